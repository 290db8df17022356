#!/usr/bin/env node
/**
 * Verifikation gegen Example-Daten
 * GFF → Baum → GFF: Byte-Vergleich und Baum-Vergleich
 * GFF → XML → GFF: Baum-Vergleich
 * Aufruf: verify-roundtrip [verzeichnis] [--preserve-unknown] [--latin1]
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { GFFReader, type GFFReadOptions } from "../gff/reader.js";
import { encodeGff } from "../gff/writer.js";
import { compareGff } from "../gff/struct.js";
import { isPrintableTag } from "../gff/binary.js";
import { GFF_SUPPORTED_VERSIONS } from "../gff/types.js";
import { convertGffToXml } from "../gffxml/gffxml-writer.js";
import { parseGffXml } from "../gffxml/gffxml-reader.js";

function collectFiles(dir: string, base = ""): string[] {
	const files: string[] = [];
	for (const entry of readdirSync(join(dir, base), { withFileTypes: true })) {
		const rel = base ? `${base}/${entry.name}` : entry.name;
		if (entry.isDirectory()) {
			files.push(...collectFiles(dir, rel));
		} else {
			files.push(rel);
		}
	}
	return files;
}

/** Nur Dateien mit gültigem GFF-Kopf werden geprüft */
function looksLikeGff(data: Buffer): boolean {
	return data.length >= 8 && isPrintableTag(data.toString("latin1", 0, 4)) && GFF_SUPPORTED_VERSIONS.includes(data.toString("latin1", 4, 8));
}

interface FileResult {
	bytes: boolean;
	tree: boolean;
	xml: boolean;
}

function verifyFile(data: Buffer, options: GFFReadOptions): FileResult {
	const document = new GFFReader(data, options).readDocument();
	const encodeOptions = { fileType: document.fileType, fileVersion: document.fileVersion, stringEncoding: options.stringEncoding };

	const rewritten = encodeGff(document.root, encodeOptions);
	const reread = new GFFReader(rewritten, options).read();
	const diffs: string[] = [];
	const tree = compareGff(document.root, reread, (line) => diffs.push(line));

	const fromXml = parseGffXml(convertGffToXml(document));
	const xml = compareGff(document.root, fromXml.root, (line) => diffs.push(line));

	for (const line of diffs.slice(0, 10)) console.log(`       ${line}`);
	return { bytes: data.equals(rewritten), tree, xml };
}

function main() {
	const args = process.argv.slice(2);
	const dir = args.find((a) => !a.startsWith("-")) ?? join(process.cwd(), "Example");
	const options: GFFReadOptions = {
		unknownFieldTypes: args.includes("--preserve-unknown") ? "preserve" : "error",
		stringEncoding: args.includes("--latin1") ? "latin1" : "utf8"
	};
	console.log("GFF-Tools – Verifikation");
	console.log("Example-Pfad:", dir);

	if (!existsSync(dir)) {
		console.error(`${dir} nicht gefunden`);
		process.exit(1);
	}

	let checked = 0;
	let identical = 0;
	let treeDiff = 0;
	let xmlDiff = 0;
	let failed = 0;

	for (const rel of collectFiles(dir)) {
		const data = readFileSync(join(dir, rel));
		if (!looksLikeGff(data)) continue;
		checked++;
		try {
			const result = verifyFile(data, options);
			if (result.bytes) identical++;
			if (!result.tree) treeDiff++;
			if (!result.xml) xmlDiff++;
			const status = !result.tree || !result.xml ? "DIFF" : result.bytes ? "OK  " : "TREE";
			console.log(`  ${status} ${rel} (${data.length} B)`);
		} catch (err) {
			failed++;
			console.log(`  FAIL ${rel}: ${err instanceof Error ? err.message : String(err)}`);
		}
	}

	console.log(`\nGFF: ${checked} Dateien, ${identical} byte-identisch, ${treeDiff} Baum-Abweichungen, ${xmlDiff} XML-Abweichungen, ${failed} Fehler`);
	console.log("\n--- Ergebnis ---");
	const ok = treeDiff === 0 && xmlDiff === 0;
	console.log("GFF Roundtrip:", ok ? "PASS" : "FAIL");
	process.exit(ok ? 0 : 1);
}

main();
