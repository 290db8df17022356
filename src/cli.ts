#!/usr/bin/env node
/**
 * CLI für die GFF-Tools
 * Verwendung:
 *   info <datei>                     - Header anzeigen
 *   convert <datei> [ausgabe.xml]    - GFF zu XML
 *   convert <datei.xml> [ausgabe]    - XML zu GFF
 *   compare <a> <b>                  - Bäume vergleichen
 */

import { existsSync, writeFileSync } from "node:fs";
import { extname } from "node:path";
import { GFFReader, type GFFReadOptions } from "./gff/reader.js";
import { writeGff } from "./gff/writer.js";
import { compareGff } from "./gff/struct.js";
import type { GFFDocument, GFFSection } from "./gff/types.js";
import { convertGffToXml } from "./gffxml/gffxml-writer.js";
import { parseGffXml } from "./gffxml/gffxml-reader.js";

const argv = process.argv.slice(2);
const flags = new Set(argv.filter((a) => a.startsWith("-")));
const args = argv.filter((a) => !a.startsWith("-"));
const command = args[0];
const inputPath = args[1];
const outputPath = args[2];

const HELP = `
GFF-Tools - Reader/Writer für das Generic File Format (GFF V3.2)

Verwendung:
  info <datei>                        - Header und Sektionen anzeigen
  convert <datei> [ausgabe.xml]       - GFF zu XML konvertieren
  convert <datei.xml> [ausgabe]       - XML zurück zu GFF konvertieren
  compare <a> <b>                     - Zwei GFF-Dateien (oder XML) vergleichen

Optionen:
  --preserve-unknown                  - Unbekannte Feldtypen übernehmen statt abbrechen
  --latin1                            - Strings als Latin-1 statt UTF-8

Beispiele:
  node dist/cli.js info trap01.utt
  node dist/cli.js convert trap01.utt trap01.utt.xml
  node dist/cli.js convert trap01.utt.xml trap01.utt
  node dist/cli.js compare trap01.utt trap01_neu.utt
`;

const readOptions: GFFReadOptions = {
	unknownFieldTypes: flags.has("--preserve-unknown") ? "preserve" : "error",
	stringEncoding: flags.has("--latin1") ? "latin1" : "utf8"
};

function isXml(path: string): boolean {
	return extname(path).toLowerCase() === ".xml";
}

function requireFile(path: string): void {
	if (!existsSync(path)) {
		console.error(`Fehler: Datei nicht gefunden: ${path}`);
		process.exit(1);
	}
}

function loadDocument(path: string): GFFDocument {
	requireFile(path);
	return isXml(path) ? parseGffXml(path) : new GFFReader(path, readOptions).readDocument();
}

function formatSection(name: string, section: GFFSection): string {
	return `  ${name.padEnd(14)} Offset ${String(section.offset).padStart(8)}  Anzahl ${section.count}`;
}

if (!command || flags.has("--help") || flags.has("-h") || command === "help") {
	console.log(HELP);
	process.exit(command ? 0 : 1);
}

if (!inputPath) {
	console.error(HELP);
	process.exit(1);
}

try {
	if (command === "info") {
		requireFile(inputPath);
		const header = new GFFReader(inputPath, readOptions).getHeader();
		console.log(`Datei:   ${inputPath}`);
		console.log(`Typ:     ${JSON.stringify(header.fileType)}`);
		console.log(`Version: ${header.fileVersion}`);
		console.log(formatSection("Structs", header.structs));
		console.log(formatSection("Fields", header.fields));
		console.log(formatSection("Labels", header.labels));
		console.log(formatSection("FieldData", header.fieldData));
		console.log(formatSection("FieldIndices", header.fieldIndices));
		console.log(formatSection("ListIndices", header.listIndices));
	} else if (command === "convert") {
		const toGff = isXml(inputPath);
		const output = outputPath ?? (toGff ? inputPath.replace(/\.xml$/i, "") : `${inputPath}.xml`);
		console.log(`Konvertiere ${inputPath} → ${output}...`);

		const document = loadDocument(inputPath);
		if (toGff) {
			writeGff(document.root, output, {
				fileType: document.fileType,
				fileVersion: document.fileVersion,
				stringEncoding: readOptions.stringEncoding
			});
		} else {
			writeFileSync(output, convertGffToXml(document), "utf8");
		}
		console.log(`Fertig: ${output} erstellt`);
	} else if (command === "compare") {
		if (!outputPath) {
			console.error(HELP);
			process.exit(1);
		}
		const a = loadDocument(inputPath);
		const b = loadDocument(outputPath);
		const same = compareGff(a.root, b.root);
		console.log(same ? "Keine Unterschiede" : "Unterschiede gefunden");
		process.exit(same ? 0 : 1);
	} else {
		console.error(`Unbekannter Befehl: ${command}`);
		process.exit(1);
	}
} catch (err) {
	console.error("Fehler:", err instanceof Error ? err.message : err);
	process.exit(1);
}
