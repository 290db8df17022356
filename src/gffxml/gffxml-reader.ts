import { readFileSync } from "node:fs";
import { XMLParser } from "fast-xml-parser";
import { GFFXmlError } from "../gff/errors.js";
import { GFFFieldType, isKnownFieldType, type GFFDocument, type GFFStruct, type GFFValue, type LocalizedSubstring } from "../gff/types.js";

type XmlElement = Record<string, unknown>;

const ARRAY_TAGS: ReadonlySet<string> = new Set(["struct", "field", "substring"]);

const TYPE_BY_NAME = new Map<string, GFFFieldType>();
for (let t = 0; t <= GFFFieldType.Vector3; t++) {
	if (isKnownFieldType(t)) TYPE_BY_NAME.set(GFFFieldType[t], t);
}

function parseXml(xml: string): unknown {
	const parser = new XMLParser({
		ignoreAttributes: false,
		attributeNamePrefix: "@_",
		trimValues: false,
		htmlEntities: true,
		isArray: (tagName, _jPath, _isLeafNode, isAttribute) => !isAttribute && ARRAY_TAGS.has(tagName)
	});
	try {
		return parser.parse(xml);
	} catch (err) {
		throw new GFFXmlError(err instanceof Error ? err.message : String(err));
	}
}

function isElement(value: unknown): value is XmlElement {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getAttr(el: XmlElement, name: string): string | undefined {
	const value = el[`@_${name}`];
	return typeof value === "string" ? value : undefined;
}

function requireAttr(el: XmlElement, name: string, context: string): string {
	const value = getAttr(el, name);
	if (value === undefined) throw new GFFXmlError(`${context}: missing attribute "${name}"`);
	return value;
}

/** Kind-Elemente eines Tags; leere Tags (<struct/>) liefert der Parser als "" */
function getChildren(el: XmlElement, tag: string, context: string): XmlElement[] {
	const value = el[tag];
	if (value === undefined) return [];
	if (!Array.isArray(value)) throw new GFFXmlError(`${context}: unexpected <${tag}> content`);
	return value.map((child: unknown) => {
		if (isElement(child)) return child;
		if (typeof child === "string" && child.trim() === "") return {};
		throw new GFFXmlError(`${context}: <${tag}> must not contain text`);
	});
}

function parseInteger(text: string, context: string): number {
	if (!/^-?\d+$/.test(text.trim())) throw new GFFXmlError(`${context}: "${text}" is not an integer`);
	return Number(text);
}

function parseBigInt(text: string, context: string): bigint {
	if (!/^-?\d+$/.test(text.trim())) throw new GFFXmlError(`${context}: "${text}" is not an integer`);
	return BigInt(text.trim());
}

function parseNumber(text: string, context: string): number {
	const value = Number(text);
	if (text.trim() === "" || (Number.isNaN(value) && text.trim() !== "NaN")) {
		throw new GFFXmlError(`${context}: "${text}" is not a number`);
	}
	return value;
}

/** Vektorkomponenten sind Float32 */
function parseComponents(text: string, count: number, context: string): number[] {
	const parts = text.trim().split(/\s+/);
	if (parts.length !== count) throw new GFFXmlError(`${context}: expected ${count} components, got "${text}"`);
	return parts.map((part) => Math.fround(parseNumber(part, context)));
}

function parseType(text: string, context: string): GFFFieldType | "opaque" {
	if (text === "opaque") return "opaque";
	const byName = TYPE_BY_NAME.get(text);
	if (byName !== undefined) return byName;
	if (/^\d+$/.test(text)) {
		const numeric = Number(text);
		if (isKnownFieldType(numeric)) return numeric;
	}
	throw new GFFXmlError(`${context}: unknown field type "${text}"`);
}

function parseStruct(el: XmlElement, context: string): GFFStruct {
	const structId = parseInteger(requireAttr(el, "id", context), `${context} id`);
	const node: GFFStruct = { structId, fields: new Map() };
	for (const fieldEl of getChildren(el, "field", context)) {
		const label = requireAttr(fieldEl, "label", context);
		if (node.fields.has(label)) throw new GFFXmlError(`${context}: duplicate field label "${label}"`);
		node.fields.set(label, parseField(fieldEl, `${context}/${label}`));
	}
	return node;
}

function parseField(el: XmlElement, context: string): GFFValue {
	const type = parseType(requireAttr(el, "type", context), context);
	const value = (): string => requireAttr(el, "value", context);

	switch (type) {
		case GFFFieldType.UInt8:
		case GFFFieldType.Int8:
		case GFFFieldType.UInt16:
		case GFFFieldType.Int16:
		case GFFFieldType.UInt32:
		case GFFFieldType.Int32:
			return { type, value: parseInteger(value(), context) };
		case GFFFieldType.UInt64:
		case GFFFieldType.Int64:
			return { type, value: parseBigInt(value(), context) };
		case GFFFieldType.Single:
			return { type, value: Math.fround(parseNumber(value(), context)) };
		case GFFFieldType.Double:
			return { type, value: parseNumber(value(), context) };
		case GFFFieldType.String:
			return { type, value: getAttr(el, "value") ?? "" };
		case GFFFieldType.ResRef: {
			const padding = getAttr(el, "padding");
			if (padding === undefined) return { type, value: { value: getAttr(el, "value") ?? "" } };
			if (!/^([0-9a-fA-F]{2})*$/.test(padding)) throw new GFFXmlError(`${context}: padding "${padding}" is not hex`);
			return { type, value: { value: getAttr(el, "value") ?? "", padding: Buffer.from(padding, "hex") } };
		}
		case GFFFieldType.LocalizedString: {
			const strref = getAttr(el, "strref") ?? "none";
			const substrings: LocalizedSubstring[] = getChildren(el, "substring", context).map((sub) => ({
				language: parseInteger(requireAttr(sub, "language", context), `${context} language`),
				gender: parseInteger(requireAttr(sub, "gender", context), `${context} gender`),
				text: getAttr(sub, "value") ?? ""
			}));
			return { type, value: { stringRef: strref === "none" ? null : parseInteger(strref, `${context} strref`), substrings } };
		}
		case GFFFieldType.Binary:
			return { type, value: Buffer.from(getAttr(el, "value") ?? "", "base64") };
		case GFFFieldType.Vector3: {
			const [x, y, z] = parseComponents(value(), 3, context);
			return { type, value: { x, y, z } };
		}
		case GFFFieldType.Vector4: {
			const [x, y, z, w] = parseComponents(value(), 4, context);
			return { type, value: { x, y, z, w } };
		}
		case GFFFieldType.Struct: {
			const structs = getChildren(el, "struct", context);
			if (structs.length !== 1) throw new GFFXmlError(`${context}: Struct field needs exactly one <struct>, got ${structs.length}`);
			return { type, value: parseStruct(structs[0], context) };
		}
		case GFFFieldType.List:
			return { type, value: getChildren(el, "struct", context).map((item, i) => parseStruct(item, `${context}/${i}`)) };
		case "opaque":
			return {
				type,
				value: {
					fieldType: parseInteger(requireAttr(el, "fieldType", context), `${context} fieldType`),
					dataOrOffset: parseInteger(value(), context)
				}
			};
	}
}

/** GFF-XML (Pfad oder Inhalt) → GFF-Dokument */
export function parseGffXml(pathOrXml: string): GFFDocument {
	const xml = pathOrXml.trimStart().startsWith("<") ? pathOrXml : readFileSync(pathOrXml, "utf8").replace(/^\uFEFF/, "");
	const doc = parseXml(xml);
	const gff = isElement(doc) ? doc.gff : undefined;
	if (!isElement(gff)) throw new GFFXmlError("no <gff> root");

	const fileType = requireAttr(gff, "type", "gff");
	const fileVersion = requireAttr(gff, "version", "gff");
	const structs = getChildren(gff, "struct", "gff");
	if (structs.length !== 1) throw new GFFXmlError(`<gff> needs exactly one root <struct>, got ${structs.length}`);

	return { fileType, fileVersion, root: parseStruct(structs[0], "GFFRoot") };
}
