import { fieldTypeName } from "../gff/struct.js";
import { GFFFieldType, type GFFDocument, type GFFStruct, type GFFValue } from "../gff/types.js";

export interface GffXmlOptions {
	/** Zeilenende, Standard "\n" */
	eol?: string;
}

export function convertGffToXml(document: GFFDocument, options?: GffXmlOptions): string {
	const eol = options?.eol ?? "\n";
	let xml = '<?xml version="1.0" encoding="utf-8"?>' + eol;
	xml += `<gff type="${escapeXml(document.fileType)}" version="${escapeXml(document.fileVersion)}">` + eol;
	xml += serializeStruct(document.root, 1, eol);
	xml += "</gff>" + eol;
	return xml;
}

function serializeStruct(node: GFFStruct, indent: number, eol: string): string {
	const spacing = "\t".repeat(indent);
	if (node.fields.size === 0) {
		return `${spacing}<struct id="${node.structId}" />${eol}`;
	}
	let xml = `${spacing}<struct id="${node.structId}">${eol}`;
	for (const [label, value] of node.fields) {
		xml += serializeField(label, value, indent + 1, eol);
	}
	xml += `${spacing}</struct>${eol}`;
	return xml;
}

function serializeField(label: string, value: GFFValue, indent: number, eol: string): string {
	const spacing = "\t".repeat(indent);
	const inner = "\t".repeat(indent + 1);
	const head = `${spacing}<field label="${escapeXml(label)}" type="${fieldTypeName(value)}"`;

	switch (value.type) {
		case GFFFieldType.Struct:
			return `${head}>${eol}${serializeStruct(value.value, indent + 1, eol)}${spacing}</field>${eol}`;
		case GFFFieldType.List: {
			if (value.value.length === 0) return `${head} />${eol}`;
			const items = value.value.map((item) => serializeStruct(item, indent + 1, eol)).join("");
			return `${head}>${eol}${items}${spacing}</field>${eol}`;
		}
		case GFFFieldType.LocalizedString: {
			const strref = value.value.stringRef === null ? "none" : String(value.value.stringRef);
			if (value.value.substrings.length === 0) return `${head} strref="${strref}" />${eol}`;
			let xml = `${head} strref="${strref}">${eol}`;
			for (const sub of value.value.substrings) {
				xml += `${inner}<substring language="${sub.language}" gender="${sub.gender}" value="${escapeXml(sub.text)}" />${eol}`;
			}
			return xml + `${spacing}</field>${eol}`;
		}
		case GFFFieldType.ResRef: {
			const padding = value.value.padding ? ` padding="${value.value.padding.toString("hex")}"` : "";
			return `${head} value="${escapeXml(value.value.value)}"${padding} />${eol}`;
		}
		case "opaque":
			return `${head} fieldType="${value.value.fieldType}" value="${value.value.dataOrOffset}" />${eol}`;
		default:
			return `${head} value="${escapeXml(formatScalar(value))}" />${eol}`;
	}
}

function formatScalar(value: GFFValue): string {
	switch (value.type) {
		case GFFFieldType.Single:
			return formatSingle(value.value);
		case GFFFieldType.Double:
			return Object.is(value.value, -0) ? "-0" : String(value.value);
		case GFFFieldType.String:
			return value.value;
		case GFFFieldType.Binary:
			return value.value.toString("base64");
		case GFFFieldType.Vector3:
			return [value.value.x, value.value.y, value.value.z].map(formatSingle).join(" ");
		case GFFFieldType.Vector4:
			return [value.value.x, value.value.y, value.value.z, value.value.w].map(formatSingle).join(" ");
		case GFFFieldType.UInt8:
		case GFFFieldType.Int8:
		case GFFFieldType.UInt16:
		case GFFFieldType.Int16:
		case GFFFieldType.UInt32:
		case GFFFieldType.Int32:
		case GFFFieldType.UInt64:
		case GFFFieldType.Int64:
			return value.value.toString();
		default:
			throw new Error(`No scalar form for field type ${fieldTypeName(value)}`);
	}
}

/** Kürzeste Dezimaldarstellung, die wieder denselben Float32-Wert ergibt */
export function formatSingle(n: number): string {
	if (!Number.isFinite(n)) return String(n);
	const v = Math.fround(n);
	if (Object.is(v, -0)) return "-0";
	for (let digits = 1; digits <= 9; digits++) {
		const candidate = Number(v.toPrecision(digits));
		if (Math.fround(candidate) === v) return String(candidate);
	}
	return String(v);
}

/** Attributwerte: <>&" sowie Steuerzeichen als Zeichenreferenz */
export function escapeXml(unsafe: string): string {
	return unsafe.replace(/[<>&"\x00-\x1f]/g, (c) => {
		switch (c) {
			case "<":
				return "&lt;";
			case ">":
				return "&gt;";
			case "&":
				return "&amp;";
			case '"':
				return "&quot;";
			default:
				return `&#${c.charCodeAt(0)};`;
		}
	});
}
