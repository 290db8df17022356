import { writeFileSync } from "node:fs";
import { BinaryWriter, encodeAscii, encodeText, isPrintableTag } from "./binary.js";
import { CyclicStructReferenceError, GFFEncodingError } from "./errors.js";
import { fieldTypeName } from "./struct.js";
import {
	GFF_FIELD_ENTRY_SIZE,
	GFF_HEADER_SIZE,
	GFF_LABEL_SIZE,
	GFF_NO_STRING_REF,
	GFF_RESREF_SIZE,
	GFF_STRUCT_ENTRY_SIZE,
	GFF_SUPPORTED_VERSIONS,
	GFFFieldType,
	type GFFStruct,
	type GFFValue,
	type LocalizedString,
	type ResRef,
	type StringEncoding
} from "./types.js";

export interface GFFWriteOptions {
	/** 4 Zeichen, z.B. "UTT " (Standard "GFF ") */
	fileType?: string;
	/** Standard "V3.2" */
	fileVersion?: string;
	stringEncoding?: StringEncoding;
}

interface FlatField {
	label: string;
	value: GFFValue;
	/** Struct-Index (Struct) bzw. Struct-Indizes (List) */
	refs: number[];
}

interface FlatStruct {
	structId: number;
	fields: FlatField[];
}

interface Layout {
	structs: FlatStruct[];
	labels: string[];
	labelIndex: Map<string, number>;
}

function checkInteger(value: number, min: number, max: number, what: string): number {
	if (!Number.isInteger(value) || value < min || value > max) {
		throw new GFFEncodingError(`${what}: ${value} is not an integer in [${min}, ${max}]`);
	}
	return value;
}

function checkBigInt(value: bigint, min: bigint, max: bigint, what: string): bigint {
	if (value < min || value > max) {
		throw new GFFEncodingError(`${what}: ${value} is out of range [${min}, ${max}]`);
	}
	return value;
}

function addLabel(layout: Layout, label: string): void {
	if (layout.labelIndex.has(label)) return;
	const encoded = encodeAscii(label, "Label");
	// Labels sind NUL-aufgefüllt
	if (encoded.includes(0)) {
		throw new GFFEncodingError(`Label ${JSON.stringify(label)} contains a NUL character`);
	}
	if (encoded.length > GFF_LABEL_SIZE) {
		throw new GFFEncodingError(`Label "${label}" is longer than ${GFF_LABEL_SIZE} characters`);
	}
	layout.labelIndex.set(label, layout.labels.length);
	layout.labels.push(label);
}

/** Pre-Order: Root = 0, Labels in Reihenfolge des ersten Auftretens */
function flattenStruct(node: GFFStruct, layout: Layout, ancestors: readonly GFFStruct[], trail: readonly string[]): number {
	if (ancestors.includes(node)) {
		throw new CyclicStructReferenceError(trail);
	}
	const index = layout.structs.length;
	const flat: FlatStruct = { structId: node.structId, fields: [] };
	layout.structs.push(flat);
	const lineage = [...ancestors, node];

	for (const [label, value] of node.fields) {
		addLabel(layout, label);
		const field: FlatField = { label, value, refs: [] };
		flat.fields.push(field);
		if (value.type === GFFFieldType.Struct) {
			field.refs.push(flattenStruct(value.value, layout, lineage, [...trail, label]));
		} else if (value.type === GFFFieldType.List) {
			value.value.forEach((item, i) => {
				field.refs.push(flattenStruct(item, layout, lineage, [...trail, `${label}[${i}]`]));
			});
		}
	}
	return index;
}

/** [Länge: u8][16 Bytes]; Gelesenes Padding nur bei passender Länge, sonst Nullen */
function encodeResRef(ref: ResRef, what: string): Buffer {
	const value = encodeAscii(ref.value, what);
	if (value.length > GFF_RESREF_SIZE) {
		throw new GFFEncodingError(`${what}: ResRef "${ref.value}" is longer than ${GFF_RESREF_SIZE} characters`);
	}
	const out = Buffer.alloc(1 + GFF_RESREF_SIZE);
	out.writeUInt8(value.length, 0);
	value.copy(out, 1);
	if (ref.padding && ref.padding.length === GFF_RESREF_SIZE - value.length) {
		out.set(ref.padding, 1 + value.length);
	}
	return out;
}

function encodeLocalizedString(loc: LocalizedString, encoding: StringEncoding, what: string): Buffer {
	const parts = loc.substrings.map((sub) => ({
		stringId: (checkInteger(sub.language, 0, 0xff, `${what} language`) << 8) | checkInteger(sub.gender, 0, 0xff, `${what} gender`),
		text: encodeText(sub.text, encoding, `${what} substring`)
	}));
	const totalSize = 8 + parts.reduce((sum, p) => sum + 8 + p.text.length, 0);
	// 0xFFFFFFFF ist für "kein Verweis" reserviert → null
	const stringRef = loc.stringRef === null ? GFF_NO_STRING_REF : checkInteger(loc.stringRef, 0, GFF_NO_STRING_REF - 1, `${what} stringRef`);

	const out = new BinaryWriter();
	out.u32(totalSize);
	out.u32(stringRef);
	out.u32(parts.length);
	for (const part of parts) {
		out.u32(part.stringId);
		out.u32(part.text.length);
		out.bytes(part.text);
	}
	return out.toBuffer();
}

class SectionWriter {
	public readonly fieldData = new BinaryWriter();
	public readonly fieldIndices = new BinaryWriter();
	public readonly listIndices = new BinaryWriter();

	constructor(private readonly encoding: StringEncoding) {}

	/** Schreibt den 4-Byte-Slot (slot = fieldBuf-Position) und liefert das Typ-Tag */
	public writeField(field: FlatField, fieldBuf: Buffer, slot: number): number {
		const { value } = field;
		const what = `Field "${field.label}" (${fieldTypeName(value)})`;

		if (value.type === "opaque") {
			// Unverändert zurückschreiben
			fieldBuf.writeUInt32LE(checkInteger(value.value.dataOrOffset, 0, 0xffffffff, what), slot);
			return checkInteger(value.value.fieldType, GFFFieldType.Vector3 + 1, 0xffffffff, what);
		}

		switch (value.type) {
			case GFFFieldType.UInt8:
				fieldBuf.writeUInt8(checkInteger(value.value, 0, 0xff, what), slot);
				break;
			case GFFFieldType.Int8:
				fieldBuf.writeInt8(checkInteger(value.value, -0x80, 0x7f, what), slot);
				break;
			case GFFFieldType.UInt16:
				fieldBuf.writeUInt16LE(checkInteger(value.value, 0, 0xffff, what), slot);
				break;
			case GFFFieldType.Int16:
				fieldBuf.writeInt16LE(checkInteger(value.value, -0x8000, 0x7fff, what), slot);
				break;
			case GFFFieldType.UInt32:
				fieldBuf.writeUInt32LE(checkInteger(value.value, 0, 0xffffffff, what), slot);
				break;
			case GFFFieldType.Int32:
				fieldBuf.writeInt32LE(checkInteger(value.value, -0x80000000, 0x7fffffff, what), slot);
				break;
			case GFFFieldType.Single:
				fieldBuf.writeFloatLE(value.value, slot);
				break;
			case GFFFieldType.UInt64:
				fieldBuf.writeUInt32LE(this.fieldData.u64(checkBigInt(value.value, 0n, 0xffffffffffffffffn, what)), slot);
				break;
			case GFFFieldType.Int64:
				fieldBuf.writeUInt32LE(this.fieldData.i64(checkBigInt(value.value, -0x8000000000000000n, 0x7fffffffffffffffn, what)), slot);
				break;
			case GFFFieldType.Double:
				fieldBuf.writeUInt32LE(this.fieldData.f64(value.value), slot);
				break;
			case GFFFieldType.String:
			case GFFFieldType.Binary: {
				const bytes = value.type === GFFFieldType.String ? encodeText(value.value, this.encoding, what) : value.value;
				fieldBuf.writeUInt32LE(this.fieldData.u32(bytes.length), slot);
				this.fieldData.bytes(bytes);
				break;
			}
			case GFFFieldType.ResRef:
				fieldBuf.writeUInt32LE(this.fieldData.bytes(encodeResRef(value.value, what)), slot);
				break;
			case GFFFieldType.LocalizedString:
				fieldBuf.writeUInt32LE(this.fieldData.bytes(encodeLocalizedString(value.value, this.encoding, what)), slot);
				break;
			case GFFFieldType.Vector3: {
				const { x, y, z } = value.value;
				fieldBuf.writeUInt32LE(this.fieldData.f32(x), slot);
				this.fieldData.f32(y);
				this.fieldData.f32(z);
				break;
			}
			case GFFFieldType.Vector4: {
				const { x, y, z, w } = value.value;
				fieldBuf.writeUInt32LE(this.fieldData.f32(x), slot);
				this.fieldData.f32(y);
				this.fieldData.f32(z);
				this.fieldData.f32(w);
				break;
			}
			case GFFFieldType.Struct:
				fieldBuf.writeUInt32LE(field.refs[0], slot);
				break;
			case GFFFieldType.List:
				fieldBuf.writeUInt32LE(this.listIndices.u32(field.refs.length), slot);
				for (const ref of field.refs) this.listIndices.u32(ref);
				break;
		}
		return value.type;
	}
}

/**
 * GFF-Baum → Buffer. Sektionen in fester Reihenfolge:
 * Header, Structs, Fields, Labels, FieldData, FieldIndices, ListIndices.
 */
export function encodeGff(root: GFFStruct, options: GFFWriteOptions = {}): Buffer {
	const fileType = options.fileType ?? "GFF ";
	const fileVersion = options.fileVersion ?? "V3.2";
	if (!isPrintableTag(fileType)) {
		throw new GFFEncodingError(`File type ${JSON.stringify(fileType)} must be 4 printable ASCII characters`);
	}
	if (!GFF_SUPPORTED_VERSIONS.includes(fileVersion)) {
		throw new GFFEncodingError(`File version ${JSON.stringify(fileVersion)} is not one of ${GFF_SUPPORTED_VERSIONS.join(", ")}`);
	}

	const layout: Layout = { structs: [], labels: [], labelIndex: new Map() };
	flattenStruct(root, layout, [], ["GFFRoot"]);

	const fieldCount = layout.structs.reduce((sum, s) => sum + s.fields.length, 0);
	const structBuf = Buffer.alloc(layout.structs.length * GFF_STRUCT_ENTRY_SIZE);
	const fieldBuf = Buffer.alloc(fieldCount * GFF_FIELD_ENTRY_SIZE);
	const labelBuf = Buffer.alloc(layout.labels.length * GFF_LABEL_SIZE);
	const sections = new SectionWriter(options.stringEncoding ?? "utf8");

	let nextField = 0;
	layout.structs.forEach((flat, structIndex) => {
		const fieldIndices: number[] = [];
		for (const field of flat.fields) {
			const fieldIndex = nextField++;
			const pos = fieldIndex * GFF_FIELD_ENTRY_SIZE;
			fieldIndices.push(fieldIndex);
			const fieldType = sections.writeField(field, fieldBuf, pos + 8);
			fieldBuf.writeUInt32LE(fieldType, pos);
			fieldBuf.writeUInt32LE(layout.labelIndex.get(field.label) ?? 0, pos + 4);
		}

		let dataOrOffset: number;
		if (fieldIndices.length === 0) {
			dataOrOffset = 0xffffffff;
		} else if (fieldIndices.length === 1) {
			dataOrOffset = fieldIndices[0];
		} else {
			dataOrOffset = sections.fieldIndices.size;
			for (const index of fieldIndices) sections.fieldIndices.u32(index);
		}

		const pos = structIndex * GFF_STRUCT_ENTRY_SIZE;
		structBuf.writeInt32LE(checkInteger(flat.structId, -0x80000000, 0x7fffffff, `Struct ${structIndex} id`), pos);
		structBuf.writeUInt32LE(dataOrOffset, pos + 4);
		structBuf.writeUInt32LE(fieldIndices.length, pos + 8);
	});

	layout.labels.forEach((label, i) => {
		labelBuf.write(label, i * GFF_LABEL_SIZE, "latin1");
	});

	const fieldDataBuf = sections.fieldData.toBuffer();
	const fieldIndicesBuf = sections.fieldIndices.toBuffer();
	const listIndicesBuf = sections.listIndices.toBuffer();

	const structOffset = GFF_HEADER_SIZE;
	const fieldOffset = structOffset + structBuf.length;
	const labelOffset = fieldOffset + fieldBuf.length;
	const fieldDataOffset = labelOffset + labelBuf.length;
	const fieldIndicesOffset = fieldDataOffset + fieldDataBuf.length;
	const listIndicesOffset = fieldIndicesOffset + fieldIndicesBuf.length;

	const header = Buffer.alloc(GFF_HEADER_SIZE);
	header.write(fileType, 0, "latin1");
	header.write(fileVersion, 4, "latin1");
	header.writeUInt32LE(structOffset, 8);
	header.writeUInt32LE(layout.structs.length, 12);
	header.writeUInt32LE(fieldOffset, 16);
	header.writeUInt32LE(fieldCount, 20);
	header.writeUInt32LE(labelOffset, 24);
	header.writeUInt32LE(layout.labels.length, 28);
	header.writeUInt32LE(fieldDataOffset, 32);
	header.writeUInt32LE(fieldDataBuf.length, 36);
	header.writeUInt32LE(fieldIndicesOffset, 40);
	header.writeUInt32LE(fieldIndicesBuf.length, 44);
	header.writeUInt32LE(listIndicesOffset, 48);
	header.writeUInt32LE(listIndicesBuf.length, 52);

	return Buffer.concat([header, structBuf, fieldBuf, labelBuf, fieldDataBuf, fieldIndicesBuf, listIndicesBuf]);
}

export function writeGff(root: GFFStruct, outputPath: string, options?: GFFWriteOptions): void {
	writeFileSync(outputPath, encodeGff(root, options));
}
