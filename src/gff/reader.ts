import { readFileSync } from "node:fs";
import { BinaryReader, isPrintableTag } from "./binary.js";
import {
	CyclicStructReferenceError,
	DuplicateFieldLabelError,
	GFFEncodingError,
	InvalidFieldIndexError,
	InvalidLabelIndexError,
	InvalidStructIndexError,
	MalformedHeaderError,
	SharedStructReferenceError,
	TruncatedFieldDataError,
	UnknownFieldTypeError
} from "./errors.js";
import {
	GFF_FIELD_ENTRY_SIZE,
	GFF_HEADER_SIZE,
	GFF_LABEL_SIZE,
	GFF_NO_STRING_REF,
	GFF_RESREF_SIZE,
	GFF_STRUCT_ENTRY_SIZE,
	GFF_SUPPORTED_VERSIONS,
	type GFFDocument,
	type GFFFieldEntry,
	GFFFieldType,
	type GFFHeader,
	type GFFSection,
	type GFFStruct,
	type GFFStructEntry,
	type GFFValue,
	type LocalizedString,
	type LocalizedSubstring,
	type ResRef,
	type StringEncoding
} from "./types.js";

export interface GFFReadOptions {
	/** "error" (Standard) bricht ab, "preserve" übernimmt unbekannte Feldtypen als opaque */
	unknownFieldTypes?: "error" | "preserve";
	stringEncoding?: StringEncoding;
}

/**
 * Liest GFF-Dateien. Der Header wird sofort geprüft, Structs und Felder erst beim Zugriff –
 * readStruct(i) löst nur den Teilbaum ab i auf.
 */
export class GFFReader {
	private buffer: Buffer;
	private file: BinaryReader;
	private header: GFFHeader;
	private fieldData: BinaryReader;
	private fieldIndices: BinaryReader;
	private listIndices: BinaryReader;
	private unknownFieldTypes: "error" | "preserve";
	private stringEncoding: StringEncoding;

	constructor(pathOrBuffer: string | Buffer, options: GFFReadOptions = {}) {
		this.buffer = Buffer.isBuffer(pathOrBuffer) ? pathOrBuffer : readFileSync(pathOrBuffer);
		this.file = new BinaryReader(this.buffer);
		this.unknownFieldTypes = options.unknownFieldTypes ?? "error";
		this.stringEncoding = options.stringEncoding ?? "utf8";
		this.header = this.readHeader();
		this.fieldData = this.sectionReader("fieldData", this.header.fieldData);
		this.fieldIndices = this.sectionReader("fieldIndices", this.header.fieldIndices);
		this.listIndices = this.sectionReader("listIndices", this.header.listIndices);
	}

	public read(): GFFStruct {
		return this.readStruct(0);
	}

	public readStruct(index: number): GFFStruct {
		return this.resolveStruct(index, [], new Set());
	}

	public readDocument(): GFFDocument {
		return {
			fileType: this.header.fileType,
			fileVersion: this.header.fileVersion,
			root: this.read()
		};
	}

	public getHeader(): GFFHeader {
		return this.header;
	}

	public getStructEntry(index: number): GFFStructEntry {
		const { offset, count } = this.header.structs;
		if (!Number.isInteger(index) || index < 0 || index >= count) {
			throw new InvalidStructIndexError(index, count);
		}
		const pos = offset + index * GFF_STRUCT_ENTRY_SIZE;
		return {
			structId: this.file.i32(pos),
			dataOrOffset: this.file.u32(pos + 4),
			fieldCount: this.file.u32(pos + 8)
		};
	}

	public getFieldEntry(index: number): GFFFieldEntry {
		const { offset, count } = this.header.fields;
		if (!Number.isInteger(index) || index < 0 || index >= count) {
			throw new InvalidFieldIndexError(index, count);
		}
		const pos = offset + index * GFF_FIELD_ENTRY_SIZE;
		return {
			fieldType: this.file.u32(pos),
			labelIndex: this.file.u32(pos + 4),
			dataOrOffset: this.file.u32(pos + 8)
		};
	}

	/** 16 Bytes ASCII, abschließende NULs entfernt */
	public getLabel(index: number): string {
		const { offset, count } = this.header.labels;
		if (!Number.isInteger(index) || index < 0 || index >= count) {
			throw new InvalidLabelIndexError(index, count);
		}
		const pos = offset + index * GFF_LABEL_SIZE;
		let length = GFF_LABEL_SIZE;
		while (length > 0 && this.buffer[pos + length - 1] === 0) length--;
		return this.file.ascii(pos, length);
	}

	private readHeader(): GFFHeader {
		if (this.buffer.length < GFF_HEADER_SIZE) {
			throw new MalformedHeaderError(`File too small for a GFF header: ${this.buffer.length} bytes`);
		}
		const fileType = this.buffer.toString("latin1", 0, 4);
		const fileVersion = this.buffer.toString("latin1", 4, 8);
		if (!isPrintableTag(fileType)) {
			throw new MalformedHeaderError(`Not a valid binary GFF file: file type ${JSON.stringify(fileType)}`);
		}
		if (!isPrintableTag(fileVersion)) {
			throw new MalformedHeaderError(`Not a valid binary GFF file: version ${JSON.stringify(fileVersion)}`);
		}
		if (!GFF_SUPPORTED_VERSIONS.includes(fileVersion)) {
			throw new MalformedHeaderError(`GFF version ${fileVersion} is unsupported`);
		}

		const section = (pos: number): GFFSection => ({
			offset: this.buffer.readUInt32LE(pos),
			count: this.buffer.readUInt32LE(pos + 4)
		});
		const header: GFFHeader = {
			fileType,
			fileVersion,
			structs: section(8),
			fields: section(16),
			labels: section(24),
			fieldData: section(32),
			fieldIndices: section(40),
			listIndices: section(48)
		};

		if (header.structs.count === 0) {
			throw new MalformedHeaderError("GFF has no structs (root struct missing)");
		}
		this.checkSection("structs", header.structs, GFF_STRUCT_ENTRY_SIZE);
		this.checkSection("fields", header.fields, GFF_FIELD_ENTRY_SIZE);
		this.checkSection("labels", header.labels, GFF_LABEL_SIZE);
		this.checkSection("fieldData", header.fieldData, 1);
		this.checkSection("fieldIndices", header.fieldIndices, 1);
		this.checkSection("listIndices", header.listIndices, 1);
		return header;
	}

	private checkSection(name: string, section: GFFSection, entrySize: number) {
		if (section.count === 0) return;
		const end = section.offset + section.count * entrySize;
		if (end > this.buffer.length) {
			throw new MalformedHeaderError(
				`Section ${name} (offset ${section.offset}, count ${section.count}) ends at ${end}, past end of file (${this.buffer.length} bytes)`
			);
		}
	}

	private sectionReader(name: string, section: GFFSection): BinaryReader {
		// Leere Sektion: Offset wird nicht ausgewertet
		const start = section.count > 0 ? section.offset : 0;
		return new BinaryReader(this.buffer, start, start + section.count, (offset, length, size) => new TruncatedFieldDataError(name, offset, length, size));
	}

	/** visited: alle in diesem Aufruf aufgelösten Structs, jeder Struct hat genau einen Elternteil */
	private resolveStruct(index: number, path: readonly number[], visited: Set<number>): GFFStruct {
		if (path.includes(index)) {
			throw new CyclicStructReferenceError([...path, index]);
		}
		if (visited.has(index)) {
			throw new SharedStructReferenceError(index, path);
		}
		visited.add(index);
		const entry = this.getStructEntry(index);
		const node: GFFStruct = { structId: entry.structId, fields: new Map() };
		const childPath = [...path, index];

		for (const fieldIndex of this.fieldIndicesOf(entry)) {
			const field = this.getFieldEntry(fieldIndex);
			const label = this.getLabel(field.labelIndex);
			if (node.fields.has(label)) {
				throw new DuplicateFieldLabelError(label, index);
			}
			node.fields.set(label, this.resolveField(field, fieldIndex, childPath, visited));
		}
		return node;
	}

	private fieldIndicesOf(entry: GFFStructEntry): number[] {
		if (entry.fieldCount === 0) return [];
		if (entry.fieldCount === 1) return [entry.dataOrOffset];
		const indices: number[] = [];
		for (let i = 0; i < entry.fieldCount; i++) {
			indices.push(this.fieldIndices.u32(entry.dataOrOffset + i * 4));
		}
		return indices;
	}

	private resolveField(field: GFFFieldEntry, fieldIndex: number, path: readonly number[], visited: Set<number>): GFFValue {
		// Einfache Typen: Wert im 4-Byte-Slot des Feldeintrags
		const slot = this.header.fields.offset + fieldIndex * GFF_FIELD_ENTRY_SIZE + 8;
		const offset = field.dataOrOffset;

		switch (field.fieldType) {
			case GFFFieldType.UInt8:
				return { type: GFFFieldType.UInt8, value: this.file.u8(slot) };
			case GFFFieldType.Int8:
				return { type: GFFFieldType.Int8, value: this.file.i8(slot) };
			case GFFFieldType.UInt16:
				return { type: GFFFieldType.UInt16, value: this.file.u16(slot) };
			case GFFFieldType.Int16:
				return { type: GFFFieldType.Int16, value: this.file.i16(slot) };
			case GFFFieldType.UInt32:
				return { type: GFFFieldType.UInt32, value: this.file.u32(slot) };
			case GFFFieldType.Int32:
				return { type: GFFFieldType.Int32, value: this.file.i32(slot) };
			case GFFFieldType.Single:
				return { type: GFFFieldType.Single, value: this.file.f32(slot) };
			case GFFFieldType.UInt64:
				return { type: GFFFieldType.UInt64, value: this.fieldData.u64(offset) };
			case GFFFieldType.Int64:
				return { type: GFFFieldType.Int64, value: this.fieldData.i64(offset) };
			case GFFFieldType.Double:
				return { type: GFFFieldType.Double, value: this.fieldData.f64(offset) };
			case GFFFieldType.String: {
				const length = this.fieldData.u32(offset);
				return { type: GFFFieldType.String, value: this.fieldData.text(offset + 4, length, this.stringEncoding) };
			}
			case GFFFieldType.ResRef:
				return { type: GFFFieldType.ResRef, value: this.readResRef(offset) };
			case GFFFieldType.LocalizedString:
				return { type: GFFFieldType.LocalizedString, value: this.readLocalizedString(offset) };
			case GFFFieldType.Binary: {
				const length = this.fieldData.u32(offset);
				return { type: GFFFieldType.Binary, value: this.fieldData.bytes(offset + 4, length) };
			}
			case GFFFieldType.Vector3:
				return {
					type: GFFFieldType.Vector3,
					value: { x: this.fieldData.f32(offset), y: this.fieldData.f32(offset + 4), z: this.fieldData.f32(offset + 8) }
				};
			case GFFFieldType.Vector4:
				return {
					type: GFFFieldType.Vector4,
					value: {
						x: this.fieldData.f32(offset),
						y: this.fieldData.f32(offset + 4),
						z: this.fieldData.f32(offset + 8),
						w: this.fieldData.f32(offset + 12)
					}
				};
			case GFFFieldType.Struct:
				return { type: GFFFieldType.Struct, value: this.resolveStruct(offset, path, visited) };
			case GFFFieldType.List:
				return { type: GFFFieldType.List, value: this.readList(offset, path, visited) };
			default:
				if (this.unknownFieldTypes === "preserve") {
					return { type: "opaque", value: { fieldType: field.fieldType, dataOrOffset: field.dataOrOffset } };
				}
				throw new UnknownFieldTypeError(field.fieldType, fieldIndex);
		}
	}

	/** [Länge: u8][16 Bytes] – Rest hinter der Länge ist Padding */
	private readResRef(offset: number): ResRef {
		const length = this.fieldData.u8(offset);
		const raw = this.fieldData.bytes(offset + 1, GFF_RESREF_SIZE);
		if (length > GFF_RESREF_SIZE) {
			throw new GFFEncodingError(`ResRef length ${length} at field data offset ${offset} exceeds ${GFF_RESREF_SIZE}`);
		}
		const value = this.fieldData.ascii(offset + 1, length);
		const padding = raw.subarray(length);
		return padding.some((b) => b !== 0) ? { value, padding } : { value };
	}

	/** [totalSize][stringRef][count] + count × [stringId][len][bytes], begrenzt auf 4 + totalSize */
	private readLocalizedString(offset: number): LocalizedString {
		const totalSize = this.fieldData.u32(offset);
		const body = this.fieldData.window(offset + 4, totalSize);
		const stringRef = body.u32(0);
		const count = body.u32(4);
		const substrings: LocalizedSubstring[] = [];
		let pos = 8;
		for (let i = 0; i < count; i++) {
			const stringId = body.u32(pos);
			const length = body.u32(pos + 4);
			substrings.push({
				language: (stringId >> 8) & 0xff,
				gender: stringId & 0xff,
				text: body.text(pos + 8, length, this.stringEncoding)
			});
			pos += 8 + length;
		}
		return { stringRef: stringRef === GFF_NO_STRING_REF ? null : stringRef, substrings };
	}

	/** [count: u32] + count × Struct-Index */
	private readList(offset: number, path: readonly number[], visited: Set<number>): GFFStruct[] {
		const count = this.listIndices.u32(offset);
		const items: GFFStruct[] = [];
		for (let i = 0; i < count; i++) {
			items.push(this.resolveStruct(this.listIndices.u32(offset + 4 + i * 4), path, visited));
		}
		return items;
	}
}

export function decodeGff(buffer: Buffer, options?: GFFReadOptions): GFFStruct {
	return new GFFReader(buffer, options).read();
}

export function readGff(pathOrBuffer: string | Buffer, options?: GFFReadOptions): GFFDocument {
	return new GFFReader(pathOrBuffer, options).readDocument();
}
