/**
 * GFF Types – Feldtypen und Tabellen des BioWare Generic File Format
 */

export enum GFFFieldType {
	UInt8 = 0,
	Int8 = 1,
	UInt16 = 2,
	Int16 = 3,
	UInt32 = 4,
	Int32 = 5,
	UInt64 = 6,
	Int64 = 7,
	Single = 8,
	Double = 9,
	String = 10,
	ResRef = 11,
	LocalizedString = 12,
	Binary = 13,
	Struct = 14,
	List = 15,
	Vector4 = 16,
	Vector3 = 17
}

export const GFF_HEADER_SIZE = 56;
export const GFF_STRUCT_ENTRY_SIZE = 12;
export const GFF_FIELD_ENTRY_SIZE = 12;
export const GFF_LABEL_SIZE = 16;
export const GFF_RESREF_SIZE = 16;
export const GFF_SUPPORTED_VERSIONS: readonly string[] = ["V3.2", "V3.3", "V4.0", "V4.1"];

/** stringRef 0xFFFFFFFF = kein Verweis in die Dialog-Tabelle */
export const GFF_NO_STRING_REF = 0xffffffff;

export type StringEncoding = "utf8" | "latin1";

export interface GFFSection {
	offset: number;
	count: number;
}

export interface GFFHeader {
	fileType: string;
	fileVersion: string;
	structs: GFFSection;
	fields: GFFSection;
	labels: GFFSection;
	/** count = Bytes */
	fieldData: GFFSection;
	/** count = Bytes */
	fieldIndices: GFFSection;
	/** count = Bytes */
	listIndices: GFFSection;
}

export interface GFFStructEntry {
	structId: number;
	dataOrOffset: number;
	fieldCount: number;
}

export interface GFFFieldEntry {
	fieldType: number;
	labelIndex: number;
	dataOrOffset: number;
}

export interface ResRef {
	value: string;
	/** Bytes hinter value bis 16 – nur gesetzt, wenn nicht alles 0 */
	padding?: Buffer;
}

export interface LocalizedSubstring {
	language: number;
	gender: number;
	text: string;
}

export interface LocalizedString {
	stringRef: number | null;
	substrings: LocalizedSubstring[];
}

export interface Vector3 {
	x: number;
	y: number;
	z: number;
}

export interface Vector4 extends Vector3 {
	w: number;
}

/** Feld mit unbekanntem Typ-Tag, unverändert übernommen (nur mit unknownFieldTypes: "preserve") */
export interface OpaqueField {
	fieldType: number;
	dataOrOffset: number;
}

export type GFFValue =
	| { type: GFFFieldType.UInt8; value: number }
	| { type: GFFFieldType.Int8; value: number }
	| { type: GFFFieldType.UInt16; value: number }
	| { type: GFFFieldType.Int16; value: number }
	| { type: GFFFieldType.UInt32; value: number }
	| { type: GFFFieldType.Int32; value: number }
	| { type: GFFFieldType.UInt64; value: bigint }
	| { type: GFFFieldType.Int64; value: bigint }
	| { type: GFFFieldType.Single; value: number }
	| { type: GFFFieldType.Double; value: number }
	| { type: GFFFieldType.String; value: string }
	| { type: GFFFieldType.ResRef; value: ResRef }
	| { type: GFFFieldType.LocalizedString; value: LocalizedString }
	| { type: GFFFieldType.Binary; value: Buffer }
	| { type: GFFFieldType.Struct; value: GFFStruct }
	| { type: GFFFieldType.List; value: GFFStruct[] }
	| { type: GFFFieldType.Vector4; value: Vector4 }
	| { type: GFFFieldType.Vector3; value: Vector3 }
	| { type: "opaque"; value: OpaqueField };

export type GFFValueOf<T extends GFFValue["type"]> = Extract<GFFValue, { type: T }>["value"];

export interface GFFStruct {
	structId: number;
	/** Reihenfolge = Feldreihenfolge in der Datei */
	fields: Map<string, GFFValue>;
}

export interface GFFDocument {
	fileType: string;
	fileVersion: string;
	root: GFFStruct;
}

const SIMPLE_TYPES: ReadonlySet<number> = new Set([
	GFFFieldType.UInt8,
	GFFFieldType.Int8,
	GFFFieldType.UInt16,
	GFFFieldType.Int16,
	GFFFieldType.UInt32,
	GFFFieldType.Int32,
	GFFFieldType.Single
]);

export function isKnownFieldType(fieldType: number): fieldType is GFFFieldType {
	return Number.isInteger(fieldType) && fieldType >= GFFFieldType.UInt8 && fieldType <= GFFFieldType.Vector3;
}

/** Wert steht direkt im 4-Byte-Slot des Feldeintrags */
export function isSimpleFieldType(fieldType: number): boolean {
	return SIMPLE_TYPES.has(fieldType);
}

/** Wert liegt im Field-Data-Block */
export function isComplexFieldType(fieldType: number): boolean {
	return isKnownFieldType(fieldType) && !isSimpleFieldType(fieldType) && fieldType !== GFFFieldType.Struct && fieldType !== GFFFieldType.List;
}
