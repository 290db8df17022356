/**
 * GFF-Tools
 *
 * Lesen und Schreiben von GFF-Dateien (Generic File Format, V3.2) sowie
 * Konvertierung in eine verlustfreie XML-Darstellung.
 *
 * @example
 * ```ts
 * import { readGff, encodeGff, getField, GFFFieldType } from 'aurora-gff-tools';
 *
 * const { fileType, root } = readGff('trap01.utt');
 * console.log(getField(root, 'Tag', GFFFieldType.String));
 *
 * const bytes = encodeGff(root, { fileType });
 * ```
 */

export { GFFReader, decodeGff, readGff } from "./gff/reader.js";
export type { GFFReadOptions } from "./gff/reader.js";
export { encodeGff, writeGff } from "./gff/writer.js";
export type { GFFWriteOptions } from "./gff/writer.js";
export { createStruct, getField, setField, removeField, getFieldType, fieldLabels, fieldTypeName, formatValue, compareGff } from "./gff/struct.js";
export { BinaryReader, BinaryWriter } from "./gff/binary.js";
export * from "./gff/types.js";
export * from "./gff/errors.js";
export { convertGffToXml, formatSingle } from "./gffxml/gffxml-writer.js";
export type { GffXmlOptions } from "./gffxml/gffxml-writer.js";
export { parseGffXml } from "./gffxml/gffxml-reader.js";
