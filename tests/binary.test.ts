/**
 * Tests for the binary primitives and field type classification
 */
import { describe, expect, it } from "vitest";
import { BinaryReader, BinaryWriter, encodeAscii, encodeText, isPrintableTag } from "../src/gff/binary.js";
import { GFFEncodingError } from "../src/gff/errors.js";
import { GFFFieldType, isComplexFieldType, isKnownFieldType, isSimpleFieldType } from "../src/gff/types.js";

describe("BinaryReader", () => {
	const data = Buffer.from([0xff, 0xfe, 0xff, 0xff, 0xff, 0x41, 0x42, 0x43]);

	it("reads little-endian values relative to its window", () => {
		const reader = new BinaryReader(data, 1, 5);
		expect(reader.size).toBe(4);
		expect(reader.u8(0)).toBe(0xfe);
		expect(reader.i8(0)).toBe(-2);
		expect(reader.u16(0)).toBe(0xfffe);
		expect(reader.i32(0)).toBe(-2);
		expect(reader.u32(0)).toBe(0xfffffffe);
	});

	it("throws the overrun error of the window", () => {
		const reader = new BinaryReader(data, 0, 4, (offset, length, size) => new Error(`${offset}+${length}>${size}`));
		expect(() => reader.u32(1)).toThrow("1+4>4");
		expect(() => reader.window(2, 2).u32(0)).toThrow("0+4>2");
		expect(() => new BinaryReader(data).u8(8)).toThrow(RangeError);
	});

	it("copies bytes out of the source buffer", () => {
		const source = Buffer.from([1, 2, 3]);
		const copy = new BinaryReader(source).bytes(0, 3);
		source[0] = 9;
		expect(copy).toEqual(Buffer.from([1, 2, 3]));
	});

	it("requires ASCII where asked", () => {
		const reader = new BinaryReader(data);
		expect(reader.ascii(5, 3)).toBe("ABC");
		expect(() => reader.ascii(4, 2)).toThrow("Non-ASCII byte 0xff at offset 4");
		expect(reader.text(5, 3, "latin1")).toBe("ABC");
	});

	it("decodes UTF-8 strictly", () => {
		const reader = new BinaryReader(Buffer.from([0x00, 0xc3, 0xbc, 0xc3]));
		expect(reader.text(1, 2, "utf8")).toBe("ü");
		expect(() => reader.text(1, 3, "utf8")).toThrow(GFFEncodingError);
		expect(() => reader.text(3, 1, "utf8")).toThrow("Invalid UTF-8 in 1 bytes at offset 3");
		expect(reader.text(3, 1, "latin1")).toBe("\xc3");
	});
});

describe("BinaryWriter", () => {
	it("returns the offset of every value and grows as needed", () => {
		const writer = new BinaryWriter();
		expect(writer.u8(1)).toBe(0);
		expect(writer.u32(2)).toBe(1);
		expect(writer.bytes(Buffer.alloc(300, 7))).toBe(5);
		expect(writer.f32(0.5)).toBe(305);
		expect(writer.size).toBe(309);

		const out = writer.toBuffer();
		expect(out.length).toBe(309);
		expect(out.readUInt32LE(1)).toBe(2);
		expect(out[304]).toBe(7);
		expect(out.readFloatLE(305)).toBe(0.5);
	});

	it("writes 64-bit values", () => {
		const writer = new BinaryWriter();
		writer.u64(1n);
		writer.i64(-1n);
		writer.f64(0.1);
		const out = writer.toBuffer();
		expect(out.readBigUInt64LE(0)).toBe(1n);
		expect(out.readBigInt64LE(8)).toBe(-1n);
		expect(out.readDoubleLE(16)).toBe(0.1);
	});
});

describe("header tags", () => {
	it("checks printable four-character tags", () => {
		expect(isPrintableTag("UTT ")).toBe(true);
		expect(isPrintableTag("UTT")).toBe(false);
		expect(isPrintableTag("U\x00T ")).toBe(false);
	});

	it("encodes text per string encoding", () => {
		expect(encodeText("ü", "utf8", "Str")).toEqual(Buffer.from([0xc3, 0xbc]));
		expect(encodeText("ü", "latin1", "Str")).toEqual(Buffer.from([0xfc]));
		expect(() => encodeText("\ud800", "utf8", "Str")).toThrow("Str: lone surrogate at position 0");
	});

	it("encodes ASCII only", () => {
		expect(encodeAscii("door", "ResRef")).toEqual(Buffer.from("door"));
		expect(() => encodeAscii("tür", "ResRef")).toThrow(GFFEncodingError);
	});
});

describe("field type classification", () => {
	it("separates inline, field-data and reference types", () => {
		expect(isKnownFieldType(17)).toBe(true);
		expect(isKnownFieldType(18)).toBe(false);
		expect(isSimpleFieldType(GFFFieldType.Single)).toBe(true);
		expect(isSimpleFieldType(GFFFieldType.Double)).toBe(false);
		expect(isComplexFieldType(GFFFieldType.Double)).toBe(true);
		expect(isComplexFieldType(GFFFieldType.Vector3)).toBe(true);
		expect(isComplexFieldType(GFFFieldType.Struct)).toBe(false);
		expect(isComplexFieldType(GFFFieldType.List)).toBe(false);
		expect(isComplexFieldType(GFFFieldType.Int32)).toBe(false);
	});
});
