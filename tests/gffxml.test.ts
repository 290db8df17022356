/**
 * Tests for the GFF XML form
 */
import { describe, expect, it } from "vitest";
import { convertGffToXml, escapeXml, formatSingle } from "../src/gffxml/gffxml-writer.js";
import { parseGffXml } from "../src/gffxml/gffxml-reader.js";
import { decodeGff } from "../src/gff/reader.js";
import { encodeGff } from "../src/gff/writer.js";
import { createStruct } from "../src/gff/struct.js";
import { GFFError, GFFXmlError } from "../src/gff/errors.js";
import { GFFFieldType, type GFFDocument, type GFFStruct, type GFFValue } from "../src/gff/types.js";

function doc(root: GFFStruct): GFFDocument {
	return { fileType: "UTT ", fileVersion: "V3.2", root };
}

function lines(root: GFFStruct): string[] {
	return convertGffToXml(doc(root)).split("\n");
}

function fieldXml(label: string, type: string, extra: string): string {
	return `<?xml version="1.0" encoding="utf-8"?>
<gff type="GFF " version="V3.2">
	<struct id="0">
		<field label="${label}" type="${type}" ${extra} />
	</struct>
</gff>
`;
}

function parsedField(xml: string): GFFValue | undefined {
	return [...parseGffXml(xml).root.fields.values()][0];
}

function sampleTree(): GFFStruct {
	return createStruct(-1, [
		["U8", { type: GFFFieldType.UInt8, value: 255 }],
		["I8", { type: GFFFieldType.Int8, value: -128 }],
		["U16", { type: GFFFieldType.UInt16, value: 65535 }],
		["I16", { type: GFFFieldType.Int16, value: -32768 }],
		["U32", { type: GFFFieldType.UInt32, value: 4294967295 }],
		["I32", { type: GFFFieldType.Int32, value: -2147483648 }],
		["U64", { type: GFFFieldType.UInt64, value: 18446744073709551615n }],
		["I64", { type: GFFFieldType.Int64, value: -9223372036854775808n }],
		["Third", { type: GFFFieldType.Single, value: Math.fround(1 / 3) }],
		["Double", { type: GFFFieldType.Double, value: Math.PI }],
		["Str", { type: GFFFieldType.String, value: 'Grüße <"&">\n\tnext' }],
		["Empty", { type: GFFFieldType.String, value: "" }],
		["Ref", { type: GFFFieldType.ResRef, value: { value: "door", padding: Buffer.from([0, 0x41, 0x42, 0, 0, 0, 0, 0, 0, 0, 0, 0]) } }],
		[
			"Loc",
			{
				type: GFFFieldType.LocalizedString,
				value: {
					stringRef: 42,
					substrings: [
						{ language: 0, gender: 0, text: "Trap" },
						{ language: 2, gender: 1, text: "Falle" }
					]
				}
			}
		],
		["NoRef", { type: GFFFieldType.LocalizedString, value: { stringRef: null, substrings: [] } }],
		["Bin", { type: GFFFieldType.Binary, value: Buffer.from([0, 1, 254, 255]) }],
		["Vec3", { type: GFFFieldType.Vector3, value: { x: 1, y: -2, z: 0.5 } }],
		["Vec4", { type: GFFFieldType.Vector4, value: { x: 0, y: 0.25, z: 0, w: 1 } }],
		["Child", { type: GFFFieldType.Struct, value: createStruct(3, [["Level", { type: GFFFieldType.UInt8, value: 2 }]]) }],
		["Items", { type: GFFFieldType.List, value: [createStruct(5), createStruct(6, [["Tag", { type: GFFFieldType.String, value: "x" }]])] }],
		["NoItems", { type: GFFFieldType.List, value: [] }],
		["Odd", { type: "opaque", value: { fieldType: 40, dataOrOffset: 9 } }]
	]);
}

// ── Writer ──
describe("convertGffToXml", () => {
	it("writes the document layout", () => {
		const root = createStruct(-1, [
			["Tag", { type: GFFFieldType.String, value: "trap01" }],
			["Name", { type: GFFFieldType.LocalizedString, value: { stringRef: null, substrings: [{ language: 0, gender: 0, text: "Trap" }] } }],
			["Child", { type: GFFFieldType.Struct, value: createStruct(3) }]
		]);
		expect(convertGffToXml(doc(root))).toBe(
			[
				'<?xml version="1.0" encoding="utf-8"?>',
				'<gff type="UTT " version="V3.2">',
				'\t<struct id="-1">',
				'\t\t<field label="Tag" type="String" value="trap01" />',
				'\t\t<field label="Name" type="LocalizedString" strref="none">',
				'\t\t\t<substring language="0" gender="0" value="Trap" />',
				"\t\t</field>",
				'\t\t<field label="Child" type="Struct">',
				'\t\t\t<struct id="3" />',
				"\t\t</field>",
				"\t</struct>",
				"</gff>",
				""
			].join("\n")
		);
	});

	it("spells scalar values", () => {
		const out = lines(sampleTree());
		expect(out).toContain('\t\t<field label="U64" type="UInt64" value="18446744073709551615" />');
		expect(out).toContain('\t\t<field label="I32" type="Int32" value="-2147483648" />');
		expect(out).toContain('\t\t<field label="Third" type="Single" value="0.33333334" />');
		expect(out).toContain('\t\t<field label="Double" type="Double" value="3.141592653589793" />');
		expect(out).toContain('\t\t<field label="Str" type="String" value="Grüße &lt;&quot;&amp;&quot;&gt;&#10;&#9;next" />');
		expect(out).toContain('\t\t<field label="Bin" type="Binary" value="AAH+/w==" />');
		expect(out).toContain('\t\t<field label="Vec3" type="Vector3" value="1 -2 0.5" />');
		expect(out).toContain('\t\t<field label="Ref" type="ResRef" value="door" padding="004142000000000000000000" />');
		expect(out).toContain('\t\t<field label="NoRef" type="LocalizedString" strref="none" />');
		expect(out).toContain('\t\t<field label="NoItems" type="List" />');
		expect(out).toContain('\t\t<field label="Odd" type="opaque" fieldType="40" value="9" />');
	});

	it("honours the line ending option", () => {
		const xml = convertGffToXml(doc(createStruct()), { eol: "\r\n" });
		expect(xml).toBe('<?xml version="1.0" encoding="utf-8"?>\r\n<gff type="UTT " version="V3.2">\r\n\t<struct id="0" />\r\n</gff>\r\n');
	});

	it("formats float32 values with the shortest round-trip decimal", () => {
		expect(formatSingle(0.1)).toBe("0.1");
		expect(formatSingle(Math.fround(0.1))).toBe("0.1");
		expect(formatSingle(1.5)).toBe("1.5");
		expect(formatSingle(-0)).toBe("-0");
		expect(formatSingle(NaN)).toBe("NaN");
		expect(formatSingle(-Infinity)).toBe("-Infinity");
	});

	it("escapes markup and control characters", () => {
		expect(escapeXml('a<b>&"c"')).toBe("a&lt;b&gt;&amp;&quot;c&quot;");
		expect(escapeXml("1\r\n2")).toBe("1&#13;&#10;2");
	});
});

// ── Reader ──
describe("parseGffXml", () => {
	it("restores the tree written by convertGffToXml", () => {
		const tree = sampleTree();
		const parsed = parseGffXml(convertGffToXml(doc(tree)));
		expect(parsed.fileType).toBe("UTT ");
		expect(parsed.fileVersion).toBe("V3.2");
		expect(parsed.root).toEqual(tree);
		expect([...parsed.root.fields.keys()]).toEqual([...tree.fields.keys()]);
	});

	it("restores a tree that also survives the binary form", () => {
		const binary = encodeGff(sampleTree(), { fileType: "UTT " });
		const fromBinary = decodeGff(binary, { unknownFieldTypes: "preserve" });
		const fromXml = parseGffXml(convertGffToXml(doc(fromBinary)));
		expect(encodeGff(fromXml.root, { fileType: fromXml.fileType }).equals(binary)).toBe(true);
	});

	it("keeps a negative zero double", () => {
		const value = parsedField(fieldXml("D", "Double", 'value="-0"'));
		expect(value?.type).toBe(GFFFieldType.Double);
		expect(Object.is(value?.value, -0)).toBe(true);
	});

	it("accepts numeric type tags", () => {
		expect(parsedField(fieldXml("A", "4", 'value="7"'))).toEqual({ type: GFFFieldType.UInt32, value: 7 });
		expect(parsedField(fieldXml("A", "10", 'value="x"'))).toEqual({ type: GFFFieldType.String, value: "x" });
	});

	it("rounds singles and vector components to float32", () => {
		expect(parsedField(fieldXml("S", "Single", 'value="0.1"'))).toEqual({ type: GFFFieldType.Single, value: Math.fround(0.1) });
		expect(parsedField(fieldXml("V", "Vector3", 'value="0.1 2 3"'))).toEqual({
			type: GFFFieldType.Vector3,
			value: { x: Math.fround(0.1), y: 2, z: 3 }
		});
	});

	it("rejects documents without a gff root", () => {
		expect(() => parseGffXml("<save><region /></save>")).toThrow("Invalid GFF XML: no <gff> root");
	});

	it("rejects malformed fields", () => {
		expect(() => parseGffXml(fieldXml("A", "Bogus", 'value="1"'))).toThrow('Invalid GFF XML: GFFRoot/A: unknown field type "Bogus"');
		expect(() => parseGffXml(fieldXml("A", "UInt8", 'value="abc"'))).toThrow('Invalid GFF XML: GFFRoot/A: "abc" is not an integer');
		expect(() => parseGffXml(fieldXml("A", "Int64", 'value="1.5"'))).toThrow(GFFXmlError);
		expect(() => parseGffXml(fieldXml("A", "Vector3", 'value="1 2"'))).toThrow('GFFRoot/A: expected 3 components, got "1 2"');
		expect(() => parseGffXml(fieldXml("A", "UInt8", ""))).toThrow('GFFRoot/A: missing attribute "value"');
		expect(() => parseGffXml(fieldXml("A", "ResRef", 'value="x" padding="zz"'))).toThrow('GFFRoot/A: padding "zz" is not hex');
	});

	it("rejects structural errors", () => {
		const twoRoots = '<gff type="GFF " version="V3.2"><struct id="0" /><struct id="1" /></gff>';
		expect(() => parseGffXml(twoRoots)).toThrow("<gff> needs exactly one root <struct>, got 2");

		const duplicate =
			'<gff type="GFF " version="V3.2"><struct id="0"><field label="A" type="UInt8" value="1" /><field label="A" type="UInt8" value="2" /></struct></gff>';
		expect(() => parseGffXml(duplicate)).toThrow('GFFRoot: duplicate field label "A"');

		const emptyStruct = '<gff type="GFF " version="V3.2"><struct id="0"><field label="C" type="Struct" /></struct></gff>';
		const err = (() => {
			try {
				parseGffXml(emptyStruct);
			} catch (e) {
				return e;
			}
			return undefined;
		})();
		expect(err).toBeInstanceOf(GFFError);
		if (err instanceof GFFError) {
			expect(err.code).toBe("InvalidXml");
			expect(err.message).toBe("Invalid GFF XML: GFFRoot/C: Struct field needs exactly one <struct>, got 0");
		}
	});
});
