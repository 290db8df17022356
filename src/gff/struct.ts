import { GFFFieldType, type GFFStruct, type GFFValue, type GFFValueOf, type LocalizedString, type ResRef } from "./types.js";

const SINGLE_TOLERANCE = 1e-4;

export function createStruct(structId: number = 0, fields: Iterable<[string, GFFValue]> = []): GFFStruct {
	return { structId, fields: new Map(fields) };
}

function hasType<T extends GFFValue["type"]>(field: GFFValue, type: T): field is Extract<GFFValue, { type: T }> {
	return field.type === type;
}

/** Wert des Felds, falls vorhanden und vom angegebenen Typ */
export function getField<T extends GFFValue["type"]>(struct: GFFStruct, label: string, type: T): GFFValueOf<T> | undefined {
	const field = struct.fields.get(label);
	return field !== undefined && hasType(field, type) ? field.value : undefined;
}

/** Neue Labels werden angehängt, bestehende behalten ihre Position */
export function setField(struct: GFFStruct, label: string, value: GFFValue): void {
	struct.fields.set(label, value);
}

export function removeField(struct: GFFStruct, label: string): boolean {
	return struct.fields.delete(label);
}

export function getFieldType(struct: GFFStruct, label: string): GFFValue["type"] | undefined {
	return struct.fields.get(label)?.type;
}

export function fieldLabels(struct: GFFStruct): string[] {
	return [...struct.fields.keys()];
}

export function fieldTypeName(value: GFFValue): string {
	return value.type === "opaque" ? "opaque" : GFFFieldType[value.type];
}

function floatsEqual(a: number, b: number, tolerance: number): boolean {
	if (Number.isNaN(a) || Number.isNaN(b)) return Number.isNaN(a) && Number.isNaN(b);
	return a === b || Math.abs(a - b) < tolerance;
}

function resRefsEqual(a: ResRef, b: ResRef): boolean {
	if (a.value !== b.value) return false;
	if (a.padding === undefined || b.padding === undefined) return a.padding === b.padding;
	return a.padding.equals(b.padding);
}

function localizedStringsEqual(a: LocalizedString, b: LocalizedString): boolean {
	return (
		a.stringRef === b.stringRef &&
		a.substrings.length === b.substrings.length &&
		a.substrings.every((sub, i) => {
			const other = b.substrings[i];
			return sub.language === other.language && sub.gender === other.gender && sub.text === other.text;
		})
	);
}

/** Vergleich von Feldwerten gleichen Typs (ohne Struct/List) */
function valuesEqual(a: GFFValue, b: GFFValue): boolean {
	switch (a.type) {
		case GFFFieldType.Single:
			return b.type === GFFFieldType.Single && floatsEqual(a.value, b.value, SINGLE_TOLERANCE);
		case GFFFieldType.Double:
			return b.type === GFFFieldType.Double && floatsEqual(a.value, b.value, 0);
		case GFFFieldType.ResRef:
			return b.type === GFFFieldType.ResRef && resRefsEqual(a.value, b.value);
		case GFFFieldType.LocalizedString:
			return b.type === GFFFieldType.LocalizedString && localizedStringsEqual(a.value, b.value);
		case GFFFieldType.Binary:
			return b.type === GFFFieldType.Binary && a.value.equals(b.value);
		case GFFFieldType.Vector3:
			return (
				b.type === GFFFieldType.Vector3 &&
				floatsEqual(a.value.x, b.value.x, SINGLE_TOLERANCE) &&
				floatsEqual(a.value.y, b.value.y, SINGLE_TOLERANCE) &&
				floatsEqual(a.value.z, b.value.z, SINGLE_TOLERANCE)
			);
		case GFFFieldType.Vector4:
			return (
				b.type === GFFFieldType.Vector4 &&
				floatsEqual(a.value.x, b.value.x, SINGLE_TOLERANCE) &&
				floatsEqual(a.value.y, b.value.y, SINGLE_TOLERANCE) &&
				floatsEqual(a.value.z, b.value.z, SINGLE_TOLERANCE) &&
				floatsEqual(a.value.w, b.value.w, SINGLE_TOLERANCE)
			);
		case GFFFieldType.Struct:
		case GFFFieldType.List:
			return false;
		case "opaque":
			return b.type === "opaque" && a.value.fieldType === b.value.fieldType && a.value.dataOrOffset === b.value.dataOrOffset;
		default:
			// Ganzzahlen und Strings
			return a.type === b.type && a.value === b.value;
	}
}

export function formatValue(value: GFFValue): string {
	switch (value.type) {
		case GFFFieldType.String:
			return JSON.stringify(value.value);
		case GFFFieldType.ResRef:
			return JSON.stringify(value.value.value);
		case GFFFieldType.LocalizedString: {
			const ref = value.value.stringRef ?? "none";
			const subs = value.value.substrings.map((s) => `${s.language}/${s.gender}:${JSON.stringify(s.text)}`);
			return `strref=${ref} [${subs.join(", ")}]`;
		}
		case GFFFieldType.Binary:
			return `<${value.value.length} bytes>`;
		case GFFFieldType.Vector3:
			return `(${value.value.x}, ${value.value.y}, ${value.value.z})`;
		case GFFFieldType.Vector4:
			return `(${value.value.x}, ${value.value.y}, ${value.value.z}, ${value.value.w})`;
		case GFFFieldType.Struct:
			return `struct(${value.value.structId})`;
		case GFFFieldType.List:
			return `list[${value.value.length}]`;
		case "opaque":
			return `opaque(type=${value.value.fieldType}, data=${value.value.dataOrOffset})`;
		default:
			return String(value.value);
	}
}

/**
 * Vergleicht zwei GFF-Bäume und meldet jede Abweichung als eine Zeile über log.
 * Single-Werte (und Vektoren) gelten mit Abstand < 1e-4 als gleich.
 */
export function compareGff(a: GFFStruct, b: GFFStruct, log: (line: string) => void = console.log, path: string = "GFFRoot"): boolean {
	let same = true;

	if (a.structId !== b.structId) {
		log(`Struct ID is different at '${path}': '${a.structId}' --> '${b.structId}'`);
		same = false;
	}
	if (a.fields.size !== b.fields.size) {
		log(`GFFStruct: number of fields have changed at '${path}': '${a.fields.size}' --> '${b.fields.size}'`);
		same = false;
	}

	const labels = new Set([...a.fields.keys(), ...b.fields.keys()]);
	for (const label of labels) {
		const childPath = `${path}/${label}`;
		const oldValue = a.fields.get(label);
		const newValue = b.fields.get(label);

		if (oldValue === undefined) {
			if (newValue !== undefined) {
				log(`Extra '${fieldTypeName(newValue)}' field found at '${childPath}': ${formatValue(newValue)}`);
				same = false;
			}
			continue;
		}
		if (newValue === undefined) {
			log(`Missing '${fieldTypeName(oldValue)}' field at '${childPath}': ${formatValue(oldValue)}`);
			same = false;
			continue;
		}
		if (oldValue.type !== newValue.type) {
			log(`Field type is different at '${childPath}': '${fieldTypeName(oldValue)}'-->'${fieldTypeName(newValue)}'`);
			same = false;
			continue;
		}

		if (oldValue.type === GFFFieldType.Struct && newValue.type === GFFFieldType.Struct) {
			if (!compareGff(oldValue.value, newValue.value, log, childPath)) same = false;
		} else if (oldValue.type === GFFFieldType.List && newValue.type === GFFFieldType.List) {
			if (!compareLists(oldValue.value, newValue.value, log, childPath)) same = false;
		} else if (!valuesEqual(oldValue, newValue)) {
			log(`Field '${fieldTypeName(oldValue)}' is different at '${childPath}': ${formatValue(oldValue)} --> ${formatValue(newValue)}`);
			same = false;
		}
	}
	return same;
}

function compareLists(a: GFFStruct[], b: GFFStruct[], log: (line: string) => void, path: string): boolean {
	let same = true;
	if (a.length !== b.length) {
		log(`GFFList counts have changed at '${path}': '${a.length}' --> '${b.length}'`);
		same = false;
	}
	const count = Math.min(a.length, b.length);
	for (let i = 0; i < count; i++) {
		if (!compareGff(a[i], b[i], log, `${path}/${i}`)) same = false;
	}
	return same;
}
