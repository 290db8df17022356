export type GFFErrorCode =
	| "MalformedHeader"
	| "TruncatedFieldData"
	| "InvalidStructIndex"
	| "InvalidLabelIndex"
	| "InvalidFieldIndex"
	| "UnknownFieldType"
	| "CyclicStructReference"
	| "SharedStructReference"
	| "EncodingError"
	| "DuplicateFieldLabel"
	| "InvalidXml";

export class GFFError extends Error {
	public readonly code: GFFErrorCode;

	constructor(code: GFFErrorCode, message: string) {
		super(message);
		this.name = new.target.name;
		this.code = code;
	}
}

export class MalformedHeaderError extends GFFError {
	constructor(message: string) {
		super("MalformedHeader", message);
	}
}

export class TruncatedFieldDataError extends GFFError {
	constructor(
		public readonly section: string,
		public readonly offset: number,
		public readonly length: number,
		public readonly sectionSize: number
	) {
		super("TruncatedFieldData", `${section}: ${length} bytes at offset ${offset} exceed section size ${sectionSize}`);
	}
}

export class InvalidStructIndexError extends GFFError {
	constructor(
		public readonly index: number,
		count: number
	) {
		super("InvalidStructIndex", `Struct index ${index} out of range (struct count ${count})`);
	}
}

export class InvalidLabelIndexError extends GFFError {
	constructor(
		public readonly index: number,
		count: number
	) {
		super("InvalidLabelIndex", `Label index ${index} out of range (label count ${count})`);
	}
}

export class InvalidFieldIndexError extends GFFError {
	constructor(
		public readonly index: number,
		count: number
	) {
		super("InvalidFieldIndex", `Field index ${index} out of range (field count ${count})`);
	}
}

export class UnknownFieldTypeError extends GFFError {
	constructor(
		public readonly fieldType: number,
		public readonly fieldIndex: number
	) {
		super("UnknownFieldType", `Unknown field type ${fieldType} at field ${fieldIndex}`);
	}
}

export class CyclicStructReferenceError extends GFFError {
	constructor(public readonly path: readonly (number | string)[]) {
		super("CyclicStructReference", `Cyclic struct reference: ${path.join(" -> ")}`);
	}
}

export class SharedStructReferenceError extends GFFError {
	constructor(
		public readonly index: number,
		public readonly path: readonly number[]
	) {
		super("SharedStructReference", `Struct ${index} is referenced more than once (again from ${path.join(" -> ")})`);
	}
}

export class GFFEncodingError extends GFFError {
	constructor(message: string) {
		super("EncodingError", message);
	}
}

export class DuplicateFieldLabelError extends GFFError {
	constructor(
		public readonly label: string,
		public readonly structIndex: number
	) {
		super("DuplicateFieldLabel", `Duplicate field label "${label}" in struct ${structIndex}`);
	}
}

export class GFFXmlError extends GFFError {
	constructor(message: string) {
		super("InvalidXml", `Invalid GFF XML: ${message}`);
	}
}
