import { GFFEncodingError } from "./errors.js";
import type { StringEncoding } from "./types.js";

export type OverrunHandler = (offset: number, length: number, size: number) => Error;

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

const defaultOverrun: OverrunHandler = (offset, length, size) => new RangeError(`Read of ${length} bytes at offset ${offset} exceeds buffer size ${size}`);

/**
 * Begrenztes Fenster [start, end) auf einen Buffer, alle Offsets relativ zu start.
 * Lesezugriffe über end hinaus werfen den Fehler aus onOverrun.
 */
export class BinaryReader {
	constructor(
		private readonly buffer: Buffer,
		private readonly start: number = 0,
		private readonly end: number = buffer.length,
		private readonly onOverrun: OverrunHandler = defaultOverrun
	) {}

	public get size(): number {
		return this.end - this.start;
	}

	private at(offset: number, length: number): number {
		if (offset < 0 || length < 0 || offset + length > this.size) {
			throw this.onOverrun(offset, length, this.size);
		}
		return this.start + offset;
	}

	public window(offset: number, length: number, onOverrun: OverrunHandler = this.onOverrun): BinaryReader {
		const pos = this.at(offset, length);
		return new BinaryReader(this.buffer, pos, pos + length, onOverrun);
	}

	public u8(offset: number): number {
		return this.buffer.readUInt8(this.at(offset, 1));
	}

	public i8(offset: number): number {
		return this.buffer.readInt8(this.at(offset, 1));
	}

	public u16(offset: number): number {
		return this.buffer.readUInt16LE(this.at(offset, 2));
	}

	public i16(offset: number): number {
		return this.buffer.readInt16LE(this.at(offset, 2));
	}

	public u32(offset: number): number {
		return this.buffer.readUInt32LE(this.at(offset, 4));
	}

	public i32(offset: number): number {
		return this.buffer.readInt32LE(this.at(offset, 4));
	}

	public u64(offset: number): bigint {
		return this.buffer.readBigUInt64LE(this.at(offset, 8));
	}

	public i64(offset: number): bigint {
		return this.buffer.readBigInt64LE(this.at(offset, 8));
	}

	public f32(offset: number): number {
		return this.buffer.readFloatLE(this.at(offset, 4));
	}

	public f64(offset: number): number {
		return this.buffer.readDoubleLE(this.at(offset, 8));
	}

	/** Kopie – der Aufrufer darf den Quell-Buffer danach freigeben */
	public bytes(offset: number, length: number): Buffer {
		const pos = this.at(offset, length);
		return Buffer.from(this.buffer.subarray(pos, pos + length));
	}

	public ascii(offset: number, length: number): string {
		const pos = this.at(offset, length);
		const raw = this.buffer.subarray(pos, pos + length);
		for (let i = 0; i < raw.length; i++) {
			if (raw[i] >= 0x80) {
				throw new GFFEncodingError(`Non-ASCII byte 0x${raw[i].toString(16)} at offset ${offset + i}`);
			}
		}
		return raw.toString("latin1");
	}

	public text(offset: number, length: number, encoding: StringEncoding): string {
		const pos = this.at(offset, length);
		if (encoding === "latin1") {
			return this.buffer.toString("latin1", pos, pos + length);
		}
		try {
			return utf8Decoder.decode(this.buffer.subarray(pos, pos + length));
		} catch (err) {
			if (err instanceof TypeError) {
				throw new GFFEncodingError(`Invalid UTF-8 in ${length} bytes at offset ${offset}`);
			}
			throw err;
		}
	}
}

/** Wachsender Little-Endian-Puffer; jede Schreibmethode liefert den Offset des Werts */
export class BinaryWriter {
	private buffer: Buffer = Buffer.alloc(256);
	private length = 0;

	public get size(): number {
		return this.length;
	}

	private reserve(bytes: number): number {
		if (this.length + bytes > this.buffer.length) {
			let capacity = this.buffer.length * 2;
			while (capacity < this.length + bytes) capacity *= 2;
			const grown = Buffer.alloc(capacity);
			this.buffer.copy(grown, 0, 0, this.length);
			this.buffer = grown;
		}
		const offset = this.length;
		this.length += bytes;
		return offset;
	}

	public u8(value: number): number {
		const offset = this.reserve(1);
		this.buffer.writeUInt8(value, offset);
		return offset;
	}

	public u32(value: number): number {
		const offset = this.reserve(4);
		this.buffer.writeUInt32LE(value, offset);
		return offset;
	}

	public u64(value: bigint): number {
		const offset = this.reserve(8);
		this.buffer.writeBigUInt64LE(value, offset);
		return offset;
	}

	public i64(value: bigint): number {
		const offset = this.reserve(8);
		this.buffer.writeBigInt64LE(value, offset);
		return offset;
	}

	public f32(value: number): number {
		const offset = this.reserve(4);
		this.buffer.writeFloatLE(value, offset);
		return offset;
	}

	public f64(value: number): number {
		const offset = this.reserve(8);
		this.buffer.writeDoubleLE(value, offset);
		return offset;
	}

	public bytes(data: Uint8Array): number {
		const offset = this.reserve(data.length);
		this.buffer.set(data, offset);
		return offset;
	}

	public toBuffer(): Buffer {
		return Buffer.from(this.buffer.subarray(0, this.length));
	}
}

export function encodeAscii(value: string, what: string): Buffer {
	for (let i = 0; i < value.length; i++) {
		if (value.charCodeAt(i) >= 0x80) {
			throw new GFFEncodingError(`${what} "${value}" contains a non-ASCII character at position ${i}`);
		}
	}
	return Buffer.from(value, "latin1");
}

// Einzelne Surrogate lassen sich nicht als UTF-8 kodieren
const loneSurrogate = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export function encodeText(value: string, encoding: StringEncoding, what: string): Buffer {
	if (encoding === "latin1") {
		for (let i = 0; i < value.length; i++) {
			if (value.charCodeAt(i) > 0xff) {
				throw new GFFEncodingError(`${what}: character at position ${i} is not representable in latin1`);
			}
		}
		return Buffer.from(value, "latin1");
	}
	const match = loneSurrogate.exec(value);
	if (match) {
		throw new GFFEncodingError(`${what}: lone surrogate at position ${match.index}`);
	}
	return Buffer.from(value, "utf8");
}

/** 4 druckbare ASCII-Zeichen (Dateityp/Version) */
export function isPrintableTag(value: string): boolean {
	return /^[\x20-\x7e]{4}$/.test(value);
}
