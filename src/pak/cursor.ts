import { PakError } from "./errors.js";

/**
 * Sequential little-endian reader over a buffer.
 * Every read is bounds checked, no struct overlay.
 */
export class ByteCursor {
	private offset = 0;

	constructor(private readonly buf: Buffer) {}

	get position(): number {
		return this.offset;
	}

	get remaining(): number {
		return this.buf.length - this.offset;
	}

	private ensure(length: number, what: string): void {
		if (length > this.remaining) {
			throw new PakError(
				"CorruptData",
				`Unexpected end of data reading ${what}: need ${length} bytes at ${this.offset}, have ${this.remaining}`
			);
		}
	}

	u32(what = "u32"): number {
		this.ensure(4, what);
		const value = this.buf.readUInt32LE(this.offset);
		this.offset += 4;
		return value;
	}

	u64(what = "u64"): bigint {
		this.ensure(8, what);
		const value = this.buf.readBigUInt64LE(this.offset);
		this.offset += 8;
		return value;
	}

	bytes(length: number, what = "bytes"): Buffer {
		this.ensure(length, what);
		const out = this.buf.subarray(this.offset, this.offset + length);
		this.offset += length;
		return out;
	}
}

/** position × unit as a byte offset; rejects offsets beyond Number.MAX_SAFE_INTEGER */
export function scaleOffset(position: number, unit: number): number {
	const offset = BigInt(position) * BigInt(unit);
	if (offset > BigInt(Number.MAX_SAFE_INTEGER)) {
		throw new PakError("CorruptData", `Offset ${position} × ${unit} is out of range`);
	}
	return Number(offset);
}
