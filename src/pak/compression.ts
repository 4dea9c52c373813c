/**
 * Chunk decompression for Kaiko-compressed PAK entries.
 *
 * Each chunk is an aPLib stream (LZ77 with an interleaved tag-bit stream)
 * that expands to at most MAX_CHUNK_OUTPUT bytes.
 */

import { ByteCursor } from "./cursor.js";
import { PakError } from "./errors.js";
import type { ArchiveSource } from "./source.js";
import { BLOCK_PREFIX_SIZE, MAX_CHUNK_OUTPUT } from "./types.js";

class AplibState {
	private src = 0;
	private tag = 0;
	private bitCount = 0;
	dst = 0;

	constructor(
		private readonly input: Uint8Array,
		readonly output: Buffer
	) {}

	byte(): number {
		if (this.src >= this.input.length) {
			throw new PakError("CorruptData", `aPLib stream truncated at byte ${this.src}`);
		}
		return this.input[this.src++];
	}

	bit(): number {
		if (this.bitCount === 0) {
			this.tag = this.byte();
			this.bitCount = 8;
		}
		this.bitCount--;
		const bit = (this.tag >> 7) & 1;
		this.tag = (this.tag << 1) & 0xff;
		return bit;
	}

	gamma(): number {
		let result = 1;
		do {
			result = (result << 1) + this.bit();
			if (result > 0xffffff) {
				throw new PakError("CorruptData", `aPLib gamma value out of range at byte ${this.src}`);
			}
		} while (this.bit());
		return result;
	}

	put(value: number): void {
		if (this.dst >= this.output.length) {
			throw new PakError("CorruptData", `aPLib output exceeds ${this.output.length} bytes`);
		}
		this.output[this.dst++] = value;
	}

	copy(offset: number, length: number): void {
		if (!Number.isInteger(offset) || offset <= 0 || offset > this.dst) {
			throw new PakError("CorruptData", `aPLib back reference ${offset} before start of output (${this.dst} bytes written)`);
		}
		if (length > this.output.length - this.dst) {
			throw new PakError("CorruptData", `aPLib output exceeds ${this.output.length} bytes`);
		}
		for (let i = 0; i < length; i++) {
			this.output[this.dst] = this.output[this.dst - offset];
			this.dst++;
		}
	}
}

/**
 * Decompresses one aPLib chunk. Output never exceeds `maxOutput` bytes.
 */
export function decompressAplib(chunk: Uint8Array, maxOutput: number = MAX_CHUNK_OUTPUT): Buffer {
	const state = new AplibState(chunk, Buffer.alloc(maxOutput));
	let lastOffset = 0;
	// true directly after a match, changes how the next gamma offset is read
	let afterMatch = false;

	state.put(state.byte());

	for (;;) {
		if (!state.bit()) {
			state.put(state.byte());
			afterMatch = false;
			continue;
		}

		if (!state.bit()) {
			// gamma coded match
			let offset = state.gamma();
			if (!afterMatch && offset === 2) {
				offset = lastOffset;
				state.copy(offset, state.gamma());
			} else {
				offset -= afterMatch ? 2 : 3;
				// * 256, not << 8: large gamma values must not wrap to negative offsets
				offset = offset * 256 + state.byte();
				let length = state.gamma();
				if (offset >= 32000) length++;
				if (offset >= 1280) length++;
				if (offset < 128) length += 2;
				state.copy(offset, length);
				lastOffset = offset;
			}
			afterMatch = true;
			continue;
		}

		if (!state.bit()) {
			// short match, offset 0 ends the stream
			const value = state.byte();
			const offset = value >> 1;
			if (offset === 0) break;
			state.copy(offset, 2 + (value & 1));
			lastOffset = offset;
			afterMatch = true;
			continue;
		}

		// single byte: 4-bit offset, 0 means a literal zero
		let offset = 0;
		for (let i = 0; i < 4; i++) offset = (offset << 1) + state.bit();
		if (offset) state.copy(offset, 1);
		else state.put(0);
		afterMatch = false;
	}

	return state.output.subarray(0, state.dst);
}

export interface CompressedBlock {
	/** Concatenated chunk outputs, not truncated to declaredSize */
	data: Buffer;
	declaredSize: number;
	chunkCount: number;
}

/**
 * Reads the compressed block of one entry:
 * DecompressedSize(4), ChunkCount(4), ChunkCount × ChunkSize(4), chunk bytes.
 */
export function readCompressedBlock(source: ArchiveSource, offset: number, maxChunkOutput: number = MAX_CHUNK_OUTPUT): CompressedBlock {
	const prefix = new ByteCursor(source.read(offset, BLOCK_PREFIX_SIZE));
	const declaredSize = prefix.u32("decompressed size");
	const chunkCount = prefix.u32("chunk count");

	let position = offset + BLOCK_PREFIX_SIZE;
	const sizes = new ByteCursor(source.read(position, chunkCount * 4));
	position += chunkCount * 4;

	const chunkSizes: number[] = [];
	for (let i = 0; i < chunkCount; i++) chunkSizes.push(sizes.u32("chunk size"));

	const parts: Buffer[] = [];
	for (const size of chunkSizes) {
		const compressed = source.read(position, size);
		position += size;
		parts.push(decompressAplib(compressed, maxChunkOutput));
	}

	return { data: Buffer.concat(parts), declaredSize, chunkCount };
}
