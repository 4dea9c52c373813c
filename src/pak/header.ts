/**
 * PAK header decoding
 */

import { ByteCursor } from "./cursor.js";
import { PakError } from "./errors.js";
import type { ArchiveSource } from "./source.js";
import { HEADER_SIZE, PakSignature, type PakHeader } from "./types.js";

export function decodeHeader(bytes: Buffer): PakHeader {
	const cursor = new ByteCursor(bytes);
	return {
		signature: cursor.u32("signature"),
		isValid: cursor.u32("valid flag"),
		alignmentUnit: cursor.u32("alignment unit"),
		chunkUnit: cursor.u32("chunk unit"),
		entriesOffset: cursor.u64("entries offset"),
		reserved0: cursor.u32("reserved"),
		reserved1: cursor.u32("reserved")
	};
}

/**
 * Reads the header at offset 0. The size check comes first, nothing in the
 * header is trusted before it.
 */
export function readHeader(source: ArchiveSource): PakHeader {
	if (source.size < HEADER_SIZE) {
		throw new PakError("FormatError", `Invalid file size ${source.size}: a PAK header needs ${HEADER_SIZE} bytes`);
	}
	return decodeHeader(source.read(0, HEADER_SIZE));
}

export function describeSignature(signature: number): string {
	const name = PakSignature[signature];
	const hex = `0x${signature.toString(16).toUpperCase().padStart(8, "0")}`;
	return name ? `${name} (${hex})` : hex;
}
