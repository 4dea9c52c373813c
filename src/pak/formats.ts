/**
 * Signature dispatch. Every known signature is listed, only the
 * little-endian Kaiko-compressed variant has a handler.
 */

import { scaleOffset } from "./cursor.js";
import { readCompressedBlock, type CompressedBlock } from "./compression.js";
import { readEntryTable, splitNameTableLocator } from "./entries.js";
import { PakError } from "./errors.js";
import { describeSignature } from "./header.js";
import { readNameTable } from "./names.js";
import type { ArchiveSource } from "./source.js";
import { PakSignature, type PakFileEntry, type PakHeader, type PakLayout, type PakLogger } from "./types.js";

export interface PakFormatHandler {
	signature: PakSignature;
	description: string;
	readLayout(source: ArchiveSource, header: PakHeader, logger?: PakLogger): PakLayout;
	readEntry(source: ArchiveSource, header: PakHeader, entry: PakFileEntry): CompressedBlock;
}

const kaikoCompressedLE: PakFormatHandler = {
	signature: PakSignature.KaikoCompressedLE,
	description: "Kaiko Compressed (Little Endian)",

	readLayout(source, header, logger) {
		if (header.isValid === 0) {
			throw new PakError("FormatError", "Invalid PAK information (valid flag is 0); cannot process");
		}

		const { entries, specialCount } = readEntryTable(source, header, logger);
		const { locator, files } = splitNameTableLocator(entries);

		let names = new Map<number, string>();
		if (locator) {
			logger?.info("Parsing strings table for file names...");
			names = readNameTable(source, header, locator);
		}

		return { header, files, locator, names, specialCount };
	},

	readEntry(source, header, entry) {
		return readCompressedBlock(source, scaleOffset(entry.position, header.alignmentUnit));
	}
};

const HANDLERS: ReadonlyMap<number, PakFormatHandler> = new Map<number, PakFormatHandler>([[kaikoCompressedLE.signature, kaikoCompressedLE]]);

export function resolveFormat(signature: number): PakFormatHandler | undefined {
	return HANDLERS.get(signature);
}

export function requireFormat(header: PakHeader): PakFormatHandler {
	const handler = resolveFormat(header.signature);
	if (!handler) {
		throw new PakError("UnsupportedFormat", `PAK file type unsupported: ${describeSignature(header.signature)}`);
	}
	return handler;
}
