/**
 * Entry table: TotalCount(4), SpecialCount(4), TotalCount × Entry(12)
 */

import { ByteCursor } from "./cursor.js";
import { PakError } from "./errors.js";
import type { ArchiveSource } from "./source.js";
import { ENTRY_SIZE, ENTRY_TABLE_PREFIX_SIZE, type EntryTable, type PakFileEntry, type PakHeader, type PakLogger } from "./types.js";

function hex32(value: number): string {
	return value.toString(16).toUpperCase().padStart(8, "0");
}

export function decodeEntry(cursor: ByteCursor): PakFileEntry {
	return {
		contentId: cursor.u32("content id"),
		position: cursor.u32("position"),
		size: cursor.u32("size")
	};
}

export function readEntryTable(source: ArchiveSource, header: PakHeader, logger?: PakLogger): EntryTable {
	if (header.entriesOffset > BigInt(Number.MAX_SAFE_INTEGER)) {
		throw new PakError("CorruptData", `Entry table offset ${header.entriesOffset} is out of range`);
	}
	const offset = Number(header.entriesOffset);
	const prefix = new ByteCursor(source.read(offset, ENTRY_TABLE_PREFIX_SIZE));
	const totalCount = prefix.u32("entry count");
	const specialCount = prefix.u32("special entry count");

	logger?.info(`Entry count: ${totalCount}`);
	logger?.info(`Entry count (special): ${specialCount}`);

	const cursor = new ByteCursor(source.read(offset + ENTRY_TABLE_PREFIX_SIZE, totalCount * ENTRY_SIZE));
	const entries: PakFileEntry[] = [];
	for (let i = 0; i < totalCount; i++) {
		const entry = decodeEntry(cursor);
		logger?.info(`Entry found: (Crc: ${hex32(entry.contentId)})(Pos: ${hex32(entry.position)})(Size: ${hex32(entry.size)})`);
		entries.push(entry);
	}

	if (specialCount > 0) {
		// gezählt, aber nie geparst
		logger?.warn(`Special entries are not supported; skipping ${specialCount}`);
	}

	return { entries: sortEntriesByPosition(entries), specialCount };
}

/** Ascending by position; Array.prototype.sort is stable, ties keep read order */
export function sortEntriesByPosition(entries: readonly PakFileEntry[]): PakFileEntry[] {
	return [...entries].sort((a, b) => a.position - b.position);
}

/**
 * The name table is written last, so after sorting it is the entry with the
 * highest position.
 */
export function splitNameTableLocator(sorted: readonly PakFileEntry[]): { locator?: PakFileEntry; files: PakFileEntry[] } {
	if (sorted.length === 0) return { files: [] };
	return { locator: sorted[sorted.length - 1], files: sorted.slice(0, -1) };
}
