/**
 * Name table: TableSize(4), Reserved(4), then records of
 * ContentId(4), NameLength(4), Name(NameLength) until TableSize bytes are consumed.
 */

import { ByteCursor, scaleOffset } from "./cursor.js";
import { PakError } from "./errors.js";
import type { ArchiveSource } from "./source.js";
import { NAME_RECORD_PREFIX_SIZE, NAME_TABLE_PREFIX_SIZE, type NameRecord, type PakFileEntry, type PakHeader } from "./types.js";

function nameFromBytes(buf: Buffer): string {
	let end = buf.length;
	while (end > 0 && buf[end - 1] === 0) end--;
	return buf.subarray(0, end).toString("utf-8");
}

export function readNameRecords(source: ArchiveSource, header: PakHeader, locator: PakFileEntry): NameRecord[] {
	let offset = scaleOffset(locator.position, header.alignmentUnit);
	const prefix = new ByteCursor(source.read(offset, NAME_TABLE_PREFIX_SIZE));
	const tableSize = prefix.u32("name table size");
	prefix.u32("name table padding");
	offset += NAME_TABLE_PREFIX_SIZE;

	if (tableSize === 0) {
		throw new PakError("CorruptData", "Invalid string table size 0; cannot parse file names");
	}

	const records: NameRecord[] = [];
	let consumed = 0;
	while (consumed < tableSize) {
		const record = new ByteCursor(source.read(offset, NAME_RECORD_PREFIX_SIZE));
		const contentId = record.u32("name id");
		const nameLength = record.u32("name length");
		offset += NAME_RECORD_PREFIX_SIZE;

		const name = nameFromBytes(source.read(offset, nameLength));
		offset += nameLength;

		records.push({ contentId, name });
		consumed += NAME_RECORD_PREFIX_SIZE + nameLength;
	}
	return records;
}

/** content id → name; on duplicate ids the later record wins */
export function buildNameMap(records: readonly NameRecord[]): Map<number, string> {
	const names = new Map<number, string>();
	for (const { contentId, name } of records) names.set(contentId, name);
	return names;
}

export function readNameTable(source: ArchiveSource, header: PakHeader, locator: PakFileEntry): Map<number, string> {
	return buildNameMap(readNameRecords(source, header, locator));
}
