/**
 * Kaiko PAK archive format types
 *
 * Layout (little endian):
 *   Header (32 bytes) → entry table at EntriesOffset → per-entry chunk blocks
 *   → name table (last block, addressed like a normal entry)
 */

export enum PakSignature {
	CompressedBE = 0x4b504b62,
	CompressedLE = 0x6c4b504b,
	UncompressedBE = 0x624b4150,
	UncompressedLE = 0x6c4b4150,
	KaikoCompressedBE = 0x6252414b,
	KaikoCompressedLE = 0x6c52414b
}

export const HEADER_SIZE = 32;
export const ENTRY_TABLE_PREFIX_SIZE = 8; // TotalCount(4), SpecialCount(4)
export const ENTRY_SIZE = 12; // ContentId(4), Position(4), Size(4)
export const NAME_TABLE_PREFIX_SIZE = 8; // TableSize(4), Reserved(4)
export const NAME_RECORD_PREFIX_SIZE = 8; // ContentId(4), NameLength(4)
export const BLOCK_PREFIX_SIZE = 8; // DecompressedSize(4), ChunkCount(4)

/** Maximum bytes a single chunk decompresses to */
export const MAX_CHUNK_OUTPUT = 4096;

export const UNKNOWN_FILE_SUFFIX = ".unknown_file";
export const MANIFEST_FILE_NAME = ".pak.manifest.json";

export interface PakHeader {
	signature: number;
	isValid: number;
	/** Stored positions × alignmentUnit = byte offset */
	alignmentUnit: number;
	chunkUnit: number;
	entriesOffset: bigint;
	reserved0: number;
	reserved1: number;
}

export interface PakFileEntry {
	/** Join key into the name table, not an integrity check */
	contentId: number;
	/** In alignment units, not bytes */
	position: number;
	size: number;
}

export interface NameRecord {
	contentId: number;
	name: string;
}

export interface DecodedFile {
	name: string;
	entry: PakFileEntry;
	data: Buffer;
	declaredSize: number;
}

export interface EntryTable {
	entries: PakFileEntry[];
	specialCount: number;
}

export interface PakLayout {
	header: PakHeader;
	/** Sorted by position, name table locator removed */
	files: PakFileEntry[];
	locator?: PakFileEntry;
	names: Map<number, string>;
	specialCount: number;
}

export interface PakLogger {
	info(message: string): void;
	warn(message: string): void;
}
