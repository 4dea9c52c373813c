/**
 * Kaiko PAK Tools
 *
 * Entpackt PAK-Archive (Kaiko compressed, little endian) in einzelne Dateien.
 *
 * @example
 * ```ts
 * import { unpackPak, readPak } from 'kaiko-pak-tools';
 *
 * // Nur Metadaten lesen
 * const { files, names } = readPak('data.pak');
 * console.log(files.length, names.size);
 *
 * // Komplett entpacken
 * const result = unpackPak('data.pak', './dump');
 * ```
 */

export { unpackPak, readPak, openPak, extractAll, decodeEntries, resolveEntryName, unknownFileName, outputPathFor } from "./pak/unpacker.js";
export type { UnpackOptions, UnpackResult, DecodeOptions, EntryOutcome, EntryFailure, ResolvedName } from "./pak/unpacker.js";
export { decompressAplib, readCompressedBlock } from "./pak/compression.js";
export type { CompressedBlock } from "./pak/compression.js";
export { readHeader, decodeHeader, describeSignature } from "./pak/header.js";
export { resolveFormat, requireFormat } from "./pak/formats.js";
export type { PakFormatHandler } from "./pak/formats.js";
export { readEntryTable, sortEntriesByPosition, splitNameTableLocator } from "./pak/entries.js";
export { readNameTable, readNameRecords, buildNameMap } from "./pak/names.js";
export { FileArchiveSource, BufferArchiveSource } from "./pak/source.js";
export type { ArchiveSource } from "./pak/source.js";
export { PakError, isPakError, exitCodeFor } from "./pak/errors.js";
export type { PakErrorKind } from "./pak/errors.js";
export { PakSignature, HEADER_SIZE, MAX_CHUNK_OUTPUT } from "./pak/types.js";
export type { PakHeader, PakFileEntry, PakLayout, DecodedFile, NameRecord, PakLogger } from "./pak/types.js";
