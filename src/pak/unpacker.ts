/**
 * PAK unpacker: header → entry table → name table → per-entry chunk blocks → files
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import { scaleOffset } from "./cursor.js";
import { PakError, toPakError, type PakErrorKind } from "./errors.js";
import { requireFormat } from "./formats.js";
import { readHeader } from "./header.js";
import { FileArchiveSource, type ArchiveSource } from "./source.js";
import {
	MANIFEST_FILE_NAME,
	UNKNOWN_FILE_SUFFIX,
	type DecodedFile,
	type PakFileEntry,
	type PakLayout,
	type PakLogger
} from "./types.js";

export interface ResolvedName {
	name: string;
	/** Counter value for the next unresolved entry */
	unknownCounter: number;
}

export function unknownFileName(index: number): string {
	return `${index.toString(16).toUpperCase().padStart(8, "0")}${UNKNOWN_FILE_SUFFIX}`;
}

/**
 * Looks the entry up in the name table. Unresolved entries get
 * `XXXXXXXX.unknown_file` from the counter, which is returned incremented.
 */
export function resolveEntryName(entry: PakFileEntry, names: ReadonlyMap<number, string>, unknownCounter: number): ResolvedName {
	const name = names.get(entry.contentId);
	if (name) return { name, unknownCounter };
	return { name: unknownFileName(unknownCounter), unknownCounter: unknownCounter + 1 };
}

/**
 * Reads header, entries and names without extracting anything.
 * Unsupported signatures stop here, before any further read.
 */
export function openPak(source: ArchiveSource, logger?: PakLogger): PakLayout {
	const header = readHeader(source);
	const handler = requireFormat(header);
	logger?.info(`Processing PAK file type: ${handler.description}`);
	return handler.readLayout(source, header, logger);
}

export function readPak(inputPath: string, logger?: PakLogger): PakLayout {
	const source = FileArchiveSource.open(inputPath);
	try {
		return openPak(source, logger);
	} finally {
		source.close();
	}
}

export interface DecodeOptions {
	filter?: (name: string) => boolean;
	/** Declared DecompressedSize must match the decoded length */
	strictSize?: boolean;
	logger?: PakLogger;
}

export type EntryOutcome =
	| { ok: true; file: DecodedFile }
	| { ok: false; entry: PakFileEntry; name: string; error: PakError };

/**
 * Decodes every file entry in position order. A failing entry is reported as
 * an outcome and the remaining entries are still decoded.
 */
export function* decodeEntries(source: ArchiveSource, layout: PakLayout, options: DecodeOptions = {}): Generator<EntryOutcome> {
	const handler = requireFormat(layout.header);
	let unknownCounter = 0;

	for (const entry of layout.files) {
		const resolved = resolveEntryName(entry, layout.names, unknownCounter);
		unknownCounter = resolved.unknownCounter;
		const { name } = resolved;

		if (options.filter && !options.filter(name)) continue;

		let outcome: EntryOutcome;
		try {
			const block = handler.readEntry(source, layout.header, entry);
			if (block.data.length !== block.declaredSize) {
				const message = `${name}: decoded ${block.data.length} bytes, header declares ${block.declaredSize}`;
				if (options.strictSize) throw new PakError("CorruptData", message);
				options.logger?.warn(message);
			}
			outcome = { ok: true, file: { name, entry, data: block.data, declaredSize: block.declaredSize } };
		} catch (err) {
			outcome = { ok: false, entry, name, error: toPakError(err, `Failed to read ${name}`) };
		}
		yield outcome;
	}
}

/** Joins a stored name onto outputDir; names escaping outputDir are rejected */
export function outputPathFor(outputDir: string, name: string): string {
	const root = resolve(outputDir);
	const target = resolve(root, name.replace(/\\/g, "/"));
	const rel = relative(root, target);
	if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
		throw new PakError("CorruptData", `Refusing to write outside the output directory: ${name}`);
	}
	return target;
}

export interface UnpackOptions extends DecodeOptions {
	/** Manifest (.pak.manifest.json) im Ausgabeordner speichern */
	manifest?: boolean;
}

export interface EntryFailure {
	name: string;
	entry: PakFileEntry;
	error: PakError;
}

export interface UnpackResult {
	extracted: string[];
	failures: EntryFailure[];
	specialCount: number;
	/** First problem of the run, undefined if everything was extracted */
	status?: PakErrorKind;
}

interface ManifestRecord {
	name: string;
	contentId: number;
	position: number;
	size: number;
	byteOffset: number;
}

export function extractAll(source: ArchiveSource, outputDir: string, options: UnpackOptions = {}): UnpackResult {
	const { logger } = options;
	const layout = openPak(source, logger);

	try {
		mkdirSync(outputDir, { recursive: true });
	} catch (err) {
		throw toPakError(err, `Cannot create output directory ${outputDir}`);
	}

	const extracted: string[] = [];
	const failures: EntryFailure[] = [];
	const manifest: ManifestRecord[] = [];

	for (const outcome of decodeEntries(source, layout, options)) {
		if (!outcome.ok) {
			logger?.warn(`Failed to dump file: ${outcome.name} (${outcome.error.message})`);
			failures.push({ name: outcome.name, entry: outcome.entry, error: outcome.error });
			continue;
		}

		const { file } = outcome;
		try {
			const outPath = outputPathFor(outputDir, file.name);
			mkdirSync(dirname(outPath), { recursive: true });
			writeFileSync(outPath, file.data, { flag: "w" });
			logger?.info(`Saving file: ${file.name}`);
			extracted.push(outPath);
			manifest.push({
				name: file.name,
				contentId: file.entry.contentId,
				position: file.entry.position,
				size: file.entry.size,
				byteOffset: scaleOffset(file.entry.position, layout.header.alignmentUnit)
			});
		} catch (err) {
			const error = toPakError(err, `Failed to dump file ${file.name}`);
			logger?.warn(error.message);
			failures.push({ name: file.name, entry: file.entry, error });
		}
	}

	if (options.manifest) {
		const content = {
			signature: layout.header.signature,
			alignmentUnit: layout.header.alignmentUnit,
			chunkUnit: layout.header.chunkUnit,
			files: manifest
		};
		try {
			writeFileSync(join(outputDir, MANIFEST_FILE_NAME), JSON.stringify(content, null, 2), "utf8");
		} catch (err) {
			throw toPakError(err, "Cannot write manifest");
		}
	}

	const status: PakErrorKind | undefined = failures[0]?.error.kind ?? (layout.specialCount > 0 ? "UnsupportedFeature" : undefined);
	return { extracted, failures, specialCount: layout.specialCount, status };
}

/**
 * Unpack a PAK archive to a directory
 */
export function unpackPak(inputPath: string, outputDir: string, options?: UnpackOptions): UnpackResult {
	const source = FileArchiveSource.open(inputPath);
	try {
		return extractAll(source, outputDir, options);
	} finally {
		source.close();
	}
}
