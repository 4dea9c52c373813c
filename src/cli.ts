#!/usr/bin/env node
/**
 * CLI für Kaiko PAK Tools
 * Verwendung:
 *   pak-tools <archive.pak> [-o dump] [--list] [--strict] [--manifest]
 */

import { Command } from "commander";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { exitCodeFor, isPakError } from "./pak/errors.js";
import { describeSignature } from "./pak/header.js";
import type { PakLogger } from "./pak/types.js";
import { readPak, resolveEntryName, unpackPak } from "./pak/unpacker.js";

const version = "0.1.0";

interface CliOptions {
	output: string;
	list?: boolean;
	strict?: boolean;
	manifest?: boolean;
}

const logger: PakLogger = {
	info: (message) => console.log(`[!] Info: ${message}`),
	warn: (message) => console.warn(`[!] Warnung: ${message}`)
};

function list(inputPath: string): void {
	const layout = readPak(inputPath, logger);
	console.log(`Signatur: ${describeSignature(layout.header.signature)}`);
	console.log(`Alignment: ${layout.header.alignmentUnit}, Chunk-Einheit: ${layout.header.chunkUnit}`);
	console.log(`${layout.files.length} Dateien, ${layout.names.size} Namen, ${layout.specialCount} Spezialeinträge`);

	let unknownCounter = 0;
	for (const entry of layout.files) {
		const resolved = resolveEntryName(entry, layout.names, unknownCounter);
		unknownCounter = resolved.unknownCounter;
		const id = entry.contentId.toString(16).toUpperCase().padStart(8, "0");
		console.log(`  ${id}  pos=${entry.position}  size=${entry.size}  ${resolved.name}`);
	}
}

function unpack(inputPath: string, options: CliOptions): number {
	const outputDir = resolve(options.output);
	console.log(`Entpacke ${inputPath} nach ${outputDir}...`);
	const result = unpackPak(inputPath, outputDir, {
		strictSize: options.strict,
		manifest: options.manifest,
		logger
	});

	console.log(`Fertig: ${result.extracted.length} Dateien extrahiert`);
	if (result.failures.length > 0) {
		console.error(`${result.failures.length} Dateien fehlgeschlagen:`);
		result.failures.forEach((f) => console.error(`  - ${f.name}: ${f.error.message}`));
	}
	return exitCodeFor(result.status);
}

const program = new Command();

program
	.name("pak-tools")
	.description("Entpackt Kaiko PAK-Archive (little endian, komprimiert)")
	.version(version)
	.argument("<archive>", "Pfad zur PAK-Datei")
	.option("-o, --output <dir>", "Ausgabeordner", "dump")
	.option("--list", "Nur Einträge auflisten, nichts entpacken")
	.option("--strict", "Deklarierte Dateigrößen erzwingen")
	.option("--manifest", "Manifest (.pak.manifest.json) schreiben")
	.action((archive: string, options: CliOptions) => {
		if (!existsSync(archive)) {
			console.error(`Fehler: Datei nicht gefunden: ${archive}`);
			process.exitCode = exitCodeFor("InvalidInput");
			return;
		}
		try {
			if (options.list) {
				list(archive);
			} else {
				process.exitCode = unpack(archive, options);
			}
		} catch (err) {
			if (isPakError(err)) {
				console.error(`Fehler (${err.kind}): ${err.message}`);
				process.exitCode = exitCodeFor(err.kind);
			} else {
				console.error("Fehler:", err instanceof Error ? err.message : err);
				process.exitCode = 1;
			}
		}
	});

program.parse();
