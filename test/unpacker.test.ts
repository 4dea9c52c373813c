import { afterEach, beforeEach, describe, test } from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PakError } from "../src/pak/errors.js";
import { BufferArchiveSource } from "../src/pak/source.js";
import {
	decodeEntries,
	extractAll,
	openPak,
	outputPathFor,
	readPak,
	resolveEntryName,
	unknownFileName,
	unpackPak
} from "../src/pak/unpacker.js";
import { encodeLiterals } from "./helpers/aplib-writer.js";
import { buildPak, recordingLogger } from "./helpers/pak-builder.js";

let workDir: string;

beforeEach(() => {
	workDir = mkdtempSync(join(tmpdir(), "pak-test-"));
});

afterEach(() => {
	rmSync(workDir, { recursive: true, force: true });
});

function pattern(length: number, seed = 1): Buffer {
	const buf = Buffer.alloc(length);
	for (let i = 0; i < length; i++) buf[i] = (i * 31 + seed) & 0xff;
	return buf;
}

describe("name resolution", () => {
	test("unknown names use 8 upper-case hex digits", () => {
		assert.equal(unknownFileName(0), "00000000.unknown_file");
		assert.equal(unknownFileName(0x2af), "000002AF.unknown_file");
	});

	test("counter only advances for unresolved entries", () => {
		const names = new Map([[1, "known.bin"]]);
		assert.deepEqual(resolveEntryName({ contentId: 1, position: 0, size: 0 }, names, 4), { name: "known.bin", unknownCounter: 4 });
		assert.deepEqual(resolveEntryName({ contentId: 2, position: 0, size: 0 }, names, 4), {
			name: "00000004.unknown_file",
			unknownCounter: 5
		});
	});

	test("an empty mapped name counts as unresolved", () => {
		const names = new Map([[1, ""]]);
		assert.equal(resolveEntryName({ contentId: 1, position: 0, size: 0 }, names, 0).name, "00000000.unknown_file");
	});
});

describe("extraction", () => {
	test("two-entry archive: locator at pos 8, one unnamed file at byte 64", () => {
		const payload = Buffer.from("0123456789");
		const chunk = encodeLiterals(payload);
		const nameBody = Buffer.concat([Buffer.from([0x34, 0x12, 0, 0, 9, 0, 0, 0]), Buffer.from("other.bin")]);

		const archive = Buffer.alloc(128 + 8 + nameBody.length);
		archive.writeUInt32LE(0x6c52414b, 0);
		archive.writeUInt32LE(1, 4);
		archive.writeUInt32LE(16, 8);
		archive.writeUInt32LE(256, 12);
		archive.writeBigUInt64LE(32n, 16);
		// entry table at 32
		archive.writeUInt32LE(2, 32);
		archive.writeUInt32LE(0, 36);
		archive.writeUInt32LE(0xbbbb, 40);
		archive.writeUInt32LE(8, 44);
		archive.writeUInt32LE(0, 48);
		archive.writeUInt32LE(0xaaaa, 52);
		archive.writeUInt32LE(4, 56);
		archive.writeUInt32LE(10, 60);
		// file block at 4 × 16
		archive.writeUInt32LE(10, 64);
		archive.writeUInt32LE(1, 68);
		archive.writeUInt32LE(chunk.length, 72);
		chunk.copy(archive, 76);
		// name table at 8 × 16
		archive.writeUInt32LE(nameBody.length, 128);
		nameBody.copy(archive, 136);

		const source = new BufferArchiveSource(archive);
		const layout = openPak(source);
		assert.equal(layout.locator?.position, 8);
		assert.equal(layout.files.length, 1);

		const out = join(workDir, "dump");
		const result = extractAll(source, out);
		assert.deepEqual(readdirSync(out), ["00000000.unknown_file"]);
		assert.deepEqual(readFileSync(join(out, "00000000.unknown_file")), payload);
		assert.equal(result.status, undefined);
	});

	test("names resolve by content id, unknown indices follow position order", () => {
		const { buffer } = buildPak({
			files: [
				{ contentId: 1, data: Buffer.from("alpha") },
				{ contentId: 2, data: Buffer.from("beta") },
				{ contentId: 3, data: Buffer.from("gamma") },
				{ contentId: 4, data: Buffer.from("delta") }
			],
			names: [
				{ contentId: 3, name: "dir/c.txt" },
				{ contentId: 1, name: "a.txt" }
			],
			reverseEntries: true
		});

		const outcomes = [...decodeEntries(new BufferArchiveSource(buffer), openPak(new BufferArchiveSource(buffer)))];
		assert.deepEqual(
			outcomes.map((o) => (o.ok ? [o.file.name, o.file.data.toString()] : ["failed", o.name])),
			[
				["a.txt", "alpha"],
				["00000000.unknown_file", "beta"],
				["dir/c.txt", "gamma"],
				["00000001.unknown_file", "delta"]
			]
		);

		const out = join(workDir, "out");
		const result = extractAll(new BufferArchiveSource(buffer), out);
		assert.equal(result.extracted.length, 4);
		assert.equal(readFileSync(join(out, "dir", "c.txt"), "utf8"), "gamma");
	});

	test("payload is the concatenation of all chunk outputs", () => {
		const data = pattern(5000);
		const { buffer } = buildPak({
			files: [{ contentId: 9, data }],
			names: [{ contentId: 9, name: "big.bin" }]
		});
		const [outcome] = [...decodeEntries(new BufferArchiveSource(buffer), openPak(new BufferArchiveSource(buffer)))];
		assert.ok(outcome.ok);
		assert.equal(outcome.file.data.length, 5000);
		assert.deepEqual(outcome.file.data, data);
	});

	test("zero chunks produce an empty file", () => {
		const { buffer } = buildPak({
			files: [{ contentId: 1, data: Buffer.alloc(0) }],
			names: [{ contentId: 1, name: "empty.dat" }]
		});
		const out = join(workDir, "out");
		extractAll(new BufferArchiveSource(buffer), out);
		assert.equal(readFileSync(join(out, "empty.dat")).length, 0);
	});

	test("zero entries: nothing extracted, no error", () => {
		const { buffer } = buildPak({ files: [] });
		const out = join(workDir, "out");
		const result = extractAll(new BufferArchiveSource(buffer), out);
		assert.deepEqual(result.extracted, []);
		assert.deepEqual(result.failures, []);
		assert.equal(result.status, undefined);
		assert.deepEqual(readdirSync(out), []);
	});

	test("a failing entry does not stop the others", () => {
		const { buffer } = buildPak({
			files: [
				{ contentId: 1, chunks: [Buffer.from([0x41, 0x6c, 0x42, 0x06, 0x00])], declaredSize: 4 },
				{ contentId: 2, data: Buffer.from("fine") }
			],
			names: [
				{ contentId: 1, name: "broken.bin" },
				{ contentId: 2, name: "fine.bin" }
			]
		});
		const out = join(workDir, "out");
		const rec = recordingLogger();
		const result = extractAll(new BufferArchiveSource(buffer), out, { logger: rec.logger });

		assert.equal(result.failures.length, 1);
		assert.equal(result.failures[0].name, "broken.bin");
		assert.equal(result.failures[0].error.kind, "CorruptData");
		assert.equal(result.status, "CorruptData");
		assert.deepEqual(readdirSync(out), ["fine.bin"]);
	});

	test("an entry positioned past the end fails with IOError", () => {
		const { buffer } = buildPak({
			files: [{ contentId: 1, data: Buffer.from("ok") }],
			names: [{ contentId: 1, name: "ok.bin" }]
		});
		const source = new BufferArchiveSource(buffer);
		const layout = openPak(source);
		const bogus = { contentId: 5, position: 0x100000, size: 1 };

		const outcomes = [...decodeEntries(source, { ...layout, files: [...layout.files, bogus] })];
		assert.equal(outcomes.length, 2);
		assert.ok(outcomes[0].ok);
		const failed = outcomes[1];
		assert.ok(!failed.ok);
		assert.equal(failed.name, "00000000.unknown_file");
		assert.equal(failed.error.kind, "IOError");
	});

	test("declared size mismatch warns by default and fails in strict mode", () => {
		const { buffer } = buildPak({
			files: [{ contentId: 1, data: Buffer.from("0123456789"), declaredSize: 99 }],
			names: [{ contentId: 1, name: "sized.bin" }]
		});

		const rec = recordingLogger();
		const loose = extractAll(new BufferArchiveSource(buffer), join(workDir, "loose"), { logger: rec.logger });
		assert.equal(loose.extracted.length, 1);
		assert.ok(rec.warn.includes("sized.bin: decoded 10 bytes, header declares 99"));

		const strict = extractAll(new BufferArchiveSource(buffer), join(workDir, "strict"), { strictSize: true });
		assert.equal(strict.extracted.length, 0);
		assert.equal(strict.failures[0].error.kind, "CorruptData");
		assert.equal(strict.failures[0].error.message, "sized.bin: decoded 10 bytes, header declares 99");
	});

	test("filter skips files but keeps unknown numbering stable", () => {
		const { buffer } = buildPak({
			files: [
				{ contentId: 1, data: Buffer.from("one") },
				{ contentId: 2, data: Buffer.from("two") }
			],
			names: [{ contentId: 42, name: "unused" }]
		});
		const out = join(workDir, "out");
		extractAll(new BufferArchiveSource(buffer), out, { filter: (name) => name !== "00000000.unknown_file" });
		assert.deepEqual(readdirSync(out), ["00000001.unknown_file"]);
		assert.equal(readFileSync(join(out, "00000001.unknown_file"), "utf8"), "two");
	});

	test("manifest lists extracted files with byte offsets", () => {
		const { buffer, offsets } = buildPak({
			files: [{ contentId: 0x10, data: Buffer.from("m") }],
			names: [{ contentId: 0x10, name: "m.txt" }]
		});
		const out = join(workDir, "out");
		extractAll(new BufferArchiveSource(buffer), out, { manifest: true });

		const manifest = JSON.parse(readFileSync(join(out, ".pak.manifest.json"), "utf8"));
		assert.deepEqual(manifest, {
			signature: 0x6c52414b,
			alignmentUnit: 16,
			chunkUnit: 256,
			files: [{ name: "m.txt", contentId: 0x10, position: offsets[0] / 16, size: 1, byteOffset: offsets[0] }]
		});
	});

	test("special entries are skipped and reported as UnsupportedFeature", () => {
		const { buffer } = buildPak({
			files: [{ contentId: 1, data: Buffer.from("s") }],
			names: [{ contentId: 1, name: "s.bin" }],
			specialCount: 2
		});
		const result = extractAll(new BufferArchiveSource(buffer), join(workDir, "out"));
		assert.equal(result.extracted.length, 1);
		assert.equal(result.specialCount, 2);
		assert.equal(result.status, "UnsupportedFeature");
	});

	test("names escaping the output directory fail only that entry", () => {
		const { buffer } = buildPak({
			files: [
				{ contentId: 1, data: Buffer.from("evil") },
				{ contentId: 2, data: Buffer.from("good") }
			],
			names: [
				{ contentId: 1, name: "../escape.txt" },
				{ contentId: 2, name: "good.txt" }
			]
		});
		const out = join(workDir, "out");
		const result = extractAll(new BufferArchiveSource(buffer), out);
		assert.equal(result.failures[0].error.kind, "CorruptData");
		assert.equal(existsSync(join(workDir, "escape.txt")), false);
		assert.deepEqual(readdirSync(out), ["good.txt"]);
	});

	test("outputPathFor maps backslashes to directories", () => {
		assert.equal(outputPathFor("/tmp/out", "data\\ui\\a.bin"), join("/tmp/out", "data", "ui", "a.bin"));
	});
});

describe("whole-run failures", () => {
	function expectKind(kind: string) {
		return (err: unknown) => err instanceof PakError && err.kind === kind;
	}

	test("unrecognized signature: UnsupportedFormat and nothing written", () => {
		const { buffer } = buildPak({
			signature: 0x624b4150,
			files: [{ contentId: 1, data: Buffer.from("x") }],
			names: [{ contentId: 1, name: "x" }]
		});
		const out = join(workDir, "out");
		assert.throws(() => extractAll(new BufferArchiveSource(buffer), out), expectKind("UnsupportedFormat"));
		assert.equal(existsSync(out), false);
	});

	test("zero-size name table: CorruptData before any file is produced", () => {
		const { buffer } = buildPak({
			files: [{ contentId: 1, data: Buffer.from("x") }],
			names: [{ contentId: 1, name: "x" }],
			nameTableSize: 0
		});
		const out = join(workDir, "out");
		assert.throws(() => extractAll(new BufferArchiveSource(buffer), out), expectKind("CorruptData"));
		assert.equal(existsSync(out), false);
	});

	test("valid flag 0 is a FormatError", () => {
		const { buffer } = buildPak({ isValid: 0, files: [] });
		assert.throws(() => openPak(new BufferArchiveSource(buffer)), expectKind("FormatError"));
	});

	test("file shorter than the header is a FormatError", () => {
		const path = join(workDir, "short.pak");
		writeFileSync(path, Buffer.alloc(10));
		assert.throws(() => unpackPak(path, join(workDir, "out")), expectKind("FormatError"));
	});

	test("missing archive path is InvalidInput", () => {
		assert.throws(() => readPak(join(workDir, "missing.pak")), expectKind("InvalidInput"));
	});
});

describe("file based api", () => {
	test("readPak lists entries, unpackPak writes them", () => {
		const { buffer } = buildPak({
			files: [
				{ contentId: 0x11, data: pattern(300, 3) },
				{ contentId: 0x22, data: Buffer.from("second") }
			],
			names: [{ contentId: 0x22, name: "second.txt" }]
		});
		const path = join(workDir, "archive.pak");
		writeFileSync(path, buffer);

		const layout = readPak(path);
		assert.deepEqual(
			layout.files.map((f) => f.contentId),
			[0x11, 0x22]
		);
		assert.equal(layout.names.get(0x22), "second.txt");

		const out = join(workDir, "dump");
		const result = unpackPak(path, out);
		assert.deepEqual(result.extracted, [join(out, "00000000.unknown_file"), join(out, "second.txt")]);
		assert.deepEqual(readFileSync(join(out, "00000000.unknown_file")), pattern(300, 3));
	});
});
