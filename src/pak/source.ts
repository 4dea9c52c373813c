/**
 * Random access over an archive: seek + read against one handle.
 */

import { closeSync, fstatSync, openSync, readSync } from "node:fs";
import { PakError } from "./errors.js";

export interface ArchiveSource {
	readonly size: number;
	/** Reads exactly `length` bytes at `offset` or throws an IOError */
	read(offset: number, length: number): Buffer;
	close(): void;
}

function checkRange(size: number, offset: number, length: number): void {
	if (offset < 0 || length < 0 || offset + length > size) {
		throw new PakError("IOError", `Read of ${length} bytes at offset ${offset} exceeds archive size ${size}`);
	}
}

export class FileArchiveSource implements ArchiveSource {
	readonly size: number;
	private fd: number | undefined;

	private constructor(fd: number, readonly path: string) {
		this.fd = fd;
		this.size = fstatSync(fd).size;
	}

	static open(path: string): FileArchiveSource {
		let fd: number;
		try {
			fd = openSync(path, "r");
		} catch (err) {
			const detail = err instanceof Error ? err.message : String(err);
			throw new PakError("InvalidInput", `Cannot open archive ${path}: ${detail}`, { cause: err });
		}
		try {
			return new FileArchiveSource(fd, path);
		} catch (err) {
			closeSync(fd);
			throw new PakError("IOError", `Cannot stat archive ${path}`, { cause: err });
		}
	}

	read(offset: number, length: number): Buffer {
		if (this.fd === undefined) {
			throw new PakError("IOError", `Archive ${this.path} is closed`);
		}
		checkRange(this.size, offset, length);
		const buf = Buffer.alloc(length);
		let done = 0;
		while (done < length) {
			let n: number;
			try {
				n = readSync(this.fd, buf, done, length - done, offset + done);
			} catch (err) {
				throw new PakError("IOError", `Read failed at offset ${offset + done} in ${this.path}`, { cause: err });
			}
			if (n === 0) {
				throw new PakError("IOError", `Short read at offset ${offset + done} in ${this.path}`);
			}
			done += n;
		}
		return buf;
	}

	close(): void {
		if (this.fd !== undefined) {
			closeSync(this.fd);
			this.fd = undefined;
		}
	}
}

/** In-memory source, mostly for tests and already loaded archives */
export class BufferArchiveSource implements ArchiveSource {
	constructor(private readonly data: Buffer) {}

	get size(): number {
		return this.data.length;
	}

	read(offset: number, length: number): Buffer {
		checkRange(this.data.length, offset, length);
		return this.data.subarray(offset, offset + length);
	}

	close(): void {}
}
