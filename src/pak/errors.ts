/**
 * Error taxonomy for PAK extraction
 */

export type PakErrorKind =
	| "InvalidInput"
	| "IOError"
	| "FormatError"
	| "UnsupportedFormat"
	| "UnsupportedFeature"
	| "CorruptData";

const EXIT_CODES: Record<PakErrorKind, number> = {
	InvalidInput: 2,
	IOError: 3,
	FormatError: 4,
	UnsupportedFormat: 5,
	UnsupportedFeature: 6,
	CorruptData: 7
};

export class PakError extends Error {
	readonly kind: PakErrorKind;

	constructor(kind: PakErrorKind, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "PakError";
		this.kind = kind;
	}
}

export function isPakError(err: unknown): err is PakError {
	return err instanceof PakError;
}

/** 0 = ok, 1 = unexpected failure, 2..7 = one code per error kind */
export function exitCodeFor(kind: PakErrorKind | undefined): number {
	return kind ? EXIT_CODES[kind] : 0;
}

/** Wraps anything thrown by node:fs into an IOError, keeps PakErrors as they are */
export function toPakError(err: unknown, context: string): PakError {
	if (err instanceof PakError) return err;
	const detail = err instanceof Error ? err.message : String(err);
	return new PakError("IOError", `${context}: ${detail}`, { cause: err });
}
