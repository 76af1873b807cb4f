/** Stable error codes for structural failures. */
export type StructuralErrorCode =
	| "NOT_A_DIRECTORY"
	| "MISSING_METADATA"
	| "BAD_METADATA"
	| "BAD_CHECKSUM_LINE"
	| "PACK_FAILED"
	| "ALREADY_EXISTS"
	| "NOT_ARCHIVABLE"
	| "BAD_SIZE";

/** Stable error codes for integrity failures. */
export type IntegrityErrorCode =
	| "CHECKSUM_MISMATCH"
	| "MISSING_FILE"
	| "SYMLINK_MISSING"
	| "VERIFICATION_FAILED";

/** Stable error codes for destination pre-flight failures. */
export type PreflightErrorCode =
	| "NO_SYMLINK_SUPPORT"
	| "CASE_INSENSITIVE_DESTINATION"
	| "DESTINATION_EXISTS"
	| "DESTINATION_MISSING";

export type ArchiverErrorCode =
	| StructuralErrorCode
	| IntegrityErrorCode
	| PreflightErrorCode
	| "COPY_FAILED";

/**
 * Base class for every error raised by the archiver.
 *
 * `code` is stable and safe to branch on; `message` is for humans.
 */
export class ArchiverError extends Error {
	/** Machine-readable error code. */
	readonly code: ArchiverErrorCode;
	/** Filesystem path the error relates to, if any. */
	readonly path?: string | undefined;
	/** Underlying cause, if available. */
	override readonly cause?: unknown;

	constructor(
		code: ArchiverErrorCode,
		message: string,
		options?: { path?: string | undefined; cause?: unknown },
	) {
		super(message, options?.cause ? { cause: options.cause } : undefined);
		this.name = "ArchiverError";
		this.code = code;
		this.path = options?.path;
		this.cause = options?.cause;
	}
}

/** Not a directory, missing metadata, malformed manifests. Never retried. */
export class StructuralError extends ArchiverError {
	declare readonly code: StructuralErrorCode;

	constructor(
		code: StructuralErrorCode,
		message: string,
		options?: { path?: string | undefined; cause?: unknown },
	) {
		super(code, message, options);
		this.name = "StructuralError";
	}
}

/** A checksum mismatch or an expected file gone missing. */
export class IntegrityError extends ArchiverError {
	declare readonly code: IntegrityErrorCode;

	constructor(
		code: IntegrityErrorCode,
		message: string,
		options?: { path?: string | undefined; cause?: unknown },
	) {
		super(code, message, options);
		this.name = "IntegrityError";
	}
}

/** The destination cannot hold the tree; raised before anything is written. */
export class PreflightError extends ArchiverError {
	declare readonly code: PreflightErrorCode;

	constructor(
		code: PreflightErrorCode,
		message: string,
		options?: { path?: string | undefined; cause?: unknown },
	) {
		super(code, message, options);
		this.name = "PreflightError";
	}
}

/** One entry the copy engine could not reproduce. */
export interface CopyFailure {
	path: string;
	reason: string;
}

/** Raised once at the end of a copy with every per-entry failure. */
export class CopyError extends ArchiverError {
	readonly failures: readonly CopyFailure[];

	constructor(source: string, failures: readonly CopyFailure[]) {
		super(
			"COPY_FAILED",
			`${source}: copy failed for ${failures.length} ${failures.length === 1 ? "entry" : "entries"}`,
			{ path: source },
		);
		this.name = "CopyError";
		this.failures = failures;
	}
}

/** Node.js system error shape (`ENOENT`, `EACCES`, ...). */
export function errorCode(err: unknown): string | undefined {
	if (err instanceof Error && "code" in err && typeof err.code === "string") {
		return err.code;
	}
	return undefined;
}

/** Permission problems on a single entry are recoverable during pack and copy. */
export function isPermissionError(err: unknown): boolean {
	const code = errorCode(err);
	return code === "EACCES" || code === "EPERM";
}

export function isNotFoundError(err: unknown): boolean {
	return errorCode(err) === "ENOENT";
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
