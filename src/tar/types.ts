import type { ReadableStream } from "node:stream/web";
import type { TarEntryType } from "./constants";

/**
 * Header of a single tar entry.
 */
export interface TarHeader {
	/** Entry path. Long paths are split into a USTAR prefix or moved to a PAX record. */
	name: string;
	/** Size of the entry data in bytes. Always 0 for directories, symlinks and hard links. */
	size: number;
	/** Modification time. Defaults to now when packing. */
	mtime?: Date;
	/** Permission bits, e.g. `0o644`. */
	mode?: number;
	/** Defaults to `"file"`. */
	type?: TarEntryType;
	uid?: number;
	gid?: number;
	uname?: string;
	gname?: string;
	/** Symlink text, or the earlier entry a hard link points at. */
	linkname?: string;
	/** PAX extended attributes. */
	pax?: Record<string, string>;
}

/** An entry read from a tar stream. `body` must be read to the end or drained. */
export interface ParsedTarEntry {
	header: TarHeader;
	body: ReadableStream<Uint8Array>;
}

export interface DecoderOptions {
	/**
	 * Reject headers with a bad checksum or magic and trailing garbage after
	 * the end-of-archive marker. Defaults to `false`.
	 */
	strict?: boolean;
}
