/** Size of a tar block in bytes. */
export const BLOCK_SIZE = 512;

/** `-size & BLOCK_SIZE_MASK` is the padding needed after `size` bytes. */
export const BLOCK_SIZE_MASK = BLOCK_SIZE - 1;

/** Permissions given to extracted files until attributes are applied. */
export const DEFAULT_FILE_MODE = 0o644;

/** Permissions given to extracted directories until attributes are applied. */
export const DEFAULT_DIR_MODE = 0o755;

/** A byte range inside a header block. */
export interface HeaderField {
	readonly offset: number;
	readonly size: number;
}

/**
 * Layout of a USTAR header block.
 *
 * @see https://www.gnu.org/software/tar/manual/html_node/Standard.html
 */
export const USTAR = {
	name: { offset: 0, size: 100 },
	mode: { offset: 100, size: 8 },
	uid: { offset: 108, size: 8 },
	gid: { offset: 116, size: 8 },
	size: { offset: 124, size: 12 },
	mtime: { offset: 136, size: 12 },
	checksum: { offset: 148, size: 8 },
	typeflag: { offset: 156, size: 1 },
	linkname: { offset: 157, size: 100 },
	magic: { offset: 257, size: 6 },
	version: { offset: 263, size: 2 },
	uname: { offset: 265, size: 32 },
	gname: { offset: 297, size: 32 },
	prefix: { offset: 345, size: 155 },
} as const satisfies Record<string, HeaderField>;

export const USTAR_MAGIC = "ustar";
export const USTAR_VERSION = "00";

/** Largest value an 8-byte octal field holds (uid, gid). */
export const USTAR_MAX_UID_GID = 0o7777777;

/** Largest value the 12-byte octal size field holds (8 GiB - 1). */
export const USTAR_MAX_SIZE = 0o77777777777;

export type TarEntryType =
	| "file"
	| "link"
	| "symlink"
	| "directory"
	| "pax-header"
	| "pax-global-header"
	| "gnu-long-name"
	| "gnu-long-link-name";

export const TYPEFLAG: Record<TarEntryType, string> = {
	file: "0",
	link: "1",
	symlink: "2",
	directory: "5",
	"pax-header": "x",
	"pax-global-header": "g",
	"gnu-long-name": "L",
	"gnu-long-link-name": "K",
};

const FLAGTYPE: Record<string, TarEntryType | undefined> = {
	"0": "file",
	"1": "link",
	"2": "symlink",
	"5": "directory",
	x: "pax-header",
	g: "pax-global-header",
	L: "gnu-long-name",
	K: "gnu-long-link-name",
};

/** Map a typeflag character to an entry type. Old-style NUL flags are files. */
export function typeFromFlag(flag: string): TarEntryType {
	return FLAGTYPE[flag] ?? "file";
}
