import { validateChecksum, writeChecksum } from "./checksum";
import {
	BLOCK_SIZE,
	DEFAULT_DIR_MODE,
	DEFAULT_FILE_MODE,
	TYPEFLAG,
	USTAR,
	USTAR_MAGIC,
	USTAR_MAX_SIZE,
	USTAR_MAX_UID_GID,
	USTAR_VERSION,
	typeFromFlag,
} from "./constants";
import {
	byteLength,
	readNumeric,
	readOctal,
	readString,
	writeOctal,
	writeString,
} from "./fields";
import type { TarHeader } from "./types";

/** Header as parsed from a block, before PAX/GNU overrides and prefix joining. */
export interface RawTarHeader extends TarHeader {
	magic: string;
	prefix: string;
}

/** Entries that carry no data after their header. */
export function isBodyless(header: TarHeader): boolean {
	return (
		header.type === "directory" ||
		header.type === "symlink" ||
		header.type === "link"
	);
}

/**
 * Split a long path into a USTAR prefix (up to 155 bytes) and name (up to 100
 * bytes) at a slash. Returns `null` when the path already fits or no split
 * works, in which case a PAX `path` record is needed.
 */
export function findUstarSplit(
	path: string,
): { name: string; prefix: string } | null {
	if (byteLength(path) <= USTAR.name.size) return null;

	for (let i = path.lastIndexOf("/"); i > 0; i = path.lastIndexOf("/", i - 1)) {
		const name = path.slice(i + 1);
		// Moving left only makes the name longer.
		if (byteLength(name) > USTAR.name.size) return null;

		const prefix = path.slice(0, i);
		if (name && byteLength(prefix) <= USTAR.prefix.size) {
			return { name, prefix };
		}
	}

	return null;
}

/**
 * Encode a 512-byte USTAR header block.
 *
 * Values that overflow their field are truncated (strings) or clamped
 * (numbers); {@link generatePax} carries the exact values alongside.
 */
export function createTarHeader(header: TarHeader): Uint8Array {
	const block = new Uint8Array(BLOCK_SIZE);
	const type = header.type ?? "file";
	const size = isBodyless(header) ? 0 : header.size;

	let name = header.name;
	let prefix = "";
	const split = findUstarSplit(name);
	if (split) {
		name = split.name;
		prefix = split.prefix;
	}

	writeString(block, USTAR.name, name);
	writeOctal(
		block,
		USTAR.mode,
		(header.mode ??
			(type === "directory" ? DEFAULT_DIR_MODE : DEFAULT_FILE_MODE)) &
			0o7777,
	);
	writeOctal(block, USTAR.uid, Math.min(header.uid ?? 0, USTAR_MAX_UID_GID));
	writeOctal(block, USTAR.gid, Math.min(header.gid ?? 0, USTAR_MAX_UID_GID));
	writeOctal(block, USTAR.size, Math.min(size, USTAR_MAX_SIZE));
	writeOctal(
		block,
		USTAR.mtime,
		Math.max(0, Math.floor((header.mtime?.getTime() ?? Date.now()) / 1000)),
	);
	writeString(block, USTAR.typeflag, TYPEFLAG[type]);
	writeString(block, USTAR.linkname, header.linkname);
	writeString(block, USTAR.magic, USTAR_MAGIC);
	writeString(block, USTAR.version, USTAR_VERSION);
	writeString(block, USTAR.uname, header.uname);
	writeString(block, USTAR.gname, header.gname);
	writeString(block, USTAR.prefix, prefix);

	writeChecksum(block);
	return block;
}

/** Decode a header block. Throws on a bad checksum or magic when `strict`. */
export function parseTarHeader(
	block: Uint8Array,
	strict: boolean,
): RawTarHeader {
	if (strict && !validateChecksum(block)) {
		throw new Error("Invalid tar header checksum.");
	}

	const magic = readString(block, USTAR.magic);
	if (strict && magic !== USTAR_MAGIC) {
		throw new Error(`Invalid USTAR magic literal. Got "${magic}".`);
	}

	return {
		name: readString(block, USTAR.name),
		mode: readOctal(block, USTAR.mode),
		uid: readNumeric(block, USTAR.uid),
		gid: readNumeric(block, USTAR.gid),
		size: readNumeric(block, USTAR.size),
		mtime: new Date(readNumeric(block, USTAR.mtime) * 1000),
		type: typeFromFlag(readString(block, USTAR.typeflag)),
		linkname: readString(block, USTAR.linkname),
		uname: readString(block, USTAR.uname),
		gname: readString(block, USTAR.gname),
		magic,
		prefix: readString(block, USTAR.prefix),
	};
}
