import * as path from "node:path";
import type { PathClass, PathInfo } from "./types";

const COMPRESSED_EXTENSIONS = new Set(["gz", "bz2", "zip"]);

export const isUnreadable = (info: PathInfo): boolean => !info.readable;

export const isUnwritable = (info: PathInfo): boolean => !info.writable;

export const isSymlink = (info: PathInfo): boolean => info.symlink !== null;

export const isExternalSymlink = (info: PathInfo): boolean =>
	info.symlink?.external ?? false;

export const isBrokenSymlink = (info: PathInfo): boolean =>
	info.symlink?.state === "broken";

export const isUnresolvableSymlink = (info: PathInfo): boolean =>
	info.symlink?.state === "unresolvable";

export const isDirlink = (info: PathInfo): boolean =>
	info.symlink?.state === "dirlink";

/** A regular file with more than one name. */
export const isHardLinked = (info: PathInfo): boolean =>
	info.stats !== null && info.stats.isFile() && info.stats.nlink > 1;

/** A regular file named `*.gz`, `*.bz2` or `*.zip`. */
export const isCompressed = (info: PathInfo): boolean => {
	if (!info.stats?.isFile()) return false;
	const ext = path.basename(info.path).split(".").pop();
	return ext !== undefined && COMPRESSED_EXTENSIONS.has(ext);
};

export const isDirectory = (info: PathInfo): boolean =>
	info.stats?.isDirectory() ?? false;

export const isRegularFile = (info: PathInfo): boolean =>
	info.stats?.isFile() ?? false;

export function classifyPath(info: PathInfo): PathClass {
	const { stats, symlink } = info;
	if (!stats) return { kind: "missing" };
	if (symlink) {
		return { kind: "symlink", state: symlink.state, external: symlink.external };
	}
	if (stats.isDirectory()) return { kind: "directory" };
	if (stats.isFile()) {
		return stats.nlink > 1
			? { kind: "hardlink", nlink: stats.nlink }
			: { kind: "file" };
	}
	return { kind: "other" };
}
