import type { Stats } from "node:fs";

/**
 * State of a symbolic link, checked in this order: a link whose resolution
 * fails outright (e.g. a cycle) is `unresolvable`; one resolving to a missing
 * path is `broken`; one resolving to a directory is a `dirlink`.
 */
export type SymlinkState = "working" | "broken" | "unresolvable" | "dirlink";

export interface SymlinkInfo {
	/** Link text as returned by `readlink`. */
	target: string;
	/** Fully resolved target, or `null` when broken or unresolvable. */
	resolved: string | null;
	state: SymlinkState;
	/** Resolved target lies outside the inspected root. */
	external: boolean;
}

/**
 * Everything the inspector learns about one path, computed once on first
 * access and cached for the lifetime of the owning {@link PathInfoCache}.
 */
export interface PathInfo {
	/** Normalized absolute path. */
	path: string;
	/** `lstat` result, or `null` when the path could not be stat'ed. */
	stats: Stats | null;
	readable: boolean;
	writable: boolean;
	symlink: SymlinkInfo | null;
}

/** Classification of a single filesystem entry. */
export type PathClass =
	| { kind: "file" }
	| { kind: "hardlink"; nlink: number }
	| { kind: "directory" }
	| { kind: "symlink"; state: SymlinkState; external: boolean }
	| { kind: "other" }
	| { kind: "missing" };

export interface WalkOptions {
	/** Descend into symlinks that resolve to directories. Defaults to `false`. */
	followlinks?: boolean;
}
