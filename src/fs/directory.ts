import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { StructuralError, describeError } from "../errors";
import { type Logger, silentLogger } from "../logger";
import { PathInfoCache } from "./cache";
import {
	isBrokenSymlink,
	isCompressed,
	isDirlink,
	isExternalSymlink,
	isHardLinked,
	isRegularFile,
	isSymlink,
	isUnreadable,
	isUnresolvableSymlink,
	isUnwritable,
} from "./predicates";
import { type UserDatabase, systemUsers } from "./users";
import type { PathInfo, WalkOptions } from "./types";

export interface DirectoryOptions {
	logger?: Logger;
	/** Defaults to the system user database. */
	users?: UserDatabase;
}

type Paths = Iterable<string> | AsyncIterable<string>;

/**
 * Handle on a directory tree with a per-handle classification cache.
 *
 * Every predicate walks the tree and classifies entries through the cache,
 * so asking several questions costs one `lstat` per path. Create a handle
 * per operation and drop it afterwards.
 */
export class Directory {
	readonly cache: PathInfoCache;
	protected readonly logger: Logger;
	private readonly users: UserDatabase | undefined;

	protected constructor(
		/** Absolute path of the directory. */
		readonly path: string,
		/** The same directory with symlinks resolved. */
		readonly realPath: string,
		options: DirectoryOptions,
	) {
		this.logger = options.logger ?? silentLogger;
		this.users = options.users;
		this.cache = new PathInfoCache(realPath, this.logger);
	}

	/**
	 * Open a directory handle.
	 *
	 * @throws {StructuralError} `NOT_A_DIRECTORY` when `dir` is missing or not a directory.
	 */
	static async open(
		dir: string,
		options: DirectoryOptions = {},
	): Promise<Directory> {
		const absolute = path.resolve(dir);
		return new Directory(absolute, await realDirectory(absolute), options);
	}

	get basename(): string {
		return path.basename(this.path);
	}

	get parentDir(): string {
		return path.dirname(this.path);
	}

	/** Cached classification record for a path below (or at) the root. */
	info(p: string): Promise<PathInfo> {
		return this.cache.get(path.resolve(this.path, p));
	}

	/** Path of `p` relative to the root, with forward slashes. */
	relative(p: string): string {
		return path.relative(this.path, p).split(path.sep).join("/");
	}

	/**
	 * Walk the tree, yielding absolute paths: for each directory its
	 * non-directory entries, then its subdirectories (symlinks to directories
	 * included), then the contents of each subdirectory in turn.
	 *
	 * Every call starts a fresh walk. Siblings are yielded in name order.
	 * Directories that cannot be listed are yielded but not entered.
	 */
	walk(options: WalkOptions = {}): AsyncGenerator<string> {
		const chain = new Set<string>([this.realPath]);
		return this.walkDirectory(this.path, options.followlinks ?? false, chain);
	}

	private async *walkDirectory(
		dir: string,
		followlinks: boolean,
		chain: Set<string>,
	): AsyncGenerator<string> {
		let dirents: Dirent[];
		try {
			dirents = await fs.readdir(dir, { withFileTypes: true });
		} catch (err) {
			this.logger.debug(`${dir}: cannot list: ${describeError(err)}`);
			return;
		}
		dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

		const files: string[] = [];
		const dirs: string[] = [];
		const links: string[] = [];

		for (const dirent of dirents) {
			const full = path.join(dir, dirent.name);
			if (dirent.isDirectory()) {
				dirs.push(full);
			} else if (dirent.isSymbolicLink() && isDirlink(await this.cache.get(full))) {
				dirs.push(full);
				links.push(full);
			} else {
				files.push(full);
			}
		}

		yield* files;
		yield* dirs;

		for (const sub of dirs) {
			const isLink = links.includes(sub);
			if (isLink && !followlinks) continue;

			if (!followlinks) {
				yield* this.walkDirectory(sub, false, chain);
				continue;
			}

			// Following links: stop at directories already on the descent chain.
			const real = await realpathOrNull(sub);
			if (real === null || chain.has(real)) {
				this.logger.debug(`${sub}: directory loop, not descending`);
				continue;
			}
			chain.add(real);
			yield* this.walkDirectory(sub, true, chain);
			chain.delete(real);
		}
	}

	private async *select(
		test: (info: PathInfo) => boolean,
	): AsyncGenerator<string> {
		for await (const p of this.walk()) {
			if (test(await this.cache.get(p))) yield p;
		}
	}

	private async any(test: (info: PathInfo) => boolean): Promise<boolean> {
		for await (const _p of this.select(test)) return true;
		return false;
	}

	unreadableFiles(): AsyncGenerator<string> {
		return this.select(isUnreadable);
	}

	hasUnreadableFiles(): Promise<boolean> {
		return this.any(isUnreadable);
	}

	unwritableFiles(): AsyncGenerator<string> {
		return this.select(isUnwritable);
	}

	/** Every entry in the tree is readable. */
	async isReadable(): Promise<boolean> {
		return !(await this.hasUnreadableFiles());
	}

	/** Every entry in the tree is writable. */
	async isWritable(): Promise<boolean> {
		return !(await this.any(isUnwritable));
	}

	symlinks(): AsyncGenerator<string> {
		return this.select(isSymlink);
	}

	hasSymlinks(): Promise<boolean> {
		return this.any(isSymlink);
	}

	externalSymlinks(): AsyncGenerator<string> {
		return this.select(isExternalSymlink);
	}

	hasExternalSymlinks(): Promise<boolean> {
		return this.any(isExternalSymlink);
	}

	brokenSymlinks(): AsyncGenerator<string> {
		return this.select(isBrokenSymlink);
	}

	hasBrokenSymlinks(): Promise<boolean> {
		return this.any(isBrokenSymlink);
	}

	unresolvableSymlinks(): AsyncGenerator<string> {
		return this.select(isUnresolvableSymlink);
	}

	hasUnresolvableSymlinks(): Promise<boolean> {
		return this.any(isUnresolvableSymlink);
	}

	dirlinks(): AsyncGenerator<string> {
		return this.select(isDirlink);
	}

	hasDirlinks(): Promise<boolean> {
		return this.any(isDirlink);
	}

	hardLinkedFiles(): AsyncGenerator<string> {
		return this.select(isHardLinked);
	}

	hasHardLinkedFiles(): Promise<boolean> {
		return this.any(isHardLinked);
	}

	compressedFiles(): AsyncGenerator<string> {
		return this.select(isCompressed);
	}

	/** Paths owned by a uid with no entry in the user database. */
	async *unknownUids(): AsyncGenerator<string> {
		const users = this.users ?? (await systemUsers());
		for await (const p of this.walk()) {
			const { stats } = await this.cache.get(p);
			if (stats && users.userName(stats.uid) === undefined) yield p;
		}
	}

	async hasUnknownUids(): Promise<boolean> {
		for await (const _p of this.unknownUids()) return true;
		return false;
	}

	/**
	 * Groups of sibling entries whose names differ only by case. A tree with
	 * any such group needs a case-sensitive filesystem to be restored.
	 */
	async *caseSensitiveFilenames(): AsyncGenerator<string[]> {
		const groups = new Map<string, string[]>();
		for await (const p of this.walk()) {
			const key = `${path.dirname(p)}\0${path.basename(p).toLowerCase()}`;
			const group = groups.get(key);
			if (group) group.push(p);
			else groups.set(key, [p]);
		}
		for (const group of groups.values()) {
			if (group.length > 1) yield group;
		}
	}

	async hasCaseSensitiveFilenames(): Promise<boolean> {
		for await (const _group of this.caseSensitiveFilenames()) return true;
		return false;
	}

	/** Every entry belongs to the named group. Unknown group names never match. */
	async checkGroup(group: string): Promise<boolean> {
		const users = this.users ?? (await systemUsers());
		const gid = users.groupId(group);
		if (gid === undefined) return false;
		for await (const p of this.walk()) {
			const { stats } = await this.cache.get(p);
			if (!stats || stats.gid !== gid) return false;
		}
		return true;
	}

	/** Allocated size of the tree in bytes; hard-linked inodes count once. */
	size(): Promise<number> {
		return this.getSize(this.walk());
	}

	/**
	 * Allocated size (`blocks * 512`) of the given paths, resolved against the
	 * root. An inode with several links is counted the first time only.
	 */
	async getSize(paths: Paths): Promise<number> {
		const seen = new Set<string>();
		let total = 0;
		for await (const p of paths) {
			const { stats } = await this.info(p);
			if (!stats) continue;
			if (stats.nlink > 1 && !stats.isDirectory()) {
				const inode = `${stats.dev}:${stats.ino}`;
				if (seen.has(inode)) continue;
				seen.add(inode);
			}
			total += stats.blocks * 512;
		}
		return total;
	}

	/** Relative path and allocated size of the largest regular file. */
	async largestFile(): Promise<[string, number] | null> {
		let largest: [string, number] | null = null;
		for await (const p of this.walk()) {
			const info = await this.cache.get(p);
			if (!info.stats || !isRegularFile(info)) continue;
			const size = info.stats.blocks * 512;
			if (largest === null || size > largest[1]) {
				largest = [this.relative(p), size];
			}
		}
		return largest;
	}

	toString(): string {
		return this.path;
	}
}

/** Resolve `dir`, insisting it is a directory. */
export async function realDirectory(dir: string): Promise<string> {
	try {
		const stats = await fs.stat(dir);
		if (!stats.isDirectory()) throw new Error("not a directory");
		return await fs.realpath(dir);
	} catch (err) {
		throw new StructuralError("NOT_A_DIRECTORY", `${dir}: not a directory`, {
			path: dir,
			cause: err,
		});
	}
}

async function realpathOrNull(p: string): Promise<string | null> {
	try {
		return await fs.realpath(p);
	} catch {
		return null;
	}
}
