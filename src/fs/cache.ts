import { constants, type Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { describeError, errorCode } from "../errors";
import { type Logger, silentLogger } from "../logger";
import { isInside } from "./path";
import type { PathInfo, SymlinkInfo } from "./types";

/**
 * Lazily computed, never invalidated classification records keyed by
 * normalized absolute path.
 *
 * One cache belongs to one {@link Directory} handle for the duration of one
 * operation. If the tree changes underneath it, answers go stale: entries
 * are not re-checked.
 */
export class PathInfoCache {
	private readonly entries = new Map<string, Promise<PathInfo>>();

	/**
	 * @param root - Real (symlink-free) path of the tree; symlinks resolving
	 *   outside it are external.
	 */
	constructor(
		readonly root: string,
		private readonly logger: Logger = silentLogger,
	) {}

	get size(): number {
		return this.entries.size;
	}

	/** Classification record for `p`, computed on first request. */
	get(p: string): Promise<PathInfo> {
		const key = path.resolve(p);
		let info = this.entries.get(key);
		if (!info) {
			info = this.inspect(key);
			this.entries.set(key, info);
		}
		return info;
	}

	private async inspect(p: string): Promise<PathInfo> {
		let stats: Stats;
		try {
			stats = await fs.lstat(p);
		} catch (err) {
			this.logger.debug(`${p}: cannot stat: ${describeError(err)}`);
			return {
				path: p,
				stats: null,
				readable: false,
				writable: false,
				symlink: null,
			};
		}

		if (stats.isSymbolicLink()) {
			// The link itself was read; what it points at is described separately.
			return {
				path: p,
				stats,
				readable: true,
				writable: true,
				symlink: await this.inspectSymlink(p),
			};
		}

		const readMode = stats.isDirectory()
			? constants.R_OK | constants.X_OK
			: constants.R_OK;

		return {
			path: p,
			stats,
			readable: await canAccess(p, readMode),
			writable: await canAccess(p, constants.W_OK),
			symlink: null,
		};
	}

	private async inspectSymlink(p: string): Promise<SymlinkInfo> {
		const target = await fs.readlink(p);

		let resolved: string;
		try {
			resolved = await fs.realpath(p);
		} catch (err) {
			const code = errorCode(err);
			const broken = code === "ENOENT" || code === "ENOTDIR";
			return {
				target,
				resolved: null,
				state: broken ? "broken" : "unresolvable",
				external: false,
			};
		}

		let isDir = false;
		try {
			isDir = (await fs.stat(resolved)).isDirectory();
		} catch (err) {
			this.logger.debug(`${p}: cannot stat target: ${describeError(err)}`);
		}

		return {
			target,
			resolved,
			state: isDir ? "dirlink" : "working",
			external: !isInside(resolved, this.root),
		};
	}
}

async function canAccess(p: string, mode: number): Promise<boolean> {
	try {
		await fs.access(p, mode);
		return true;
	} catch {
		return false;
	}
}
