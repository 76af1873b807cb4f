import * as fs from "node:fs/promises";
import * as path from "node:path";
import { minimatch } from "minimatch";
import { describeError } from "../errors";
import { Directory } from "../fs/directory";
import { isDirectory, isRegularFile } from "../fs/predicates";
import type { PathInfo } from "../fs/types";
import { type Logger, defaultLogger } from "../logger";
import { md5sum } from "./checksums";
import { pathExists } from "./publish";

export interface VerifyCopyOptions {
	/**
	 * Compare what symlinks in the original point at rather than the links
	 * themselves, and walk into symlinked directories.
	 */
	followSymlinks?: boolean;
	/**
	 * A broken or unresolvable symlink in the original matches a regular file
	 * in the copy holding the link text.
	 */
	brokenSymlinksArePlaceholders?: boolean;
	/** Globs over `/`-separated relative paths left out on both sides. */
	ignorePaths?: readonly string[];
	logger?: Logger;
}

const isDangling = (info: PathInfo) =>
	info.symlink?.state === "broken" || info.symlink?.state === "unresolvable";

/**
 * Check that `copy` holds the same tree as `original`: every entry of the
 * original exists in the copy with the same type, symlink text or file
 * checksum, and the copy has nothing the original lacks.
 *
 * A symlink in the copy where the original has something else always fails,
 * even with `followSymlinks`.
 *
 * Logs one line per difference and keeps going, so the result reports every
 * problem at once.
 *
 * @example
 * ```typescript
 * const same = await verifyCopy("/data/run_42", "/backup/run_42", {
 *   ignorePaths: ["ARCHIVE_METADATA", "ARCHIVE_METADATA/**"],
 * });
 * ```
 */
export async function verifyCopy(
	original: string,
	copy: string,
	options: VerifyCopyOptions = {},
): Promise<boolean> {
	const logger = options.logger ?? defaultLogger;
	const followSymlinks = options.followSymlinks ?? false;
	const placeholders = options.brokenSymlinksArePlaceholders ?? false;
	const ignorePaths = options.ignorePaths ?? [];

	const a = await Directory.open(original);
	const b = await Directory.open(copy);
	const ignored = (relative: string) =>
		ignorePaths.some((glob) => minimatch(relative, glob, { dot: true }));

	let same = true;
	const differ = (relative: string, reason: string) => {
		logger.error(`${relative}: ${reason}`);
		same = false;
	};

	for await (const p of a.walk({ followlinks: followSymlinks })) {
		const relative = a.relative(p);
		if (ignored(relative)) continue;

		const q = path.join(b.path, relative);
		const ai = await a.info(p);
		const bi = await b.info(q);

		if (!bi.stats) {
			differ(relative, `missing from ${b.path}`);
			continue;
		}

		if (bi.symlink) {
			if (!ai.symlink) differ(relative, "symlink in copy is not a symlink in original");
			else if (ai.symlink.target !== bi.symlink.target) {
				differ(relative, `symlink targets differ ('${ai.symlink.target}' != '${bi.symlink.target}')`);
			}
			continue;
		}

		if (ai.symlink) {
			if (placeholders && isDangling(ai) && isRegularFile(bi)) {
				if ((await fs.readFile(q, "utf8")) !== ai.symlink.target) {
					differ(relative, "placeholder does not hold the link text");
				}
				continue;
			}
			if (!followSymlinks) {
				differ(relative, "symlink in original is not a symlink in copy");
				continue;
			}
			if (isDangling(ai)) {
				differ(relative, "symlink in original cannot be resolved");
				continue;
			}
			if (ai.symlink.state === "dirlink") {
				if (!isDirectory(bi)) differ(relative, "directory in original is not a directory in copy");
				continue;
			}
			await compareFiles(relative, p, q, bi);
			continue;
		}

		if (isDirectory(ai)) {
			if (!isDirectory(bi)) differ(relative, "directory in original is not a directory in copy");
		} else if (isRegularFile(ai)) {
			await compareFiles(relative, p, q, bi);
		} else if (isRegularFile(bi) || isDirectory(bi)) {
			differ(relative, "types differ");
		}
	}

	for await (const q of b.walk()) {
		const relative = b.relative(q);
		if (ignored(relative)) continue;
		if (!(await pathExists(path.join(a.path, relative)))) {
			differ(relative, `not present in ${a.path}`);
		}
	}

	return same;

	async function compareFiles(relative: string, p: string, q: string, bi: PathInfo) {
		if (!isRegularFile(bi)) {
			differ(relative, "file in original is not a file in copy");
			return;
		}
		try {
			if ((await md5sum(p)) !== (await md5sum(q))) differ(relative, "checksums differ");
		} catch (err) {
			differ(relative, `cannot compare: ${describeError(err)}`);
		}
	}
}
