import * as fs from "node:fs/promises";
import { StructuralError, isNotFoundError } from "../errors";
import { PART_SUFFIX } from "./options";

/** Staging path used while `finalDir` is being built. */
export function stagingPath(finalDir: string): string {
	return `${finalDir}${PART_SUFFIX}`;
}

export async function pathExists(p: string): Promise<boolean> {
	try {
		await fs.lstat(p);
		return true;
	} catch (err) {
		if (isNotFoundError(err)) return false;
		throw err;
	}
}

/**
 * Create the `.part` staging directory for `finalDir`.
 *
 * A leftover staging directory from an interrupted run is never reused; it
 * has to be removed by hand.
 *
 * @throws {StructuralError} `ALREADY_EXISTS` when either path is taken.
 */
export async function createStaging(finalDir: string): Promise<string> {
	const partDir = stagingPath(finalDir);
	for (const p of [finalDir, partDir]) {
		if (await pathExists(p)) {
			throw new StructuralError("ALREADY_EXISTS", `${p}: already exists`, {
				path: p,
			});
		}
	}
	await fs.mkdir(partDir);
	return partDir;
}

/**
 * Move a finished staging directory into place, then give it the source
 * directory's mode and mtime plus owner read, write and execute.
 */
export async function publish(
	partDir: string,
	finalDir: string,
	source: string,
): Promise<void> {
	if (await pathExists(finalDir)) {
		throw new StructuralError("ALREADY_EXISTS", `${finalDir}: already exists`, {
			path: finalDir,
		});
	}
	await fs.rename(partDir, finalDir);

	const stats = await fs.stat(source);
	await fs.chmod(finalDir, (stats.mode & 0o7777) | 0o700);
	await fs.utimes(finalDir, stats.atime, stats.mtime);
}

/** Copy a file with its mode and timestamps. */
export async function copyFilePreserving(src: string, dest: string): Promise<void> {
	await fs.copyFile(src, dest);
	const stats = await fs.stat(src);
	await fs.chmod(dest, stats.mode & 0o7777);
	await fs.utimes(dest, stats.atime, stats.mtime);
}
