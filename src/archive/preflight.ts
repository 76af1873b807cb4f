import * as fs from "node:fs/promises";
import * as path from "node:path";
import { PreflightError } from "../errors";
import type { ArchiveMetadata } from "./metadata";
import { pathExists } from "./publish";

async function withProbeDir<T>(
	dir: string,
	probe: (probeDir: string) => Promise<T>,
): Promise<T> {
	const probeDir = await fs.mkdtemp(path.join(dir, ".probe-"));
	try {
		return await probe(probeDir);
	} finally {
		await fs.rm(probeDir, { recursive: true, force: true });
	}
}

/** Whether symlinks can be created in `dir`. */
export function supportsSymlinks(dir: string): Promise<boolean> {
	return withProbeDir(dir, async (probeDir) => {
		try {
			await fs.symlink("target", path.join(probeDir, "link"));
			return true;
		} catch {
			return false;
		}
	});
}

/** Whether `dir` tells `probe` and `PROBE` apart. */
export function isCaseSensitive(dir: string): Promise<boolean> {
	return withProbeDir(dir, async (probeDir) => {
		await fs.writeFile(path.join(probeDir, "probe"), "");
		return !(await pathExists(path.join(probeDir, "PROBE")));
	});
}

/** What a destination filesystem is asked before extraction. */
export interface DestinationProbes {
	supportsSymlinks(dir: string): Promise<boolean>;
	isCaseSensitive(dir: string): Promise<boolean>;
}

const filesystemProbes: DestinationProbes = { supportsSymlinks, isCaseSensitive };

/**
 * Check that `extractDir` can receive `name` with everything the record says
 * the tree holds. Runs before anything is written.
 *
 * @throws {PreflightError}
 */
export async function checkDestination(
	metadata: ArchiveMetadata,
	extractDir: string,
	name: string,
	probes: DestinationProbes = filesystemProbes,
): Promise<string> {
	const stats = await fs.stat(extractDir).catch(() => null);
	if (!stats?.isDirectory()) {
		throw new PreflightError(
			"DESTINATION_MISSING",
			`${extractDir}: destination is not an existing directory`,
			{ path: extractDir },
		);
	}

	const target = path.join(extractDir, name);
	if (await pathExists(target)) {
		throw new PreflightError("DESTINATION_EXISTS", `${target}: already exists`, {
			path: target,
		});
	}

	const needsSymlinks =
		metadata.has_symlinks ||
		metadata.has_broken_symlinks ||
		metadata.has_dirlinks ||
		metadata.has_unresolvable_symlinks;
	if (needsSymlinks && !(await probes.supportsSymlinks(extractDir))) {
		throw new PreflightError(
			"NO_SYMLINK_SUPPORT",
			`${extractDir}: archive holds symlinks but the destination cannot store them`,
			{ path: extractDir },
		);
	}

	if (metadata.has_case_sensitive_filenames && !(await probes.isCaseSensitive(extractDir))) {
		throw new PreflightError(
			"CASE_INSENSITIVE_DESTINATION",
			`${extractDir}: archive holds names differing only by case but the destination is case-insensitive`,
			{ path: extractDir },
		);
	}

	return target;
}
