import * as fs from "node:fs/promises";
import * as path from "node:path";
import { isNotFoundError } from "../errors";
import { Directory, type DirectoryOptions, realDirectory } from "../fs/directory";
import { ArchiveDirectory } from "./archive-directory";
import { CopyArchiveDirectory } from "./copy";
import { type ArchiveFormat, detectArchive } from "./metadata";
import { PROJECTS_INFO } from "./options";

/** What a directory is, and so how it is archived or read. */
export type DirectoryKind =
	| { kind: "archive"; format: ArchiveFormat }
	| { kind: "copy"; format: ArchiveFormat }
	| { kind: "multi-project"; projectDirs: string[]; processingArtefacts: string[] }
	| { kind: "multi-subdir"; subdirs: string[] }
	| { kind: "generic" };

async function isDirectoryFollowingLinks(p: string): Promise<boolean> {
	try {
		return (await fs.stat(p)).isDirectory();
	} catch (err) {
		if (isNotFoundError(err)) return false;
		throw err;
	}
}

/**
 * Read the project directories named in `projects.info`: the first
 * tab-separated field of every line not starting with `#`, kept when it
 * exists. Directories named `undetermined*` are projects too.
 */
export async function readProjectDirs(dir: string, names: readonly string[]): Promise<string[]> {
	const text = await fs.readFile(path.join(dir, PROJECTS_INFO), "utf8");
	const projects: string[] = [];

	for (const line of text.split("\n")) {
		if (!line || line.startsWith("#")) continue;
		const project = line.split("\t")[0];
		if (project && !projects.includes(project) && names.includes(project)) {
			projects.push(project);
		}
	}

	for (const name of names) {
		if (
			name.startsWith("undetermined") &&
			!projects.includes(name) &&
			(await isDirectoryFollowingLinks(path.join(dir, name)))
		) {
			projects.push(name);
		}
	}

	return projects;
}

/**
 * Classify a directory by the first rule that holds:
 *
 * 1. it carries archive or copy metadata,
 * 2. it has a `projects.info` file,
 * 3. its top level holds directories and nothing else (at least one),
 * 4. anything else is generic.
 *
 * Symlinks to directories count as directories.
 *
 * @throws {StructuralError} `NOT_A_DIRECTORY` when `dir` is not a directory.
 *
 * @example
 * ```typescript
 * const kind = await classify("/data/run_42");
 * if (kind.kind === "multi-subdir") console.log(kind.subdirs);
 * ```
 */
export async function classify(dir: string): Promise<DirectoryKind> {
	const absolute = path.resolve(dir);
	await realDirectory(absolute);

	const detected = await detectArchive(absolute);
	if (detected) return { kind: detected.format.kind, format: detected.format };

	const names = (await fs.readdir(absolute)).sort();

	if (names.includes(PROJECTS_INFO)) {
		const projectDirs = await readProjectDirs(absolute, names);
		return {
			kind: "multi-project",
			projectDirs,
			processingArtefacts: names.filter(
				(name) => name !== PROJECTS_INFO && !projectDirs.includes(name),
			),
		};
	}

	if (names.length > 0) {
		let allDirs = true;
		for (const name of names) {
			if (!(await isDirectoryFollowingLinks(path.join(absolute, name)))) {
				allDirs = false;
				break;
			}
		}
		if (allDirs) return { kind: "multi-subdir", subdirs: names };
	}

	return { kind: "generic" };
}

/**
 * Open `dir` with the handle its kind calls for: an archive, a copy, or a
 * plain directory to be archived.
 */
export async function getDirectory(
	dir: string,
	options: DirectoryOptions = {},
): Promise<ArchiveDirectory | CopyArchiveDirectory | Directory> {
	const kind = await classify(dir);
	switch (kind.kind) {
		case "archive":
			return ArchiveDirectory.load(dir, options);
		case "copy":
			return CopyArchiveDirectory.load(dir, options);
		default:
			return Directory.open(dir, options);
	}
}
