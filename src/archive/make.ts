import * as fs from "node:fs/promises";
import * as path from "node:path";
import { StructuralError } from "../errors";
import { Directory, realDirectory } from "../fs/directory";
import { isDirectory } from "../fs/predicates";
import { type UserDatabase, currentUserName, systemUsers } from "../fs/users";
import { type Logger, defaultLogger } from "../logger";
import { convertSizeToBytes, formatSize } from "../size";
import { VERSION } from "../version";
import { ArchiveDirectory } from "./archive-directory";
import { type ChecksumEntry, md5sum, writeChecksums } from "./checksums";
import { classify } from "./classify";
import { formatOwnership, formatReadme, writeListings } from "./listings";
import { type ArchiveMetadataInput, formatTimestamp, writeMetadata } from "./metadata";
import {
	ARCHIVE_FILELIST,
	ARCHIVE_README,
	ARCHIVE_SUFFIX,
	ARCHIVE_TREE,
	DEFAULT_COMPRESSION_LEVEL,
	DEFAULT_VOLUME_SIZE,
	METADATA_DIR,
	PROCESSING_SUBARCHIVE,
	PROJECTS_INFO,
} from "./options";
import { copyFilePreserving, createStaging, publish } from "./publish";
import { checksumFileFor, packVolumes } from "./volumes";

export interface MakeArchiveOptions {
	/** Directory the `<name>.archive` directory is created in. Defaults to the working directory. */
	outDir?: string;
	/**
	 * Split each subarchive into volumes of about this many bytes: a number,
	 * or a string such as `"250M"`.
	 */
	volumeSize?: number | string;
	/** Split into volumes even without `volumeSize`, at 250M each. */
	multiVolume?: boolean;
	/** gzip level, 0 to 9. Defaults to 6. */
	compressionLevel?: number;
	logger?: Logger;
	users?: UserDatabase;
}

/** One `.tar.gz` subarchive to build: a root, the name it gets and what goes in. */
interface SubarchivePlan {
	name: string;
	source: Directory;
	baseDir: string;
	paths: AsyncIterable<string>;
}

/**
 * Archive a directory into `<outDir>/<name>.archive`.
 *
 * A generic directory becomes a single subarchive. A directory holding only
 * subdirectories gets one subarchive per subdirectory. A multi-project
 * directory gets one per project plus a `processing` subarchive for
 * everything else, and its `projects.info` is copied alongside.
 *
 * Everything is built under `<name>.archive.part` and renamed into place at
 * the end. Unreadable entries, and anything else that could not be packed
 * (sockets, fifos, devices), are left out and listed in
 * `ARCHIVE_METADATA/excluded.txt`.
 *
 * @throws {StructuralError} `NOT_ARCHIVABLE` for an archive or copy
 *   directory, `ALREADY_EXISTS` when the archive or its staging directory
 *   exists, `PACK_FAILED` when a volume cannot be written.
 *
 * @example
 * ```typescript
 * const archive = await makeArchive("/data/run_42", { outDir: "/archive", volumeSize: "50G" });
 * console.log(archive.path); // "/archive/run_42.archive"
 * ```
 */
export async function makeArchive(
	dir: string,
	options: MakeArchiveOptions = {},
): Promise<ArchiveDirectory> {
	const logger = options.logger ?? defaultLogger;
	const users = options.users ?? (await systemUsers());
	const compressionLevel = options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL;
	const sizeOption =
		options.volumeSize ?? (options.multiVolume ? DEFAULT_VOLUME_SIZE : undefined);
	const volumeSize = sizeOption === undefined ? undefined : convertSizeToBytes(sizeOption);

	const kind = await classify(dir);
	if (kind.kind === "archive" || kind.kind === "copy") {
		throw new StructuralError(
			"NOT_ARCHIVABLE",
			`${dir}: already an ${kind.kind === "copy" ? "archive copy" : "archive"} directory`,
			{ path: dir },
		);
	}

	const source = await Directory.open(dir, { logger, users });
	const outDir = await realDirectory(path.resolve(options.outDir ?? process.cwd()));
	const finalDir = path.join(outDir, `${source.basename}${ARCHIVE_SUFFIX}`);
	const partDir = await createStaging(finalDir);
	const metadataDir = path.join(partDir, METADATA_DIR);
	await fs.mkdir(metadataDir);
	logger.info(`${source.path}: archiving (${kind.kind}) into ${finalDir}`);

	const excluded: string[] = [];
	for await (const p of source.unreadableFiles()) excluded.push(p);
	if (excluded.length > 0) {
		logger.warn(`${source.path}: ${excluded.length} unreadable entries will be excluded`);
	}

	await fs.writeFile(path.join(metadataDir, "manifest"), await formatOwnership(source, users));

	const flags = {
		has_broken_symlinks: await source.hasBrokenSymlinks(),
		has_dirlinks: await source.hasDirlinks(),
		has_external_symlinks: await source.hasExternalSymlinks(),
		has_hard_linked_files: await source.hasHardLinkedFiles(),
		has_symlinks: await source.hasSymlinks(),
		has_unresolvable_symlinks: await source.hasUnresolvableSymlinks(),
		has_case_sensitive_filenames: await source.hasCaseSensitiveFilenames(),
	};

	const plans: SubarchivePlan[] = [];
	const extraFiles: string[] = [];

	const subdirPlan = async (sub: string): Promise<SubarchivePlan> => {
		const subdir = await Directory.open(path.join(source.path, sub), { logger, users });
		return {
			name: sub,
			source: subdir,
			baseDir: `${source.basename}/${sub}`,
			paths: subdir.walk(),
		};
	};

	switch (kind.kind) {
		case "generic":
			plans.push({
				name: source.basename,
				source,
				baseDir: source.basename,
				paths: source.walk(),
			});
			break;

		case "multi-subdir":
			for (const sub of kind.subdirs) plans.push(await subdirPlan(sub));
			break;

		case "multi-project":
			for (const project of kind.projectDirs) plans.push(await subdirPlan(project));
			if (kind.processingArtefacts.length > 0) {
				plans.push({
					name: PROCESSING_SUBARCHIVE,
					source,
					baseDir: source.basename,
					paths: artefactPaths(source, kind.processingArtefacts),
				});
			}
			extraFiles.push(PROJECTS_INFO);
			break;
	}

	const exclude = new Set(excluded);
	const symlinkLines: string[] = [];
	const subarchives: string[] = [];
	const files: string[] = [];

	for (const plan of plans) {
		logger.info(`-- packing ${plan.baseDir}`);
		const { volumes, skipped } = await packVolumes({
			source: plan.source,
			baseDir: plan.baseDir,
			outputBase: path.join(partDir, plan.name),
			paths: plan.paths,
			exclude,
			volumeSize,
			compressionLevel,
			users,
			logger,
		});
		if (skipped.length > 0) {
			logger.warn(`${plan.baseDir}: ${skipped.length} entries could not be read and were skipped`);
			excluded.push(...skipped);
		}

		for (const volume of volumes) {
			await writeChecksums(path.join(partDir, checksumFileFor(volume.name)), volume.checksums);
			for (const link of volume.symlinks) symlinkLines.push(`${link}\t${volume.name}\n`);
			subarchives.push(volume.name);
		}
	}

	if (excluded.length > 0) {
		await fs.writeFile(
			path.join(metadataDir, "excluded.txt"),
			excluded.map((p) => `${source.relative(p)}\n`).join(""),
		);
	}

	for (const file of extraFiles) {
		await copyFilePreserving(path.join(source.path, file), path.join(partDir, file));
		files.push(file);
	}

	const aggregate: ChecksumEntry[] = [];
	for (const name of [...subarchives, ...files]) {
		aggregate.push({ md5: await md5sum(path.join(partDir, name)), path: name });
	}
	await writeChecksums(path.join(metadataDir, "archive_checksums.md5"), aggregate);

	if (symlinkLines.length > 0) {
		await fs.writeFile(path.join(metadataDir, "symlinks"), symlinkLines.join(""));
	}

	const sourceStats = await fs.stat(source.path);
	const metadata: ArchiveMetadataInput = {
		name: source.basename,
		source: source.path,
		source_date: formatTimestamp(sourceStats.mtime),
		source_size: formatSize(await source.size()),
		type: "ArchiveDirectory",
		subarchives,
		files,
		user: currentUserName(users),
		creation_date: formatTimestamp(new Date()),
		multi_volume: volumeSize !== undefined,
		volume_size: sizeOption ?? null,
		compression_level: compressionLevel,
		archiver_version: VERSION,
		...flags,
		has_unreadable_files: excluded.length > 0,
	};
	await writeMetadata(path.join(metadataDir, "archiver_metadata.json"), metadata);

	await writeListings(source, {
		fileList: path.join(partDir, ARCHIVE_FILELIST),
		tree: path.join(partDir, ARCHIVE_TREE),
	});
	await fs.writeFile(path.join(partDir, ARCHIVE_README), formatReadme(metadata));

	await publish(partDir, finalDir, source.path);
	logger.info(`${finalDir}: archive complete`);

	return ArchiveDirectory.load(finalDir, { logger });
}

/** Top-level artefacts of a multi-project directory, with directory contents. */
async function* artefactPaths(
	source: Directory,
	artefacts: readonly string[],
): AsyncGenerator<string> {
	for (const artefact of artefacts) {
		const p = path.join(source.path, artefact);
		yield p;
		if (isDirectory(await source.info(p))) {
			const sub = await Directory.open(p);
			yield* sub.walk();
		}
	}
}
