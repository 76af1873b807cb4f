import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
	CopyError,
	type CopyFailure,
	IntegrityError,
	StructuralError,
	describeError,
} from "../errors";
import { Directory, realDirectory } from "../fs/directory";
import { type UserDatabase, currentUserName, systemUsers } from "../fs/users";
import { type Logger, defaultLogger } from "../logger";
import { formatSize } from "../size";
import { VERSION } from "../version";
import {
	type ArchiveMember,
	type SearchOptions,
	matchesSearch,
	readSymlinkManifest,
} from "./archive-directory";
import { type ChecksumEntry, md5sum, readChecksums, verifyChecksums, writeChecksums } from "./checksums";
import { verifyCopy } from "./compare";
import { formatOwnership, formatReadme } from "./listings";
import {
	type ArchiveMetadata,
	type ArchiveMetadataInput,
	type DetectedArchive,
	formatTimestamp,
	loadArchive,
	writeMetadata,
} from "./metadata";
import { ARCHIVE_README, METADATA_DIR } from "./options";
import { copyFilePreserving, createStaging, publish } from "./publish";

export interface CopyOptions {
	/** Copy what working symlinks point at instead of the links. */
	replaceSymlinks?: boolean;
	/** Write broken and unresolvable symlinks as files holding the link text. */
	transformBrokenSymlinks?: boolean;
	/** Copy symlinked directories as real directories. */
	followDirlinks?: boolean;
	logger?: Logger;
	users?: UserDatabase;
}

/** Entries of the copy that are not plain copies of regular files. */
interface CopyRecords {
	checksums: ChecksumEntry[];
	symlinks: string[];
	broken: string[];
	unresolvable: string[];
}

/** Glob set covering what a copy adds on top of the original tree. */
export const COPY_BOOKKEEPING = [METADATA_DIR, `${METADATA_DIR}/**`, ARCHIVE_README];

/**
 * Make a verified, uncompressed copy of `source` at `dest`.
 *
 * Regular files are copied byte for byte with their mode and timestamps;
 * directories get theirs once all their children are in place. Symlinks
 * are copied as they are unless an option says otherwise:
 *
 * | entry              | `replaceSymlinks`  | `transformBrokenSymlinks` | `followDirlinks`   |
 * |--------------------|--------------------|---------------------------|--------------------|
 * | working symlink    | target's bytes     |                           |                    |
 * | directory symlink  | error              |                           | real directory     |
 * | broken symlink     | error              | file with the link text   |                    |
 *
 * Per-entry failures are collected and reported together. The copy is built
 * in `<dest>.part`, compared with the source and only then renamed to
 * `dest`.
 *
 * @throws {CopyError} listing every entry that could not be copied.
 * @throws {IntegrityError} `VERIFICATION_FAILED` when the copy differs from the source.
 */
export async function copy(
	source: string,
	dest: string,
	options: CopyOptions = {},
): Promise<CopyArchiveDirectory> {
	const logger = options.logger ?? defaultLogger;
	const users = options.users ?? (await systemUsers());
	const replaceSymlinks = options.replaceSymlinks ?? false;
	const transformBroken = options.transformBrokenSymlinks ?? false;
	const followDirlinks = options.followDirlinks ?? false;

	const src = await Directory.open(source, { logger, users });
	const finalDir = path.resolve(dest);
	await realDirectory(path.dirname(finalDir));
	const partDir = await createStaging(finalDir);
	logger.info(`${src.path}: copying to ${finalDir}`);

	const failures: CopyFailure[] = [];
	const records: CopyRecords = { checksums: [], symlinks: [], broken: [], unresolvable: [] };
	// Source and copy of every directory, for the attribute pass.
	const directories: Array<[string, string]> = [];

	for await (const p of src.walk({ followlinks: followDirlinks })) {
		const relative = src.relative(p);
		const target = path.join(partDir, relative);
		try {
			const reason = await copyEntry(p, relative, target);
			if (reason) failures.push({ path: p, reason });
		} catch (err) {
			failures.push({ path: p, reason: describeError(err) });
		}
	}

	for (const failure of failures) logger.error(`${failure.path}: ${failure.reason}`);
	if (failures.length > 0) throw new CopyError(src.path, failures);

	const depth = (p: string) => p.split(path.sep).length;
	directories.sort(([, a], [, b]) => depth(b) - depth(a));
	for (const [from, to] of directories) {
		const stats = await fs.stat(from);
		await fs.chmod(to, stats.mode & 0o7777);
		await fs.utimes(to, stats.atime, stats.mtime);
	}

	const metadataDir = path.join(partDir, METADATA_DIR);
	await fs.mkdir(metadataDir);
	await writeChecksums(path.join(metadataDir, "checksums.md5"), records.checksums);
	await fs.writeFile(path.join(metadataDir, "manifest"), await formatOwnership(src, users));
	const detailFiles: Array<[string, string[]]> = [
		["symlinks", records.symlinks],
		["broken_symlinks", records.broken],
		["unresolvable_symlinks", records.unresolvable],
	];
	for (const [name, lines] of detailFiles) {
		if (lines.length > 0) await fs.writeFile(path.join(metadataDir, name), lines.join(""));
	}

	const sourceStats = await fs.stat(src.path);
	const metadata: ArchiveMetadataInput = {
		name: src.basename,
		source: src.path,
		source_date: formatTimestamp(sourceStats.mtime),
		source_size: formatSize(await src.size()),
		type: "CopyArchiveDirectory",
		subarchives: [],
		files: [],
		user: currentUserName(users),
		creation_date: formatTimestamp(new Date()),
		multi_volume: false,
		volume_size: null,
		archiver_version: VERSION,
		has_broken_symlinks: await src.hasBrokenSymlinks(),
		has_dirlinks: await src.hasDirlinks(),
		has_external_symlinks: await src.hasExternalSymlinks(),
		has_hard_linked_files: await src.hasHardLinkedFiles(),
		has_symlinks: await src.hasSymlinks(),
		has_unresolvable_symlinks: await src.hasUnresolvableSymlinks(),
		has_unreadable_files: await src.hasUnreadableFiles(),
		has_case_sensitive_filenames: await src.hasCaseSensitiveFilenames(),
		replace_symlinks: replaceSymlinks,
		transform_broken_symlinks: transformBroken,
		follow_dirlinks: followDirlinks,
	};
	await writeMetadata(path.join(metadataDir, "archiver_metadata.json"), metadata);
	await fs.writeFile(path.join(partDir, ARCHIVE_README), formatReadme(metadata));

	logger.info(`-- verifying copy against ${src.path}`);
	const verified = await verifyCopy(src.path, partDir, {
		followSymlinks: replaceSymlinks || followDirlinks,
		brokenSymlinksArePlaceholders: transformBroken,
		ignorePaths: COPY_BOOKKEEPING,
		logger,
	});
	if (!verified) {
		throw new IntegrityError(
			"VERIFICATION_FAILED",
			`${partDir}: copy does not match ${src.path}`,
			{ path: partDir },
		);
	}

	await publish(partDir, finalDir, src.path);
	logger.info(`${finalDir}: copy complete`);
	return CopyArchiveDirectory.load(finalDir, { logger });

	/** Copy one entry; returns why it cannot be copied, if it cannot. */
	async function copyEntry(
		p: string,
		relative: string,
		target: string,
	): Promise<string | undefined> {
		const info = await src.info(p);
		if (!info.stats) return "cannot be read";

		if (!info.symlink) {
			if (info.stats.isDirectory()) {
				if (!info.readable) return "directory cannot be read";
				await fs.mkdir(target);
				directories.push([p, target]);
				return undefined;
			}
			if (info.stats.isFile()) {
				await copyFilePreserving(p, target);
				records.checksums.push({ md5: await md5sum(target), path: relative });
				return undefined;
			}
			return "unsupported file type";
		}

		const link = info.symlink;
		const line = `${relative}\t${link.target}\n`;

		switch (link.state) {
			case "dirlink":
				if (followDirlinks) {
					await fs.mkdir(target);
					directories.push([p, target]);
					return undefined;
				}
				if (replaceSymlinks) return "cannot replace a symlink to a directory";
				break;

			case "broken":
			case "unresolvable":
				(link.state === "broken" ? records.broken : records.unresolvable).push(line);
				if (transformBroken) {
					await fs.writeFile(target, link.target);
					records.checksums.push({ md5: await md5sum(target), path: relative });
					return undefined;
				}
				if (replaceSymlinks) return `cannot replace ${link.state} symlink`;
				break;

			case "working":
				if (replaceSymlinks) {
					await copyFilePreserving(p, target);
					records.checksums.push({ md5: await md5sum(target), path: relative });
					return undefined;
				}
				break;
		}

		await fs.symlink(link.target, target);
		await fs.lutimes(target, info.stats.atime, info.stats.mtime);
		records.symlinks.push(line);
		return undefined;
	}
}

export interface CopyArchiveDirectoryOptions {
	logger?: Logger;
}

/**
 * A copy made by {@link copy}: the original tree plus `ARCHIVE_METADATA`
 * and a README.
 */
export class CopyArchiveDirectory {
	protected constructor(
		readonly path: string,
		protected readonly detected: DetectedArchive,
		protected readonly logger: Logger,
	) {}

	/** @throws {StructuralError} when `dir` is not a copy archive. */
	static async load(
		dir: string,
		options: CopyArchiveDirectoryOptions = {},
	): Promise<CopyArchiveDirectory> {
		const absolute = path.resolve(dir);
		await realDirectory(absolute);
		const detected = await loadArchive(absolute);
		if (detected.format.kind !== "copy") {
			throw new StructuralError(
				"BAD_METADATA",
				`${absolute}: a compressed archive, not a copy archive`,
				{ path: absolute },
			);
		}
		return new CopyArchiveDirectory(absolute, detected, options.logger ?? defaultLogger);
	}

	get metadata(): ArchiveMetadata {
		return this.detected.metadata;
	}

	get name(): string {
		return this.detected.metadata.name;
	}

	/** Files with their checksums, then symlinks copied as links. */
	async *list(): AsyncGenerator<ArchiveMember> {
		for (const entry of await readChecksums(this.detected.checksumFile)) {
			yield { path: `${this.name}/${entry.path}`, subarchive: "file", md5: entry.md5 };
		}
		const symlinks = path.join(this.detected.metadataDir, "symlinks");
		for (const [link] of await readSymlinkManifest(symlinks)) {
			yield { path: `${this.name}/${link}`, subarchive: "file" };
		}
	}

	async *search(options: SearchOptions): AsyncGenerator<ArchiveMember> {
		if (options.name === undefined && options.path === undefined) return;
		for await (const member of this.list()) {
			if (matchesSearch(member.path, options)) yield member;
		}
	}

	/**
	 * Check file checksums, then that every recorded symlink is still a
	 * symlink with the recorded text.
	 */
	async verifyArchive(): Promise<boolean> {
		const checksumsOk = await verifyChecksums(this.detected.checksumFile, this.path, {
			logger: this.logger,
			verbose: true,
		});
		if (!checksumsOk) return false;

		const symlinks = path.join(this.detected.metadataDir, "symlinks");
		for (const [link, target] of await readSymlinkManifest(symlinks)) {
			const copied = path.join(this.path, link);
			const text = await fs.readlink(copied).catch(() => null);
			if (text !== target) {
				this.logger.error(`${copied}: symlink missing or changed`);
				return false;
			}
		}
		return true;
	}

	toString(): string {
		return this.path;
	}
}
