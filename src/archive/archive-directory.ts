import { createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { minimatch } from "minimatch";
import {
	IntegrityError,
	StructuralError,
	isNotFoundError,
} from "../errors";
import { realDirectory } from "../fs/directory";
import { type Logger, defaultLogger } from "../logger";
import { formatSize } from "../size";
import { DEFAULT_FILE_MODE } from "../tar/constants";
import { drainStream } from "../tar/fields";
import type { TarHeader } from "../tar/types";
import { md5sum, readChecksums, verifyChecksums } from "./checksums";
import {
	type PendingSymlink,
	applyAttributes,
	createSymlinks,
	extractVolume,
	memberName,
	openVolume,
	readVolumeHeaders,
} from "./extract";
import {
	type ArchiveFormat,
	type ArchiveMetadata,
	type DetectedArchive,
	loadArchive,
} from "./metadata";
import { checkDestination } from "./preflight";
import { copyFilePreserving, pathExists } from "./publish";
import { checksumFileFor } from "./volumes";

/** A file or symlink stored in an archive, as recorded by its manifests. */
export interface ArchiveMember {
	/** Path relative to the parent of the archived directory. */
	path: string;
	/** Volume holding the member, or `"file"` for top-level copied files. */
	subarchive: string;
	/** Absent for symlinks. */
	md5?: string;
}

export interface SearchOptions {
	/** Wildcard pattern matched against the last path component. */
	name?: string;
	/** Wildcard pattern matched against the whole member path; `*` crosses "/". */
	path?: string;
	caseInsensitive?: boolean;
}

export interface ExtractFilesOptions {
	/** Defaults to the working directory. */
	extractDir?: string;
	/** Recreate the member's leading directories below `extractDir`. */
	includePath?: boolean;
}

export interface UnpackOptions {
	/** Check restored files against the subarchive checksums. Defaults to `true`. */
	verify?: boolean;
	/** Give the owner read and write on everything restored. Defaults to `true`. */
	setReadWrite?: boolean;
	/** Apply stored permission bits. Defaults to `true`. */
	restoreModes?: boolean;
}

export interface ArchiveDirectoryOptions {
	logger?: Logger;
}

/** A restored member waiting for its checksum. */
interface ExtractedMember {
	member: ArchiveMember;
	dest: string;
	mode: number;
}

/**
 * Read a tab-separated symlink manifest: path, then the subarchive or link
 * target. A missing file means no symlinks.
 */
export async function readSymlinkManifest(
	file: string,
): Promise<Array<[string, string]>> {
	let text: string;
	try {
		text = await fs.readFile(file, "utf8");
	} catch (err) {
		if (isNotFoundError(err)) return [];
		throw err;
	}

	const links: Array<[string, string]> = [];
	for (const line of text.split("\n")) {
		if (!line) continue;
		const tab = line.indexOf("\t");
		links.push(tab < 0 ? [line, ""] : [line.slice(0, tab), line.slice(tab + 1)]);
	}
	return links;
}

/** Stands in for "/" while matching, so minimatch sees a single segment. */
const SEPARATOR = "\u0000";

/**
 * Shell-style wildcard match over a whole string: `*` and `?` match "/" as
 * well, `[...]` and `[!...]` are character classes and nothing else is
 * special.
 *
 * @example
 * ```typescript
 * matchesPattern("run/subdir1/ex1.txt", "*subdir1/ex1*.txt"); // true
 * ```
 */
export function matchesPattern(
	value: string,
	pattern: string,
	caseInsensitive = false,
): boolean {
	return minimatch(value.replaceAll("/", SEPARATOR), pattern.replaceAll("/", SEPARATOR), {
		dot: true,
		nocase: caseInsensitive,
		nobrace: true,
		noext: true,
		noglobstar: true,
		nonegate: true,
		nocomment: true,
	});
}

export function matchesSearch(memberPath: string, options: SearchOptions): boolean {
	const caseInsensitive = options.caseInsensitive ?? false;
	return (
		(options.name !== undefined &&
			matchesPattern(path.posix.basename(memberPath), options.name, caseInsensitive)) ||
		(options.path !== undefined && matchesPattern(memberPath, options.path, caseInsensitive))
	);
}

/**
 * A compressed archive directory: `.tar.gz` subarchives with per-subarchive
 * checksums, top-level files copied as they are and a metadata directory.
 *
 * @example
 * ```typescript
 * const archive = await ArchiveDirectory.load("/archive/run_42.archive");
 * if (await archive.verifyArchive()) {
 *   await archive.unpack("/restore");
 * }
 * ```
 */
export class ArchiveDirectory {
	protected constructor(
		/** Absolute path of the archive directory. */
		readonly path: string,
		protected readonly detected: DetectedArchive,
		protected readonly logger: Logger,
	) {}

	/**
	 * Open an archive directory in any known layout.
	 *
	 * @throws {StructuralError} when `dir` is not a compressed archive.
	 */
	static async load(
		dir: string,
		options: ArchiveDirectoryOptions = {},
	): Promise<ArchiveDirectory> {
		const absolute = path.resolve(dir);
		await realDirectory(absolute);
		const detected = await loadArchive(absolute);
		if (detected.format.kind !== "archive") {
			throw new StructuralError(
				"BAD_METADATA",
				`${absolute}: a copy archive, not a compressed archive`,
				{ path: absolute },
			);
		}
		return new ArchiveDirectory(absolute, detected, options.logger ?? defaultLogger);
	}

	get metadata(): ArchiveMetadata {
		return this.detected.metadata;
	}

	get format(): ArchiveFormat {
		return this.detected.format;
	}

	get name(): string {
		return this.detected.metadata.name;
	}

	/** Volume files in reassembly order. */
	get volumes(): string[] {
		return this.metadata.subarchives.map((name) => path.join(this.path, name));
	}

	/**
	 * Every member recorded in the manifests: top-level files first, then the
	 * contents of each subarchive in order, then symlinks.
	 */
	async *list(): AsyncGenerator<ArchiveMember> {
		const files = new Set(this.metadata.files);
		for (const entry of await readChecksums(this.detected.checksumFile)) {
			if (files.has(entry.path)) {
				yield {
					path: `${this.name}/${entry.path}`,
					subarchive: "file",
					md5: entry.md5,
				};
			}
		}

		for (const subarchive of this.metadata.subarchives) {
			const checksumFile = path.join(this.path, checksumFileFor(subarchive));
			for (const entry of await readChecksums(checksumFile)) {
				yield { path: entry.path, subarchive, md5: entry.md5 };
			}
		}

		const symlinks = path.join(this.detected.metadataDir, "symlinks");
		for (const [link, subarchive] of await readSymlinkManifest(symlinks)) {
			yield { path: link, subarchive };
		}
	}

	/**
	 * Members whose name or path matches a glob. A member matching both is
	 * yielded once.
	 */
	async *search(options: SearchOptions): AsyncGenerator<ArchiveMember> {
		if (options.name === undefined && options.path === undefined) return;
		for await (const member of this.list()) {
			if (matchesSearch(member.path, options)) yield member;
		}
	}

	/**
	 * Check every subarchive and top-level file against the aggregate
	 * checksums. Logs each member as it is checked.
	 */
	verifyArchive(): Promise<boolean> {
		return verifyChecksums(this.detected.checksumFile, this.path, {
			logger: this.logger,
			verbose: true,
		});
	}

	/**
	 * Extract the members matching `pattern` (by name or by path).
	 *
	 * Existing files are left alone with a warning; directories are skipped.
	 * Extracted files get owner read and write and are checked against their
	 * recorded checksum.
	 *
	 * @returns the paths written.
	 * @throws {IntegrityError} `CHECKSUM_MISMATCH` when an extracted file differs.
	 */
	async extractFiles(
		pattern: string,
		options: ExtractFilesOptions = {},
	): Promise<string[]> {
		const extractDir = path.resolve(options.extractDir ?? process.cwd());
		const destFor = (member: ArchiveMember) =>
			path.join(
				extractDir,
				options.includePath ? member.path : path.posix.basename(member.path),
			);

		const bySubarchive = new Map<string, ArchiveMember[]>();
		const extracted: ExtractedMember[] = [];
		const written: string[] = [];

		for await (const member of this.search({ name: pattern, path: pattern })) {
			if (member.subarchive === "file") {
				const dest = destFor(member);
				if (await this.alreadyExists(dest)) continue;
				const src = path.join(this.path, path.posix.basename(member.path));
				this.logger.info(
					`-- extracting '${member.path}' (${formatSize((await fs.stat(src)).size)})`,
				);
				await fs.mkdir(path.dirname(dest), { recursive: true });
				await copyFilePreserving(src, dest);
				extracted.push({ member, dest, mode: (await fs.stat(dest)).mode & 0o7777 });
				continue;
			}
			const group = bySubarchive.get(member.subarchive);
			if (group) group.push(member);
			else bySubarchive.set(member.subarchive, [member]);
		}

		for (const [subarchive, members] of bySubarchive) {
			const volume = path.join(this.path, subarchive);
			const headers = new Map<string, TarHeader>();
			for (const header of await readVolumeHeaders(volume)) {
				headers.set(memberName(header), header);
			}

			// Stored name whose data is wanted, to where it goes.
			const wanted = new Map<string, ExtractedMember[]>();
			for (const member of members) {
				const header = headers.get(member.path);
				if (!header) {
					throw new IntegrityError(
						"MISSING_FILE",
						`${volume}: '${member.path}' is not in the subarchive`,
						{ path: volume },
					);
				}
				if (header.type === "directory") {
					this.logger.warn(`${this.path}: '${member.path}' is a directory, skipping`);
					continue;
				}
				const dest = destFor(member);
				if (await this.alreadyExists(dest)) continue;
				await fs.mkdir(path.dirname(dest), { recursive: true });

				if (header.type === "symlink") {
					await fs.symlink(header.linkname ?? "", dest);
					written.push(dest);
					continue;
				}

				this.logger.info(`-- extracting '${member.path}' (${formatSize(header.size)})`);
				const stored = header.type === "link" ? (header.linkname ?? "") : member.path;
				const target: ExtractedMember = {
					member,
					dest,
					mode: header.mode ?? DEFAULT_FILE_MODE,
				};
				const targets = wanted.get(stored);
				if (targets) targets.push(target);
				else wanted.set(stored, [target]);
			}

			if (wanted.size === 0) continue;
			for await (const { header, body } of openVolume(volume)) {
				const targets = wanted.get(memberName(header));
				if (!targets || header.type !== "file") {
					await drainStream(body);
					continue;
				}
				const [first, ...rest] = targets;
				await pipeline(Readable.fromWeb(body), createWriteStream(first.dest));
				for (const other of rest) await fs.copyFile(first.dest, other.dest);
				extracted.push(...targets);
			}
		}

		for (const { member, dest, mode } of extracted) {
			await fs.chmod(dest, mode | 0o600);
			if ((await md5sum(dest)) !== member.md5) {
				throw new IntegrityError(
					"CHECKSUM_MISMATCH",
					`${this.path}: MD5 check failed when extracting '${member.path}'`,
					{ path: dest },
				);
			}
			written.push(dest);
		}

		return written;
	}

	private async alreadyExists(dest: string): Promise<boolean> {
		if (!(await pathExists(dest))) return false;
		this.logger.warn(`${this.path}: file '${dest}' already exists, skipping`);
		return true;
	}

	/**
	 * Restore the archived tree as `<extractDir>/<name>`.
	 *
	 * The destination is checked first and nothing is written when it cannot
	 * hold the tree. Volumes are then extracted in order without their stored
	 * attributes, checked against every subarchive checksum file, symlinks
	 * are created, and modes and mtimes applied in a last pass.
	 *
	 * @returns the restored directory.
	 * @throws {PreflightError} when the destination is unusable.
	 * @throws {IntegrityError} when a checksum or a recorded symlink is wrong.
	 */
	async unpack(extractDir?: string, options: UnpackOptions = {}): Promise<string> {
		const extractRoot = path.resolve(extractDir ?? process.cwd());
		const target = await checkDestination(this.metadata, extractRoot, this.name);

		await fs.mkdir(target);

		for (const file of this.metadata.files) {
			this.logger.info(`-- copying ${file}`);
			await copyFilePreserving(path.join(this.path, file), path.join(target, file));
		}

		const symlinks: PendingSymlink[] = [];
		for (const volume of this.volumes) {
			this.logger.info(`-- extracting ${path.basename(volume)}`);
			await extractVolume(volume, extractRoot, { symlinks, logger: this.logger });
		}

		if (options.verify ?? true) {
			this.logger.info("-- verifying checksums");
			for (const checksumFile of this.subarchiveChecksumFiles()) {
				if (!(await verifyChecksums(checksumFile, extractRoot, { logger: this.logger }))) {
					throw new IntegrityError(
						"CHECKSUM_MISMATCH",
						`${checksumFile}: checksum verification failed`,
						{ path: checksumFile },
					);
				}
			}
		}

		await createSymlinks(symlinks);
		const manifest = path.join(this.detected.metadataDir, "symlinks");
		for (const [link] of await readSymlinkManifest(manifest)) {
			const restored = path.join(extractRoot, link);
			const stats = await fs.lstat(restored).catch(() => null);
			if (!stats?.isSymbolicLink()) {
				throw new IntegrityError("SYMLINK_MISSING", `${restored}: symlink was not restored`, {
					path: restored,
				});
			}
		}

		const setReadWrite = options.setReadWrite ?? true;
		await applyAttributes(this.volumes, extractRoot, {
			restoreModes: options.restoreModes ?? true,
			setReadWrite,
		});
		if (setReadWrite) {
			for (const file of this.metadata.files) {
				const restored = path.join(target, file);
				await fs.chmod(restored, ((await fs.stat(restored)).mode & 0o7777) | 0o600);
			}
		}

		return target;
	}

	/** Per-subarchive checksum files, in volume order. */
	private subarchiveChecksumFiles(): string[] {
		return this.metadata.subarchives.map((name) =>
			path.join(this.path, checksumFileFor(name)),
		);
	}

	toString(): string {
		return this.path;
	}
}
