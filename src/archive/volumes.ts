import { createHash } from "node:crypto";
import { createWriteStream } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Readable, Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import {
	StructuralError,
	describeError,
	isPermissionError,
} from "../errors";
import type { Directory } from "../fs/directory";
import { toPosix } from "../fs/path";
import { type UserDatabase, systemUsers } from "../fs/users";
import { type Logger, defaultLogger } from "../logger";
import { formatSize } from "../size";
import { CountingGzipEncoder } from "../tar/compression";
import { type TarPackController, createTarPacker, tarEntrySize } from "../tar/pack";
import type { TarHeader } from "../tar/types";
import type { ChecksumEntry } from "./checksums";
import { DEFAULT_COMPRESSION_LEVEL } from "./options";

export interface PackVolumesOptions {
	/** Handle on the source tree; supplies cached classification. */
	source: Directory;
	/** Directory whose contents are packed. Defaults to the source root. */
	root?: string;
	/** Member name given to `root`; every other member is named below it. */
	baseDir: string;
	/** Output path without the `.tar.gz` (or `.NN.tar.gz`) extension. */
	outputBase: string;
	/** Absolute paths to pack, in order. Each is added non-recursively. */
	paths: Iterable<string> | AsyncIterable<string>;
	/** When given, only these paths are packed. */
	include?: ReadonlySet<string>;
	/** Paths never packed. */
	exclude?: ReadonlySet<string>;
	/**
	 * Approximate size of each `.tar.gz` volume on disk. Setting it switches
	 * to `<base>.NN.tar.gz` naming even if only one volume results.
	 */
	volumeSize?: number;
	compressionLevel?: number;
	users?: UserDatabase;
	logger?: Logger;
}

export interface PackedVolume {
	/** Absolute path of the `.tar.gz` file. */
	file: string;
	/** File name of the volume. */
	name: string;
	/** Regular files and hard links it holds, by member name. */
	checksums: ChecksumEntry[];
	/** Member names of the symlinks it holds. */
	symlinks: string[];
	entries: number;
	/** Size of the `.tar.gz` file. */
	size: number;
}

export interface PackResult {
	volumes: PackedVolume[];
	/** Absolute paths left out because they could not be read. */
	skipped: string[];
}

/** `<name>.tar.gz` becomes `<name>.md5`. */
export function checksumFileFor(volumeName: string): string {
	return `${volumeName.replace(/\.tar\.gz$/, "")}.md5`;
}

export function volumeFileName(
	base: string,
	index: number,
	multiVolume: boolean,
): string {
	return multiVolume
		? `${base}.${String(index).padStart(2, "0")}.tar.gz`
		: `${base}.tar.gz`;
}

/**
 * One open `.tar.gz` volume: a tar packer piped through gzip into a file.
 */
class VolumeWriter {
	readonly volume: PackedVolume;
	/** Inode to first member name, for hard links within this volume. */
	readonly inodes = new Map<string, { name: string; md5: string }>();
	/** Holds an entry bigger than the volume size; nothing more goes in. */
	full = false;
	private readonly controller: TarPackController;
	private readonly encoder: CountingGzipEncoder;
	private readonly done: Promise<void>;
	private tarBytes = 0;
	private failure: unknown;

	constructor(file: string, level: number) {
		const { readable, controller } = createTarPacker();
		this.controller = controller;
		this.encoder = new CountingGzipEncoder(level);
		this.volume = {
			file,
			name: path.basename(file),
			checksums: [],
			symlinks: [],
			entries: 0,
			size: 0,
		};
		this.done = pipeline(
			Readable.fromWeb(readable.pipeThrough(this.encoder.stream)),
			createWriteStream(file),
		);
		// Surfaced by the next add() or by close().
		this.done.catch((err: unknown) => {
			this.failure = err;
			this.encoder.abort(err);
		});
	}

	/** Bytes of the volume file once everything added so far is written. */
	compressedSize(): Promise<number> {
		this.check();
		return this.encoder.compressedSizeAfter(this.tarBytes);
	}

	private check(): void {
		if (this.failure !== undefined) throw this.failure;
	}

	async addBodyless(header: TarHeader): Promise<void> {
		this.check();
		await this.controller.add(header).close();
		this.count(header);
	}

	/** Stream a file's data into the volume, returning its MD5. */
	async addFile(header: TarHeader, handle: FileHandle): Promise<string> {
		this.check();
		const hash = createHash("md5");
		await pipeline(
			handle.createReadStream({ autoClose: false }),
			async function* (source: AsyncIterable<Buffer>) {
				for await (const chunk of source) {
					hash.update(chunk);
					yield chunk;
				}
			},
			Writable.fromWeb(this.controller.add(header)),
		);
		this.count(header);
		return hash.digest("hex");
	}

	private count(header: TarHeader): void {
		this.volume.entries++;
		this.tarBytes += tarEntrySize(header);
	}

	async close(): Promise<PackedVolume> {
		this.check();
		this.controller.finalize();
		await this.done;
		this.volume.size = this.encoder.bytesOut;
		return this.volume;
	}

	async abort(err: unknown): Promise<void> {
		this.controller.error(err);
		try {
			await this.done;
		} catch {
			// The abort reason is what the caller reports.
		}
	}
}

/**
 * Pack paths into one or more gzip-compressed tar volumes.
 *
 * Volume 0 opens with a directory entry for the root. A new volume starts
 * when the compressed size of the open one plus the uncompressed tar size of
 * the next entry would exceed `volumeSize`, unless the open one is still
 * empty; an entry bigger than the budget gets a volume to itself. Files, directories and symlinks are each added as a
 * single entry, hard links as links to the first name of the inode in the
 * same volume.
 *
 * Unreadable entries are logged and skipped.
 *
 * @throws {StructuralError} `PACK_FAILED` for any other failure.
 */
export async function packVolumes(
	options: PackVolumesOptions,
): Promise<PackResult> {
	const logger = options.logger ?? defaultLogger;
	const users = options.users ?? (await systemUsers());
	const { source, baseDir, volumeSize } = options;
	const root = options.root ?? source.path;
	const multiVolume = volumeSize !== undefined;
	const level = options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL;
	const base = path.basename(options.outputBase);
	const outDir = path.dirname(options.outputBase);

	const volumes: PackedVolume[] = [];
	const skipped: string[] = [];

	const openVolume = () =>
		new VolumeWriter(
			path.join(outDir, volumeFileName(base, volumes.length, multiVolume)),
			level,
		);

	let current = openVolume();

	const memberName = (p: string) => {
		const relative = toPosix(path.relative(root, p));
		return relative ? `${baseDir}/${relative}` : baseDir;
	};

	try {
		const { header: rootHeader } = await headerFor(root, memberName(root));
		if (rootHeader?.type !== "directory") {
			throw new StructuralError("NOT_A_DIRECTORY", `${root}: not a directory`, {
				path: root,
			});
		}
		await current.addBodyless(rootHeader);

		for await (const p of options.paths) {
			if (options.include && !options.include.has(p)) continue;
			if (options.exclude?.has(p)) continue;

			let handle: FileHandle | undefined;
			try {
				const { header, isFile } = await headerFor(p, memberName(p));
				if (!header) {
					logger.warn(`${p}: unsupported file type, skipped`);
					skipped.push(p);
					continue;
				}
				if (isFile) handle = await fs.open(p, "r");

				const entrySize = tarEntrySize(header);
				if (volumeSize !== undefined) {
					if (
						current.volume.entries > 0 &&
						(current.full || (await current.compressedSize()) + entrySize > volumeSize)
					) {
						const closed = await current.close();
						volumes.push(closed);
						logger.debug(`${closed.file}: ${closed.entries} entries, ${formatSize(closed.size)}`);
						current = openVolume();
					}
					if (entrySize > volumeSize) {
						logger.warn(
							`${p}: ${formatSize(entrySize)} is larger than the volume size, written to its own volume`,
						);
						current.full = true;
					}
				}

				await addEntry(current, header, handle);
			} catch (err) {
				if (isPermissionError(err)) {
					logger.warn(`${p}: ${describeError(err)}, skipped`);
					skipped.push(p);
					continue;
				}
				throw err;
			} finally {
				await handle?.close();
			}
		}

		volumes.push(await current.close());
	} catch (err) {
		await current.abort(err);
		if (err instanceof StructuralError) throw err;
		throw new StructuralError(
			"PACK_FAILED",
			`${source.path}: unable to pack into ${path.basename(current.volume.file)}: ${describeError(err)}`,
			{ path: source.path, cause: err },
		);
	}

	return { volumes, skipped };

	async function headerFor(
		p: string,
		name: string,
	): Promise<{ header: TarHeader | null; isFile: boolean }> {
		const info = await source.info(p);
		const { stats } = info;
		if (!stats) {
			// Gone or never readable: report it the way a read would.
			await fs.lstat(p);
			return { header: null, isFile: false };
		}

		const common = {
			name,
			size: 0,
			mode: stats.mode & 0o7777,
			mtime: stats.mtime,
			uid: stats.uid,
			gid: stats.gid,
			uname: users.userName(stats.uid),
			gname: users.groupName(stats.gid),
		};

		if (info.symlink) {
			return {
				header: { ...common, type: "symlink", linkname: info.symlink.target },
				isFile: false,
			};
		}
		if (stats.isDirectory()) {
			return { header: { ...common, name: `${name}/`, type: "directory" }, isFile: false };
		}
		if (stats.isFile()) {
			return { header: { ...common, type: "file", size: stats.size }, isFile: true };
		}
		return { header: null, isFile: false };
	}

	async function addEntry(
		volume: VolumeWriter,
		header: TarHeader,
		handle: FileHandle | undefined,
	): Promise<void> {
		if (!handle) {
			await volume.addBodyless(header);
			if (header.type === "symlink") volume.volume.symlinks.push(header.name);
			return;
		}

		const stats = await handle.stat();
		const inode = `${stats.dev}:${stats.ino}`;
		const first = stats.nlink > 1 ? volume.inodes.get(inode) : undefined;
		if (first) {
			await volume.addBodyless({ ...header, type: "link", size: 0, linkname: first.name });
			volume.volume.checksums.push({ md5: first.md5, path: header.name });
			return;
		}

		const md5 = await volume.addFile(header, handle);
		volume.volume.checksums.push({ md5, path: header.name });
		if (stats.nlink > 1) volume.inodes.set(inode, { name: header.name, md5 });
	}
}
