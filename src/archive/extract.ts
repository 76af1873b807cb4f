import { createReadStream, createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { ReadableStream } from "node:stream/web";
import { type Logger, defaultLogger } from "../logger";
import { resolveEntryPath } from "../fs/path";
import { createGzipDecoder } from "../tar/compression";
import { DEFAULT_DIR_MODE, DEFAULT_FILE_MODE } from "../tar/constants";
import { drainStream } from "../tar/fields";
import type { ParsedTarEntry, TarHeader } from "../tar/types";
import { createTarDecoder } from "../tar/unpack";

/** A symlink read from a volume, created only once every volume is out. */
export interface PendingSymlink {
	path: string;
	target: string;
}

/** Member name without the trailing slash directories carry. */
export function memberName(header: TarHeader): string {
	return header.name.endsWith("/") ? header.name.slice(0, -1) : header.name;
}

/**
 * Decode the entries of a `.tar.gz` volume. Each entry's body must be read or
 * drained before the next one is produced.
 */
export function openVolume(file: string): ReadableStream<ParsedTarEntry> {
	const bytes: ReadableStream<Uint8Array> = Readable.toWeb(createReadStream(file));
	return bytes
		.pipeThrough(createGzipDecoder())
		.pipeThrough(createTarDecoder({ strict: true }));
}

/** Headers of every entry in a volume, in stream order. */
export async function readVolumeHeaders(file: string): Promise<TarHeader[]> {
	const headers: TarHeader[] = [];
	for await (const entry of openVolume(file)) {
		await drainStream(entry.body);
		headers.push(entry.header);
	}
	return headers;
}

export interface ExtractVolumeOptions {
	/** Receives the symlinks met in the volume. */
	symlinks: PendingSymlink[];
	logger?: Logger;
}

/**
 * Extract a volume below `destDir` without applying the stored attributes.
 *
 * Directories are created `0o755` and may already exist, so entries from
 * several volumes can share them. Files are written `0o644`. Symlinks are
 * collected for the caller instead of being created.
 */
export async function extractVolume(
	file: string,
	destDir: string,
	options: ExtractVolumeOptions,
): Promise<number> {
	const logger = options.logger ?? defaultLogger;
	let count = 0;

	for await (const { header, body } of openVolume(file)) {
		const outPath = resolveEntryPath(destDir, header.name);
		await fs.mkdir(path.dirname(outPath), {
			recursive: true,
			mode: DEFAULT_DIR_MODE,
		});

		switch (header.type) {
			case "directory":
				await drainStream(body);
				await fs.mkdir(outPath, { recursive: true, mode: DEFAULT_DIR_MODE });
				break;

			case "file":
				await pipeline(
					Readable.fromWeb(body),
					createWriteStream(outPath, { mode: DEFAULT_FILE_MODE }),
				);
				break;

			case "link":
				await drainStream(body);
				await fs.link(resolveEntryPath(destDir, header.linkname ?? ""), outPath);
				break;

			case "symlink":
				await drainStream(body);
				options.symlinks.push({ path: outPath, target: header.linkname ?? "" });
				break;

			default:
				await drainStream(body);
				logger.warn(`${file}: ${header.name}: unsupported entry type, skipped`);
				continue;
		}
		count++;
	}

	return count;
}

/** Create collected symlinks. */
export async function createSymlinks(
	symlinks: Iterable<PendingSymlink>,
): Promise<void> {
	for (const link of symlinks) {
		await fs.mkdir(path.dirname(link.path), { recursive: true });
		await fs.symlink(link.target, link.path);
	}
}

export interface ApplyAttributesOptions {
	/** Apply the stored permission bits. Defaults to `true`. */
	restoreModes?: boolean;
	/** Add owner read and write to every entry. Defaults to `true`. */
	setReadWrite?: boolean;
}

/**
 * Apply stored modes and mtimes from the headers of every volume.
 *
 * Non-directories come first, then directories deepest first, so creating
 * or touching a child never disturbs an attribute already set on its parent.
 * Symlinks only get their timestamps.
 */
export async function applyAttributes(
	volumes: Iterable<string>,
	destDir: string,
	options: ApplyAttributesOptions = {},
): Promise<void> {
	const restoreModes = options.restoreModes ?? true;
	const readWrite = (options.setReadWrite ?? true) ? 0o600 : 0;

	const entries: TarHeader[] = [];
	const directories = new Map<string, TarHeader>();
	for (const volume of volumes) {
		for (const header of await readVolumeHeaders(volume)) {
			// The same directory may be stored in several volumes; keep the last.
			if (header.type === "directory") directories.set(memberName(header), header);
			else entries.push(header);
		}
	}

	const depth = (name: string) => name.split("/").length;
	const dirs = [...directories.entries()].sort(
		([a], [b]) => depth(b) - depth(a),
	);

	for (const header of entries) {
		const outPath = resolveEntryPath(destDir, header.name);
		const mtime = header.mtime ?? new Date();
		if (header.type === "symlink") {
			await fs.lutimes(outPath, mtime, mtime);
			continue;
		}
		const mode = restoreModes ? (header.mode ?? DEFAULT_FILE_MODE) : DEFAULT_FILE_MODE;
		await fs.chmod(outPath, mode | readWrite);
		await fs.utimes(outPath, mtime, mtime);
	}

	for (const [name, header] of dirs) {
		const outPath = resolveEntryPath(destDir, name);
		const mtime = header.mtime ?? new Date();
		const mode = restoreModes ? (header.mode ?? DEFAULT_DIR_MODE) : DEFAULT_DIR_MODE;
		await fs.chmod(outPath, mode | readWrite);
		await fs.utimes(outPath, mtime, mtime);
	}
}
