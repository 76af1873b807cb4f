import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { StructuralError, isNotFoundError } from "../errors";
import { ARCHIVE_SUFFIX, METADATA_DIR } from "./options";

const flag = z.boolean().default(false);

/** The archive record as stored in `archiver_metadata.json`. */
export const archiveMetadataSchema = z.object({
	name: z.string(),
	source: z.string().default(""),
	source_date: z.string().nullable().default(null),
	source_size: z.string().nullable().default(null),
	type: z.enum(["ArchiveDirectory", "CopyArchiveDirectory"]).optional(),
	subarchives: z.array(z.string()).default([]),
	files: z.array(z.string()).default([]),
	user: z.string().default(""),
	creation_date: z.string().nullable().default(null),
	multi_volume: z.boolean().default(false),
	volume_size: z.union([z.string(), z.number()]).nullable().default(null),
	compression_level: z.number().int().min(0).max(9).optional(),
	archiver_version: z.string().default(""),
	has_broken_symlinks: flag,
	has_dirlinks: flag,
	has_external_symlinks: flag,
	has_hard_linked_files: flag,
	has_symlinks: flag,
	has_unresolvable_symlinks: flag,
	has_unreadable_files: flag,
	has_case_sensitive_filenames: flag,
	replace_symlinks: z.boolean().optional(),
	transform_broken_symlinks: z.boolean().optional(),
	follow_dirlinks: z.boolean().optional(),
});

export type ArchiveMetadata = z.infer<typeof archiveMetadataSchema>;

/** The record as written, before defaults are filled in. */
export type ArchiveMetadataInput = z.input<typeof archiveMetadataSchema>;

export type ArchiveKind = "archive" | "copy";

/** Where one on-disk generation keeps its record and aggregate checksums. */
export interface ArchiveFormat {
	kind: ArchiveKind;
	metadataDir: string;
	metadataFile: string;
	checksumFile: string;
	/** Older layouts only ever held compressed archives. */
	legacy: boolean;
}

/** Known layouts, newest first. */
export const ARCHIVE_FORMATS: readonly ArchiveFormat[] = [
	{
		kind: "archive",
		metadataDir: METADATA_DIR,
		metadataFile: "archiver_metadata.json",
		checksumFile: "archive_checksums.md5",
		legacy: false,
	},
	{
		kind: "copy",
		metadataDir: METADATA_DIR,
		metadataFile: "archiver_metadata.json",
		checksumFile: "checksums.md5",
		legacy: false,
	},
	{
		kind: "archive",
		metadataDir: ".ngsarchiver",
		metadataFile: "archive_metadata.json",
		checksumFile: "archive.md5",
		legacy: true,
	},
	{
		kind: "archive",
		metadataDir: ".ngsarchive",
		metadataFile: "archive_contents.json",
		checksumFile: "archive.md5",
		legacy: true,
	},
];

export interface DetectedArchive {
	format: ArchiveFormat;
	metadata: ArchiveMetadata;
	/** Absolute path of the metadata directory. */
	metadataDir: string;
	/** Absolute path of the aggregate checksum file. */
	checksumFile: string;
}

/** Archive directory names end in `.archive`; the record's name does not. */
export function archiveNameFromPath(dir: string): string {
	const base = path.basename(dir);
	return base.endsWith(ARCHIVE_SUFFIX) ? base.slice(0, -ARCHIVE_SUFFIX.length) : base;
}

/**
 * Bring older records to the current shape: `archives` became
 * `subarchives`, the version key was renamed and the oldest records carry
 * no name at all.
 */
function normalizeLegacy(raw: unknown, fallbackName: string): unknown {
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return raw;
	const record: Record<string, unknown> = { ...raw };

	if (record.subarchives === undefined && record.archives !== undefined) {
		record.subarchives = record.archives;
	}
	if (record.archiver_version === undefined && record.ngsarchiver_version !== undefined) {
		record.archiver_version = record.ngsarchiver_version;
	}
	record.name ??= fallbackName;
	return record;
}

/**
 * Validate a decoded record.
 *
 * @throws {StructuralError} `BAD_METADATA` when the record does not fit the schema.
 */
export function parseMetadata(
	raw: unknown,
	fallbackName: string,
	file: string,
): ArchiveMetadata {
	const result = archiveMetadataSchema.safeParse(normalizeLegacy(raw, fallbackName));
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
			.join("; ");
		throw new StructuralError("BAD_METADATA", `${file}: invalid archive metadata: ${issues}`, {
			path: file,
		});
	}
	return result.data;
}

async function exists(p: string): Promise<boolean> {
	try {
		await fs.access(p);
		return true;
	} catch (err) {
		if (isNotFoundError(err)) return false;
		throw err;
	}
}

async function readJson(file: string): Promise<unknown> {
	const text = await fs.readFile(file, "utf8");
	try {
		return JSON.parse(text);
	} catch (err) {
		throw new StructuralError("BAD_METADATA", `${file}: not valid JSON`, {
			path: file,
			cause: err,
		});
	}
}

/**
 * Find which archive layout `dir` uses, trying newest first. A row matches
 * when both its record and its checksum file exist; rows sharing the current
 * metadata directory also need the record's kind to agree, which is told by
 * the presence of `compression_level`.
 *
 * @returns `null` when `dir` is not an archive or copy directory.
 * @throws {StructuralError} `BAD_METADATA` when a record exists but is invalid.
 */
export async function detectArchive(dir: string): Promise<DetectedArchive | null> {
	const parsed = new Map<string, ArchiveMetadata>();

	for (const format of ARCHIVE_FORMATS) {
		const metadataDir = path.join(dir, format.metadataDir);
		const metadataFile = path.join(metadataDir, format.metadataFile);
		const checksumFile = path.join(metadataDir, format.checksumFile);
		if (!(await exists(metadataFile)) || !(await exists(checksumFile))) continue;

		let metadata = parsed.get(metadataFile);
		if (!metadata) {
			metadata = parseMetadata(await readJson(metadataFile), archiveNameFromPath(dir), metadataFile);
			parsed.set(metadataFile, metadata);
		}

		if (!format.legacy && metadataKind(metadata) !== format.kind) continue;
		return { format, metadata, metadataDir, checksumFile };
	}

	return null;
}

/**
 * Detect the layout of an archive directory, insisting there is one.
 *
 * @throws {StructuralError} `MISSING_METADATA` when no layout matches.
 */
export async function loadArchive(dir: string): Promise<DetectedArchive> {
	const detected = await detectArchive(dir);
	if (!detected) {
		throw new StructuralError("MISSING_METADATA", `${dir}: no archive metadata found`, {
			path: dir,
		});
	}
	return detected;
}

/** Copies are the records without a compression level. */
export function metadataKind(metadata: ArchiveMetadata): ArchiveKind {
	return metadata.compression_level === undefined ? "copy" : "archive";
}

export async function writeMetadata(
	file: string,
	metadata: ArchiveMetadataInput,
): Promise<void> {
	await fs.writeFile(file, `${JSON.stringify(metadata, null, 2)}\n`);
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
	const pad = (n: number) => String(n).padStart(2, "0");
	return (
		`${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
		`${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
	);
}
