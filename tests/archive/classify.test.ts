import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ArchiveDirectory } from "../../src/archive/archive-directory";
import { classify, getDirectory } from "../../src/archive/classify";
import { CopyArchiveDirectory } from "../../src/archive/copy";
import { makeArchive } from "../../src/archive/make";
import {
	archiveNameFromPath,
	detectArchive,
	formatTimestamp,
	parseMetadata,
} from "../../src/archive/metadata";
import { checkDestination, isCaseSensitive, supportsSymlinks } from "../../src/archive/preflight";
import { PreflightError } from "../../src/errors";
import { Directory, UserDatabase } from "../../src/fs";
import { buildExample, buildTree, captureLogger, makeTempDir } from "../fixtures";

const users = new UserDatabase(new Map(), new Map());

describe("classify", () => {
	let tmpDir: string;

	beforeEach(async () => {
		tmpDir = await makeTempDir("classify");
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("treats mixed and empty directories as generic", async () => {
		expect(await classify(await buildExample(tmpDir))).toEqual({ kind: "generic" });
		expect(await classify(await buildTree(path.join(tmpDir, "empty"), {}))).toEqual({
			kind: "generic",
		});
	});

	it("recognises a directory of directories", async () => {
		const root = await buildTree(path.join(tmpDir, "multi"), {
			"b/x.txt": "x",
			a: null,
			c: { symlink: "a" },
		});

		expect(await classify(root)).toEqual({ kind: "multi-subdir", subdirs: ["a", "b", "c"] });
	});

	it("recognises a multi-project run", async () => {
		const root = await buildTree(path.join(tmpDir, "run"), {
			"projects.info": "#Project\tSamples\nproj_b\tS2\nproj_a\tS1\n",
			"proj_a/a.txt": "a",
			"proj_b/b.txt": "b",
			"undetermined_reads/u.txt": "u",
			"stats.txt": "s",
		});

		expect(await classify(root)).toEqual({
			kind: "multi-project",
			projectDirs: ["proj_b", "proj_a", "undetermined_reads"],
			processingArtefacts: ["stats.txt"],
		});
	});

	it("recognises archives and copies", async () => {
		const example = await buildExample(tmpDir);
		const logger = captureLogger().logger;
		const archive = await makeArchive(example, { outDir: tmpDir, users, logger });

		const kind = await classify(archive.path);
		expect(kind.kind).toBe("archive");
		expect(await getDirectory(archive.path, { logger })).toBeInstanceOf(ArchiveDirectory);
		expect(await getDirectory(example)).toBeInstanceOf(Directory);
	});

	it("opens copies through getDirectory", async () => {
		const root = await buildTree(path.join(tmpDir, "copy"), {
			"a.txt": "a",
			"ARCHIVE_METADATA/checksums.md5": "",
			"ARCHIVE_METADATA/archiver_metadata.json": JSON.stringify({
				name: "source",
				type: "CopyArchiveDirectory",
			}),
		});

		expect((await classify(root)).kind).toBe("copy");
		expect(await getDirectory(root)).toBeInstanceOf(CopyArchiveDirectory);
		await expect(ArchiveDirectory.load(root)).rejects.toMatchObject({ code: "BAD_METADATA" });
	});

	it("refuses what is not a directory", async () => {
		await fs.writeFile(path.join(tmpDir, "file.txt"), "x");
		await expect(classify(path.join(tmpDir, "file.txt"))).rejects.toMatchObject({
			code: "NOT_A_DIRECTORY",
		});
	});
});

describe("archive metadata", () => {
	let tmpDir: string;

	beforeEach(async () => {
		tmpDir = await makeTempDir("metadata");
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("fills in defaults", () => {
		const metadata = parseMetadata({ name: "run" }, "fallback", "metadata.json");

		expect(metadata).toMatchObject({
			name: "run",
			subarchives: [],
			files: [],
			multi_volume: false,
			volume_size: null,
			has_symlinks: false,
		});
	});

	it("rejects records that do not fit", () => {
		expect(() => parseMetadata({ name: "run", subarchives: "x" }, "run", "m.json")).toThrow(
			"m.json: invalid archive metadata: subarchives: Expected array, received string",
		);
		expect(() => parseMetadata([], "run", "m.json")).toThrowError(
			expect.objectContaining({ code: "BAD_METADATA" }),
		);
	});

	it("strips the archive suffix from directory names", () => {
		expect(archiveNameFromPath("/archive/run_42.archive")).toBe("run_42");
		expect(archiveNameFromPath("/archive/run_42")).toBe("run_42");
	});

	it("formats timestamps in local time", () => {
		expect(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe("2024-01-02 03:04:05");
	});

	it("reads the older layouts", async () => {
		const older = await buildTree(path.join(tmpDir, "older.archive"), {
			".ngsarchiver/archive.md5": "",
			".ngsarchiver/archive_metadata.json": JSON.stringify({
				name: "older",
				archives: ["older.tar.gz"],
				ngsarchiver_version: "1.2.3",
				compression_level: 6,
			}),
		});
		const oldest = await buildTree(path.join(tmpDir, "oldest.archive"), {
			".ngsarchive/archive.md5": "",
			".ngsarchive/archive_contents.json": JSON.stringify({ archives: ["oldest.tar.gz"] }),
		});

		const detected = await detectArchive(older);
		expect(detected?.format.legacy).toBe(true);
		expect(detected?.metadata).toMatchObject({
			name: "older",
			subarchives: ["older.tar.gz"],
			archiver_version: "1.2.3",
		});

		const archive = await ArchiveDirectory.load(oldest);
		expect(archive.name).toBe("oldest");
		expect(archive.metadata.subarchives).toEqual(["oldest.tar.gz"]);
		expect(archive.format.metadataDir).toBe(".ngsarchive");
	});

	it("returns null for plain directories", async () => {
		expect(await detectArchive(await buildExample(tmpDir))).toBeNull();
	});

	it("rejects a record that is not JSON", async () => {
		const root = await buildTree(path.join(tmpDir, "bad.archive"), {
			"ARCHIVE_METADATA/archive_checksums.md5": "",
			"ARCHIVE_METADATA/archiver_metadata.json": "{ not json",
		});

		await expect(detectArchive(root)).rejects.toMatchObject({ code: "BAD_METADATA" });
	});
});

describe("destination checks", () => {
	let tmpDir: string;

	beforeEach(async () => {
		tmpDir = await makeTempDir("preflight");
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("leaves nothing behind after checking the destination", async () => {
		expect(await supportsSymlinks(tmpDir)).toBe(true);
		expect(typeof (await isCaseSensitive(tmpDir))).toBe("boolean");
		expect(await fs.readdir(tmpDir)).toEqual([]);
	});

	it("returns the directory the tree will be restored into", async () => {
		const metadata = parseMetadata({ name: "run", has_symlinks: true }, "run", "m.json");

		expect(await checkDestination(metadata, tmpDir, "run")).toBe(path.join(tmpDir, "run"));
	});

	it("refuses a case-insensitive destination for names differing only by case", async () => {
		const metadata = parseMetadata(
			{ name: "run", has_case_sensitive_filenames: true },
			"run",
			"m.json",
		);
		const caseInsensitive = {
			supportsSymlinks: async () => true,
			isCaseSensitive: async () => false,
		};

		const error = await checkDestination(metadata, tmpDir, "run", caseInsensitive).catch(
			(err: unknown) => err,
		);
		expect(error).toBeInstanceOf(PreflightError);
		expect(error).toMatchObject({
			code: "CASE_INSENSITIVE_DESTINATION",
			message: `${tmpDir}: archive holds names differing only by case but the destination is case-insensitive`,
		});

		const plain = parseMetadata({ name: "run" }, "run", "m.json");
		expect(await checkDestination(plain, tmpDir, "run", caseInsensitive)).toBe(
			path.join(tmpDir, "run"),
		);
	});

	it("refuses a destination without symlinks when the tree has them", async () => {
		const metadata = parseMetadata({ name: "run", has_dirlinks: true }, "run", "m.json");

		await expect(
			checkDestination(metadata, tmpDir, "run", {
				supportsSymlinks: async () => false,
				isCaseSensitive: async () => true,
			}),
		).rejects.toMatchObject({ code: "NO_SYMLINK_SUPPORT" });
	});

	it("archives and restores names differing only by case", async () => {
		const root = await buildTree(path.join(tmpDir, "cased"), { "A.txt": "upper", "a.txt": "lower" });
		const archive = await makeArchive(root, {
			outDir: tmpDir,
			users,
			logger: captureLogger().logger,
		});
		expect(archive.metadata.has_case_sensitive_filenames).toBe(true);

		const dest = path.join(tmpDir, "restore");
		await fs.mkdir(dest);
		const restored = await archive.unpack(dest);
		expect(await fs.readFile(path.join(restored, "A.txt"), "utf8")).toBe("upper");
		expect(await fs.readFile(path.join(restored, "a.txt"), "utf8")).toBe("lower");
	});

	it("refuses a destination that already holds the tree", async () => {
		const metadata = parseMetadata({ name: "run" }, "run", "m.json");
		await fs.mkdir(path.join(tmpDir, "run"));

		await expect(checkDestination(metadata, tmpDir, "run")).rejects.toThrow(
			`${path.join(tmpDir, "run")}: already exists`,
		);
	});
});
