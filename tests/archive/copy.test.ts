import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { verifyCopy } from "../../src/archive/compare";
import { CopyArchiveDirectory, copy } from "../../src/archive/copy";
import { CopyError } from "../../src/errors";
import { UserDatabase } from "../../src/fs";
import { buildTree, captureLogger, listTree, makeTempDir } from "../fixtures";

const users = new UserDatabase(new Map(), new Map());

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
	const items: T[] = [];
	for await (const item of iterable) items.push(item);
	return items;
}

describe("copy", () => {
	let tmpDir: string;
	let source: string;

	beforeEach(async () => {
		tmpDir = await makeTempDir("copy");
		source = await buildTree(path.join(tmpDir, "src"), {
			"a.txt": "a",
			"sub/b.txt": "b",
			link: { symlink: "a.txt" },
			dl: { symlink: "sub" },
			broken: { symlink: "missing.txt" },
		});
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("copies the tree with symlinks as they are", async () => {
		const dest = path.join(tmpDir, "copy");
		const copied = await copy(source, dest, { users, logger: captureLogger().logger });

		expect(copied.path).toBe(dest);
		expect(copied.name).toBe("src");
		expect(await listTree(dest)).toEqual([
			"ARCHIVE_METADATA/",
			"ARCHIVE_METADATA/archiver_metadata.json",
			"ARCHIVE_METADATA/broken_symlinks",
			"ARCHIVE_METADATA/checksums.md5",
			"ARCHIVE_METADATA/manifest",
			"ARCHIVE_METADATA/symlinks",
			"ARCHIVE_README.txt",
			"a.txt",
			"broken",
			"dl",
			"link",
			"sub/",
			"sub/b.txt",
		]);
		expect(await fs.readlink(path.join(dest, "link"))).toBe("a.txt");
		expect(await fs.readlink(path.join(dest, "dl"))).toBe("sub");
		expect(await fs.readlink(path.join(dest, "broken"))).toBe("missing.txt");
		expect(await fs.readFile(path.join(dest, "ARCHIVE_METADATA", "symlinks"), "utf8")).toBe(
			"broken\tmissing.txt\nlink\ta.txt\ndl\tsub\n",
		);
		expect(
			await fs.readFile(path.join(dest, "ARCHIVE_METADATA", "broken_symlinks"), "utf8"),
		).toBe("broken\tmissing.txt\n");
	});

	it("records a copy that lists and verifies", async () => {
		const dest = path.join(tmpDir, "copy");
		await copy(source, dest, { users, logger: captureLogger().logger });
		const copied = await CopyArchiveDirectory.load(dest, { logger: captureLogger().logger });

		expect(copied.metadata).toMatchObject({
			name: "src",
			type: "CopyArchiveDirectory",
			has_symlinks: true,
			has_dirlinks: true,
			has_broken_symlinks: true,
			replace_symlinks: false,
			transform_broken_symlinks: false,
			follow_dirlinks: false,
		});
		expect(copied.metadata.compression_level).toBeUndefined();
		expect((await collect(copied.list())).map((m) => m.path)).toEqual([
			"src/a.txt",
			"src/sub/b.txt",
			"src/broken",
			"src/link",
			"src/dl",
		]);
		expect((await collect(copied.search({ name: "b*" }))).map((m) => m.path)).toEqual([
			"src/sub/b.txt",
			"src/broken",
		]);
		expect(await copied.verifyArchive()).toBe(true);

		await fs.writeFile(path.join(dest, "a.txt"), "changed");
		expect(await copied.verifyArchive()).toBe(false);
	});

	it("notices a recorded symlink that has gone", async () => {
		const dest = path.join(tmpDir, "copy");
		const { logger, lines } = captureLogger();
		const copied = await copy(source, dest, { users, logger });
		await fs.rm(path.join(dest, "link"));

		expect(await copied.verifyArchive()).toBe(false);
		expect(lines.at(-1)).toEqual({
			level: "error",
			message: `${path.join(dest, "link")}: symlink missing or changed`,
		});
	});

	it("collects every entry it cannot replace", async () => {
		const dest = path.join(tmpDir, "copy");
		const { logger, lines } = captureLogger();

		const error = await copy(source, dest, { replaceSymlinks: true, users, logger }).catch(
			(err: unknown) => err,
		);

		expect(error).toBeInstanceOf(CopyError);
		expect(error).toMatchObject({
			code: "COPY_FAILED",
			failures: [
				{ path: path.join(source, "broken"), reason: "cannot replace broken symlink" },
				{ path: path.join(source, "dl"), reason: "cannot replace a symlink to a directory" },
			],
		});
		expect(lines.filter((line) => line.level === "error").map((line) => line.message)).toEqual([
			`${path.join(source, "broken")}: cannot replace broken symlink`,
			`${path.join(source, "dl")}: cannot replace a symlink to a directory`,
		]);
		await expect(fs.access(dest)).rejects.toThrow();
	});

	it("replaces symlinks, follows directory links and transforms broken links", async () => {
		const dest = path.join(tmpDir, "copy");
		const copied = await copy(source, dest, {
			replaceSymlinks: true,
			followDirlinks: true,
			transformBrokenSymlinks: true,
			users,
			logger: captureLogger().logger,
		});

		expect((await listTree(dest)).filter((p) => !p.startsWith("ARCHIVE_"))).toEqual([
			"a.txt",
			"broken",
			"dl/",
			"dl/b.txt",
			"link",
			"sub/",
			"sub/b.txt",
		]);
		expect((await fs.lstat(path.join(dest, "link"))).isFile()).toBe(true);
		expect(await fs.readFile(path.join(dest, "link"), "utf8")).toBe("a");
		expect(await fs.readFile(path.join(dest, "dl", "b.txt"), "utf8")).toBe("b");
		expect(await fs.readFile(path.join(dest, "broken"), "utf8")).toBe("missing.txt");
		expect(copied.metadata).toMatchObject({
			replace_symlinks: true,
			transform_broken_symlinks: true,
			follow_dirlinks: true,
		});
		expect(await copied.verifyArchive()).toBe(true);
	});

	it("transforms broken links while keeping working ones", async () => {
		const dest = path.join(tmpDir, "copy");
		await copy(source, dest, {
			transformBrokenSymlinks: true,
			users,
			logger: captureLogger().logger,
		});

		expect(await fs.readFile(path.join(dest, "broken"), "utf8")).toBe("missing.txt");
		expect(await fs.readlink(path.join(dest, "link"))).toBe("a.txt");
		expect(await fs.readlink(path.join(dest, "dl"))).toBe("sub");
	});

	describe("symlinks that cannot be resolved", () => {
		let looped: string;

		beforeEach(async () => {
			looped = await buildTree(path.join(tmpDir, "looped"), {
				"a.txt": "a",
				loop1: { symlink: "loop2" },
				loop2: { symlink: "loop1" },
			});
		});

		it("copies them as they are and records them", async () => {
			const dest = path.join(tmpDir, "copy");
			const copied = await copy(looped, dest, { users, logger: captureLogger().logger });

			expect(await fs.readlink(path.join(dest, "loop1"))).toBe("loop2");
			expect(await fs.readlink(path.join(dest, "loop2"))).toBe("loop1");
			expect(
				await fs.readFile(path.join(dest, "ARCHIVE_METADATA", "unresolvable_symlinks"), "utf8"),
			).toBe("loop1\tloop2\nloop2\tloop1\n");
			expect(await listTree(path.join(dest, "ARCHIVE_METADATA"))).not.toContain("broken_symlinks");
			expect(copied.metadata).toMatchObject({
				has_unresolvable_symlinks: true,
				has_broken_symlinks: false,
			});
			expect(await copied.verifyArchive()).toBe(true);
		});

		it("turns them into placeholder files when transforming", async () => {
			const dest = path.join(tmpDir, "copy");
			await copy(looped, dest, {
				transformBrokenSymlinks: true,
				users,
				logger: captureLogger().logger,
			});

			expect((await fs.lstat(path.join(dest, "loop1"))).isFile()).toBe(true);
			expect(await fs.readFile(path.join(dest, "loop1"), "utf8")).toBe("loop2");
			expect(await fs.readFile(path.join(dest, "loop2"), "utf8")).toBe("loop1");
			expect(
				await fs.readFile(path.join(dest, "ARCHIVE_METADATA", "unresolvable_symlinks"), "utf8"),
			).toBe("loop1\tloop2\nloop2\tloop1\n");
		});

		it("cannot replace them", async () => {
			const error = await copy(looped, path.join(tmpDir, "copy"), {
				replaceSymlinks: true,
				users,
				logger: captureLogger().logger,
			}).catch((err: unknown) => err);

			expect(error).toMatchObject({
				code: "COPY_FAILED",
				failures: [
					{ path: path.join(looped, "loop1"), reason: "cannot replace unresolvable symlink" },
					{ path: path.join(looped, "loop2"), reason: "cannot replace unresolvable symlink" },
				],
			});
		});
	});

	it("refuses an existing destination", async () => {
		const dest = path.join(tmpDir, "copy");
		await fs.mkdir(dest);

		await expect(
			copy(source, dest, { users, logger: captureLogger().logger }),
		).rejects.toMatchObject({ code: "ALREADY_EXISTS" });
	});
});

describe("verifyCopy", () => {
	let tmpDir: string;

	beforeEach(async () => {
		tmpDir = await makeTempDir("verify");
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	const tree = (name: string, layout: Parameters<typeof buildTree>[1]) =>
		buildTree(path.join(tmpDir, name), layout);

	it("accepts identical trees", async () => {
		const layout = { "a.txt": "a", "sub/b.txt": "b", link: { symlink: "a.txt" } };
		const a = await tree("a", layout);
		const b = await tree("b", layout);

		expect(await verifyCopy(a, b, { logger: captureLogger().logger })).toBe(true);
	});

	it("reports every difference", async () => {
		const a = await tree("a", { "a.txt": "a", "gone.txt": "g", "sub/b.txt": "b" });
		const b = await tree("b", { "a.txt": "A", "sub/b.txt": "b", "extra.txt": "e" });
		const { logger, lines } = captureLogger();

		expect(await verifyCopy(a, b, { logger })).toBe(false);
		expect(lines.map((line) => line.message)).toEqual([
			"a.txt: checksums differ",
			`gone.txt: missing from ${b}`,
			`extra.txt: not present in ${a}`,
		]);
	});

	it("rejects a symlink in the copy even when following symlinks", async () => {
		const a = await tree("a", { "a.txt": "a", "x.txt": "a" });
		const b = await tree("b", { "a.txt": "a", "x.txt": { symlink: "a.txt" } });
		const { logger, lines } = captureLogger();

		expect(await verifyCopy(a, b, { followSymlinks: true, logger })).toBe(false);
		expect(lines.map((line) => line.message)).toEqual([
			"x.txt: symlink in copy is not a symlink in original",
		]);
	});

	it("compares what symlinks point at when following them", async () => {
		const a = await tree("a", { "a.txt": "a", x: { symlink: "a.txt" } });
		const b = await tree("b", { "a.txt": "a", x: "a" });
		const { logger, lines } = captureLogger();

		expect(await verifyCopy(a, b, { logger })).toBe(false);
		expect(lines.map((line) => line.message)).toEqual([
			"x: symlink in original is not a symlink in copy",
		]);
		expect(await verifyCopy(a, b, { followSymlinks: true, logger })).toBe(true);
	});

	it("accepts placeholder files for broken symlinks", async () => {
		const a = await tree("a", { broken: { symlink: "nowhere" } });
		const good = await tree("good", { broken: "nowhere" });
		const bad = await tree("bad", { broken: "elsewhere" });
		const logger = captureLogger().logger;

		expect(await verifyCopy(a, good, { brokenSymlinksArePlaceholders: true, logger })).toBe(true);
		expect(await verifyCopy(a, bad, { brokenSymlinksArePlaceholders: true, logger })).toBe(false);
		expect(await verifyCopy(a, good, { logger })).toBe(false);
	});

	it("leaves ignored paths out on both sides", async () => {
		const a = await tree("a", { "a.txt": "a", "notes/n.txt": "n" });
		const b = await tree("b", { "a.txt": "a", "META/m.txt": "m" });

		expect(
			await verifyCopy(a, b, {
				ignorePaths: ["notes", "notes/**", "META", "META/**"],
				logger: captureLogger().logger,
			}),
		).toBe(true);
	});
});
