import { randomBytes } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	applyAttributes,
	createSymlinks,
	extractVolume,
	memberName,
	type PendingSymlink,
	readVolumeHeaders,
} from "../../src/archive/extract";
import { checksumFileFor, packVolumes, volumeFileName } from "../../src/archive/volumes";
import { Directory, UserDatabase } from "../../src/fs";
import { buildTree, captureLogger, isRoot, listTree, makeTempDir } from "../fixtures";

const HELLO_MD5 = "5d41402abc4b2a76b9719d911017c592";
const users = new UserDatabase(new Map(), new Map());

describe("volumes", () => {
	let tmpDir: string;
	let outDir: string;

	beforeEach(async () => {
		tmpDir = await makeTempDir("volumes");
		outDir = path.join(tmpDir, "out");
		await fs.mkdir(outDir);
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	async function pack(root: string, volumeSize?: number) {
		const { logger, lines } = captureLogger();
		const source = await Directory.open(root);
		const result = await packVolumes({
			source,
			baseDir: "src",
			outputBase: path.join(outDir, "src"),
			paths: source.walk(),
			volumeSize,
			users,
			logger,
		});
		return { ...result, lines };
	}

	const names = async (file: string) =>
		(await readVolumeHeaders(file)).map((header) => header.name);

	const onDisk = (volumes: Array<{ file: string }>) =>
		Promise.all(volumes.map(async (volume) => (await fs.stat(volume.file)).size));

	/** Content that gzip cannot shrink, so compressed sizes track tar sizes. */
	const writeRandom = (file: string, size: number) => fs.writeFile(file, randomBytes(size));

	it("names volumes and their checksum files", () => {
		expect(volumeFileName("run", 0, false)).toBe("run.tar.gz");
		expect(volumeFileName("run", 3, true)).toBe("run.03.tar.gz");
		expect(checksumFileFor("run.03.tar.gz")).toBe("run.03.md5");
		expect(checksumFileFor("run.tar.gz")).toBe("run.md5");
	});

	it("packs a tree into a single volume", async () => {
		const root = await buildTree(path.join(tmpDir, "src"), {
			"a.txt": "hello",
			"sub/b.txt": "",
			link: { symlink: "a.txt" },
		});

		const { volumes, skipped } = await pack(root);

		expect(skipped).toEqual([]);
		expect(volumes).toHaveLength(1);
		const [volume] = volumes;
		expect(volume.name).toBe("src.tar.gz");
		expect(volume.file).toBe(path.join(outDir, "src.tar.gz"));
		expect(volume.entries).toBe(5);
		expect(volume.symlinks).toEqual(["src/link"]);
		expect(volume.checksums).toEqual([
			{ md5: HELLO_MD5, path: "src/a.txt" },
			{ md5: "d41d8cd98f00b204e9800998ecf8427e", path: "src/sub/b.txt" },
		]);
		expect(await names(volume.file)).toEqual([
			"src/",
			"src/a.txt",
			"src/link",
			"src/sub/",
			"src/sub/b.txt",
		]);
	});

	it("starts a new volume when the next entry would overflow", async () => {
		const root = await buildTree(path.join(tmpDir, "src"), {});
		for (const name of ["a.bin", "b.bin", "c.bin"]) {
			await writeRandom(path.join(root, name), 3000);
		}

		const { volumes } = await pack(root, 8192);

		expect(volumes.map((v) => v.name)).toEqual(["src.00.tar.gz", "src.01.tar.gz"]);
		expect(await names(volumes[0].file)).toEqual(["src/", "src/a.bin", "src/b.bin"]);
		expect(await names(volumes[1].file)).toEqual(["src/c.bin"]);
		expect(await onDisk(volumes)).toEqual(volumes.map((v) => v.size));
		expect(volumes[0].size).toBeGreaterThan(6000);
		expect(volumes[0].size).toBeLessThanOrEqual(8192);
	});

	it("budgets volumes by their compressed size", async () => {
		const root = await buildTree(path.join(tmpDir, "src"), {});
		for (let i = 0; i < 20; i++) {
			await fs.writeFile(path.join(root, `run_${String(i).padStart(2, "0")}.log`), "ok\n".repeat(21_846));
		}

		const { volumes } = await pack(root, 256 * 1024);

		expect(volumes.map((v) => [v.name, v.entries])).toEqual([["src.00.tar.gz", 21]]);
		expect(await onDisk(volumes)).toEqual([volumes[0].size]);
		expect(volumes[0].size).toBeLessThan(64 * 1024);
	});

	it("gives an oversized entry a volume of its own", async () => {
		const root = await buildTree(path.join(tmpDir, "src"), { "small.txt": "s" });
		await writeRandom(path.join(root, "big.bin"), 3000);

		const { volumes, lines } = await pack(root, 2048);

		expect(volumes.map((v) => v.name)).toEqual([
			"src.00.tar.gz",
			"src.01.tar.gz",
			"src.02.tar.gz",
		]);
		expect(await names(volumes[0].file)).toEqual(["src/"]);
		expect(await names(volumes[1].file)).toEqual(["src/big.bin"]);
		expect(await names(volumes[2].file)).toEqual(["src/small.txt"]);
		expect(lines.filter((line) => line.level === "warn")).toEqual([
			{
				level: "warn",
				message: `${path.join(root, "big.bin")}: 3.5K is larger than the volume size, written to its own volume`,
			},
		]);
	});

	it("stores hard links as links to the first name", async () => {
		const root = await buildTree(path.join(tmpDir, "src"), { "a.txt": "hello" });
		await fs.link(path.join(root, "a.txt"), path.join(root, "b.txt"));

		const { volumes } = await pack(root);
		const headers = await readVolumeHeaders(volumes[0].file);

		expect(headers.map((h) => [h.name, h.type, h.linkname])).toEqual([
			["src/", "directory", ""],
			["src/a.txt", "file", ""],
			["src/b.txt", "link", "src/a.txt"],
		]);
		expect(volumes[0].checksums).toEqual([
			{ md5: HELLO_MD5, path: "src/a.txt" },
			{ md5: HELLO_MD5, path: "src/b.txt" },
		]);
	});

	it("refuses a root that is not a directory", async () => {
		await fs.writeFile(path.join(tmpDir, "file.txt"), "x");
		const source = await Directory.open(tmpDir);

		await expect(
			packVolumes({
				source,
				root: path.join(tmpDir, "file.txt"),
				baseDir: "file.txt",
				outputBase: path.join(outDir, "file"),
				paths: [],
				users,
				logger: captureLogger().logger,
			}),
		).rejects.toMatchObject({ code: "NOT_A_DIRECTORY" });
	});

	it.skipIf(isRoot)("skips files it cannot read", async () => {
		const root = await buildTree(path.join(tmpDir, "src"), {
			"a.txt": "hello",
			"secret.txt": "secret",
		});
		await fs.chmod(path.join(root, "secret.txt"), 0o000);

		try {
			const { volumes, skipped, lines } = await pack(root);

			expect(skipped).toEqual([path.join(root, "secret.txt")]);
			expect(await names(volumes[0].file)).toEqual(["src/", "src/a.txt"]);
			expect(lines.some((line) => line.level === "warn" && line.message.endsWith(", skipped"))).toBe(
				true,
			);
		} finally {
			await fs.chmod(path.join(root, "secret.txt"), 0o644);
		}
	});

	describe("extraction", () => {
		it("restores files, links and attributes across volumes", async () => {
			const root = await buildTree(path.join(tmpDir, "src"), {
				"sub/c.txt": "c",
				"sub/link": { symlink: "c.txt" },
			});
			await writeRandom(path.join(root, "a.bin"), 2000);
			await writeRandom(path.join(root, "sub", "b.bin"), 2000);
			await fs.chmod(path.join(root, "a.bin"), 0o640);
			await fs.chmod(path.join(root, "sub"), 0o750);
			const stamp = new Date("2024-01-02T03:04:05Z");
			await fs.utimes(path.join(root, "sub", "c.txt"), stamp, stamp);

			const { volumes } = await pack(root, 3072);
			expect(volumes.length).toBeGreaterThan(1);

			const dest = path.join(tmpDir, "dest");
			await fs.mkdir(dest);
			const symlinks: PendingSymlink[] = [];
			const logger = captureLogger().logger;
			let count = 0;
			for (const volume of volumes) {
				count += await extractVolume(volume.file, dest, { symlinks, logger });
			}
			await createSymlinks(symlinks);
			await applyAttributes(
				volumes.map((v) => v.file),
				dest,
			);

			expect(count).toBe(6);
			expect(await listTree(dest)).toEqual([
				"src/",
				"src/a.bin",
				"src/sub/",
				"src/sub/b.bin",
				"src/sub/c.txt",
				"src/sub/link",
			]);
			expect(await fs.readFile(path.join(dest, "src/sub/b.bin"))).toEqual(
				await fs.readFile(path.join(root, "sub", "b.bin")),
			);
			expect(await fs.readlink(path.join(dest, "src/sub/link"))).toBe("c.txt");
			expect((await fs.stat(path.join(dest, "src/a.bin"))).mode & 0o777).toBe(0o640);
			expect((await fs.stat(path.join(dest, "src/sub"))).mode & 0o777).toBe(0o750);
			expect((await fs.stat(path.join(dest, "src/sub/c.txt"))).mtime.getTime()).toBe(
				stamp.getTime(),
			);
		});

		it("adds owner read and write to restored modes", async () => {
			const root = await buildTree(path.join(tmpDir, "src"), { "ro.txt": "read only" });
			await fs.chmod(path.join(root, "ro.txt"), 0o444);

			const { volumes } = await pack(root);
			const dest = path.join(tmpDir, "dest");
			await fs.mkdir(dest);
			await extractVolume(volumes[0].file, dest, {
				symlinks: [],
				logger: captureLogger().logger,
			});

			await applyAttributes([volumes[0].file], dest);
			expect((await fs.stat(path.join(dest, "src/ro.txt"))).mode & 0o777).toBe(0o644);

			await applyAttributes([volumes[0].file], dest, { setReadWrite: false });
			expect((await fs.stat(path.join(dest, "src/ro.txt"))).mode & 0o777).toBe(0o444);
		});

		it("strips the trailing slash from directory member names", () => {
			expect(memberName({ name: "src/sub/", type: "directory", size: 0 })).toBe("src/sub");
			expect(memberName({ name: "src/a.txt", size: 1 })).toBe("src/a.txt");
		});
	});
});
