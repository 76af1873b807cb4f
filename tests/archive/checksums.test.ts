import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	formatChecksumLine,
	md5sum,
	parseChecksumLine,
	readChecksums,
	verifyChecksums,
	writeChecksums,
} from "../../src/archive/checksums";
import { buildExample, captureLogger, makeTempDir } from "../fixtures";

const EX1_MD5 = "e93b3fa481be3932aa08bd68c3deee70";
const EMPTY_MD5 = "d41d8cd98f00b204e9800998ecf8427e";

describe("checksums", () => {
	let tmpDir: string;

	beforeEach(async () => {
		tmpDir = await makeTempDir("checksums");
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("computes MD5 digests", async () => {
		const example = await buildExample(tmpDir);

		expect(await md5sum(path.join(example, "ex1.txt"))).toBe(EX1_MD5);
		expect(await md5sum(path.join(example, "subdir", "ex2.txt"))).toBe(EMPTY_MD5);
	});

	it("formats and parses md5sum lines", () => {
		expect(formatChecksumLine({ md5: EX1_MD5, path: "example/ex1.txt" })).toBe(
			`${EX1_MD5}  example/ex1.txt\n`,
		);
		expect(parseChecksumLine(`${EX1_MD5}  dir with  spaces/a b.txt`)).toEqual({
			md5: EX1_MD5,
			path: "dir with  spaces/a b.txt",
		});
	});

	it("rejects lines without a separator", () => {
		expect(() => parseChecksumLine("no-separator", "list.md5")).toThrow(
			'list.md5: bad checksum line: "no-separator"',
		);
		expect(() => parseChecksumLine("  leading")).toThrowError(
			expect.objectContaining({ code: "BAD_CHECKSUM_LINE" }),
		);
	});

	it("reads back what it writes, ignoring blank lines", async () => {
		const file = path.join(tmpDir, "list.md5");
		await writeChecksums(file, [
			{ md5: EX1_MD5, path: "example/ex1.txt" },
			{ md5: EMPTY_MD5, path: "example/subdir/ex2.txt" },
		]);

		expect(await fs.readFile(file, "utf8")).toBe(
			`${EX1_MD5}  example/ex1.txt\n${EMPTY_MD5}  example/subdir/ex2.txt\n`,
		);

		await fs.appendFile(file, "\n\n");
		expect(await readChecksums(file)).toEqual([
			{ md5: EX1_MD5, path: "example/ex1.txt" },
			{ md5: EMPTY_MD5, path: "example/subdir/ex2.txt" },
		]);
	});

	it("reports a missing checksum file as missing metadata", async () => {
		await expect(readChecksums(path.join(tmpDir, "none.md5"))).rejects.toMatchObject({
			code: "MISSING_METADATA",
		});
	});

	describe("verifyChecksums", () => {
		let file: string;

		beforeEach(async () => {
			await buildExample(tmpDir);
			file = path.join(tmpDir, "example.md5");
			await writeChecksums(file, [
				{ md5: EX1_MD5, path: "example/ex1.txt" },
				{ md5: EMPTY_MD5, path: "example/subdir/ex2.txt" },
			]);
		});

		it("passes an intact tree and logs each path when verbose", async () => {
			const { logger, lines } = captureLogger();

			expect(await verifyChecksums(file, tmpDir, { logger, verbose: true })).toBe(true);
			expect(lines).toEqual([
				{ level: "info", message: "-- checking MD5 sum for example/ex1.txt" },
				{ level: "info", message: "-- checking MD5 sum for example/subdir/ex2.txt" },
			]);
		});

		it("fails on a changed file", async () => {
			const { logger, lines } = captureLogger();
			await fs.writeFile(path.join(tmpDir, "example", "subdir", "ex2.txt"), "changed");

			expect(await verifyChecksums(file, tmpDir, { logger })).toBe(false);
			expect(lines).toEqual([
				{
					level: "error",
					message: `${path.join(tmpDir, "example/subdir/ex2.txt")}: checksum verification failed`,
				},
			]);
		});

		it("fails on a missing file", async () => {
			const { logger, lines } = captureLogger();
			await fs.rm(path.join(tmpDir, "example", "ex1.txt"));

			expect(await verifyChecksums(file, tmpDir, { logger })).toBe(false);
			expect(lines).toEqual([
				{
					level: "error",
					message: `${path.join(tmpDir, "example/ex1.txt")}: missing, can't verify checksum`,
				},
			]);
		});
	});
});
