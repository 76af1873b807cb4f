import { createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { extractVolume } from "../../src/archive/extract";
import { resolveEntryPath } from "../../src/fs/path";
import { createGzipEncoder, createTarPacker, type TarHeader } from "../../src/tar";
import { captureLogger, makeTempDir } from "../fixtures";

describe("path traversal prevention", () => {
	let tmpDir: string;
	let destDir: string;

	beforeEach(async () => {
		tmpDir = await makeTempDir("path-traversal");
		destDir = path.join(tmpDir, "dest");
		await fs.mkdir(destDir);
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	const writeVolume = async (headers: TarHeader[]): Promise<string> => {
		const file = path.join(tmpDir, "volume.tar.gz");
		const { readable, controller } = createTarPacker();
		const done = pipeline(
			Readable.fromWeb(readable.pipeThrough(createGzipEncoder(1))),
			createWriteStream(file),
		);
		for (const header of headers) {
			const writer = controller.add(header).getWriter();
			if (header.size > 0) await writer.write(new Uint8Array(header.size));
			await writer.close();
		}
		controller.finalize();
		await done;
		return file;
	};

	const extract = (file: string) =>
		extractVolume(file, destDir, { symlinks: [], logger: captureLogger().logger });

	it("rejects a file climbing out of the destination", async () => {
		const file = await writeVolume([
			{ name: "safe-file.txt", size: 4 },
			{ name: "../evil.txt", size: 4 },
		]);

		await expect(extract(file)).rejects.toThrow(
			'Path traversal attempt detected for entry "../evil.txt".',
		);
		await expect(fs.access(path.join(tmpDir, "evil.txt"))).rejects.toThrow();
	});

	it("rejects absolute names", async () => {
		const file = await writeVolume([{ name: "/etc/evil/", type: "directory", size: 0 }]);

		await expect(extract(file)).rejects.toThrow(
			'Path traversal attempt detected for entry "/etc/evil/".',
		);
	});

	it("rejects hard links pointing outside the destination", async () => {
		const file = await writeVolume([
			{ name: "link.txt", type: "link", size: 0, linkname: "../../outside.txt" },
		]);

		await expect(extract(file)).rejects.toThrow(
			'Path traversal attempt detected for entry "../../outside.txt".',
		);
	});

	it("allows names that only look suspicious", () => {
		expect(resolveEntryPath(destDir, "run/..data/file.txt")).toBe(
			path.join(destDir, "run", "..data", "file.txt"),
		);
		expect(resolveEntryPath(destDir, "run/sub/")).toBe(path.join(destDir, "run", "sub"));
	});
});
