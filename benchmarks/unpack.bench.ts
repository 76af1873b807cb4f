import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import * as tar from "tar";
import { Bench } from "tinybench";
import { ArchiveDirectory } from "../src/archive/archive-directory";
import { extractVolume } from "../src/archive/extract";
import { makeArchive } from "../src/archive/make";
import { silentLogger } from "../src/logger";
import { LARGE_FILES_DIR, RUN_DIR, SMALL_FILES_DIR } from "./fixtures/generate";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const TMP_DIR = path.resolve(__dirname, "tmp");
const ARCHIVES_DIR = path.join(TMP_DIR, "archives");

const CASES = [
	{ name: "Many Small Files (2500 x 1KB)", dir: SMALL_FILES_DIR },
	{ name: "Few Large Files (5 x 20MB)", dir: LARGE_FILES_DIR },
	{ name: "Multi-project Run (240 x 64KB)", dir: RUN_DIR },
];

async function setup(): Promise<Map<string, ArchiveDirectory>> {
	await fsp.rm(TMP_DIR, { recursive: true, force: true });
	await fsp.mkdir(ARCHIVES_DIR, { recursive: true });

	const archives = new Map<string, ArchiveDirectory>();
	for (const testCase of CASES) {
		archives.set(
			testCase.name,
			await makeArchive(testCase.dir, { outDir: ARCHIVES_DIR, logger: silentLogger }),
		);
	}
	return archives;
}

async function createUniqueExtractDir(): Promise<string> {
	const extractDir = path.join(
		TMP_DIR,
		`extract-${Date.now()}-${Math.random().toString(36).slice(2)}`,
	);
	await fsp.mkdir(extractDir, { recursive: true });
	return extractDir;
}

export async function runUnpackingBenchmarks() {
	const archives = await setup();
	console.log("\nUnpacking benchmarks...");

	for (const testCase of CASES) {
		const archive = archives.get(testCase.name);
		if (!archive) throw new Error(`No archive for ${testCase.name}`);

		const bench = new Bench({
			time: 15000,
			iterations: 30,
			warmupTime: 5000,
			warmupIterations: 10,
		});

		let extractDir: string;
		const hooks = {
			async beforeEach() {
				extractDir = await createUniqueExtractDir();
			},
			async afterEach() {
				await fsp.rm(extractDir, { recursive: true, force: true });
			},
		};

		bench
			.add(
				`treearchiver: Extract ${testCase.name}`,
				async () => {
					for (const volume of archive.volumes) {
						await extractVolume(volume, extractDir, { symlinks: [], logger: silentLogger });
					}
				},
				hooks,
			)
			.add(
				`treearchiver: Unpack and verify ${testCase.name}`,
				async () => {
					await archive.unpack(extractDir);
				},
				hooks,
			)
			.add(
				`node-tar: Extract ${testCase.name}`,
				async () => {
					for (const volume of archive.volumes) {
						await tar.x({ f: volume, C: extractDir });
					}
				},
				hooks,
			)
			.add(`treearchiver: Verify ${testCase.name}`, async () => {
				await archive.verifyArchive();
			});

		await bench.run();
		console.log(`\n--- ${testCase.name} ---`);
		console.table(bench.table());
	}

	await fsp.rm(TMP_DIR, { recursive: true, force: true });
}
