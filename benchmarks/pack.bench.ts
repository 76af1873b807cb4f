import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import * as tar from "tar";
import { Bench } from "tinybench";
import { makeArchive } from "../src/archive/make";
import { packVolumes } from "../src/archive/volumes";
import { Directory } from "../src/fs/directory";
import { silentLogger } from "../src/logger";
import { LARGE_FILES_DIR, RUN_DIR, SMALL_FILES_DIR } from "./fixtures/generate";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const TMP_DIR = path.resolve(__dirname, "tmp");
const OUTPUT_DIR = path.join(TMP_DIR, "output");

async function setup() {
	await fsp.rm(TMP_DIR, { recursive: true, force: true });
	await fsp.mkdir(OUTPUT_DIR, { recursive: true });
}

async function teardown() {
	await fsp.rm(TMP_DIR, { recursive: true, force: true });
}

async function createUniqueOutputDir(): Promise<string> {
	const dir = path.join(
		OUTPUT_DIR,
		`pack-${Date.now()}-${Math.random().toString(36).slice(2)}`,
	);
	await fsp.mkdir(dir);
	return dir;
}

async function pack(dir: string, outDir: string, volumeSize?: number) {
	const source = await Directory.open(dir);
	await packVolumes({
		source,
		baseDir: source.basename,
		outputBase: path.join(outDir, source.basename),
		paths: source.walk(),
		volumeSize,
		logger: silentLogger,
	});
}

export async function runPackingBenchmarks() {
	await setup();
	console.log("\nPacking benchmarks...");

	for (const testCase of [
		{ name: "Many Small Files (2500 x 1KB)", dir: SMALL_FILES_DIR },
		{ name: "Few Large Files (5 x 20MB)", dir: LARGE_FILES_DIR },
		{ name: "Multi-project Run (240 x 64KB)", dir: RUN_DIR },
	]) {
		const bench = new Bench({
			time: 15000,
			iterations: 30,
			warmupTime: 5000,
			warmupIterations: 10,
		});

		let outDir: string;
		const hooks = {
			async beforeEach() {
				outDir = await createUniqueOutputDir();
			},
			async afterEach() {
				await fsp.rm(outDir, { recursive: true, force: true });
			},
		};

		bench
			.add(`treearchiver: Pack ${testCase.name}`, () => pack(testCase.dir, outDir), hooks)
			.add(
				`treearchiver: Pack ${testCase.name} into 8MB volumes`,
				() => pack(testCase.dir, outDir, 8 * 1024 * 1024),
				hooks,
			)
			.add(
				`treearchiver: Archive ${testCase.name}`,
				async () => {
					await makeArchive(testCase.dir, { outDir, logger: silentLogger });
				},
				hooks,
			)
			.add(
				`node-tar: Pack ${testCase.name}`,
				async () => {
					await tar.c(
						{
							file: path.join(outDir, "out.tar.gz"),
							gzip: true,
							C: path.dirname(testCase.dir),
						},
						[path.basename(testCase.dir)],
					);
				},
				hooks,
			);

		await bench.run();
		console.log(`\n--- ${testCase.name} ---`);
		console.table(bench.table());
	}

	await teardown();
}
