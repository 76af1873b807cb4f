import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const FIXTURES_DIR = path.resolve(__dirname, "..", "data");
export const SMALL_FILES_DIR = path.join(FIXTURES_DIR, "small-files");
export const LARGE_FILES_DIR = path.join(FIXTURES_DIR, "large-files");
export const RUN_DIR = path.join(FIXTURES_DIR, "run");

const SMALL_FILE_COUNT = 2500;
const SMALL_FILE_SIZE = 1024; // 1 KB
const LARGE_FILE_COUNT = 5;
const LARGE_FILE_SIZE = 20 * 1024 * 1024; // 20 MB

const PROJECTS = ["proj_a", "proj_b", "proj_c"];
const SAMPLES_PER_PROJECT = 40;
const READ_FILE_SIZE = 64 * 1024;

export async function generateFixtures() {
	console.log("Generating fixtures...");
	await fs.rm(FIXTURES_DIR, { recursive: true, force: true });

	// Many small files (flat structure)
	await fs.mkdir(SMALL_FILES_DIR, { recursive: true });
	const smallFileContent = Buffer.alloc(SMALL_FILE_SIZE, "a");
	const smallFilePromises: Promise<void>[] = [];
	for (let i = 0; i < SMALL_FILE_COUNT; i++) {
		smallFilePromises.push(
			fs.writeFile(path.join(SMALL_FILES_DIR, `file-${i}.txt`), smallFileContent),
		);
	}
	await Promise.all(smallFilePromises);

	// Few large files (flat structure)
	await fs.mkdir(LARGE_FILES_DIR, { recursive: true });
	const largeFileContent = Buffer.alloc(LARGE_FILE_SIZE, "b");
	const largeFilePromises: Promise<void>[] = [];
	for (let i = 0; i < LARGE_FILE_COUNT; i++) {
		largeFilePromises.push(
			fs.writeFile(path.join(LARGE_FILES_DIR, `large-file-${i}.bin`), largeFileContent),
		);
	}
	await Promise.all(largeFilePromises);

	// A sequencing-style run: projects of per-sample reads, logs and links
	await fs.mkdir(RUN_DIR, { recursive: true });
	const readContent = Buffer.alloc(READ_FILE_SIZE, "c");
	const runPromises: Promise<void>[] = [];
	let info = "#Project\tSamples\n";
	for (const project of PROJECTS) {
		const samples: string[] = [];
		for (let i = 0; i < SAMPLES_PER_PROJECT; i++) {
			const sample = `${project}_S${i}`;
			samples.push(sample);
			const sampleDir = path.join(RUN_DIR, project, sample);
			await fs.mkdir(sampleDir, { recursive: true });
			for (const read of ["R1", "R2"]) {
				runPromises.push(
					fs.writeFile(path.join(sampleDir, `${sample}_${read}.fastq`), readContent),
				);
			}
		}
		info += `${project}\t${samples.join(",")}\n`;
	}
	runPromises.push(fs.writeFile(path.join(RUN_DIR, "projects.info"), info));

	await fs.mkdir(path.join(RUN_DIR, "logs"), { recursive: true });
	runPromises.push(fs.writeFile(path.join(RUN_DIR, "logs", "bcl2fastq.log"), "done\n"));
	runPromises.push(fs.symlink("logs/bcl2fastq.log", path.join(RUN_DIR, "latest.log")));
	await Promise.all(runPromises);

	console.log("Fixtures generated successfully.");
}
