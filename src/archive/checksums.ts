import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { StructuralError, isNotFoundError } from "../errors";
import { type Logger, defaultLogger } from "../logger";
import { MD5_BLOCK_SIZE } from "./options";

/** One `md5sum` line. */
export interface ChecksumEntry {
	md5: string;
	path: string;
}

const SEPARATOR = "  ";

/**
 * MD5 hex digest of a file, read in 1 MiB blocks.
 *
 * MD5 is used for compatibility with `md5sum -c`, not for security.
 */
export async function md5sum(file: string): Promise<string> {
	const hash = createHash("md5");
	for await (const chunk of createReadStream(file, {
		highWaterMark: MD5_BLOCK_SIZE,
	})) {
		hash.update(chunk);
	}
	return hash.digest("hex");
}

export function formatChecksumLine(entry: ChecksumEntry): string {
	return `${entry.md5}${SEPARATOR}${entry.path}\n`;
}

/**
 * Split a line on its first double space; paths may contain spaces.
 *
 * @throws {StructuralError} `BAD_CHECKSUM_LINE` when there is no separator.
 */
export function parseChecksumLine(line: string, file?: string): ChecksumEntry {
	const index = line.indexOf(SEPARATOR);
	if (index <= 0) {
		throw new StructuralError(
			"BAD_CHECKSUM_LINE",
			`${file ? `${file}: ` : ""}bad checksum line: "${line}"`,
			{ path: file },
		);
	}
	return { md5: line.slice(0, index), path: line.slice(index + SEPARATOR.length) };
}

/** Write entries in the order given. */
export async function writeChecksums(
	file: string,
	entries: Iterable<ChecksumEntry>,
): Promise<void> {
	let text = "";
	for (const entry of entries) text += formatChecksumLine(entry);
	await fs.writeFile(file, text);
}

/**
 * Read every entry of a checksum file. Blank lines are ignored.
 *
 * @throws {StructuralError} `MISSING_METADATA` when the file does not exist,
 *   `BAD_CHECKSUM_LINE` on a malformed line.
 */
export async function readChecksums(file: string): Promise<ChecksumEntry[]> {
	let text: string;
	try {
		text = await fs.readFile(file, "utf8");
	} catch (err) {
		if (isNotFoundError(err)) {
			throw new StructuralError(
				"MISSING_METADATA",
				`${file}: checksum file not found`,
				{ path: file, cause: err },
			);
		}
		throw err;
	}

	return text
		.split("\n")
		.filter((line) => line !== "")
		.map((line) => parseChecksumLine(line, file));
}

export interface VerifyChecksumsOptions {
	logger?: Logger;
	/** Log each path as it is checked. */
	verbose?: boolean;
}

/**
 * Check every entry of a checksum file against files under `rootDir`.
 *
 * Stops at the first missing or mismatching file, logs it and returns
 * `false`.
 *
 * @throws {StructuralError} on a malformed line or a missing checksum file.
 */
export async function verifyChecksums(
	file: string,
	rootDir: string,
	options: VerifyChecksumsOptions = {},
): Promise<boolean> {
	const logger = options.logger ?? defaultLogger;

	for (const entry of await readChecksums(file)) {
		if (options.verbose) logger.info(`-- checking MD5 sum for ${entry.path}`);

		const target = path.join(rootDir, entry.path);
		let actual: string;
		try {
			actual = await md5sum(target);
		} catch (err) {
			if (!isNotFoundError(err)) throw err;
			logger.error(`${target}: missing, can't verify checksum`);
			return false;
		}

		if (actual !== entry.md5) {
			logger.error(`${target}: checksum verification failed`);
			return false;
		}
	}

	return true;
}
