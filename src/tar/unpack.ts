import {
	ReadableStream,
	type ReadableStreamDefaultController,
	TransformStream,
} from "node:stream/web";
import { BLOCK_SIZE, BLOCK_SIZE_MASK, USTAR_MAGIC } from "./constants";
import { readString } from "./fields";
import { parseTarHeader } from "./header";
import { type PaxOverrides, parsePax } from "./pax";
import type { DecoderOptions, ParsedTarEntry, TarHeader } from "./types";

interface OpenEntry {
	header: TarHeader;
	bytesLeft: number;
	// Absent when the data is skipped rather than delivered.
	controller?: ReadableStreamDefaultController<Uint8Array>;
}

/**
 * Create a transform stream that parses tar bytes into entries.
 *
 * Each entry's `body` must be consumed (or drained) before its data is
 * released; bodies of later entries are not delivered out of order.
 *
 * @example
 * ```typescript
 * const entries = Readable.toWeb(createReadStream("volume.tar"))
 *   .pipeThrough(createTarDecoder({ strict: true }));
 *
 * for await (const { header, body } of entries) {
 *   console.log(header.name);
 *   await drainStream(body);
 * }
 * ```
 */
export function createTarDecoder(
	options: DecoderOptions = {},
): TransformStream<Uint8Array, ParsedTarEntry> {
	const strict = options.strict ?? false;

	// Pending input. Only the first chunk is partially consumed.
	const chunks: Uint8Array[] = [];
	let totalLength = 0;
	let offset = 0;

	let currentEntry: OpenEntry | null = null;
	let paxGlobals: PaxOverrides = {};
	let nextEntryOverrides: PaxOverrides = {};
	let ended = false;

	function consume(size: number): Uint8Array | null {
		if (totalLength < size) return null;
		totalLength -= size;

		const first = chunks[0];
		if (first && first.length - offset >= size) {
			const data = first.slice(offset, offset + size);
			offset += size;
			if (offset === first.length) {
				chunks.shift();
				offset = 0;
			}
			return data;
		}

		const data = new Uint8Array(size);
		let copied = 0;
		while (copied < size) {
			const chunk = chunks[0];
			const count = Math.min(size - copied, chunk.length - offset);
			data.set(chunk.subarray(offset, offset + count), copied);
			copied += count;
			offset += count;
			if (offset === chunk.length) {
				chunks.shift();
				offset = 0;
			}
		}
		return data;
	}

	// Hand body bytes straight to the entry stream without an extra copy.
	function forward(
		size: number,
		target: ReadableStreamDefaultController<Uint8Array>,
	): number {
		const count = Math.min(size, totalLength);
		let forwarded = 0;

		while (forwarded < count) {
			const chunk = chunks[0];
			const take = Math.min(count - forwarded, chunk.length - offset);
			target.enqueue(chunk.subarray(offset, offset + take));
			forwarded += take;
			offset += take;
			if (offset === chunk.length) {
				chunks.shift();
				offset = 0;
			}
		}

		totalLength -= forwarded;
		return forwarded;
	}

	function unshift(data: Uint8Array): void {
		if (offset > 0) {
			chunks[0] = chunks[0].subarray(offset);
			offset = 0;
		}
		chunks.unshift(data);
		totalLength += data.length;
	}

	const closeBody = (controller: ReadableStreamDefaultController<Uint8Array>) => {
		try {
			controller.close();
		} catch {
			// Already closed by a cancelled reader.
		}
	};

	return new TransformStream<Uint8Array, ParsedTarEntry>(
		{
			transform(chunk, controller) {
				chunks.push(chunk);
				totalLength += chunk.length;

				while (true) {
					if (currentEntry) {
						if (currentEntry.controller) {
							currentEntry.bytesLeft -= forward(
								currentEntry.bytesLeft,
								currentEntry.controller,
							);
						} else {
							const skipped = Math.min(currentEntry.bytesLeft, totalLength);
							consume(skipped);
							currentEntry.bytesLeft -= skipped;
						}
						if (currentEntry.bytesLeft > 0) break;

						const padding = -currentEntry.header.size & BLOCK_SIZE_MASK;
						if (consume(padding) === null) break;

						if (currentEntry.controller) closeBody(currentEntry.controller);
						currentEntry = null;
					}

					const block = consume(BLOCK_SIZE);
					if (block === null) break;

					if (block.every((b) => b === 0)) {
						const next = consume(BLOCK_SIZE);
						if (next === null) {
							unshift(block);
							break;
						}
						if (next.every((b) => b === 0)) {
							ended = true;
							controller.terminate();
							return;
						}
						// A lone zero block is skipped, as GNU tar does.
						unshift(next);
						continue;
					}

					const raw = parseTarHeader(block, strict);

					if (
						raw.type === "pax-header" ||
						raw.type === "pax-global-header" ||
						raw.type === "gnu-long-name" ||
						raw.type === "gnu-long-link-name"
					) {
						const padded = raw.size + (-raw.size & BLOCK_SIZE_MASK);
						if (totalLength < padded) {
							unshift(block);
							break;
						}
						const data = consume(raw.size);
						consume(padded - raw.size);
						if (data === null) break;

						const overrides = parseMeta(raw.type, data);
						if (raw.type === "pax-global-header") {
							paxGlobals = { ...paxGlobals, ...overrides };
						} else {
							nextEntryOverrides = { ...nextEntryOverrides, ...overrides };
						}
						continue;
					}

					const header: TarHeader = {
						name: raw.name,
						size: raw.size,
						mode: raw.mode,
						mtime: raw.mtime,
						type: raw.type,
						uid: raw.uid,
						gid: raw.gid,
						uname: raw.uname,
						gname: raw.gname,
						linkname: raw.linkname,
					};
					if (
						raw.prefix &&
						raw.magic === USTAR_MAGIC &&
						nextEntryOverrides.name === undefined &&
						paxGlobals.name === undefined
					) {
						header.name = `${raw.prefix}/${raw.name}`;
					}
					applyOverrides(header, paxGlobals);
					applyOverrides(header, nextEntryOverrides);
					nextEntryOverrides = {};

					const { body, controller: bodyController } = openBody();
					controller.enqueue({ header, body });

					if (header.size > 0 && header.type === "file") {
						currentEntry = {
							header,
							bytesLeft: header.size,
							controller: bodyController,
						};
					} else {
						closeBody(bodyController);
						// Some writers give links a size; the data is not part of the entry.
						if (header.size > 0) {
							currentEntry = { header, bytesLeft: header.size };
						}
					}
				}
			},

			flush(controller) {
				if (currentEntry) {
					const error = new Error("Tar archive is truncated.");
					currentEntry.controller?.error(error);
					controller.error(error);
					return;
				}

				if (strict && !ended) {
					controller.error(new Error("Tar archive has no end-of-archive marker."));
				}
			},
		},
		undefined,
		// One queued entry keeps input flowing while its body is being read.
		{ highWaterMark: 1 },
	);
}

function openBody(): {
	body: ReadableStream<Uint8Array>;
	controller: ReadableStreamDefaultController<Uint8Array>;
} {
	const source: { controller?: ReadableStreamDefaultController<Uint8Array> } =
		{};
	const body = new ReadableStream<Uint8Array>({
		start(controller) {
			source.controller = controller;
		},
	});
	// start() runs synchronously inside the constructor.
	if (!source.controller) throw new Error("Entry body did not start.");
	return { body, controller: source.controller };
}

function parseMeta(type: string, data: Uint8Array): PaxOverrides {
	switch (type) {
		case "gnu-long-name":
			return { name: readString(data, { offset: 0, size: data.length }) };
		case "gnu-long-link-name":
			return { linkname: readString(data, { offset: 0, size: data.length }) };
		default:
			return parsePax(data);
	}
}

function applyOverrides(header: TarHeader, overrides: PaxOverrides): void {
	if (overrides.name !== undefined) header.name = overrides.name;
	if (overrides.linkname !== undefined) header.linkname = overrides.linkname;
	if (overrides.size !== undefined) header.size = overrides.size;
	if (overrides.mtime !== undefined) {
		header.mtime = new Date(overrides.mtime * 1000);
	}
	if (overrides.uid !== undefined) header.uid = overrides.uid;
	if (overrides.gid !== undefined) header.gid = overrides.gid;
	if (overrides.uname !== undefined) header.uname = overrides.uname;
	if (overrides.gname !== undefined) header.gname = overrides.gname;
	if (overrides.pax) header.pax = { ...header.pax, ...overrides.pax };
}
