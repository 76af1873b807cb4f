import {
	ReadableStream,
	type ReadableStreamDefaultController,
	WritableStream,
} from "node:stream/web";
import { BLOCK_SIZE, BLOCK_SIZE_MASK } from "./constants";
import { createTarHeader, isBodyless } from "./header";
import { generatePax, paxSize } from "./pax";
import type { TarHeader } from "./types";

/** Chunks buffered on the readable side before writers are made to wait. */
const HIGH_WATER_MARK = 16;

/**
 * Controls a streaming tar packing process.
 */
export interface TarPackController {
	/**
	 * Add an entry. Exactly `header.size` bytes must then be written to the
	 * returned stream before it is closed; bodyless entries are closed
	 * straight away. Entries must be added one at a time.
	 *
	 * @example
	 * ```typescript
	 * const body = controller.add({ name: "data/run.txt", size: 5, type: "file" });
	 * const writer = body.getWriter();
	 * await writer.write(new TextEncoder().encode("hello"));
	 * await writer.close();
	 * ```
	 */
	add(header: TarHeader): WritableStream<Uint8Array>;

	/** Write the end-of-archive marker and close the readable side. */
	finalize(): void;

	/** Abort packing. */
	error(err: unknown): void;
}

/**
 * Create a streaming tar packer.
 *
 * Entry writers wait while the readable side is more than a few chunks
 * ahead of its consumer, so large files can be streamed without buffering
 * them whole.
 *
 * @example
 * ```typescript
 * const { readable, controller } = createTarPacker();
 * const done = pipeline(Readable.fromWeb(readable), createWriteStream("out.tar"));
 *
 * await controller.add({ name: "data/", type: "directory", size: 0 }).close();
 * controller.finalize();
 * await done;
 * ```
 */
export function createTarPacker(): {
	readable: ReadableStream<Uint8Array>;
	controller: TarPackController;
} {
	let streamController: ReadableStreamDefaultController<Uint8Array> | undefined;
	let resumeWriter: (() => void) | undefined;

	const readable = new ReadableStream<Uint8Array>(
		{
			start(controller) {
				streamController = controller;
			},
			pull() {
				resumeWriter?.();
				resumeWriter = undefined;
			},
			cancel() {
				// The next enqueue throws, failing the entry writer.
				resumeWriter?.();
				resumeWriter = undefined;
			},
		},
		{ highWaterMark: HIGH_WATER_MARK },
	);

	const output = (): ReadableStreamDefaultController<Uint8Array> => {
		if (!streamController) throw new Error("Tar packer is not started.");
		return streamController;
	};

	const waitForConsumer = async (): Promise<void> => {
		if ((output().desiredSize ?? 1) > 0) return;
		await new Promise<void>((resolve) => {
			resumeWriter = resolve;
		});
	};

	const packController: TarPackController = {
		add(header) {
			const size = isBodyless(header) ? 0 : header.size;
			const target = output();

			const pax = generatePax(header);
			if (pax) {
				target.enqueue(pax.paxHeader);
				target.enqueue(pax.paxBody);
				const padding = -pax.paxBody.length & BLOCK_SIZE_MASK;
				if (padding > 0) target.enqueue(new Uint8Array(padding));
			}

			target.enqueue(createTarHeader({ ...header, size }));

			let written = 0;

			return new WritableStream<Uint8Array>({
				async write(chunk) {
					written += chunk.length;
					if (written > size) {
						const err = new Error(
							`"${header.name}" exceeds given size of ${size} bytes.`,
						);
						target.error(err);
						throw err;
					}

					target.enqueue(chunk);
					await waitForConsumer();
				},

				close() {
					if (written !== size) {
						const err = new Error(
							`Size mismatch for "${header.name}": expected ${size} bytes, got ${written}.`,
						);
						target.error(err);
						throw err;
					}

					const padding = -size & BLOCK_SIZE_MASK;
					if (padding > 0) target.enqueue(new Uint8Array(padding));
				},

				abort(reason) {
					target.error(reason);
				},
			});
		},

		finalize() {
			// Two zero blocks end the archive.
			const target = output();
			target.enqueue(new Uint8Array(BLOCK_SIZE * 2));
			target.close();
		},

		error(err) {
			output().error(err);
		},
	};

	return { readable, controller: packController };
}

/**
 * Number of bytes `header` and its padded body occupy in the tar stream,
 * including any PAX extended header.
 */
export function tarEntrySize(header: TarHeader): number {
	const size = isBodyless(header) ? 0 : header.size;
	return paxSize(header) + BLOCK_SIZE + size + (-size & BLOCK_SIZE_MASK);
}

/** Size of the end-of-archive marker. */
export const TAR_TRAILER_SIZE = BLOCK_SIZE * 2;
