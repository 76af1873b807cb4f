import { Duplex } from "node:stream";
import { type ReadableWritablePair, TransformStream } from "node:stream/web";
import { setImmediate } from "node:timers/promises";
import { type Gzip, constants, createGunzip, createGzip } from "node:zlib";

/**
 * Gzip compression as a web stream pair, for `readable.pipeThrough()`.
 *
 * @param level - zlib compression level, 0 (store) to 9 (best).
 *
 * @example
 * ```typescript
 * const { readable, controller } = createTarPacker();
 * const gzipped = readable.pipeThrough(createGzipEncoder(6));
 * ```
 */
export function createGzipEncoder(
	level: number = constants.Z_DEFAULT_COMPRESSION,
): ReadableWritablePair<Uint8Array, Uint8Array> {
	return Duplex.toWeb(createGzip({ level }));
}

/**
 * Gzip decompression as a web stream pair. Concatenated gzip members are
 * decoded as one stream.
 */
export function createGzipDecoder(): ReadableWritablePair<
	Uint8Array,
	Uint8Array
> {
	return Duplex.toWeb(createGunzip());
}

interface SizeWaiter {
	bytes: number;
	resolve: () => void;
	reject: (err: unknown) => void;
}

/**
 * Gzip encoder that keeps count of the bytes going in and coming out.
 *
 * {@link compressedSizeAfter} flushes the deflate stream to a byte boundary
 * (`Z_SYNC_FLUSH`), so the count it returns is the exact size of the gzip
 * output so far. Each flush costs a few bytes of output.
 *
 * @example
 * ```typescript
 * const encoder = new CountingGzipEncoder(6);
 * const done = pipeline(
 *   Readable.fromWeb(readable.pipeThrough(encoder.stream)),
 *   createWriteStream("out.tar.gz"),
 * );
 * await controller.add({ name: "data/", type: "directory", size: 0 }).close();
 * console.log(await encoder.compressedSizeAfter(512));
 * ```
 */
export class CountingGzipEncoder {
	readonly stream: TransformStream<Uint8Array, Uint8Array>;
	/** Uncompressed bytes taken in by the compressor. */
	bytesIn = 0;
	/** Compressed bytes handed on. */
	bytesOut = 0;
	private readonly gzip: Gzip;
	private waiters: SizeWaiter[] = [];
	private failure: unknown;

	constructor(level: number = constants.Z_DEFAULT_COMPRESSION) {
		const gzip = createGzip({ level });
		this.gzip = gzip;
		gzip.on("error", (err) => this.abort(err));

		this.stream = new TransformStream<Uint8Array, Uint8Array>({
			start: (controller) => {
				gzip.on("data", (chunk: Buffer) => {
					this.bytesOut += chunk.length;
					try {
						controller.enqueue(chunk);
					} catch (err) {
						// Readable side cancelled.
						this.abort(err);
					}
				});
			},
			transform: async (chunk) => {
				await new Promise<void>((resolve, reject) => {
					gzip.write(chunk, (err) => (err ? reject(err) : resolve()));
				});
				this.bytesIn += chunk.length;
				this.waiters = this.waiters.filter((waiter) => {
					if (this.bytesIn < waiter.bytes) return true;
					waiter.resolve();
					return false;
				});
			},
			flush: () =>
				new Promise<void>((resolve, reject) => {
					gzip.once("end", resolve);
					gzip.once("error", reject);
					gzip.end();
				}),
		});
	}

	/**
	 * Wait until `bytes` uncompressed bytes have reached the compressor,
	 * flush them through and return the compressed size so far.
	 */
	async compressedSizeAfter(bytes: number): Promise<number> {
		this.check();
		if (this.bytesIn < bytes) {
			await new Promise<void>((resolve, reject) => {
				this.waiters.push({ bytes, resolve, reject });
			});
		}
		await new Promise<void>((resolve) => {
			this.gzip.flush(constants.Z_SYNC_FLUSH, resolve);
		});
		// Output pushed by the flush may still be queued for emission.
		do {
			await setImmediate();
		} while (this.gzip.readableLength > 0);
		this.check();
		return this.bytesOut;
	}

	/** Stop compressing; pending and later size queries reject with `err`. */
	abort(err: unknown): void {
		if (this.failure !== undefined) return;
		this.failure = err;
		for (const waiter of this.waiters) waiter.reject(err);
		this.waiters = [];
		this.gzip.destroy();
	}

	private check(): void {
		if (this.failure !== undefined) throw this.failure;
	}
}
