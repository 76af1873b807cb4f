import type { ReadableStream } from "node:stream/web";
import type { HeaderField } from "./constants";

export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

/** UTF-8 byte length, which is what USTAR field limits count. */
export function byteLength(value: string): number {
	return encoder.encode(value).length;
}

/** Write a string into a zero-filled field, truncating at the field width. */
export function writeString(
	block: Uint8Array,
	field: HeaderField,
	value: string | undefined,
): void {
	if (!value) return;
	encoder.encodeInto(
		value,
		block.subarray(field.offset, field.offset + field.size),
	);
}

/** Write a zero-padded octal number, leaving the last byte as NUL. */
export function writeOctal(
	block: Uint8Array,
	field: HeaderField,
	value: number,
): void {
	const digits = value.toString(8).padStart(field.size - 1, "0");
	encoder.encodeInto(
		digits,
		block.subarray(field.offset, field.offset + field.size - 1),
	);
}

/** Read a NUL-terminated string, or the whole field if there is no NUL. */
export function readString(block: Uint8Array, field: HeaderField): string {
	const end = field.offset + field.size;
	const nul = block.indexOf(0, field.offset);
	return decoder.decode(
		block.subarray(field.offset, nul === -1 || nul > end ? end : nul),
	);
}

/** Read an octal field, skipping space padding. */
export function readOctal(block: Uint8Array, field: HeaderField): number {
	let value = 0;
	for (let i = field.offset; i < field.offset + field.size; i++) {
		const byte = block[i];
		if (byte === 0) break;
		if (byte === 32) continue;
		value = value * 8 + (byte - 48);
	}
	return value;
}

/**
 * Read a numeric field that is either octal or GNU base-256 (high bit set on
 * the first byte). Only non-negative values are supported.
 */
export function readNumeric(block: Uint8Array, field: HeaderField): number {
	if ((block[field.offset] & 0x80) === 0) return readOctal(block, field);

	let value = block[field.offset] & 0x7f;
	for (let i = 1; i < field.size; i++) {
		value = value * 256 + block[field.offset + i];
	}
	return value;
}

/** Collect a whole stream into one buffer. Meant for small bodies. */
export async function streamToBuffer(
	stream: ReadableStream<Uint8Array>,
): Promise<Uint8Array> {
	const chunks: Uint8Array[] = [];
	let length = 0;

	for await (const chunk of stream) {
		chunks.push(chunk);
		length += chunk.length;
	}

	const result = new Uint8Array(length);
	let offset = 0;
	for (const chunk of chunks) {
		result.set(chunk, offset);
		offset += chunk.length;
	}
	return result;
}

/** Read a body to its end without keeping it. */
export async function drainStream(
	stream: ReadableStream<Uint8Array>,
): Promise<void> {
	for await (const _chunk of stream) {
		// discard
	}
}
