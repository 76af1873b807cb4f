import { StructuralError } from "./errors";

const UNITS = ["K", "M", "G", "T", "P"] as const;

/**
 * Convert a size given as a byte count or a string such as `"250M"` or
 * `"1G"` into bytes. Suffixes are binary multiples (K = 1024).
 *
 * @example
 * ```typescript
 * convertSizeToBytes("1K"); // 1024
 * convertSizeToBytes("250M"); // 262144000
 * convertSizeToBytes(4096); // 4096
 * ```
 */
export function convertSizeToBytes(size: number | string): number {
	if (typeof size === "number") {
		if (!Number.isInteger(size) || size < 0) {
			throw new StructuralError("BAD_SIZE", `Invalid size: ${size}`);
		}
		return size;
	}

	const trimmed = size.trim();
	if (/^\d+$/.test(trimmed)) return Number.parseInt(trimmed, 10);

	const match = /^(\d+(?:\.\d+)?)([KMGTP])$/i.exec(trimmed);
	if (!match) {
		throw new StructuralError("BAD_SIZE", `Invalid size: "${size}"`);
	}

	const power = UNITS.join("").indexOf(match[2].toUpperCase()) + 1;
	return Math.floor(Number.parseFloat(match[1]) * 1024 ** power);
}

/**
 * Format a byte count for humans, one decimal place in the smallest unit
 * that keeps the value under 1024 (`4096` becomes `"4.0K"`).
 */
export function formatSize(bytes: number): string {
	let value = bytes;
	for (const unit of UNITS) {
		value /= 1024;
		if (value < 1024) return `${value.toFixed(1)}${unit}`;
	}
	return `${value.toFixed(1)}P`;
}
