import { USTAR } from "./constants";
import { encoder, readOctal } from "./fields";

const SPACE = 32;

// Unsigned byte sum with the checksum field itself counted as spaces.
function headerSum(block: Uint8Array): number {
	const { offset, size } = USTAR.checksum;
	let sum = SPACE * size;
	for (let i = 0; i < block.length; i++) {
		if (i >= offset && i < offset + size) continue;
		sum += block[i];
	}
	return sum;
}

/** Check the stored header checksum against the block contents. */
export function validateChecksum(block: Uint8Array): boolean {
	return readOctal(block, USTAR.checksum) === headerSum(block);
}

/** Compute and store the header checksum as six octal digits, NUL, space. */
export function writeChecksum(block: Uint8Array): void {
	const { offset } = USTAR.checksum;
	const digits = headerSum(block).toString(8).padStart(6, "0");
	block.set(encoder.encode(`${digits}\0 `), offset);
}
