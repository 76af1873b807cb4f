import {
	BLOCK_SIZE,
	BLOCK_SIZE_MASK,
	USTAR,
	USTAR_MAX_SIZE,
	USTAR_MAX_UID_GID,
} from "./constants";
import { byteLength, decoder, encoder } from "./fields";
import { createTarHeader, findUstarSplit } from "./header";
import type { TarHeader } from "./types";

/** Header fields a PAX extended header may override. */
export type PaxOverrides = Omit<Partial<TarHeader>, "mtime"> & {
	// PAX mtime is fractional seconds.
	mtime?: number;
};

/**
 * Format one `"<length> <key>=<value>\n"` record. The length counts its own
 * digits and is measured in bytes.
 */
export function formatPaxRecord(key: string, value: string): string {
	const payload = ` ${key}=${value}\n`;
	const payloadLength = byteLength(payload);
	let length = payloadLength + String(payloadLength).length;
	if (String(length).length !== String(payloadLength).length) {
		length = payloadLength + String(length).length;
	}
	return `${length}${payload}`;
}

/** Records needed because a header value does not fit its USTAR field. */
export function collectPaxRecords(header: TarHeader): Record<string, string> {
	const records: Record<string, string> = {};

	if (
		byteLength(header.name) > USTAR.name.size &&
		findUstarSplit(header.name) === null
	) {
		records.path = header.name;
	}
	if (header.linkname && byteLength(header.linkname) > USTAR.linkname.size) {
		records.linkpath = header.linkname;
	}
	if (header.uname && byteLength(header.uname) > USTAR.uname.size) {
		records.uname = header.uname;
	}
	if (header.gname && byteLength(header.gname) > USTAR.gname.size) {
		records.gname = header.gname;
	}
	if (header.uid !== undefined && header.uid > USTAR_MAX_UID_GID) {
		records.uid = String(header.uid);
	}
	if (header.gid !== undefined && header.gid > USTAR_MAX_UID_GID) {
		records.gid = String(header.gid);
	}
	if (header.size > USTAR_MAX_SIZE) {
		records.size = String(header.size);
	}

	return Object.assign(records, header.pax);
}

/**
 * Build the PAX extended header and body that must precede `header`, or
 * `null` when every value fits the USTAR fields.
 */
export function generatePax(
	header: TarHeader,
): { paxHeader: Uint8Array; paxBody: Uint8Array } | null {
	const entries = Object.entries(collectPaxRecords(header));
	if (entries.length === 0) return null;

	const paxBody = encoder.encode(
		entries.map(([key, value]) => formatPaxRecord(key, value)).join(""),
	);

	const paxHeader = createTarHeader({
		name: truncateBytes(`PaxHeader/${header.name}`, USTAR.name.size),
		size: paxBody.length,
		type: "pax-header",
		mode: 0o644,
		mtime: header.mtime,
		uid: header.uid,
		gid: header.gid,
	});

	return { paxHeader, paxBody };
}

/** Bytes occupied by the PAX header and padded body for `header`, if any. */
export function paxSize(header: TarHeader): number {
	const entries = Object.entries(collectPaxRecords(header));
	if (entries.length === 0) return 0;
	const bodyLength = entries.reduce(
		(total, [key, value]) => total + byteLength(formatPaxRecord(key, value)),
		0,
	);
	return BLOCK_SIZE + bodyLength + (-bodyLength & BLOCK_SIZE_MASK);
}

/** Parse a PAX body into header overrides. Unknown keys land in `pax` only. */
export function parsePax(buffer: Uint8Array): PaxOverrides {
	const overrides: PaxOverrides = {};
	const pax: Record<string, string> = {};
	let offset = 0;

	while (offset < buffer.length) {
		const space = buffer.indexOf(32, offset);
		if (space === -1) break;

		const length = Number.parseInt(
			decoder.decode(buffer.subarray(offset, space)),
			10,
		);
		if (Number.isNaN(length) || length <= 0) break;

		const record = decoder.decode(
			buffer.subarray(space + 1, offset + length - 1),
		);
		const eq = record.indexOf("=");
		if (eq > 0) {
			const key = record.slice(0, eq);
			const value = record.slice(eq + 1);
			pax[key] = value;

			switch (key) {
				case "path":
					overrides.name = value;
					break;
				case "linkpath":
					overrides.linkname = value;
					break;
				case "size":
					overrides.size = Number.parseInt(value, 10);
					break;
				case "mtime":
					overrides.mtime = Number.parseFloat(value);
					break;
				case "uid":
					overrides.uid = Number.parseInt(value, 10);
					break;
				case "gid":
					overrides.gid = Number.parseInt(value, 10);
					break;
				case "uname":
					overrides.uname = value;
					break;
				case "gname":
					overrides.gname = value;
					break;
			}
		}

		offset += length;
	}

	if (Object.keys(pax).length > 0) overrides.pax = pax;
	return overrides;
}

// Cut at a character boundary so the result encodes to at most `size` bytes.
function truncateBytes(value: string, size: number): string {
	let result = value;
	while (byteLength(result) > size) result = result.slice(0, -1);
	return result;
}
