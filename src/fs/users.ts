import * as fs from "node:fs/promises";
import { isNotFoundError } from "../errors";

/**
 * Uid/gid to name lookups from `/etc/passwd` and `/etc/group`.
 *
 * Ids without an entry are "unknown": the archive records them numerically
 * and pre-flight checks report them.
 */
export class UserDatabase {
	constructor(
		private readonly users: ReadonlyMap<number, string>,
		private readonly groups: ReadonlyMap<number, string>,
	) {}

	static async load(
		passwdFile = "/etc/passwd",
		groupFile = "/etc/group",
	): Promise<UserDatabase> {
		return new UserDatabase(
			parseIdFile(await readOptional(passwdFile)),
			parseIdFile(await readOptional(groupFile)),
		);
	}

	userName(uid: number): string | undefined {
		return this.users.get(uid);
	}

	groupName(gid: number): string | undefined {
		return this.groups.get(gid);
	}

	groupId(name: string): number | undefined {
		for (const [gid, groupName] of this.groups) {
			if (groupName === name) return gid;
		}
		return undefined;
	}
}

let shared: Promise<UserDatabase> | undefined;

/** The system database, read once per process. */
export function systemUsers(): Promise<UserDatabase> {
	shared ??= UserDatabase.load();
	return shared;
}

/** Name of the user running the process, for the archive record. */
export function currentUserName(users: UserDatabase): string {
	const uid = process.getuid?.();
	return (
		(uid === undefined ? undefined : users.userName(uid)) ??
		process.env.USER ??
		String(uid ?? "unknown")
	);
}

// name:password:id:... as used by both passwd and group.
function parseIdFile(text: string): Map<number, string> {
	const ids = new Map<number, string>();
	for (const line of text.split("\n")) {
		if (!line || line.startsWith("#")) continue;
		const [name, , id] = line.split(":");
		const value = Number.parseInt(id ?? "", 10);
		if (name && !Number.isNaN(value) && !ids.has(value)) ids.set(value, name);
	}
	return ids;
}

async function readOptional(file: string): Promise<string> {
	try {
		return await fs.readFile(file, "utf8");
	} catch (err) {
		if (isNotFoundError(err)) return "";
		throw err;
	}
}
