import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Directory } from "../fs/directory";
import { isDirectory } from "../fs/predicates";
import type { PathInfo } from "../fs/types";
import type { UserDatabase } from "../fs/users";
import { VERSION } from "../version";
import type { ArchiveMetadataInput } from "./metadata";
import { METADATA_DIR } from "./options";

interface ListedEntry {
	/** Path relative to the tree root, `/`-separated. */
	relative: string;
	info: PathInfo;
}

async function collect(dir: Directory): Promise<ListedEntry[]> {
	const entries: ListedEntry[] = [];
	for await (const p of dir.walk()) {
		entries.push({ relative: dir.relative(p), info: await dir.info(p) });
	}
	return entries;
}

function annotate(name: string, info: PathInfo): string {
	if (info.symlink) return `${name} -> ${info.symlink.target}`;
	return isDirectory(info) ? `${name}/` : name;
}

/**
 * One line per entry, named from the parent of the tree so that every line
 * starts with the tree's own name.
 */
export async function formatFileList(dir: Directory): Promise<string> {
	let text = `${dir.basename}/\n`;
	for (const { relative, info } of await collect(dir)) {
		text += `${annotate(`${dir.basename}/${relative}`, info)}\n`;
	}
	return text;
}

/**
 * The tree drawn the way `tree` does. Children keep walk order; files come
 * before subdirectories at every level.
 */
export async function formatTree(dir: Directory): Promise<string> {
	const children = new Map<string, ListedEntry[]>();
	for (const entry of await collect(dir)) {
		const parent = path.posix.dirname(entry.relative);
		const siblings = children.get(parent);
		if (siblings) siblings.push(entry);
		else children.set(parent, [entry]);
	}

	const lines = [dir.basename];
	const render = (parent: string, indent: string) => {
		const entries = children.get(parent) ?? [];
		entries.forEach((entry, index) => {
			const last = index === entries.length - 1;
			const name = path.posix.basename(entry.relative);
			lines.push(`${indent}${last ? "└── " : "├── "}${annotate(name, entry.info)}`);
			if (isDirectory(entry.info)) {
				render(entry.relative, `${indent}${last ? "    " : "│   "}`);
			}
		});
	};
	render(".", "");

	return `${lines.join("\n")}\n`;
}

/**
 * `owner\tgroup\tpath` per entry, relative to the tree root. Ids without a
 * name are written as numbers.
 */
export async function formatOwnership(
	dir: Directory,
	users: UserDatabase,
): Promise<string> {
	let text = "";
	for (const { relative, info } of await collect(dir)) {
		if (!info.stats) continue;
		const owner = users.userName(info.stats.uid) ?? String(info.stats.uid);
		const group = users.groupName(info.stats.gid) ?? String(info.stats.gid);
		const name = isDirectory(info) ? `${relative}/` : relative;
		text += `${owner}\t${group}\t${name}\n`;
	}
	return text;
}

export async function writeListings(
	dir: Directory,
	files: { fileList: string; tree: string },
): Promise<void> {
	await fs.writeFile(files.fileList, await formatFileList(dir));
	await fs.writeFile(files.tree, await formatTree(dir));
}

function indentList(items: readonly string[]): string {
	return items.map((item) => `    ${item}`).join("\n");
}

/** Prose description of an archive or copy directory with recovery commands. */
export function formatReadme(metadata: ArchiveMetadataInput): string {
	const created = `It was created on ${metadata.creation_date ?? "(unknown date)"} by ${
		metadata.user || "(unknown user)"
	} with treearchiver ${metadata.archiver_version || VERSION}.`;

	if (metadata.compression_level === undefined) {
		const applied: string[] = [];
		if (metadata.replace_symlinks) {
			applied.push("symlinks were replaced by copies of their targets");
		}
		if (metadata.transform_broken_symlinks) {
			applied.push("broken symlinks were replaced by files holding the link text");
		}
		if (metadata.follow_dirlinks) {
			applied.push("symlinks to directories were copied as real directories");
		}

		return [
			"This directory is a copy of",
			"",
			`    ${metadata.source}`,
			"",
			created,
			"",
			applied.length > 0
				? `While copying, ${applied.join("; ")}.`
				: "Files, directories and symlinks were copied as they were.",
			"",
			"The copy was compared with the source before it was put in place.",
			"To check the file contents again, run from this directory:",
			"",
			`    md5sum -c ${METADATA_DIR}/checksums.md5`,
			"",
		].join("\n");
	}

	const subarchives = metadata.subarchives ?? [];
	const extra = metadata.files ?? [];
	const lines = [
		`This directory is a compressed archive of`,
		"",
		`    ${metadata.source}`,
		"",
		created,
		"",
		`It holds ${subarchives.length} gzip-compressed tar file${subarchives.length === 1 ? "" : "s"}:`,
		"",
		indentList(subarchives),
		"",
	];
	if (extra.length > 0) {
		lines.push("and these files copied as they are:", "", indentList(extra), "");
	}
	lines.push(
		"Check the archive files from this directory with:",
		"",
		`    md5sum -c ${METADATA_DIR}/archive_checksums.md5`,
		"",
		"Restore the tree by unpacking every tar file in order:",
		"",
		"    for f in *.tar.gz; do tar -xzf \"$f\"; done",
		"",
		"then check the restored files against each .md5 file next to the",
		"tar files, from the directory the tree was unpacked into:",
		"",
		"    md5sum -c /path/to/archive/<subarchive>.md5",
		"",
	);
	return lines.join("\n");
}
