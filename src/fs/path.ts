import * as path from "node:path";

/** Whether `target` is `root` itself or lies beneath it. Both must be absolute. */
export function isInside(target: string, root: string): boolean {
	const relative = path.relative(root, target);
	return (
		relative === "" ||
		(relative !== ".." &&
			!relative.startsWith(`..${path.sep}`) &&
			!path.isAbsolute(relative))
	);
}

/** Throw `errorMessage` unless `targetPath` stays within `destDir`. */
export function validateBounds(
	targetPath: string,
	destDir: string,
	errorMessage: string,
): void {
	if (!isInside(path.resolve(targetPath), path.resolve(destDir))) {
		throw new Error(errorMessage);
	}
}

/**
 * Resolve a tar entry name below `destDir`, rejecting absolute names and
 * names that climb out with `..`.
 */
export function resolveEntryPath(destDir: string, entryName: string): string {
	if (path.isAbsolute(entryName)) {
		throw new Error(`Path traversal attempt detected for entry "${entryName}".`);
	}
	const outPath = path.join(destDir, entryName);
	validateBounds(
		outPath,
		destDir,
		`Path traversal attempt detected for entry "${entryName}".`,
	);
	return outPath.endsWith(path.sep) ? outPath.slice(0, -1) : outPath;
}

/** Archive member names always use forward slashes. */
export function toPosix(p: string): string {
	return path.sep === "/" ? p : p.split(path.sep).join("/");
}
