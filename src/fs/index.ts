export { PathInfoCache } from "./cache";
export { Directory, type DirectoryOptions, realDirectory } from "./directory";
export { isInside, resolveEntryPath, validateBounds } from "./path";
export * from "./predicates";
export type {
	PathClass,
	PathInfo,
	SymlinkInfo,
	SymlinkState,
	WalkOptions,
} from "./types";
export { UserDatabase, systemUsers } from "./users";
