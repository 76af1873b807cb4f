export {
	ArchiveDirectory,
	type ArchiveDirectoryOptions,
	type ArchiveMember,
	type ExtractFilesOptions,
	type SearchOptions,
	type UnpackOptions,
	readSymlinkManifest,
} from "./archive-directory";
export {
	type ChecksumEntry,
	type VerifyChecksumsOptions,
	formatChecksumLine,
	md5sum,
	parseChecksumLine,
	readChecksums,
	verifyChecksums,
	writeChecksums,
} from "./checksums";
export { type DirectoryKind, classify, getDirectory } from "./classify";
export { type VerifyCopyOptions, verifyCopy } from "./compare";
export {
	COPY_BOOKKEEPING,
	CopyArchiveDirectory,
	type CopyArchiveDirectoryOptions,
	type CopyOptions,
	copy,
} from "./copy";
export {
	type ApplyAttributesOptions,
	type PendingSymlink,
	applyAttributes,
	createSymlinks,
	extractVolume,
	openVolume,
	readVolumeHeaders,
} from "./extract";
export { formatFileList, formatOwnership, formatReadme, formatTree } from "./listings";
export { type MakeArchiveOptions, makeArchive } from "./make";
export {
	ARCHIVE_FORMATS,
	type ArchiveFormat,
	type ArchiveKind,
	type ArchiveMetadata,
	type DetectedArchive,
	archiveMetadataSchema,
	detectArchive,
	loadArchive,
	parseMetadata,
} from "./metadata";
export * from "./options";
export {
	type DestinationProbes,
	checkDestination,
	isCaseSensitive,
	supportsSymlinks,
} from "./preflight";
export { createStaging, publish, stagingPath } from "./publish";
export {
	type PackResult,
	type PackVolumesOptions,
	type PackedVolume,
	packVolumes,
	volumeFileName,
} from "./volumes";
