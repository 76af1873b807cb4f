/** gzip level used when none is given. */
export const DEFAULT_COMPRESSION_LEVEL = 6;

/** Volume size used when multi-volume output is asked for without a size. */
export const DEFAULT_VOLUME_SIZE = "250M";

/** Read size for checksumming. */
export const MD5_BLOCK_SIZE = 1024 * 1024;

/** Subarchive holding the loose top-level entries of a multi-project run. */
export const PROCESSING_SUBARCHIVE = "processing";

/** Marks a multi-project run directory. */
export const PROJECTS_INFO = "projects.info";

/** Metadata directory of the current archive layout. */
export const METADATA_DIR = "ARCHIVE_METADATA";

/** Suffix of the archive directory made from `<name>`. */
export const ARCHIVE_SUFFIX = ".archive";

/** Suffix of any directory still under construction. */
export const PART_SUFFIX = ".part";

export const ARCHIVE_FILELIST = "ARCHIVE_FILELIST.txt";
export const ARCHIVE_TREE = "ARCHIVE_TREE.txt";
export const ARCHIVE_README = "ARCHIVE_README.txt";
