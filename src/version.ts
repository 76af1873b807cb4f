/** Recorded as `archiver_version` in every metadata file written. */
export const VERSION = "0.1.0";
