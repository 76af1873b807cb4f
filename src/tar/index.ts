export { validateChecksum } from "./checksum";
export {
	CountingGzipEncoder,
	createGzipDecoder,
	createGzipEncoder,
} from "./compression";
export {
	BLOCK_SIZE,
	DEFAULT_DIR_MODE,
	DEFAULT_FILE_MODE,
	type TarEntryType,
	USTAR,
} from "./constants";
export { drainStream, streamToBuffer } from "./fields";
export { createTarHeader, findUstarSplit, parseTarHeader } from "./header";
export {
	createTarPacker,
	TAR_TRAILER_SIZE,
	type TarPackController,
	tarEntrySize,
} from "./pack";
export { generatePax, parsePax } from "./pax";
export type { DecoderOptions, ParsedTarEntry, TarHeader } from "./types";
export { createTarDecoder } from "./unpack";
