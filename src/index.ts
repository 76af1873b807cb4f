export * from "./archive/index";
export * from "./errors";
export * from "./fs/index";
export {
	type ConsoleLoggerOptions,
	type LogLevel,
	type Logger,
	createLogger,
	silentLogger,
} from "./logger";
export { convertSizeToBytes, formatSize } from "./size";
export * from "./tar/index";
export { VERSION } from "./version";
