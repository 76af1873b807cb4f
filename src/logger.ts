export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Logging handle passed into every operation.
 *
 * Operations never reach for a module-level logger, so callers decide where
 * progress and failure lines go and how verbose they are.
 */
export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

export interface ConsoleLoggerOptions {
	/** Lowest level that is printed. Defaults to `"info"`. */
	level?: LogLevel;
	/** Prepended to every line, e.g. the archive name. */
	prefix?: string;
	/** Prefix lines with an ISO timestamp. Defaults to `false`. */
	timestamps?: boolean;
}

/**
 * Create a level-filtered logger writing to the console.
 *
 * `debug` and `info` go to stdout, `warn` and `error` to stderr.
 */
export function createLogger(options: ConsoleLoggerOptions = {}): Logger {
	const minIndex = LEVELS.indexOf(options.level ?? "info");

	const format = (level: LogLevel, message: string) => {
		const parts: string[] = [];
		if (options.timestamps) parts.push(new Date().toISOString());
		if (level !== "info") parts.push(level.toUpperCase());
		if (options.prefix) parts.push(`[${options.prefix}]`);
		parts.push(message);
		return parts.join(" ");
	};

	const write = (level: LogLevel, message: string) => {
		if (LEVELS.indexOf(level) < minIndex) return;
		const line = format(level, message);
		switch (level) {
			case "error":
				console.error(line);
				break;
			case "warn":
				console.warn(line);
				break;
			default:
				console.log(line);
		}
	};

	return {
		debug: (message) => write("debug", message),
		info: (message) => write("info", message),
		warn: (message) => write("warn", message),
		error: (message) => write("error", message),
	};
}

/** Discards everything. */
export const silentLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};

export const defaultLogger: Logger = createLogger();
