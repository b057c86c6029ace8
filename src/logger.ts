/**
 * Console logging with a scope prefix and a level threshold.
 *
 * Everything goes to stderr: stdout is reserved for the MCP stdio stream.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
	threshold = level;
}

export function createLogger(scope: string): Logger {
	const write = (level: Exclude<LogLevel, "silent">, message: string): void => {
		if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
		console.error(`[${scope}] ${level === "info" ? "" : `${level}: `}${message}`);
	};

	return {
		debug: (message) => write("debug", message),
		info: (message) => write("info", message),
		warn: (message) => write("warn", message),
		error: (message) => write("error", message),
	};
}

/** A logger that drops everything; handy in tests. */
export const silentLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
	error() {},
};
