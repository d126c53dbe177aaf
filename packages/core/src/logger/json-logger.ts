// =============================================================================
// JSON LOGGER — one JSON object per line, for log aggregation
// =============================================================================

import stringify from "safe-stable-stringify";
import type { LogLevel, TraceletLogger } from "../types.js";
import { createLevelLogger } from "./emitter.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name for structured output. Default: `"tracelet"` */
	service?: string;
	/** Keys whose values are replaced with "[REDACTED]". Default: credential keys */
	redactKeys?: string[];
	/** Line sink. Default: `console.log` / `console.warn` / `console.error` by level */
	write?: (line: string, level: LogLevel) => void;
}

function writeToConsole(line: string, level: LogLevel): void {
	if (level === "error") console.error(line);
	else if (level === "warn") console.warn(line);
	else console.log(line);
}

/**
 * Create a structured JSON logger.
 *
 * Entries carry `timestamp`, `level`, `service` and `message`, followed by the
 * (redacted) data fields. Circular data is tolerated.
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): TraceletLogger {
	const { service = "tracelet", write = writeToConsole } = options;

	return createLevelLogger(options, (level, message, data) => {
		const entry = { ...data, timestamp: new Date().toISOString(), level, service, message };
		write(stringify(entry), level);
	});
}
