import type { TraceletLogger } from "../types.js";

export { type ConsoleLoggerOptions, createConsoleLogger } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export { buildRedactKeys, redactData } from "./redact.js";

/** Logger that discards everything. Used when the caller supplies none. */
export const noopLogger: TraceletLogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
