// =============================================================================
// CONSOLE LOGGER — human-readable lines on console.*
// =============================================================================

import pc from "picocolors";
import type { LogLevel, TraceletLogger } from "../types.js";
import { createLevelLogger } from "./emitter.js";

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Prefix shown before each message. Default: `"Tracelet"` */
	prefix?: string;
	/** Whether to include ISO timestamps. Default: `true` */
	timestamps?: boolean;
	/** Keys whose values are replaced with "[REDACTED]". Default: credential keys */
	redactKeys?: string[];
	/** Force colors on or off. Default: on for a TTY without `NO_COLOR` */
	colors?: boolean;
}

/**
 * Create a console-based logger.
 *
 * @example
 * ```ts
 * import { createConsoleLogger } from "@tracelet/core/logger";
 *
 * const client = new Client(options, { logger: createConsoleLogger({ level: "debug" }) });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): TraceletLogger {
	const { prefix = "Tracelet", timestamps = true } = options;
	const c = pc.createColors(
		options.colors ?? (process.stdout?.isTTY === true && !process.env.NO_COLOR),
	);
	const tint: Record<LogLevel, (s: string) => string> = {
		debug: c.magenta,
		info: c.blue,
		warn: c.yellow,
		error: c.red,
	};

	return createLevelLogger(options, (level, message, data) => {
		const head = tint[level](c.bold(level.toUpperCase().padEnd(5)));
		const line = [timestamps ? c.dim(new Date().toISOString()) : "", head, `[${prefix}]:`, message]
			.filter(Boolean)
			.join(" ");
		const write = level === "error" ? console.error : level === "warn" ? console.warn : console.log;

		if (data && Object.keys(data).length > 0) write(line, data);
		else write(line);
	});
}
