// =============================================================================
// LEVEL EMITTER — level filtering and redaction shared by the built-in loggers
// =============================================================================

import type { LogLevel, TraceletLogger } from "../types.js";
import { buildRedactKeys, redactData } from "./redact.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export type LogSink = (level: LogLevel, message: string, data?: Record<string, unknown>) => void;

/**
 * Build a `TraceletLogger` that drops entries below `level`, redacts their
 * data and hands what remains to `sink`.
 */
export function createLevelLogger(
	options: { level?: LogLevel; redactKeys?: string[] },
	sink: LogSink,
): TraceletLogger {
	const minPriority = LEVEL_PRIORITY[options.level ?? "info"];
	const redactKeys = buildRedactKeys(options.redactKeys);

	const at =
		(level: LogLevel) =>
		(message: string, data?: Record<string, unknown>): void => {
			if (LEVEL_PRIORITY[level] < minPriority) return;
			sink(level, message, redactData(data, redactKeys));
		};

	return { debug: at("debug"), info: at("info"), warn: at("warn"), error: at("error") };
}
