import {
	type ConfigErrorCode,
	ERROR_CODES,
	type SendErrorCode,
	type TraceletErrorCode,
} from "./codes.js";

export {
	CONFIG_ERROR_CODES,
	type ConfigErrorCode,
	ERROR_CODES,
	type RawErrorCode,
	SEND_ERROR_CODES,
	type SendErrorCode,
	type TraceletErrorCode,
} from "./codes.js";

export class TraceletError extends Error {
	readonly code: TraceletErrorCode;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether the condition may change on its own — a later attempt may succeed.
	 * Callers decide whether to retry; the library never does.
	 */
	readonly transient: boolean;

	constructor(
		code: TraceletErrorCode,
		message?: string,
		options?: { cause?: unknown; details?: Record<string, unknown> },
	) {
		const raw = ERROR_CODES[code];
		super(message ?? raw.message, { cause: options?.cause });
		this.code = code;
		this.transient = raw.transient;
		this.details = options?.details;
		this.name = "TraceletError";
	}

	static invalidArgument(message = "Invalid argument", cause?: unknown) {
		return new TraceletError("INVALID_ARGUMENT", message, { cause });
	}
}

// =============================================================================
// CONFIG ERROR — API key resolution failures
// =============================================================================

export class ConfigError extends TraceletError {
	declare readonly code: ConfigErrorCode;
	/** Environment variable that was missing, for `MISSING_ENV`. */
	readonly variable?: string;

	constructor(
		code: ConfigErrorCode,
		message?: string,
		options?: { cause?: unknown; variable?: string },
	) {
		super(code, message, {
			cause: options?.cause,
			details: options?.variable ? { variable: options.variable } : undefined,
		});
		this.variable = options?.variable;
		this.name = "ConfigError";
	}

	static missingEnv(variable: string) {
		return new ConfigError(
			"MISSING_ENV",
			`Environment variable ${variable} is not set`,
			{ variable },
		);
	}

	static secretFetchFailed(message = "Failed to fetch secret", cause?: unknown) {
		return new ConfigError("SECRET_FETCH_FAILED", message, { cause });
	}
}

// =============================================================================
// SEND ERROR — capture failures
// =============================================================================

export class SendError extends TraceletError {
	declare readonly code: SendErrorCode;
	/** HTTP status, for `REJECTED`. */
	readonly status?: number;
	/** Response body as text, for `REJECTED`. */
	readonly body?: string;

	constructor(
		code: SendErrorCode,
		message?: string,
		options?: { cause?: unknown; status?: number; body?: string },
	) {
		super(code, message, {
			cause: options?.cause,
			details: options?.status !== undefined ? { status: options.status } : undefined,
		});
		this.status = options?.status;
		this.body = options?.body;
		this.name = "SendError";
	}

	static transport(message = "Request failed before a response was received", cause?: unknown) {
		return new SendError("TRANSPORT", message, { cause });
	}

	static rejected(status: number, body: string) {
		return new SendError("REJECTED", `Event rejected with HTTP ${status}`, { status, body });
	}

	static encoding(message = "Event could not be serialized", cause?: unknown) {
		return new SendError("ENCODING", message, { cause });
	}
}
