// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of every error code the library can produce, with a default message
// and whether the condition may clear up on its own.

export type RawErrorCode = {
	message: string;
	/**
	 * Whether this error is transient (retrying may succeed).
	 *
	 * - `true`: the remote side or the network may recover — the caller may retry.
	 * - `false` (default): retrying with the same input will always fail.
	 */
	transient?: boolean;
};

export const CONFIG_ERROR_CODES = {
	MISSING_ENV: { message: "Required environment variable is not set", transient: false },
	SECRET_FETCH_FAILED: { message: "Failed to fetch secret", transient: true },
} as const satisfies Record<string, RawErrorCode>;

export const SEND_ERROR_CODES = {
	TRANSPORT: { message: "Request failed before a response was received", transient: true },
	REJECTED: { message: "Event rejected by the ingestion endpoint", transient: false },
	ENCODING: { message: "Event could not be serialized", transient: false },
} as const satisfies Record<string, RawErrorCode>;

export const ERROR_CODES = Object.freeze({
	INVALID_ARGUMENT: { message: "Invalid argument", transient: false },
	...CONFIG_ERROR_CODES,
	...SEND_ERROR_CODES,
} as const satisfies Record<string, RawErrorCode>);

export type ConfigErrorCode = keyof typeof CONFIG_ERROR_CODES;
export type SendErrorCode = keyof typeof SEND_ERROR_CODES;
export type TraceletErrorCode = keyof typeof ERROR_CODES;
