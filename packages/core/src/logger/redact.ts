// =============================================================================
// REDACTION — keeps credentials out of log output
// =============================================================================

const REDACTED = "[REDACTED]";
const CIRCULAR = "[Circular]";

const DEFAULT_REDACT_KEYS = ["api_key", "apikey", "authorization", "password", "secret", "token"];

function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) return false;
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

/**
 * Redact sensitive keys from a log data object, descending into nested plain
 * objects. Key matching is case-insensitive. An object that contains itself
 * is written as "[Circular]". The input is never mutated.
 */
export function redactData(
	data: Record<string, unknown> | undefined,
	keys: Set<string>,
): Record<string, unknown> | undefined {
	if (!data || keys.size === 0) return data;
	return redactObject(data, keys, new WeakSet());
}

function redactObject(
	data: Record<string, unknown>,
	keys: Set<string>,
	ancestors: WeakSet<object>,
): Record<string, unknown> {
	ancestors.add(data);
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(data)) {
		if (keys.has(key.toLowerCase())) {
			out[key] = REDACTED;
		} else if (isPlainObject(value)) {
			out[key] = ancestors.has(value) ? CIRCULAR : redactObject(value, keys, ancestors);
		} else {
			out[key] = value;
		}
	}
	// shared (non-cyclic) references are still expanded at each use
	ancestors.delete(data);
	return out;
}

/** Lower-cased redaction key set from user-provided keys, or the defaults. */
export function buildRedactKeys(userKeys?: string[]): Set<string> {
	return new Set((userKeys ?? DEFAULT_REDACT_KEYS).map((k) => k.toLowerCase()));
}
