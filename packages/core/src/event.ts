// =============================================================================
// EVENT — one analytics event and its property bag
// =============================================================================

import { TraceletError } from "./error/index.js";

export type PropertyPairs = Iterable<readonly [string, string]> | Readonly<Record<string, string>>;

function isIterable(value: PropertyPairs): value is Iterable<readonly [string, string]> {
	return Symbol.iterator in value;
}

/**
 * An analytics event: a name, the distinct id of the user or session it
 * belongs to, string properties and an optional capture time.
 *
 * Properties have map semantics — inserting an existing key overwrites it.
 *
 * @example
 * ```ts
 * const event = new Event("signup", "user_42")
 *   .insertProp("plan", "pro")
 *   .setTimestamp(new Date());
 * ```
 */
export class Event {
	readonly name: string;
	readonly distinctId: string;
	private readonly props = new Map<string, string>();
	private capturedAt: Date | undefined;

	constructor(name: string, distinctId: string) {
		if (!name) throw TraceletError.invalidArgument("Event name must not be empty");
		if (!distinctId) throw TraceletError.invalidArgument("Event distinctId must not be empty");
		this.name = name;
		this.distinctId = distinctId;
	}

	get properties(): ReadonlyMap<string, string> {
		return this.props;
	}

	/** Explicit capture time, or `undefined` to let the collector stamp it. */
	get timestamp(): Date | undefined {
		return this.capturedAt;
	}

	getProp(key: string): string | undefined {
		return this.props.get(key);
	}

	insertProp(key: string, value: string): this {
		this.props.set(key, value);
		return this;
	}

	/** Insert pairs in order; on a repeated key the later pair wins. */
	insertPropMany(pairs: PropertyPairs): this {
		const entries = isIterable(pairs) ? pairs : Object.entries(pairs);
		for (const [key, value] of entries) {
			this.props.set(key, value);
		}
		return this;
	}

	setTimestamp(timestamp: Date): this {
		this.capturedAt = timestamp;
		return this;
	}
}
