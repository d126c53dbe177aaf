// =============================================================================
// WIRE FORMAT — capture request body
// =============================================================================

import stringify from "safe-stable-stringify";
import { SendError } from "./error/index.js";
import type { Event } from "./event.js";
import { Err, Ok, type Result } from "./result.js";

export interface WireEvent {
	api_key: string;
	event: string;
	properties: {
		distinct_id: string;
		properties: Record<string, string>;
	};
	/** ISO-8601, or null to let the collector assign ingestion time. */
	timestamp: string | null;
}

/**
 * Build the capture body for an event. Throws `RangeError` when the event
 * carries an invalid `Date`.
 */
export function toWireEvent(event: Event, apiKey: string): WireEvent {
	return {
		api_key: apiKey,
		event: event.name,
		properties: {
			distinct_id: event.distinctId,
			properties: Object.fromEntries(event.properties),
		},
		timestamp: event.timestamp ? event.timestamp.toISOString() : null,
	};
}

/**
 * Serialize an event to its JSON body. Keys are emitted in sorted order, so
 * the output depends only on the final property map, never on insertion order.
 */
export function serializeEvent(event: Event, apiKey: string): Result<string, SendError> {
	try {
		return Ok(stringify(toWireEvent(event, apiKey)));
	} catch (error) {
		return Err(SendError.encoding(`Failed to serialize event "${event.name}"`, error));
	}
}
