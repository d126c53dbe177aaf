// =============================================================================
// CLIENT — capture events against the ingestion endpoint
// =============================================================================

import {
	type Event,
	Ok,
	type Result,
	type SendError,
	serializeEvent,
	TraceletError,
	type TraceletLogger,
} from "@tracelet/core";
import { noopLogger } from "@tracelet/core/logger";
import { CAPTURE_PATH } from "./constants.js";
import { createTransport, type Transport } from "./fetch.js";
import type { ApiOptions } from "./options.js";
import type { ClientOptions } from "./types.js";

/**
 * Sends events one HTTP request at a time. Holds no mutable state, so one
 * instance can serve any number of concurrent `capture` calls.
 *
 * @example
 * ```ts
 * const client = new Client(new ApiOptions("test-key"));
 * const result = await client.capture(new Event("signup", "user_42"));
 * if (!result.success) console.error(result.error.code);
 * ```
 */
export class Client {
	readonly options: ApiOptions;
	private readonly clientOptions: ClientOptions;
	private readonly transport: Transport;
	private readonly logger: TraceletLogger;
	private readonly captureUrl: string;

	constructor(options: ApiOptions, clientOptions: ClientOptions = {}) {
		const { timeout } = clientOptions;
		if (timeout !== undefined && !(Number.isFinite(timeout) && timeout > 0)) {
			throw TraceletError.invalidArgument(`Timeout must be a positive number, got ${timeout}`);
		}

		this.options = options;
		this.clientOptions = clientOptions;
		this.transport = createTransport(clientOptions);
		this.logger = clientOptions.logger ?? noopLogger;
		this.captureUrl = new URL(CAPTURE_PATH, options.endpoint).toString();
	}

	/**
	 * Serialize `event` and POST it once. No retry: the caller decides what
	 * to do with a failure.
	 */
	async capture(event: Event): Promise<Result<void, SendError>> {
		const body = serializeEvent(event, this.options.apiKey);
		if (!body.success) {
			this.logger.warn("Event could not be serialized", { event: event.name });
			return body;
		}

		this.logger.debug("Capturing event", {
			event: event.name,
			distinctId: event.distinctId,
			url: this.captureUrl,
		});

		const result = await this.transport.post(this.captureUrl, body.data);
		if (result.success) {
			this.logger.debug("Event captured", { event: event.name });
		} else {
			this.logger.warn("Event capture failed", {
				event: event.name,
				code: result.error.code,
				status: result.error.status,
				message: result.error.message,
			});
		}
		return result;
	}

	/**
	 * Capture events one after another, stopping at the first failure. Each
	 * event is still its own request.
	 */
	async captureMany(events: Iterable<Event>): Promise<Result<void, SendError>> {
		for (const event of events) {
			const result = await this.capture(event);
			if (!result.success) return result;
		}
		return Ok(undefined);
	}

	/** A client with the same configuration and a different request timeout. */
	withTimeout(timeout: number): Client {
		return new Client(this.options, { ...this.clientOptions, timeout });
	}
}
