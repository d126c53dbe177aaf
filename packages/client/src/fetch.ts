// =============================================================================
// FETCH TRANSPORT — one POST per call, failures mapped to SendError
// =============================================================================

import { Err, Ok, type Result, SendError } from "@tracelet/core";
import { DEFAULT_TIMEOUT_MS } from "./constants.js";
import type { ClientOptions, RequestInterceptor, ResponseInterceptor } from "./types.js";

export interface Transport {
	post(url: string, body: string): Promise<Result<void, SendError>>;
}

function toArray<T>(value: T | T[] | undefined): T[] {
	if (value === undefined) return [];
	return Array.isArray(value) ? value : [value];
}

function describeFailure(error: unknown): string {
	if (error instanceof Error) {
		return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
	}
	return String(error);
}

export function createTransport(options: ClientOptions): Transport {
	const fetchFn = options.fetch ?? globalThis.fetch;
	const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
	const baseHeaders: Record<string, string> = {
		"Content-Type": "application/json",
		...options.headers,
	};
	const requestInterceptors: RequestInterceptor[] = toArray(options.onRequest);
	const responseInterceptors: ResponseInterceptor[] = toArray(options.onResponse);

	return {
		async post(url, body) {
			let init: RequestInit = {
				method: "POST",
				headers: { ...baseHeaders },
				body,
				signal: AbortSignal.timeout(timeout),
			};

			let response: Response;
			try {
				for (const interceptor of requestInterceptors) {
					init = await interceptor(url, init);
				}

				response = await fetchFn(url, init);

				for (const interceptor of responseInterceptors) {
					response = await interceptor(response, { url, init });
				}
			} catch (error) {
				return Err(SendError.transport(`POST ${url} failed: ${describeFailure(error)}`, error));
			}

			if (!response.ok) {
				const text = await response.text().catch(() => "");
				return Err(SendError.rejected(response.status, text));
			}

			return Ok(undefined);
		},
	};
}
