// =============================================================================
// CLIENT TYPES
// =============================================================================

import type { TraceletLogger } from "@tracelet/core";

export interface ClientOptions {
	/** Per-request timeout in milliseconds (default: 8000) */
	timeout?: number;

	/** Static headers to include in every request */
	headers?: Record<string, string>;

	/** Custom fetch implementation (default: globalThis.fetch) */
	fetch?: typeof globalThis.fetch;

	/** Request interceptors */
	onRequest?: RequestInterceptor | RequestInterceptor[];

	/** Response interceptors */
	onResponse?: ResponseInterceptor | ResponseInterceptor[];

	/** Receives request and failure diagnostics (default: silent) */
	logger?: TraceletLogger;
}

export type RequestInterceptor = (
	url: string,
	init: RequestInit,
) => RequestInit | Promise<RequestInit>;

export type ResponseInterceptor = (
	response: Response,
	request: { url: string; init: RequestInit },
) => Response | Promise<Response>;
