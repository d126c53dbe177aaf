import { Event, TraceletError, type WireEvent } from "@tracelet/core";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { Client } from "../client.js";
import { ApiOptions } from "../options.js";

const T = new Date("2024-05-01T10:00:00.000Z");

function signupEvent(): Event {
	return new Event("signup", "user_42").insertProp("plan", "pro").setTimestamp(T);
}

function respondWith(status: number, body = "") {
	return vi.fn().mockImplementation(async () => new Response(body, { status }));
}

function sentBody(fetchFn: ReturnType<typeof vi.fn>, call = 0): WireEvent {
	const init = fetchFn.mock.calls[call]?.[1];
	return JSON.parse(String(init?.body));
}

describe("Client", () => {
	const options = new ApiOptions("test-key", "http://collector.test/");

	describe("capture", () => {
		let fetchFn: ReturnType<typeof vi.fn>;

		beforeEach(() => {
			fetchFn = respondWith(200, '{"status":1}');
		});

		it("POSTs the serialized event to the capture route", async () => {
			const client = new Client(options, { fetch: fetchFn });

			const result = await client.capture(signupEvent());

			expect(result).toEqual({ success: true, data: undefined });
			expect(fetchFn).toHaveBeenCalledTimes(1);
			expect(fetchFn.mock.calls[0]?.[0]).toBe("http://collector.test/capture/");
			expect(fetchFn.mock.calls[0]?.[1]).toMatchObject({
				method: "POST",
				headers: { "Content-Type": "application/json" },
			});
			expect(sentBody(fetchFn)).toEqual({
				api_key: "test-key",
				event: "signup",
				properties: { distinct_id: "user_42", properties: { plan: "pro" } },
				timestamp: "2024-05-01T10:00:00.000Z",
			});
		});

		it("returns REJECTED with status and body on HTTP 400", async () => {
			const client = new Client(options, {
				fetch: respondWith(400, '{"type":"validation_error"}'),
			});

			const result = await client.capture(signupEvent());

			expect(result.success).toBe(false);
			if (result.success) return;
			expect(result.error.code).toBe("REJECTED");
			expect(result.error.status).toBe(400);
			expect(result.error.body).toBe('{"type":"validation_error"}');
		});

		it("returns TRANSPORT when the request fails", async () => {
			const cause = new TypeError("fetch failed");
			const client = new Client(options, { fetch: vi.fn().mockRejectedValue(cause) });

			const result = await client.capture(signupEvent());

			expect(result.success).toBe(false);
			if (result.success) return;
			expect(result.error.code).toBe("TRANSPORT");
			expect(result.error.message).toBe("POST http://collector.test/capture/ failed: fetch failed");
			expect(result.error.cause).toBe(cause);
		});

		it("returns ENCODING without sending when the event cannot be serialized", async () => {
			const client = new Client(options, { fetch: fetchFn });
			const event = new Event("signup", "user_42").setTimestamp(new Date(Number.NaN));

			const result = await client.capture(event);

			expect(result.success).toBe(false);
			if (result.success) return;
			expect(result.error.code).toBe("ENCODING");
			expect(fetchFn).not.toHaveBeenCalled();
		});

		it("merges custom headers", async () => {
			const client = new Client(options, { fetch: fetchFn, headers: { "X-Trace": "abc" } });

			await client.capture(signupEvent());

			expect(fetchFn.mock.calls[0]?.[1]?.headers).toEqual({
				"Content-Type": "application/json",
				"X-Trace": "abc",
			});
		});

		it("handles concurrent captures independently", async () => {
			const client = new Client(options, { fetch: fetchFn });

			const results = await Promise.all([
				client.capture(new Event("a", "user_1")),
				client.capture(new Event("b", "user_2")),
			]);

			expect(results.every((r) => r.success)).toBe(true);
			const names = [sentBody(fetchFn, 0), sentBody(fetchFn, 1)].map((body) => body.event);
			expect(names.sort()).toEqual(["a", "b"]);
		});
	});

	describe("logging", () => {
		it("logs through the caller's logger only", async () => {
			const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
			const client = new Client(options, { fetch: respondWith(503, "down"), logger });

			await client.capture(signupEvent());

			expect(logger.debug).toHaveBeenCalledWith("Capturing event", {
				event: "signup",
				distinctId: "user_42",
				url: "http://collector.test/capture/",
			});
			expect(logger.warn).toHaveBeenCalledWith("Event capture failed", {
				event: "signup",
				code: "REJECTED",
				status: 503,
				message: "Event rejected with HTTP 503",
			});
		});
	});

	describe("captureMany", () => {
		it("sends one request per event", async () => {
			const fetchFn = respondWith(200);
			const client = new Client(options, { fetch: fetchFn });

			const result = await client.captureMany([new Event("a", "u"), new Event("b", "u")]);

			expect(result.success).toBe(true);
			expect(fetchFn).toHaveBeenCalledTimes(2);
		});

		it("stops at the first failure", async () => {
			const fetchFn = vi
				.fn()
				.mockResolvedValueOnce(new Response("", { status: 200 }))
				.mockResolvedValueOnce(new Response("quota", { status: 429 }));
			const client = new Client(options, { fetch: fetchFn });

			const result = await client.captureMany([
				new Event("a", "u"),
				new Event("b", "u"),
				new Event("c", "u"),
			]);

			expect(fetchFn).toHaveBeenCalledTimes(2);
			expect(result.success).toBe(false);
			if (result.success) return;
			expect(result.error.status).toBe(429);
		});
	});

	describe("timeout", () => {
		it("rejects a non-positive timeout", () => {
			expect(() => new Client(options, { timeout: 0 })).toThrow(TraceletError);
		});

		it("withTimeout returns a new client with the same options", () => {
			const client = new Client(options);
			const faster = client.withTimeout(500);

			expect(faster).not.toBe(client);
			expect(faster.options).toBe(options);
		});

		it("maps a timed-out request to TRANSPORT", async () => {
			const fetchFn = vi.fn().mockImplementation(
				(_url: string, init: RequestInit) =>
					new Promise((_resolve, reject) => {
						init.signal?.addEventListener("abort", () => reject(init.signal?.reason));
					}),
			);
			const client = new Client(options, { fetch: fetchFn, timeout: 10 });

			const result = await client.capture(signupEvent());

			expect(result.success).toBe(false);
			if (result.success) return;
			expect(result.error.code).toBe("TRANSPORT");
		});
	});
});
