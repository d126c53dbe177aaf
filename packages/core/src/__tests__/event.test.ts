import { describe, expect, it } from "vitest";
import { TraceletError } from "../error/index.js";
import { Event } from "../event.js";

describe("Event", () => {
	it("starts with no properties and no timestamp", () => {
		const event = new Event("signup", "user_42");
		expect(event.name).toBe("signup");
		expect(event.distinctId).toBe("user_42");
		expect(event.properties.size).toBe(0);
		expect(event.timestamp).toBeUndefined();
	});

	it("rejects an empty name", () => {
		expect(() => new Event("", "user_42")).toThrow(TraceletError);
		expect(() => new Event("", "user_42")).toThrow("Event name must not be empty");
	});

	it("rejects an empty distinct id", () => {
		expect(() => new Event("signup", "")).toThrow("Event distinctId must not be empty");
	});

	describe("insertProp", () => {
		it("keeps only the latest value for a key", () => {
			const event = new Event("signup", "user_42");
			event.insertProp("plan", "free");
			event.insertProp("plan", "pro");
			expect(event.getProp("plan")).toBe("pro");
			expect(event.properties.size).toBe(1);
		});

		it("returns the event for chaining", () => {
			const event = new Event("signup", "user_42");
			expect(event.insertProp("a", "1")).toBe(event);
		});
	});

	describe("insertPropMany", () => {
		it("lets later pairs win on collision", () => {
			const event = new Event("signup", "user_42").insertPropMany([
				["plan", "free"],
				["source", "ad"],
				["plan", "pro"],
			]);
			expect(Object.fromEntries(event.properties)).toEqual({ plan: "pro", source: "ad" });
		});

		it("accepts a plain record", () => {
			const event = new Event("signup", "user_42").insertPropMany({ plan: "pro", seats: "3" });
			expect(event.getProp("seats")).toBe("3");
		});

		it("accepts a Map", () => {
			const event = new Event("signup", "user_42").insertPropMany(new Map([["plan", "pro"]]));
			expect(event.getProp("plan")).toBe("pro");
		});

		it("is overwritten by a later insertProp", () => {
			const event = new Event("signup", "user_42")
				.insertPropMany([["plan", "free"]])
				.insertProp("plan", "pro");
			expect(event.getProp("plan")).toBe("pro");
		});

		it("overwrites an earlier insertProp", () => {
			const event = new Event("signup", "user_42")
				.insertProp("plan", "pro")
				.insertPropMany({ plan: "team" });
			expect(event.getProp("plan")).toBe("team");
		});
	});

	it("setTimestamp attaches the capture time", () => {
		const at = new Date("2024-05-01T10:00:00.000Z");
		const event = new Event("signup", "user_42").setTimestamp(at);
		expect(event.timestamp).toBe(at);
	});
});
