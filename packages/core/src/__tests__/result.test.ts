import { describe, expect, it } from "vitest";
import { Err, Ok, unwrap } from "../result.js";

describe("Result", () => {
	it("Ok wraps data", () => {
		expect(Ok(3)).toEqual({ success: true, data: 3 });
	});

	it("Err wraps an error", () => {
		const error = new Error("nope");
		expect(Err(error)).toEqual({ success: false, error });
	});

	it("unwrap returns data of a success", () => {
		expect(unwrap(Ok("key"))).toBe("key");
	});

	it("unwrap throws the error of a failure", () => {
		const error = new Error("nope");
		expect(() => unwrap(Err(error))).toThrow(error);
	});
});
