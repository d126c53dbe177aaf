// Errors
export {
	type ConfigErrorCode,
	ConfigError,
	ERROR_CODES,
	type RawErrorCode,
	SendError,
	type SendErrorCode,
	TraceletError,
	type TraceletErrorCode,
} from "./error/index.js";

// Events
export { Event, type PropertyPairs } from "./event.js";
export { serializeEvent, toWireEvent, type WireEvent } from "./serialize.js";

// Results
export { Err, Ok, type Result, unwrap } from "./result.js";

// Type definitions
export type { LogLevel, TraceletLogger } from "./types.js";
