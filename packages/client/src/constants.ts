// =============================================================================
// DEFAULTS — well-known names and endpoint
// =============================================================================

/** Environment variable holding the API key directly. */
export const POSTHOG_API_KEY_ENV = "POSTHOG_API_KEY";

/** Environment variable holding the path of a Google service-account key file. */
export const SERVICE_ACCOUNT_ENV = "SERVICE_ACCOUNT";

/** Name of the Secret Manager secret holding the API key. */
export const DEFAULT_SECRET_NAME = "posthog-api-key";

export const DEFAULT_ENDPOINT = "https://app.posthog.com/";

/** Path of the single-event capture route, relative to the endpoint. */
export const CAPTURE_PATH = "capture/";

export const DEFAULT_TIMEOUT_MS = 8_000;
