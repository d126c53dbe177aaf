export { Client } from "./client.js";
export {
	CAPTURE_PATH,
	DEFAULT_ENDPOINT,
	DEFAULT_SECRET_NAME,
	DEFAULT_TIMEOUT_MS,
	POSTHOG_API_KEY_ENV,
	SERVICE_ACCOUNT_ENV,
} from "./constants.js";
export { createTransport, type Transport } from "./fetch.js";
export {
	ApiOptions,
	type Env,
	type EnvResolveOptions,
	type SecretManagerResolveOptions,
} from "./options.js";
export {
	createGoogleSecretManager,
	type SecretManager,
	type SecretManagerFactory,
	secretVersionName,
} from "./secrets/google.js";
export type { ClientOptions, RequestInterceptor, ResponseInterceptor } from "./types.js";
