// =============================================================================
// API OPTIONS — resolve the API key from the environment or Secret Manager
// =============================================================================

import { ConfigError, Err, Ok, type Result, TraceletError, type TraceletLogger } from "@tracelet/core";
import { noopLogger } from "@tracelet/core/logger";
import {
	DEFAULT_ENDPOINT,
	DEFAULT_SECRET_NAME,
	POSTHOG_API_KEY_ENV,
	SERVICE_ACCOUNT_ENV,
} from "./constants.js";
import {
	createGoogleSecretManager,
	type SecretManager,
	type SecretManagerFactory,
} from "./secrets/google.js";

export type Env = Readonly<Record<string, string | undefined>>;

export interface EnvResolveOptions {
	/** Variables to read. Default: `process.env` */
	env?: Env;
	/** Ingestion endpoint for the resolved options. Default: `DEFAULT_ENDPOINT` */
	endpoint?: string;
}

export interface SecretManagerResolveOptions extends EnvResolveOptions {
	/** Google Cloud project. Default: the project of the service-account credentials */
	project?: string;
	/** Secret name. Default: `DEFAULT_SECRET_NAME` */
	secret?: string;
	/** Default: `createGoogleSecretManager` */
	createSecretManager?: SecretManagerFactory;
	/** Receives failures to release the Secret Manager connection. Default: silent */
	logger?: TraceletLogger;
}

// ignoreBOM keeps a leading BOM in the key rather than stripping it
const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** Parse `endpoint` as an absolute URL and give it a trailing `/`. */
function normalizeEndpoint(endpoint: string): string {
	let url: URL;
	try {
		url = new URL(endpoint);
	} catch (error) {
		throw TraceletError.invalidArgument(`Invalid endpoint URL: ${endpoint}`, error);
	}
	if (url.protocol !== "http:" && url.protocol !== "https:") {
		throw TraceletError.invalidArgument(`Endpoint must use http or https: ${endpoint}`);
	}
	return endpoint.endsWith("/") ? endpoint : `${endpoint}/`;
}

/**
 * Resolved configuration for a `Client`: the API key and the ingestion
 * endpoint. Frozen once constructed.
 *
 * @example
 * ```ts
 * const resolved = await ApiOptions.auto();
 * if (!resolved.success) throw resolved.error;
 * const client = new Client(resolved.data);
 * ```
 */
export class ApiOptions {
	readonly apiKey: string;
	/** Base URL, always ending in `/`. */
	readonly endpoint: string;

	constructor(apiKey: string, endpoint: string = DEFAULT_ENDPOINT) {
		if (!apiKey) throw TraceletError.invalidArgument("API key must not be empty");
		this.apiKey = apiKey;
		this.endpoint = normalizeEndpoint(endpoint);
		Object.freeze(this);
	}

	/** Read the API key from `POSTHOG_API_KEY`. Absent and empty are both missing. */
	static fromEnv(options: EnvResolveOptions = {}): Result<ApiOptions, ConfigError> {
		const env = options.env ?? process.env;
		const key = env[POSTHOG_API_KEY_ENV];
		if (!key) return Err(ConfigError.missingEnv(POSTHOG_API_KEY_ENV));
		return Ok(new ApiOptions(key, options.endpoint));
	}

	/**
	 * Fetch the API key from Google Secret Manager, authenticating with the
	 * service-account key file named by `SERVICE_ACCOUNT`.
	 */
	static async fromGoogleSecretManager(
		options: SecretManagerResolveOptions = {},
	): Promise<Result<ApiOptions, ConfigError>> {
		const env = options.env ?? process.env;
		const keyFilename = env[SERVICE_ACCOUNT_ENV];
		if (!keyFilename) return Err(ConfigError.missingEnv(SERVICE_ACCOUNT_ENV));

		const endpoint = normalizeEndpoint(options.endpoint ?? DEFAULT_ENDPOINT);
		const secret = options.secret ?? DEFAULT_SECRET_NAME;
		const logger = options.logger ?? noopLogger;
		let manager: SecretManager | undefined;

		try {
			manager = (options.createSecretManager ?? createGoogleSecretManager)(keyFilename);
			const project = options.project ?? (await manager.getProjectId());
			const key = utf8.decode(await manager.getSecret(project, secret));
			if (!key) {
				return Err(ConfigError.secretFetchFailed(`Secret ${secret} in project ${project} is empty`));
			}
			return Ok(new ApiOptions(key, endpoint));
		} catch (error) {
			if (error instanceof ConfigError) return Err(error);
			return Err(
				ConfigError.secretFetchFailed(
					`Failed to fetch secret ${secret} from Google Secret Manager`,
					error,
				),
			);
		} finally {
			await manager?.close().catch((error: unknown) => {
				logger.warn("Failed to close Secret Manager client", { error });
			});
		}
	}

	/**
	 * Try `fromEnv`, then `fromGoogleSecretManager`. When both fail, the
	 * Secret Manager error is returned. Nothing is cached between calls.
	 */
	static async auto(
		options: SecretManagerResolveOptions = {},
	): Promise<Result<ApiOptions, ConfigError>> {
		const fromEnv = ApiOptions.fromEnv(options);
		if (fromEnv.success) return fromEnv;
		return ApiOptions.fromGoogleSecretManager(options);
	}
}
