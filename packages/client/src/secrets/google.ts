// =============================================================================
// GOOGLE SECRET MANAGER — fetch a secret's latest version by name
// =============================================================================

import { SecretManagerServiceClient } from "@google-cloud/secret-manager";
import { ConfigError } from "@tracelet/core";

/**
 * The slice of Secret Manager that API key resolution needs. The default
 * implementation wraps `SecretManagerServiceClient`; tests supply their own.
 */
export interface SecretManager {
	/** Project the credentials belong to. */
	getProjectId(): Promise<string>;
	/** Raw payload of the latest version of `secret` in `project`. */
	getSecret(project: string, secret: string): Promise<Uint8Array>;
	close(): Promise<void>;
}

export type SecretManagerFactory = (keyFilename: string) => SecretManager;

export function secretVersionName(project: string, secret: string): string {
	return `projects/${project}/secrets/${secret}/versions/latest`;
}

/**
 * Create a Secret Manager authenticated with the service-account key file at
 * `keyFilename`. Authentication happens lazily on the first call.
 */
export function createGoogleSecretManager(keyFilename: string): SecretManager {
	const client = new SecretManagerServiceClient({ keyFilename });

	return {
		getProjectId: () => client.getProjectId(),

		async getSecret(project, secret) {
			const name = secretVersionName(project, secret);
			const [version] = await client.accessSecretVersion({ name });

			const payload = version.payload;
			if (!payload) throw ConfigError.secretFetchFailed(`Secret ${name} has no payload`);

			const data = payload.data;
			if (data === null || data === undefined) {
				throw ConfigError.secretFetchFailed(`Secret ${name} has no data`);
			}

			// REST fallback transports hand bytes over base64-encoded
			return typeof data === "string" ? Buffer.from(data, "base64") : data;
		},

		close: () => client.close(),
	};
}
