import type { RedisOptions } from "ioredis";
import type { RedisConfig } from "./index.js";

// --- Startup options (discriminated union by type) ---

export type StartOption =
	| { type: "Timeout"; ms: number }
	| { type: "Auth"; password: string }
	| { type: "AuthWithUsername"; username: string; password: string };

/**
 * Translate a config into the ordered startup options of a connection.
 *
 * There is always exactly one `Timeout`. At most one auth option is
 * produced and it is listed first:
 *
 * | username | password | auth option                              |
 * |----------|----------|------------------------------------------|
 * | set      | set      | `AuthWithUsername(username, password)`   |
 * | set      | unset    | `AuthWithUsername(username, "")`         |
 * | unset    | set      | `Auth(password)`                         |
 * | unset    | unset    | none                                     |
 */
export function toStartOptions(config: RedisConfig): StartOption[] {
	const timeout: StartOption = { type: "Timeout", ms: config.timeoutMs };
	const auth = authOption(config);
	return auth ? [auth, timeout] : [timeout];
}

function authOption(config: RedisConfig): StartOption | undefined {
	if (config.username !== undefined) {
		return {
			type: "AuthWithUsername",
			username: config.username,
			password: config.password ?? "",
		};
	}
	if (config.password !== undefined) {
		return { type: "Auth", password: config.password };
	}
	return undefined;
}

/**
 * Fold startup options into the options object ioredis takes.
 *
 * The client never connects on its own (`lazyConnect`), never queues
 * commands while offline and never reconnects: the driver decides when a
 * connection starts and callers own any retry policy.
 */
export function toRedisOptions(
	config: RedisConfig,
	startOptions: StartOption[],
): RedisOptions {
	const options: RedisOptions = {
		host: config.host,
		port: config.port,
		lazyConnect: true,
		enableOfflineQueue: false,
		maxRetriesPerRequest: 0,
		retryStrategy: () => null,
	};

	for (const option of startOptions) {
		switch (option.type) {
			case "Timeout":
				options.connectTimeout = option.ms;
				options.commandTimeout = option.ms;
				break;
			case "Auth":
				options.password = option.password;
				break;
			case "AuthWithUsername":
				options.username = option.username;
				options.password = option.password;
				break;
		}
	}

	return options;
}
