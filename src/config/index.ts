// --- Configuration ---

export interface RedisConfig {
	readonly host: string;
	readonly port: number;
	/** Bound on connecting, on each command and on shutdown, in ms. */
	readonly timeoutMs: number;
	/** Connections held by the pooled driver. Ignored by the single-connection driver. */
	readonly poolSize: number;
	readonly username?: string;
	readonly password?: string;
}

export class InvalidConfigError extends Error {
	constructor(
		message: string,
		readonly field: keyof RedisConfig | "url",
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "InvalidConfigError";
	}
}

const DEFAULT_HOST = "localhost";
const DEFAULT_PORT = 6379;
const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_POOL_SIZE = 10;

/** `localhost:6379`, 5000ms timeout, a pool of 10, no authentication. */
export function defaultConfig(): RedisConfig {
	return Object.freeze({
		host: DEFAULT_HOST,
		port: DEFAULT_PORT,
		timeoutMs: DEFAULT_TIMEOUT_MS,
		poolSize: DEFAULT_POOL_SIZE,
	});
}

/**
 * Build a config from the defaults and the given overrides.
 * Throws `InvalidConfigError` on a value no connection could use.
 *
 * @example
 * ```ts
 * const config = createConfig({ host: "cache.internal", password: "test-secret" });
 * ```
 */
export function createConfig(overrides: Partial<RedisConfig> = {}): RedisConfig {
	// A key given as `undefined` falls back to its default.
	const defaults = defaultConfig();
	const config: { -readonly [K in keyof RedisConfig]: RedisConfig[K] } = {
		host: overrides.host ?? defaults.host,
		port: overrides.port ?? defaults.port,
		timeoutMs: overrides.timeoutMs ?? defaults.timeoutMs,
		poolSize: overrides.poolSize ?? defaults.poolSize,
	};
	if (overrides.username !== undefined) config.username = overrides.username;
	if (overrides.password !== undefined) config.password = overrides.password;

	if (config.host === "") {
		throw new InvalidConfigError("host must not be empty", "host");
	}
	if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
		throw new InvalidConfigError(
			`port must be an integer between 1 and 65535, got ${config.port}`,
			"port",
		);
	}
	if (!Number.isInteger(config.timeoutMs) || config.timeoutMs <= 0) {
		throw new InvalidConfigError(
			`timeoutMs must be a positive integer, got ${config.timeoutMs}`,
			"timeoutMs",
		);
	}
	if (!Number.isInteger(config.poolSize) || config.poolSize < 1) {
		throw new InvalidConfigError(
			`poolSize must be at least 1, got ${config.poolSize}`,
			"poolSize",
		);
	}

	return Object.freeze(config);
}

/**
 * Parse a `redis://[username[:password]@]host[:port]` URL.
 * Credentials are URL-decoded; an empty username is treated as unset.
 * Fields in `overrides` win over what the URL says.
 */
export function configFromUrl(
	url: string,
	overrides: Partial<RedisConfig> = {},
): RedisConfig {
	let parsed: URL;
	try {
		parsed = new URL(url);
	} catch (error) {
		throw new InvalidConfigError(`not a valid URL: ${url}`, "url", {
			cause: error,
		});
	}

	if (parsed.protocol !== "redis:") {
		throw new InvalidConfigError(
			`unsupported scheme "${parsed.protocol}", expected "redis:"`,
			"url",
		);
	}

	const fromUrl: { -readonly [K in keyof RedisConfig]?: RedisConfig[K] } = {
		host: unbracket(parsed.hostname),
	};
	if (parsed.port !== "") {
		fromUrl.port = Number(parsed.port);
	}
	if (parsed.username !== "") {
		fromUrl.username = decodeURIComponent(parsed.username);
	}
	if (parsed.password !== "") {
		fromUrl.password = decodeURIComponent(parsed.password);
	}

	return createConfig({
		host: overrides.host ?? fromUrl.host,
		port: overrides.port ?? fromUrl.port,
		timeoutMs: overrides.timeoutMs,
		poolSize: overrides.poolSize,
		username: overrides.username ?? fromUrl.username,
		password: overrides.password ?? fromUrl.password,
	});
}

/** `URL` keeps the brackets around IPv6 literals; sockets want them bare. */
function unbracket(hostname: string): string {
	return hostname.startsWith("[") && hostname.endsWith("]")
		? hostname.slice(1, -1)
		: hostname;
}
