import { type Result, err, ok } from "neverthrow";
import { type RedisConfig, defaultConfig } from "../config/index.js";
import {
	type ConnectError,
	type DisconnectError,
	DriverError,
	NotConnectedError,
	RedisError,
	toError,
} from "../errors.js";
import { type Logger, createLogger } from "../logger.js";
import { composeKey } from "../utils/key.js";
import { withTimeout } from "../utils/timeout.js";
import { deleteEntry, getEntry, setEntry } from "./commands.js";
import { createIoredisConnection, openConnection } from "./connection.js";
import type {
	CacheDriver,
	ConnectionFactory,
	RedisConnection,
} from "./types.js";

// --- Driver state ---

/** A driver owning at most one connection. Never mutated; replaced. */
export interface RedisDriver {
	readonly config: RedisConfig;
	readonly connection: RedisConnection | undefined;
}

export function newRedisDriver(config: RedisConfig = defaultConfig()): RedisDriver {
	return Object.freeze({ config, connection: undefined });
}

export interface RedisDriverOptions {
	/** Builds the client for a connection. Default: an ioredis `Redis`. */
	createConnection?: ConnectionFactory;
	logger?: Logger;
}

/**
 * A cache driver over one long-lived connection.
 *
 * Operations on a shared state are not synchronised; callers using one
 * state from several places must serialise their calls.
 *
 * @example
 * ```ts
 * const driver = createRedisCacheDriver();
 * const connected = await driver.connect(newRedisDriver(createConfig({ port: 6380 })));
 * if (connected.isOk()) {
 *   await driver.set(connected.value, "session", "42", "payload", 300);
 * }
 * ```
 */
export function createRedisCacheDriver(
	options: RedisDriverOptions = {},
): CacheDriver<RedisDriver, RedisError> {
	const createConnection = options.createConnection ?? createIoredisConnection;
	let defaultLog: Logger | undefined;
	const logger = () => {
		if (options.logger) return options.logger;
		defaultLog ??= createLogger("driver");
		return defaultLog;
	};

	return {
		async connect(driver): Promise<Result<RedisDriver, ConnectError<RedisError>>> {
			if (driver.connection !== undefined) {
				return err(DriverError.alreadyConnected());
			}

			try {
				const connection = await openConnection(
					driver.config,
					createConnection,
					logger(),
				);
				logger().info(
					{ host: driver.config.host, port: driver.config.port },
					"connected",
				);
				return ok(Object.freeze({ config: driver.config, connection }));
			} catch (error) {
				const cause = toError(error);
				logger().warn({ err: cause }, "connection failed to start");
				return err(DriverError.connect(RedisError.start(cause)));
			}
		},

		async disconnect(
			driver,
		): Promise<Result<RedisDriver, DisconnectError<RedisError>>> {
			if (driver.connection === undefined) {
				return err(DriverError.notConnected());
			}

			try {
				await withTimeout(driver.connection.quit(), driver.config.timeoutMs);
			} catch (error) {
				const cause = toError(error);
				logger().warn({ err: cause }, "connection failed to shut down");
				return err(DriverError.disconnect(RedisError.shutdown(cause)));
			}

			logger().info("disconnected");
			return ok(newRedisDriver(driver.config));
		},

		async set(driver, resourceType, key, value, ttlSeconds) {
			return setEntry(
				requireConnection(driver, "set"),
				composeKey(resourceType, key),
				value,
				ttlSeconds,
			);
		},

		async get(driver, resourceType, key) {
			return getEntry(
				requireConnection(driver, "get"),
				composeKey(resourceType, key),
			);
		},

		async delete(driver, resourceType, key) {
			return deleteEntry(
				requireConnection(driver, "delete"),
				composeKey(resourceType, key),
			);
		},
	};
}

function requireConnection(
	driver: RedisDriver,
	operation: string,
): RedisConnection {
	if (driver.connection === undefined) {
		throw new NotConnectedError(operation);
	}
	return driver.connection;
}

/**
 * The single-connection driver with ioredis and the default logger. The
 * logger is built on first use, not on import.
 */
export const redisCacheDriver = createRedisCacheDriver();
