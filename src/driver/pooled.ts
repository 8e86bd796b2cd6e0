import { type Pool, createPool } from "generic-pool";
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

const DEFAULT_START_TIMEOUT_MS = 1000;

// --- Driver state ---

/** A driver owning a pool of up to `config.poolSize` connections. */
export interface PooledRedisDriver {
	readonly config: RedisConfig;
	readonly connection: Pool<RedisConnection> | undefined;
}

export function newPooledRedisDriver(
	config: RedisConfig = defaultConfig(),
): PooledRedisDriver {
	return Object.freeze({ config, connection: undefined });
}

export interface PooledRedisDriverOptions {
	/** Builds the client for each pooled connection. Default: an ioredis `Redis`. */
	createConnection?: ConnectionFactory;
	logger?: Logger;
	/** How long `connect` waits for a first connection to the server. Default: 1000 */
	startTimeoutMs?: number;
}

/**
 * A cache driver over a pool of connections. One state can be shared by
 * concurrent callers: every operation checks out its own connection for
 * its whole duration and returns it afterwards, on every path.
 *
 * When all connections are busy, a checkout waits up to `timeoutMs` and
 * then fails with `PoolError`. There is no queueing beyond that.
 */
export function createPooledRedisCacheDriver(
	options: PooledRedisDriverOptions = {},
): CacheDriver<PooledRedisDriver, RedisError> {
	const createConnection = options.createConnection ?? createIoredisConnection;
	let defaultLog: Logger | undefined;
	const logger = () => {
		if (options.logger) return options.logger;
		defaultLog ??= createLogger("pool");
		return defaultLog;
	};
	const startTimeoutMs = options.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS;

	return {
		async connect(
			driver,
		): Promise<Result<PooledRedisDriver, ConnectError<RedisError>>> {
			if (driver.connection !== undefined) {
				return err(DriverError.alreadyConnected());
			}

			const { config } = driver;
			try {
				// One connection proves the server is reachable before the pool
				// starts filling itself in the background.
				const probe = await openConnection(
					{ ...config, timeoutMs: Math.min(startTimeoutMs, config.timeoutMs) },
					createConnection,
					logger(),
				);
				await withTimeout(probe.quit(), config.timeoutMs);
			} catch (error) {
				const cause = toError(error);
				logger().warn({ err: cause }, "pool failed to start");
				return err(DriverError.connect(RedisError.start(cause)));
			}

			const pool = createPool<RedisConnection>(
				{
					create: () => openConnection(config, createConnection, logger()),
					// A client whose socket dropped never reconnects on its own.
					validate: async (connection) => connection.status === "ready",
					destroy: async (connection) => {
						await connection.quit();
					},
				},
				{
					min: config.poolSize,
					max: config.poolSize,
					acquireTimeoutMillis: config.timeoutMs,
					destroyTimeoutMillis: config.timeoutMs,
					testOnBorrow: true,
				},
			);
			pool.on("factoryCreateError", (error: unknown) => {
				logger().warn({ err: toError(error) }, "pool failed to open a connection");
			});
			pool.on("factoryDestroyError", (error: unknown) => {
				logger().warn({ err: toError(error) }, "pool failed to close a connection");
			});

			logger().info(
				{ host: config.host, port: config.port, poolSize: config.poolSize },
				"pool started",
			);
			return ok(Object.freeze({ config, connection: pool }));
		},

		async disconnect(
			driver,
		): Promise<Result<PooledRedisDriver, DisconnectError<RedisError>>> {
			if (driver.connection === undefined) {
				return err(DriverError.notConnected());
			}

			try {
				await closePool(driver.connection, driver.config.timeoutMs);
			} catch (error) {
				const cause = toError(error);
				logger().warn({ err: cause }, "pool failed to shut down");
				return err(DriverError.disconnect(RedisError.shutdown(cause)));
			}

			logger().info("pool stopped");
			return ok(newPooledRedisDriver(driver.config));
		},

		async set(driver, resourceType, key, value, ttlSeconds) {
			return withConnection(
				requirePool(driver, "set"),
				(connection) =>
					setEntry(connection, composeKey(resourceType, key), value, ttlSeconds),
				DriverError.set,
			);
		},

		async get(driver, resourceType, key) {
			return withConnection(
				requirePool(driver, "get"),
				(connection) => getEntry(connection, composeKey(resourceType, key)),
				DriverError.get,
			);
		},

		async delete(driver, resourceType, key) {
			return withConnection(
				requirePool(driver, "delete"),
				(connection) => deleteEntry(connection, composeKey(resourceType, key)),
				DriverError.delete,
			);
		},
	};
}

/** Operations currently holding or waiting for a connection, per pool. */
const operations = new WeakMap<Pool<RedisConnection>, Set<Promise<unknown>>>();

function operationsOf(pool: Pool<RedisConnection>): Set<Promise<unknown>> {
	let running = operations.get(pool);
	if (!running) {
		running = new Set();
		operations.set(pool, running);
	}
	return running;
}

/**
 * Check out one connection, run `operation` on it and give it back,
 * whether the operation succeeded, failed or threw.
 */
async function withConnection<T, E>(
	pool: Pool<RedisConnection>,
	operation: (connection: RedisConnection) => Promise<Result<T, E>>,
	wrap: (error: RedisError) => E,
): Promise<Result<T, E>> {
	const running = operationsOf(pool);
	const current = checkout(pool, operation, wrap);
	running.add(current);
	try {
		return await current;
	} finally {
		running.delete(current);
	}
}

async function checkout<T, E>(
	pool: Pool<RedisConnection>,
	operation: (connection: RedisConnection) => Promise<Result<T, E>>,
	wrap: (error: RedisError) => E,
): Promise<Result<T, E>> {
	let connection: RedisConnection;
	try {
		connection = await pool.acquire();
	} catch (error) {
		return err(wrap(RedisError.pool(toError(error))));
	}

	try {
		return await operation(connection);
	} finally {
		await pool.release(connection);
	}
}

/**
 * Wait for running operations to hand their connections back, then stop
 * lending and close everything.
 *
 * The pool is left untouched when operations outlast `timeoutMs`, so the
 * state stays connected and usable and the disconnect can be retried.
 * Once draining starts it runs to the end: commands and checkouts are
 * bounded by their own timeouts, and each close by `destroyTimeoutMillis`.
 */
async function closePool(
	pool: Pool<RedisConnection>,
	timeoutMs: number,
): Promise<void> {
	await withTimeout(settle(operationsOf(pool)), timeoutMs);
	await pool.drain();
	await pool.clear();
}

async function settle(running: Set<Promise<unknown>>): Promise<void> {
	while (running.size > 0) {
		await Promise.allSettled([...running]);
	}
}

function requirePool(
	driver: PooledRedisDriver,
	operation: string,
): Pool<RedisConnection> {
	if (driver.connection === undefined) {
		throw new NotConnectedError(operation);
	}
	return driver.connection;
}

/**
 * The pooled driver with ioredis and the default logger. The logger is
 * built on first use, not on import.
 */
export const pooledRedisCacheDriver = createPooledRedisCacheDriver();
