import { Redis } from "ioredis";
import type { RedisConfig } from "../config/index.js";
import { toRedisOptions, toStartOptions } from "../config/options.js";
import type { Logger } from "../logger.js";
import { withTimeout } from "../utils/timeout.js";
import type { ConnectionFactory, RedisConnection } from "./types.js";

export const createIoredisConnection: ConnectionFactory = (options) =>
	new Redis(options);

/**
 * Build a client for `config` and wait for it to be ready, at most
 * `config.timeoutMs`. A client that fails to start is torn down before
 * the error is rethrown.
 */
export async function openConnection(
	config: RedisConfig,
	createConnection: ConnectionFactory,
	log: Logger,
): Promise<RedisConnection> {
	const connection = createConnection(
		toRedisOptions(config, toStartOptions(config)),
	);
	connection.on("error", (err) => {
		log.error({ err }, "redis connection error");
	});

	try {
		await withTimeout(connection.connect(), config.timeoutMs);
	} catch (error) {
		connection.disconnect();
		throw error;
	}

	log.debug({ host: config.host, port: config.port }, "redis connection ready");
	return connection;
}
