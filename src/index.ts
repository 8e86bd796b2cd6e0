export {
	createRedisCacheDriver,
	newRedisDriver,
	redisCacheDriver,
} from "./driver/single.js";
export type { RedisDriver, RedisDriverOptions } from "./driver/single.js";

export {
	createPooledRedisCacheDriver,
	newPooledRedisDriver,
	pooledRedisCacheDriver,
} from "./driver/pooled.js";
export type {
	PooledRedisDriver,
	PooledRedisDriverOptions,
} from "./driver/pooled.js";

export type {
	CacheDriver,
	ConnectionFactory,
	RedisConnection,
} from "./driver/types.js";

export {
	InvalidConfigError,
	configFromUrl,
	createConfig,
	defaultConfig,
} from "./config/index.js";
export type { RedisConfig } from "./config/index.js";

export { toRedisOptions, toStartOptions } from "./config/options.js";
export type { StartOption } from "./config/options.js";

export { composeKey } from "./utils/key.js";
export { TimeoutError } from "./utils/timeout.js";

export {
	ClientError,
	DriverError,
	NotConnectedError,
	RedisError,
	UnreachableError,
	classifyClientError,
	translateError,
} from "./errors.js";
export type {
	ConnectError,
	DeleteError,
	DisconnectError,
	GetError,
	SetError,
} from "./errors.js";

export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
