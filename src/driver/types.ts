import type { RedisOptions } from "ioredis";
import type { Result } from "neverthrow";
import type {
	ConnectError,
	DeleteError,
	DisconnectError,
	GetError,
	SetError,
} from "../errors.js";

/**
 * The contract a cache backend plugs into. `D` is the driver state the
 * caller threads through: `connect` and `disconnect` return the state to
 * use from then on, the old value is left untouched.
 */
export interface CacheDriver<D, E> {
	connect(driver: D): Promise<Result<D, ConnectError<E>>>;
	disconnect(driver: D): Promise<Result<D, DisconnectError<E>>>;
	/** Store `value`. Without `ttlSeconds` any earlier expiry is cleared. */
	set(
		driver: D,
		resourceType: string,
		key: string,
		value: string,
		ttlSeconds?: number,
	): Promise<Result<void, SetError<E>>>;
	get(
		driver: D,
		resourceType: string,
		key: string,
	): Promise<Result<string, GetError<E>>>;
	/** Deleting a key that does not exist succeeds. */
	delete(
		driver: D,
		resourceType: string,
		key: string,
	): Promise<Result<void, DeleteError<E>>>;
}

/**
 * The part of an ioredis client the drivers use. A `Redis` instance
 * satisfies it as is.
 */
export interface RedisConnection {
	/** `"ready"` while commands can be sent. */
	readonly status: string;
	connect(): Promise<void>;
	quit(): Promise<unknown>;
	disconnect(): void;
	get(key: string): Promise<string | null>;
	set(key: string, value: string): Promise<unknown>;
	expire(key: string, seconds: number): Promise<number>;
	persist(key: string): Promise<number>;
	del(key: string): Promise<number>;
	on(event: "error", listener: (error: Error) => void): unknown;
}

export type ConnectionFactory = (options: RedisOptions) => RedisConnection;
