import { type Result, ResultAsync, err, ok } from "neverthrow";
import {
	ClientError,
	type DeleteError,
	DriverError,
	type GetError,
	RedisError,
	type SetError,
	classifyClientError,
	translateError,
} from "../errors.js";
import type { RedisConnection } from "./types.js";

// --- Wire commands ---
//
// Each command is bounded by the client's command timeout. Nil and zero
// replies that mean "no such key" come back as `NotFound`.

function run<T>(reply: Promise<T>): ResultAsync<T, ClientError> {
	return ResultAsync.fromPromise(reply, classifyClientError);
}

export function getCommand(
	connection: RedisConnection,
	key: string,
): ResultAsync<string, ClientError> {
	return run(connection.get(key)).andThen(
		(value): Result<string, ClientError> =>
			value === null ? err(ClientError.notFound()) : ok(value),
	);
}

export function setCommand(
	connection: RedisConnection,
	key: string,
	value: string,
): ResultAsync<void, ClientError> {
	return run(connection.set(key, value)).map(() => undefined);
}

/** EXPIRE replies 0 when the key does not exist. */
export function expireCommand(
	connection: RedisConnection,
	key: string,
	seconds: number,
): ResultAsync<void, ClientError> {
	return run(connection.expire(key, seconds)).andThen(
		(updated): Result<void, ClientError> =>
			updated === 0 ? err(ClientError.notFound()) : ok(undefined),
	);
}

/** PERSIST replies 0 both for a missing key and for a key without expiry. */
export function persistCommand(
	connection: RedisConnection,
	key: string,
): ResultAsync<void, ClientError> {
	return run(connection.persist(key)).map(() => undefined);
}

export function delCommand(
	connection: RedisConnection,
	key: string,
): ResultAsync<void, ClientError> {
	return run(connection.del(key)).andThen(
		(removed): Result<void, ClientError> =>
			removed === 0 ? err(ClientError.notFound()) : ok(undefined),
	);
}

// --- Cache operations over one connection ---

/**
 * SET the value, then PERSIST or EXPIRE it. Not atomic: when the second
 * step fails the value may already be written.
 *
 * A key that vanished between the two steps (expired or deleted by
 * someone else) is reported as `UnknownResponseError`.
 */
export async function setEntry(
	connection: RedisConnection,
	key: string,
	value: string,
	ttlSeconds?: number,
): Promise<Result<void, SetError<RedisError>>> {
	const written = await setCommand(connection, key, value);
	if (written.isErr()) {
		return err(DriverError.set(translateError(written.error)));
	}

	const expiry =
		ttlSeconds === undefined
			? await persistCommand(connection, key)
			: await expireCommand(connection, key, ttlSeconds);
	if (expiry.isErr()) {
		return err(
			DriverError.set(
				expiry.error.type === "NotFound"
					? RedisError.unknownResponse()
					: translateError(expiry.error),
			),
		);
	}

	return ok(undefined);
}

/** A miss is `GotTooFewRecords`, kept apart from infrastructure failures. */
export async function getEntry(
	connection: RedisConnection,
	key: string,
): Promise<Result<string, GetError<RedisError>>> {
	const value = await getCommand(connection, key);
	if (value.isOk()) {
		return ok(value.value);
	}
	if (value.error.type === "NotFound") {
		return err(DriverError.gotTooFewRecords());
	}
	return err(DriverError.get(translateError(value.error)));
}

export async function deleteEntry(
	connection: RedisConnection,
	key: string,
): Promise<Result<void, DeleteError<RedisError>>> {
	const removed = await delCommand(connection, key);
	if (removed.isOk() || removed.error.type === "NotFound") {
		return ok(undefined);
	}
	return err(DriverError.delete(translateError(removed.error)));
}
