// --- Client errors ---
//
// What a single command against the server can fail with. `NotFound` is
// produced by the command layer from nil / zero replies; everything else
// comes from classifying what ioredis rejected with.

export type ClientError =
	| { type: "ActorError"; cause: Error }
	| { type: "ConnectionError"; cause: Error }
	| { type: "TCPError"; cause: Error }
	| { type: "ServerError"; message: string }
	| { type: "RESPError"; cause: Error }
	| { type: "NotFound" };

export const ClientError = {
	notFound: (): ClientError => ({ type: "NotFound" }),
} as const;

const CONNECTION_MESSAGES = [
	"Connection is closed.",
	"Stream isn't writeable and enableOfflineQueue options is false",
];

/** Sort an ioredis rejection into the client error it stands for. */
export function classifyClientError(error: unknown): ClientError {
	const cause = toError(error);

	if (cause.name === "ReplyError") {
		return { type: "ServerError", message: cause.message };
	}
	if (cause.name === "ParserError") {
		return { type: "RESPError", cause };
	}
	if (
		cause.name === "MaxRetriesPerRequestError" ||
		CONNECTION_MESSAGES.includes(cause.message)
	) {
		return { type: "ConnectionError", cause };
	}
	if (hasSystemCode(cause) || cause.message === "Command timed out") {
		return { type: "TCPError", cause };
	}
	return { type: "ActorError", cause };
}

// --- Adapter errors ---

/** Every way the Redis driver can fail. Match on `type`. */
export type RedisError =
	| { type: "StartError"; cause?: Error }
	| { type: "ActorError"; cause?: Error }
	| { type: "ConnectionError"; cause?: Error }
	| { type: "TCPError"; cause: Error }
	| { type: "ServerError"; message: string }
	| { type: "ShutdownError"; cause?: Error }
	| { type: "PoolError"; cause: Error }
	| { type: "UnknownResponseError"; cause?: Error };

export const RedisError = {
	start: (cause?: Error): RedisError => ({ type: "StartError", cause }),
	actor: (cause?: Error): RedisError => ({ type: "ActorError", cause }),
	connection: (cause?: Error): RedisError => ({ type: "ConnectionError", cause }),
	tcp: (cause: Error): RedisError => ({ type: "TCPError", cause }),
	server: (message: string): RedisError => ({ type: "ServerError", message }),
	shutdown: (cause?: Error): RedisError => ({ type: "ShutdownError", cause }),
	pool: (cause: Error): RedisError => ({ type: "PoolError", cause }),
	unknownResponse: (cause?: Error): RedisError => ({
		type: "UnknownResponseError",
		cause,
	}),
} as const;

/**
 * Thrown when control reaches a branch that call sites are required to
 * make impossible. Never caught by the driver.
 */
export class UnreachableError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UnreachableError";
	}
}

/**
 * Map a client error onto the adapter taxonomy, one variant to one variant.
 *
 * Call sites handle `NotFound` themselves (a miss, an idempotent delete, a
 * raced expiry); it arriving here is a bug and throws `UnreachableError`.
 */
export function translateError(error: ClientError): RedisError {
	switch (error.type) {
		case "ActorError":
			return RedisError.actor(error.cause);
		case "ConnectionError":
			return RedisError.connection(error.cause);
		case "TCPError":
			return RedisError.tcp(error.cause);
		case "ServerError":
			return RedisError.server(error.message);
		case "RESPError":
			return RedisError.unknownResponse(error.cause);
		case "NotFound":
			throw new UnreachableError(
				"NotFound reached the generic error translator without being handled",
			);
	}
}

// --- Cache-driver conditions ---

export type ConnectError<E> =
	| { type: "AlreadyConnected" }
	| { type: "ConnectDriverError"; error: E };

export type DisconnectError<E> =
	| { type: "NotConnected" }
	| { type: "DisconnectDriverError"; error: E };

export type SetError<E> = { type: "SetDriverError"; error: E };

export type GetError<E> =
	| { type: "GotTooFewRecords" }
	| { type: "GetDriverError"; error: E };

export type DeleteError<E> = { type: "DeleteDriverError"; error: E };

export const DriverError = {
	alreadyConnected: (): { type: "AlreadyConnected" } => ({
		type: "AlreadyConnected",
	}),
	notConnected: (): { type: "NotConnected" } => ({ type: "NotConnected" }),
	gotTooFewRecords: (): { type: "GotTooFewRecords" } => ({
		type: "GotTooFewRecords",
	}),
	connect: <E>(error: E): ConnectError<E> => ({
		type: "ConnectDriverError",
		error,
	}),
	disconnect: <E>(error: E): DisconnectError<E> => ({
		type: "DisconnectDriverError",
		error,
	}),
	set: <E>(error: E): SetError<E> => ({ type: "SetDriverError", error }),
	get: <E>(error: E): GetError<E> => ({ type: "GetDriverError", error }),
	delete: <E>(error: E): DeleteError<E> => ({
		type: "DeleteDriverError",
		error,
	}),
} as const;

/** Thrown when set/get/delete is handed a driver that is not connected. */
export class NotConnectedError extends Error {
	constructor(operation: string) {
		super(`${operation} called on a driver that is not connected`);
		this.name = "NotConnectedError";
	}
}

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

function hasSystemCode(error: Error): boolean {
	return "code" in error && typeof error.code === "string";
}
