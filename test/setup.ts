import type { RedisOptions } from "ioredis";
import { pino } from "pino";
import { beforeEach } from "vitest";
import type {
	ConnectionFactory,
	RedisConnection,
} from "../src/driver/types.js";

type Command = "get" | "set" | "expire" | "persist" | "del" | "quit";

interface Entry {
	value: string;
	expiresAt: number | undefined;
}

/**
 * An in-process stand-in for a Redis server. Keys expire against the
 * wall clock, like the real thing, so TTL tests wait real time.
 */
export class FakeRedisServer {
	readonly entries = new Map<string, Entry>();
	/** Options of every connection created, in order. */
	readonly connectionOptions: RedisOptions[] = [];
	readonly connections: FakeRedisConnection[] = [];
	openConnections = 0;
	/** When set, every connection attempt is refused. */
	down = false;
	/** When set, connection attempts never complete. */
	stalled = false;

	private failures = new Map<Command, Error>();
	private hooks = new Map<Command, () => void>();
	private gates = new Map<Command, Promise<void>>();

	readonly createConnection: ConnectionFactory = (options) => {
		const connection = new FakeRedisConnection(this);
		this.connectionOptions.push(options);
		this.connections.push(connection);
		return connection;
	};

	/** Make the next `command` reject with `error`. */
	failNext(command: Command, error: Error): void {
		this.failures.set(command, error);
	}

	/** Run `hook` just before the next `command` executes. */
	beforeNext(command: Command, hook: () => void): void {
		this.hooks.set(command, hook);
	}

	/** Hold every `command` until the returned function is called. */
	pause(command: Command): () => void {
		let release = () => {};
		this.gates.set(
			command,
			new Promise<void>((resolve) => {
				release = () => resolve();
			}),
		);
		return () => {
			this.gates.delete(command);
			release();
		};
	}

	/** Remaining TTL in seconds, -1 without expiry, -2 when missing. */
	ttl(key: string): number {
		const entry = this.read(key);
		if (!entry) return -2;
		if (entry.expiresAt === undefined) return -1;
		return Math.ceil((entry.expiresAt - Date.now()) / 1000);
	}

	read(key: string): Entry | undefined {
		const entry = this.entries.get(key);
		if (entry?.expiresAt !== undefined && entry.expiresAt <= Date.now()) {
			this.entries.delete(key);
			return undefined;
		}
		return entry;
	}

	async execute<T>(command: Command, run: () => T): Promise<T> {
		const gate = this.gates.get(command);
		if (gate) await gate;

		const failure = this.failures.get(command);
		if (failure) {
			this.failures.delete(command);
			throw failure;
		}

		const hook = this.hooks.get(command);
		if (hook) {
			this.hooks.delete(command);
			hook();
		}

		return run();
	}
}

export class FakeRedisConnection implements RedisConnection {
	status: "wait" | "ready" | "end" = "wait";
	private errorListeners: ((error: Error) => void)[] = [];

	constructor(private server: FakeRedisServer) {}

	async connect(): Promise<void> {
		if (this.server.stalled) {
			return new Promise<void>(() => {});
		}
		if (this.server.down) {
			throw systemError("connect ECONNREFUSED 127.0.0.1:6379", "ECONNREFUSED");
		}
		this.status = "ready";
		this.server.openConnections++;
	}

	async quit(): Promise<unknown> {
		return this.server.execute("quit", () => {
			this.close();
			return "OK";
		});
	}

	disconnect(): void {
		this.close();
	}

	get(key: string): Promise<string | null> {
		return this.command("get", () => this.server.read(key)?.value ?? null);
	}

	set(key: string, value: string): Promise<unknown> {
		return this.command("set", () => {
			this.server.entries.set(key, { value, expiresAt: undefined });
			return "OK";
		});
	}

	expire(key: string, seconds: number): Promise<number> {
		return this.command("expire", () => {
			const entry = this.server.read(key);
			if (!entry) return 0;
			entry.expiresAt = Date.now() + seconds * 1000;
			return 1;
		});
	}

	persist(key: string): Promise<number> {
		return this.command("persist", () => {
			const entry = this.server.read(key);
			if (entry?.expiresAt === undefined) return 0;
			entry.expiresAt = undefined;
			return 1;
		});
	}

	del(key: string): Promise<number> {
		return this.command("del", () => {
			if (!this.server.read(key)) return 0;
			this.server.entries.delete(key);
			return 1;
		});
	}

	on(_event: "error", listener: (error: Error) => void): this {
		this.errorListeners.push(listener);
		return this;
	}

	/** Emit a connection-level error, as ioredis does on socket trouble. */
	emitError(error: Error): void {
		for (const listener of this.errorListeners) listener(error);
	}

	private command<T>(name: Command, run: () => T): Promise<T> {
		if (this.status !== "ready") {
			return Promise.reject(new Error("Connection is closed."));
		}
		return this.server.execute(name, run);
	}

	private close(): void {
		if (this.status === "ready") this.server.openConnections--;
		this.status = "end";
	}
}

export function systemError(message: string, code: string): Error {
	return Object.assign(new Error(message), { code });
}

/** An error shaped like the `ReplyError` ioredis rejects with. */
export function replyError(message: string): Error {
	const error = new Error(message);
	error.name = "ReplyError";
	return error;
}

export const silentLogger = pino({ level: "silent" });

/**
 * Call this in your describe() block to get a fresh fake server
 * before each test.
 */
export function useFakeRedis() {
	let server: FakeRedisServer;

	beforeEach(() => {
		server = new FakeRedisServer();
	});

	return {
		get server() {
			return server;
		},
	};
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
