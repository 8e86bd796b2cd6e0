import { type Logger, pino } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";

/**
 * Create a logger for one component of the driver.
 *
 * @example
 * const log = createLogger("pool");
 * log.warn({ err }, "pool failed to start");
 */
export function createLogger(name: string): Logger {
	return pino({
		name: `redis-cache-driver:${name}`,
		level: LOG_LEVEL,
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
	});
}

export type { Logger };
