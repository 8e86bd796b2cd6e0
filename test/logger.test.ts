import { describe, expect, it, vi } from "vitest";
import { createRedisCacheDriver, newRedisDriver } from "../src/index.js";
import { createLogger } from "../src/logger.js";
import { useFakeRedis } from "./setup.js";

vi.mock("../src/logger.js", async (importOriginal) => {
	const actual = await importOriginal<typeof import("../src/logger.js")>();
	return { ...actual, createLogger: vi.fn(actual.createLogger) };
});

describe("default logger", () => {
	const ctx = useFakeRedis();

	it("is not built when the package is imported", () => {
		expect(createLogger).not.toHaveBeenCalled();
	});

	it("is built once, on first use", async () => {
		const driver = createRedisCacheDriver({
			createConnection: ctx.server.createConnection,
		});
		expect(createLogger).not.toHaveBeenCalled();

		const state = (await driver.connect(newRedisDriver()))._unsafeUnwrap();
		await driver.disconnect(state);

		expect(createLogger).toHaveBeenCalledTimes(1);
		expect(createLogger).toHaveBeenCalledWith("driver");
	});
});
