/**
 * Unit Tests for the console logger
 *
 * Run: npx tsx --test tests/unit/logger.test.ts
 */

import { test } from "node:test";
import assert from "node:assert";
import ConsoleLogger from "../../src/utils/logger/ConsoleLogger.js";
import { parseLogLevel } from "../../src/utils/logger/Logger.js";

test("parseLogLevel", async (t) => {
	await t.test("accepts any casing and surrounding spaces", () => {
		assert.strictEqual(parseLogLevel(" warn "), "WARN");
		assert.strictEqual(parseLogLevel("None"), "NONE");
	});

	await t.test("falls back to DEBUG", () => {
		assert.strictEqual(parseLogLevel(undefined), "DEBUG");
		assert.strictEqual(parseLogLevel("verbose"), "DEBUG");
	});
});

test("ConsoleLogger", async (t) => {
	await t.test("child loggers prefix their titles and share the level", (t) => {
		const log = t.mock.method(console, "log", () => {});
		const root = new ConsoleLogger("NONE");
		const child = root.getLogger("Identity").getLogger("Roles");

		child.logInfo("silenciado");
		assert.strictEqual(log.mock.callCount(), 0);

		root.setLevel("INFO");
		child.logInfo("rol creado");
		child.logDebug("por debajo del nivel");

		assert.strictEqual(log.mock.callCount(), 1);
		assert.ok(String(log.mock.calls[0]?.arguments[0]).endsWith("[Identity:Roles] rol creado"));
	});

	await t.test("warnings and errors go to their own streams", (t) => {
		const warn = t.mock.method(console, "warn", () => {});
		const error = t.mock.method(console, "error", () => {});
		const logger = new ConsoleLogger("WARN");

		logger.logWarn("aviso");
		logger.logError("fallo");

		assert.strictEqual(warn.mock.callCount(), 1);
		assert.strictEqual(error.mock.callCount(), 1);
	});
});
