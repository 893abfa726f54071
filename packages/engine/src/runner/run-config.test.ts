import { describe, expect, test } from "vitest";
import { ErrorCode, FatalConfigurationError } from "../domain/errors.js";
import { type RunConfig, validateRunConfig } from "./run-config.js";

const BASE: RunConfig = {
	host: "localhost",
	port: 443,
	appKey: "test-key",
	channel: "test-channel",
	scenarioId: 1,
	clientCount: 1000,
	rampUpSec: 30,
	holdSec: 60,
	rampDownSec: 10,
};

function expectFatal(config: RunConfig, code: ErrorCode): void {
	try {
		validateRunConfig(config);
		expect.unreachable("validateRunConfig should have thrown");
	} catch (error) {
		expect(error).toBeInstanceOf(FatalConfigurationError);
		expect(error instanceof FatalConfigurationError && error.code).toBe(code);
	}
}

describe("validateRunConfig", () => {
	test("should fill in defaults", () => {
		const config = validateRunConfig(BASE);

		expect(config.scenario.id).toBe(1);
		expect(config.warmupSec).toBe(0);
		expect(config.graceSec).toBe(10);
		expect(config.clientIdOffset).toBe(0);
		expect(config.filterKey).toBe("token_address");
		expect(config.ackTimeoutMs).toBe(10_000);
		expect(config.connectTimeoutMs).toBe(10_000);
		expect(config.progressIntervalMs).toBe(5000);
		expect(config.secure).toBe(true);
	});

	test("should default to plain ws away from port 443", () => {
		expect(validateRunConfig({ ...BASE, port: 6001 }).secure).toBe(false);
		expect(validateRunConfig({ ...BASE, port: 6001, secure: true }).secure).toBe(true);
	});

	test("should apply the update interval only to the update scenario", () => {
		expect(validateRunConfig({ ...BASE, scenarioId: 2, filterUpdateIntervalMs: 2000 }).scenario.updateIntervalMs).toBe(2000);
		expect(validateRunConfig({ ...BASE, scenarioId: 2 }).scenario.updateIntervalMs).toBe(5000);
		expect(validateRunConfig({ ...BASE, scenarioId: 3, filterUpdateIntervalMs: 2000 }).scenario.updateIntervalMs).toBeUndefined();
	});

	test("should reject unknown scenarios", () => {
		expectFatal({ ...BASE, scenarioId: 6 }, ErrorCode.INVALID_SCENARIO);
		expectFatal({ ...BASE, scenarioId: 0 }, ErrorCode.INVALID_SCENARIO);
	});

	test.each<[string, Partial<RunConfig>]>([
		["zero clients", { clientCount: 0 }],
		["fractional clients", { clientCount: 1.5 }],
		["too many clients", { clientCount: 100_001 }],
		["zero ramp-up", { rampUpSec: 0 }],
		["negative hold", { holdSec: -1 }],
		["zero ramp-down", { rampDownSec: 0 }],
		["negative warm-up", { warmupSec: -1 }],
		["negative grace", { graceSec: -0.5 }],
		["port 0", { port: 0 }],
		["port above 65535", { port: 65536 }],
		["empty host", { host: " " }],
		["empty app key", { appKey: "" }],
		["empty channel", { channel: "" }],
		["negative client id offset", { clientIdOffset: -1 }],
		["zero update interval", { filterUpdateIntervalMs: 0 }],
		["zero ack timeout", { ackTimeoutMs: 0 }],
	])("should reject %s", (_name, override) => {
		expectFatal({ ...BASE, ...override }, ErrorCode.INVALID_CONFIG);
	});

	test("should accept the maximum client count", () => {
		expect(validateRunConfig({ ...BASE, clientCount: 100_000 }).clientCount).toBe(100_000);
	});
});
