import { ErrorCode, FatalConfigurationError, SubscribeFailure } from "@filterbench/engine";
import { describe, expect, test } from "vitest";
import { describeError, EXIT_FAILURE, EXIT_FATAL_CONFIG, exitCodeFor } from "./execute.js";

describe("exitCodeFor", () => {
	test("should use the configuration exit code for fatal configuration errors", () => {
		expect(exitCodeFor(new FatalConfigurationError(ErrorCode.INVALID_SCENARIO, "Unknown scenario: 9"))).toBe(EXIT_FATAL_CONFIG);
		expect(EXIT_FATAL_CONFIG).toBe(2);
	});

	test("should use the generic exit code for anything else", () => {
		expect(exitCodeFor(new SubscribeFailure(ErrorCode.SUBSCRIBE_TIMEOUT))).toBe(EXIT_FAILURE);
		expect(exitCodeFor(new Error("boom"))).toBe(1);
		expect(exitCodeFor("boom")).toBe(1);
	});
});

describe("describeError", () => {
	test("should label configuration errors", () => {
		expect(describeError(new FatalConfigurationError(ErrorCode.INVALID_CONFIG, "Port must be an integer between 1 and 65535, got 0"))).toBe(
			"Configuration error: Port must be an integer between 1 and 65535, got 0",
		);
	});

	test("should use the message of other errors", () => {
		expect(describeError(new Error("socket hang up"))).toBe("socket hang up");
		expect(describeError(42)).toBe("42");
	});
});
