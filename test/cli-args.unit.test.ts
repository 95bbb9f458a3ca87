import { getAddress } from "viem";
import { describe, expect, test } from "vitest";
import {
	assertNoUnknownOptions,
	getFlagValue,
	parseAccount,
	parseApprovalPolicy,
	parsePolicyArgs,
	parsePort,
	parseTimeout,
	UsageError,
} from "../src/cli/args";

describe("cli args", () => {
	test("accepts known options and their values", () => {
		expect(() =>
			assertNoUnknownOptions("proxy", ["--upstream", "http://127.0.0.1:8545", "--port", "0", "--cors"]),
		).not.toThrow();
		expect(() => assertNoUnknownOptions("networks", ["--base-port", "9400", "--quiet"])).not.toThrow();
	});

	test("rejects unknown options per command", () => {
		expect(() => assertNoUnknownOptions("networks", ["--upstream", "x"])).toThrow(
			new UsageError("Unknown option --upstream"),
		);
		expect(() => assertNoUnknownOptions("proxy", ["--bogus"])).toThrow("Unknown option --bogus");
	});

	test("rejects an option missing its value", () => {
		expect(() => assertNoUnknownOptions("proxy", ["--port"])).toThrow("Missing value for --port");
	});

	test("reads flag values", () => {
		expect(getFlagValue(["--port", "3000"], ["--port"])).toBe("3000");
		expect(getFlagValue(["--cors"], ["--port"])).toBeUndefined();
	});

	test("ports are whole numbers up to 65535", () => {
		expect(parsePort("0")).toBe(0);
		expect(parsePort("8545")).toBe(8545);
		expect(() => parsePort("65536")).toThrow('Invalid --port value "65536"');
		expect(() => parsePort("12ab", "--base-port")).toThrow('Invalid --base-port value "12ab"');
	});

	test("timeouts are positive milliseconds", () => {
		expect(parseTimeout(undefined)).toBeUndefined();
		expect(parseTimeout("1000")).toBe(1000);
		expect(() => parseTimeout("0")).toThrow('Invalid --timeout value "0" (milliseconds)');
	});

	test("accounts are checksummed", () => {
		const lower = "0x24274566a1ad6a9b056e8e2618549ebd2f5141a7";
		expect(parseAccount(lower)).toBe(getAddress(lower));
		expect(() => parseAccount("0x12")).toThrow('Invalid --account address "0x12"');
	});

	test("the approval policy defaults to prompt only on a terminal", () => {
		expect(parseApprovalPolicy(undefined, true)).toBe("prompt");
		expect(parseApprovalPolicy(undefined, false)).toBe("reject");
		expect(parseApprovalPolicy("FORWARD", false)).toBe("forward");
		expect(() => parseApprovalPolicy("prompt", false)).toThrow(
			"--on-request prompt needs an interactive terminal",
		);
		expect(() => parseApprovalPolicy("maybe", true)).toThrow(
			'Invalid --on-request value "maybe" (prompt|forward|reject)',
		);
	});

	test("collects policy args", () => {
		expect(
			parsePolicyArgs(
				["--hostname", "0.0.0.0", "--secret", "test-secret", "--on-request", "reject", "--timeout", "500", "--quiet"],
				true,
			),
		).toEqual({
			hostname: "0.0.0.0",
			secret: "test-secret",
			account: undefined,
			policy: "reject",
			asyncTimeoutMs: 500,
			cors: false,
			quiet: true,
		});
	});
});
