import { getAddress } from "viem";
import { describe, expect, test } from "vitest";
import { renderUserRequest, stripAnsi } from "../src/cli/ui";
import { createEventLogger, createNetworkEventLogger, formatEvent } from "../src/log";
import type { PendingUserRequest } from "../src/wallet/approval-queue";
import type { UserRequest } from "../src/wallet/requests";

const FROM = getAddress("0x24274566a1ad6a9b056e8e2618549ebd2f5141a7");
const TO = getAddress("0x66a9893cc07d91d95644aedd05d03f95e1dba8af");

function pending(userRequest: UserRequest, id = 1): PendingUserRequest {
	return {
		id,
		request: { jsonrpc: "2.0", method: "eth_sendTransaction", id },
		userRequest,
		receivedAt: new Date(0),
		signal: new AbortController().signal,
	};
}

describe("request log", () => {
	test("formats routed requests", () => {
		expect(
			stripAnsi(
				formatEvent({
					type: "request",
					method: "eth_chainId",
					id: 1,
					route: "forward",
					ok: true,
					durationMs: 3.4,
				}),
			),
		).toBe("✓ eth_chainId id=1 forward 3ms");
	});

	test("formats failures with their error and label", () => {
		expect(
			stripAnsi(
				formatEvent(
					{
						type: "request",
						method: "eth_sendTransaction",
						id: "a",
						route: null,
						ok: false,
						error: "boom",
						durationMs: 0,
					},
					"mainnet",
				),
			),
		).toBe('[mainnet] ✗ eth_sendTransaction id="a" error 0ms: boom');
	});

	test("writes large ids in full", () => {
		expect(
			stripAnsi(
				formatEvent({
					type: "request",
					method: "a",
					id: 9007199254740993n,
					route: "sync",
					ok: true,
					durationMs: 0,
				}),
			),
		).toBe("✓ a id=9007199254740993 sync 0ms");
	});

	test("formats parse errors", () => {
		expect(stripAnsi(formatEvent({ type: "parse_error", reason: "expected a JSON object or array" }))).toBe(
			"✗ parse error: expected a JSON object or array",
		);
	});

	test("network loggers label each line with its network", () => {
		const lines: string[] = [];
		const log = createNetworkEventLogger({ write: (line) => lines.push(stripAnsi(line)) });
		log({ name: "mainnet" }, { type: "parse_error", reason: "x" });
		log({ name: "sepolia" }, { type: "parse_error", reason: "y" });
		log({ name: "mainnet" }, { type: "parse_error", reason: "z" });
		expect(lines).toEqual([
			"[mainnet] ✗ parse error: x",
			"[sepolia] ✗ parse error: y",
			"[mainnet] ✗ parse error: z",
		]);
	});

	test("quiet loggers write nothing", () => {
		const lines: string[] = [];
		createEventLogger({ quiet: true, write: (line) => lines.push(line) })({
			type: "parse_error",
			reason: "x",
		});
		expect(lines).toEqual([]);
		createEventLogger({ write: (line) => lines.push(stripAnsi(line)) })({
			type: "parse_error",
			reason: "x",
		});
		expect(lines).toEqual(["✗ parse error: x"]);
	});
});

describe("request rendering", () => {
	test("renders a transaction with value and data", () => {
		const text = stripAnsi(
			renderUserRequest(
				pending({
					kind: "sendTransaction",
					transaction: { from: FROM, to: TO, value: "0xde0b6b3a7640000", data: "0x12345678", chainId: "0x1" },
				}),
				"mainnet",
			),
		);
		expect(text.split("\n")).toEqual([
			"#1 Send transaction on mainnet",
			`  from      ${FROM}`,
			`  to        ${TO}`,
			"  value     1 ETH",
			"  data      0x12345678 (4 bytes)",
			"  chainId   1",
		]);
	});

	test("renders contract creation and an empty transfer", () => {
		const text = stripAnsi(
			renderUserRequest(pending({ kind: "sendTransaction", transaction: { from: FROM, to: null } })),
		);
		expect(text.split("\n")).toEqual([
			"#1 Send transaction",
			`  from      ${FROM}`,
			"  to        (contract creation)",
			"  value     0 ETH",
			"  data      (none)",
		]);
	});

	test("renders a message to sign", () => {
		const text = stripAnsi(
			renderUserRequest(
				pending({ kind: "signMessage", address: FROM, message: "0x", text: "line one\nline two" }, 3),
			),
		);
		expect(text.split("\n")).toEqual([
			"#3 Sign message",
			`  address   ${FROM}`,
			"  message   ",
			"    line one",
			"    line two",
		]);
	});
});
