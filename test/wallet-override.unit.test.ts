import { getAddress } from "viem";
import { describe, expect, test } from "vitest";
import type { OverrideOutcome } from "../src/jsonrpc/override";
import { type JsonRpcRequest, success, userRejected } from "../src/jsonrpc/types";
import { ApprovalQueue } from "../src/wallet/approval-queue";
import { createWalletOverride, type UserRequestHandoff } from "../src/wallet/override";

const ACCOUNT = getAddress("0x24274566a1ad6a9b056e8e2618549ebd2f5141a7");

function request(method: string, params?: unknown, id: JsonRpcRequest["id"] = 1): JsonRpcRequest {
	return { jsonrpc: "2.0", method, ...(params === undefined ? {} : { params }), id };
}

async function outcomeOf(value: OverrideOutcome | Promise<OverrideOutcome>): Promise<OverrideOutcome> {
	return await value;
}

describe("wallet override", () => {
	test("answers eth_accounts locally", async () => {
		const override = createWalletOverride({ account: ACCOUNT, onUserRequest: () => undefined });
		expect(await outcomeOf(override(request("eth_accounts")))).toEqual({
			kind: "sync",
			payload: { result: [ACCOUNT] },
		});
		expect(await outcomeOf(override(request("eth_requestAccounts")))).toEqual({
			kind: "sync",
			payload: { result: [ACCOUNT] },
		});
	});

	test("answers an empty account list without an account", async () => {
		const override = createWalletOverride({ onUserRequest: () => undefined });
		expect(await outcomeOf(override(request("eth_accounts")))).toEqual({
			kind: "sync",
			payload: { result: [] },
		});
	});

	test("forwards everything that needs no decision", async () => {
		const override = createWalletOverride({ onUserRequest: () => undefined });
		expect(await outcomeOf(override(request("eth_getBalance", [ACCOUNT, "latest"])))).toEqual({
			kind: "forward",
		});
	});

	test("invalid signing params are answered with Invalid params", async () => {
		const handoffs: UserRequestHandoff[] = [];
		const override = createWalletOverride({ onUserRequest: (handoff) => handoffs.push(handoff) });
		expect(await outcomeOf(override(request("personal_sign", [7, ACCOUNT])))).toEqual({
			kind: "sync",
			payload: {
				error: { code: -32602, message: "Invalid params", data: "params.0: expected a message string" },
			},
		});
		expect(handoffs).toHaveLength(0);
	});

	test("hands signing requests off and waits for the reply", async () => {
		const handoffs: UserRequestHandoff[] = [];
		const override = createWalletOverride({ onUserRequest: (handoff) => handoffs.push(handoff) });

		const outcome = await outcomeOf(override(request("personal_sign", ["0x68656c6c6f", ACCOUNT])));
		expect(outcome.kind).toBe("async");
		expect(handoffs).toHaveLength(1);
		const handoff = handoffs[0];
		if (!handoff || outcome.kind !== "async") return;
		expect(handoff.userRequest).toEqual({
			kind: "signMessage",
			address: ACCOUNT,
			message: "0x68656c6c6f",
			text: "hello",
		});

		handoff.reply.send(success("0xsigned"));
		await expect(outcome.receiver.recv()).resolves.toEqual({ result: "0xsigned" });
	});
});

describe("approval queue", () => {
	function enqueueSign(queue: ApprovalQueue, id: number, network?: string) {
		const handoffs: UserRequestHandoff[] = [];
		const override = createWalletOverride({
			onUserRequest: (handoff) => {
				handoffs.push(handoff);
				queue.enqueue({ ...handoff, network });
			},
		});
		const outcome = override(request("personal_sign", ["hello", ACCOUNT], id));
		if (outcome instanceof Promise || outcome.kind !== "async") {
			throw new Error("expected an async outcome");
		}
		return outcome.receiver;
	}

	test("hands out pending requests oldest first with increasing ids", async () => {
		const queue = new ApprovalQueue();
		enqueueSign(queue, 10, "mainnet");
		enqueueSign(queue, 11);

		expect(queue.size).toBe(2);
		expect(queue.list().map((pending) => pending.id)).toEqual([1, 2]);
		expect(queue.list().map((pending) => pending.request.id)).toEqual([10, 11]);
		expect(queue.peek()?.network).toBe("mainnet");
		await expect(queue.next()).resolves.toMatchObject({ id: 1 });
	});

	test("approve sends the payload and removes the entry", async () => {
		const queue = new ApprovalQueue();
		const receiver = enqueueSign(queue, 1);
		expect(queue.approve(1, success("0xsig"))).toBe(true);
		expect(queue.size).toBe(0);
		await expect(receiver.recv()).resolves.toEqual({ result: "0xsig" });
		expect(queue.approve(1, success("0xsig"))).toBe(false);
	});

	test("reject replies with the user-rejected error", async () => {
		const queue = new ApprovalQueue();
		const receiver = enqueueSign(queue, 1);
		expect(queue.reject(1)).toBe(true);
		await expect(receiver.recv()).resolves.toEqual({ error: userRejected() });
	});

	test("a caller that stops waiting leaves the queue", () => {
		const queue = new ApprovalQueue();
		const receiver = enqueueSign(queue, 1);
		const pending = queue.peek();
		receiver.close();
		expect(queue.size).toBe(0);
		expect(pending?.signal.aborted).toBe(true);
	});

	test("next waits for the first request", async () => {
		const queue = new ApprovalQueue();
		const next = queue.next();
		enqueueSign(queue, 5);
		await expect(next).resolves.toMatchObject({ id: 1, request: { id: 5 } });
	});

	test("next rejects when its signal aborts", async () => {
		const queue = new ApprovalQueue();
		const controller = new AbortController();
		const next = queue.next(controller.signal);
		controller.abort(new Error("stopping"));
		await expect(next).rejects.toThrow("stopping");
	});

	test("rejectAll answers every pending request", async () => {
		const queue = new ApprovalQueue();
		const first = enqueueSign(queue, 1);
		const second = enqueueSign(queue, 2);
		expect(queue.rejectAll()).toBe(2);
		expect(queue.size).toBe(0);
		await expect(first.recv()).resolves.toEqual({ error: userRejected() });
		await expect(second.recv()).resolves.toEqual({ error: userRejected() });
	});
});
