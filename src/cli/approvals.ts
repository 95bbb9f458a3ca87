import readline from "node:readline";
import { errorMessage } from "../jsonrpc/errors";
import {
	errorObject,
	failure,
	JsonRpcErrorCode,
	type JsonRpcResponse,
	type ResponsePayload,
	success,
} from "../jsonrpc/types";
import type { ApprovalPolicy } from "../types";
import type { ApprovalQueue, PendingUserRequest } from "../wallet/approval-queue";
import { renderError, renderOk, renderUserRequest, renderWarning } from "./ui";

export type PromptFn = (question: string, signal: AbortSignal) => Promise<boolean>;

export interface ApprovalLoopOptions {
	queue: ApprovalQueue;
	policy: ApprovalPolicy;
	/** Sends an approved request to the upstream node that holds the account. */
	forward: (pending: PendingUserRequest) => Promise<JsonRpcResponse>;
	prompt?: PromptFn;
	write?: (text: string) => void;
	signal?: AbortSignal;
}

export async function promptYesNo(question: string, signal?: AbortSignal): Promise<boolean> {
	const rl = readline.createInterface({ input: process.stdin, output: process.stderr });
	try {
		const answer = await new Promise<string>((resolve, reject) => {
			if (signal?.aborted) {
				reject(signal.reason);
				return;
			}
			signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
			rl.question(question, (value) => resolve(value));
		});
		const normalized = answer.trim().toLowerCase();
		return normalized === "y" || normalized === "yes";
	} finally {
		rl.close();
	}
}

export function responseToPayload(response: JsonRpcResponse): ResponsePayload {
	return "error" in response ? failure(response.error) : success(response.result);
}

async function forwardApproved(
	pending: PendingUserRequest,
	options: ApprovalLoopOptions,
): Promise<ResponsePayload> {
	try {
		return responseToPayload(await options.forward(pending));
	} catch (error) {
		return failure(
			errorObject(JsonRpcErrorCode.InternalError, `Internal error: ${errorMessage(error)}`),
		);
	}
}

async function decide(pending: PendingUserRequest, options: ApprovalLoopOptions): Promise<void> {
	const write = options.write ?? ((text: string) => process.stderr.write(`${text}\n`));
	const prompt = options.prompt ?? promptYesNo;
	write(renderUserRequest(pending, pending.network));

	let approved: boolean;
	if (options.policy === "forward") {
		approved = true;
	} else if (options.policy === "reject") {
		approved = false;
	} else {
		try {
			approved = await prompt("Approve? [y/N] ", pending.signal);
		} catch (error) {
			if (pending.signal.aborted) {
				write(renderWarning(`#${pending.id} withdrawn by the caller`));
				return;
			}
			write(renderError(`Prompt failed: ${errorMessage(error)}`));
			approved = false;
		}
	}

	if (!approved) {
		options.queue.reject(pending.id);
		write(renderWarning(`#${pending.id} rejected`));
		return;
	}

	const payload = await forwardApproved(pending, options);
	if (!options.queue.approve(pending.id, payload)) {
		write(renderWarning(`#${pending.id} approved, but the caller is gone`));
		return;
	}
	if ("error" in payload) {
		write(renderError(`#${pending.id} upstream error: ${payload.error.message}`));
		return;
	}
	write(renderOk(`#${pending.id} approved`));
}

/** Handles pending requests one at a time, oldest first, until `signal` aborts. */
export async function runApprovalLoop(options: ApprovalLoopOptions): Promise<void> {
	const signal = options.signal;
	while (!signal?.aborted) {
		let pending: PendingUserRequest;
		try {
			pending = await options.queue.next(signal);
		} catch (error) {
			if (signal?.aborted) return;
			throw error;
		}
		await decide(pending, options);
	}
}
