import { performance } from "node:perf_hooks";
import { parseErrorResponse, parseRequestPayload } from "./codec";
import { errorMessage } from "./errors";
import type { OverrideFn, OverrideOutcome, OverrideRoute } from "./override";
import {
	internalError,
	type JsonRpcId,
	type JsonRpcRequest,
	type JsonRpcResponse,
	toResponse,
} from "./types";
import type { ForwardFn } from "./upstream";

export const DEFAULT_ASYNC_TIMEOUT_MS = 180_000;

export type ProxyEvent =
	| {
			type: "request";
			method: string;
			id: JsonRpcId;
			route: OverrideRoute | null;
			ok: boolean;
			error?: string;
			durationMs: number;
	  }
	| { type: "parse_error"; reason: string };

export type ProxyEventSink = (event: ProxyEvent) => void;

export interface DispatchContext {
	override: OverrideFn;
	forward: ForwardFn;
	asyncTimeoutMs?: number;
	/** Aborted when the client goes away; closes pending async replies. */
	signal?: AbortSignal;
	onEvent?: ProxyEventSink;
}

function emit(ctx: DispatchContext, event: ProxyEvent): void {
	if (!ctx.onEvent) return;
	try {
		ctx.onEvent(event);
	} catch (error) {
		process.emitWarning(`Proxy event sink failed: ${errorMessage(error)}`);
	}
}

async function complete(
	outcome: OverrideOutcome,
	request: JsonRpcRequest,
	ctx: DispatchContext,
): Promise<JsonRpcResponse> {
	switch (outcome.kind) {
		case "sync":
			return toResponse(outcome.payload, request.id);
		case "async": {
			const payload = await outcome.receiver.recv({
				timeoutMs: ctx.asyncTimeoutMs ?? DEFAULT_ASYNC_TIMEOUT_MS,
				signal: ctx.signal,
			});
			return toResponse(payload, request.id);
		}
		case "forward": {
			const response = await ctx.forward(request, ctx.signal);
			return { ...response, id: request.id };
		}
	}
}

export async function dispatchRequest(
	request: JsonRpcRequest,
	ctx: DispatchContext,
): Promise<JsonRpcResponse> {
	const started = performance.now();
	let route: OverrideRoute | null = null;
	let response: JsonRpcResponse;
	let failure: string | undefined;
	try {
		const outcome = await ctx.override(structuredClone(request));
		route = outcome.kind;
		response = await complete(outcome, request, ctx);
	} catch (error) {
		failure = errorMessage(error);
		response = internalError(request.id, failure);
	}

	emit(ctx, {
		type: "request",
		method: request.method,
		id: request.id,
		route,
		ok: failure === undefined,
		...(failure === undefined ? {} : { error: failure }),
		durationMs: performance.now() - started,
	});
	return response;
}

/**
 * Answers a decoded request body: one envelope for an object, an array in
 * input order for a batch (handled one request at a time), and a single
 * Parse error envelope when the body is not a valid request or batch.
 */
export async function dispatchPayload(
	body: unknown,
	ctx: DispatchContext,
): Promise<JsonRpcResponse | JsonRpcResponse[]> {
	const parsed = parseRequestPayload(body);
	if (!parsed.success) {
		emit(ctx, { type: "parse_error", reason: parsed.error });
		return parseErrorResponse(parsed.error);
	}

	if (parsed.data.kind === "single") {
		return await dispatchRequest(parsed.data.request, ctx);
	}

	const responses: JsonRpcResponse[] = [];
	for (const request of parsed.data.requests) {
		// Nobody reads the reply once the client is gone.
		if (ctx.signal?.aborted) break;
		responses.push(await dispatchRequest(request, ctx));
	}
	return responses;
}
