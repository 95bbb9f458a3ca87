import { postJson, PROBE_TIMEOUT_MS } from "../http";
import { decodeJson, parseResponse, serializeRequest } from "./codec";
import { errorMessage, UpstreamRequestFailedError } from "./errors";
import type { JsonRpcRequest, JsonRpcResponse } from "./types";

export type ForwardFn = (request: JsonRpcRequest, signal?: AbortSignal) => Promise<JsonRpcResponse>;

/**
 * POSTs the request unchanged and decodes the reply. The id on the returned
 * envelope is always the request's own. Node's global fetch keeps pooled
 * keep-alive connections per origin; there are no retries.
 */
export async function forwardToUpstream(
	upstreamUrl: string,
	request: JsonRpcRequest,
	signal?: AbortSignal,
): Promise<JsonRpcResponse> {
	let response: Response;
	try {
		response = await postJson(upstreamUrl, serializeRequest(request), { signal });
	} catch (error) {
		throw new UpstreamRequestFailedError(errorMessage(error), { cause: error });
	}

	const text = await response.text().catch((error: unknown) => {
		throw new UpstreamRequestFailedError(errorMessage(error), {
			status: response.status,
			cause: error,
		});
	});

	let body: unknown;
	try {
		body = decodeJson(text);
	} catch (error) {
		throw new UpstreamRequestFailedError(`upstream returned invalid JSON (HTTP ${response.status})`, {
			status: response.status,
			cause: error,
		});
	}

	const parsed = parseResponse(body);
	if (!parsed.success) {
		throw new UpstreamRequestFailedError(
			`upstream returned an invalid JSON-RPC response (HTTP ${response.status}): ${parsed.error}`,
			{ status: response.status },
		);
	}
	return { ...parsed.data, id: request.id };
}

export function createUpstreamForwarder(upstreamUrl: string): ForwardFn {
	return async (request, signal) => await forwardToUpstream(upstreamUrl, request, signal);
}

function parseQuantity(value: unknown): bigint | null {
	if (typeof value !== "string") return null;
	const trimmed = value.trim();
	if (!trimmed) return null;
	try {
		if (trimmed.startsWith("0x") || trimmed.startsWith("0X")) {
			return BigInt(trimmed);
		}
		if (/^\d+$/.test(trimmed)) {
			return BigInt(trimmed);
		}
		return null;
	} catch {
		return null;
	}
}

/** Best-effort `eth_chainId` lookup for startup banners; null when unreachable. */
export async function getUpstreamChainId(upstreamUrl: string): Promise<string | null> {
	const payload: JsonRpcRequest = {
		jsonrpc: "2.0",
		id: 1,
		method: "eth_chainId",
		params: [],
	};
	try {
		const response = await postJson(upstreamUrl, serializeRequest(payload), {
			timeoutMs: PROBE_TIMEOUT_MS,
		});
		if (!response.ok) return null;
		const parsed = parseResponse(decodeJson(await response.text()));
		if (!parsed.success || !("result" in parsed.data)) return null;
		const chainId = parseQuantity(parsed.data.result);
		return chainId === null ? null : chainId.toString();
	} catch {
		return null;
	}
}
