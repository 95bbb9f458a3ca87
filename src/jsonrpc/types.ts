/** Numeric ids above `Number.MAX_SAFE_INTEGER` are carried as bigint. */
export type JsonRpcId = string | number | bigint | null;

export const JSONRPC_VERSION = "2.0";

export const JsonRpcErrorCode = {
	ParseError: -32700,
	InvalidRequest: -32600,
	MethodNotFound: -32601,
	InvalidParams: -32602,
	InternalError: -32603,
	UserRejected: -4001,
} as const;

const DEFAULT_MESSAGES: Record<number, string> = {
	[JsonRpcErrorCode.ParseError]: "Parse error",
	[JsonRpcErrorCode.InvalidRequest]: "Invalid Request",
	[JsonRpcErrorCode.MethodNotFound]: "Method not found",
	[JsonRpcErrorCode.InvalidParams]: "Invalid params",
	[JsonRpcErrorCode.InternalError]: "Internal error",
	[JsonRpcErrorCode.UserRejected]: "User rejected the request.",
};

export interface JsonRpcRequest {
	jsonrpc: "2.0";
	method: string;
	params?: unknown;
	id: JsonRpcId;
}

export interface JsonRpcErrorObject {
	code: number;
	message: string;
	data?: unknown;
}

export type ResponsePayload = { result: unknown } | { error: JsonRpcErrorObject };

export type JsonRpcSuccess = { jsonrpc: "2.0"; result: unknown; id: JsonRpcId };

export type JsonRpcFailure = { jsonrpc: "2.0"; error: JsonRpcErrorObject; id: JsonRpcId };

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

export function success(result: unknown): ResponsePayload {
	return { result };
}

export function failure(error: JsonRpcErrorObject): ResponsePayload {
	return { error };
}

/**
 * Builds an error object. Server-defined codes (-32000 to -32099) without an
 * explicit message read "Server error".
 */
export function errorObject(code: number, message?: string, data?: unknown): JsonRpcErrorObject {
	const fallback = code <= -32000 && code >= -32099 ? "Server error" : "Unknown error";
	return {
		code,
		message: message ?? DEFAULT_MESSAGES[code] ?? fallback,
		...(data === undefined ? {} : { data }),
	};
}

export function userRejected(): JsonRpcErrorObject {
	return errorObject(JsonRpcErrorCode.UserRejected);
}

export function isFailurePayload(
	payload: ResponsePayload,
): payload is { error: JsonRpcErrorObject } {
	return "error" in payload;
}

export function toResponse(payload: ResponsePayload, id: JsonRpcId): JsonRpcResponse {
	if (isFailurePayload(payload)) {
		return { jsonrpc: JSONRPC_VERSION, error: payload.error, id };
	}
	return {
		jsonrpc: JSONRPC_VERSION,
		result: payload.result === undefined ? null : payload.result,
		id,
	};
}

export function internalError(id: JsonRpcId, detail: string): JsonRpcFailure {
	return {
		jsonrpc: JSONRPC_VERSION,
		error: errorObject(JsonRpcErrorCode.InternalError, `Internal error: ${detail}`),
		id,
	};
}
