import { parse as parseJsonText, stringify as stringifyJson } from "lossless-json";
import { z } from "zod";
import {
	errorObject,
	JSONRPC_VERSION,
	type JsonRpcFailure,
	JsonRpcErrorCode,
	type JsonRpcErrorObject,
	type JsonRpcId,
	type JsonRpcRequest,
	type JsonRpcResponse,
} from "./types";

const MAX_NUMERIC_ID = 2n ** 64n - 1n;
const INTEGER_PATTERN = /^-?\d+$/;

export type ParsedPayload =
	| { kind: "single"; request: JsonRpcRequest }
	| { kind: "batch"; requests: JsonRpcRequest[] };

export type CodecResult<T> = { success: true; data: T } | { success: false; error: string };

const jsonRpcIdSchema = z.union([
	z.string(),
	z
		.number()
		.int()
		.nonnegative("numeric id must not be negative")
		.max(Number.MAX_SAFE_INTEGER, "numeric ids above 2^53 must be passed as bigint"),
	z
		.bigint()
		.nonnegative("numeric id must not be negative")
		.max(MAX_NUMERIC_ID, "numeric id must be at most 2^64-1"),
	z.null(),
]);

const jsonRpcRequestSchema = z
	.object({
		jsonrpc: z.unknown(),
		method: z.string(),
		params: z.unknown().optional(),
		id: jsonRpcIdSchema.optional(),
	})
	.superRefine((value, ctx) => {
		if (value.jsonrpc !== JSONRPC_VERSION) {
			ctx.addIssue({
				code: "custom",
				path: ["jsonrpc"],
				message: `invalid value ${describeValue(value.jsonrpc)}, expected "2.0"`,
			});
		}
	});

const jsonRpcErrorObjectSchema = z.object({
	code: z.number().int().min(-2147483648).max(2147483647),
	message: z.string(),
	data: z.unknown().optional(),
});

const jsonRpcResponseSchema = z.object({
	jsonrpc: z.literal(JSONRPC_VERSION),
	result: z.unknown().optional(),
	error: jsonRpcErrorObjectSchema.optional(),
	// Forwarding replaces the id, so an upstream that mangles it is not an error.
	id: jsonRpcIdSchema.catch(null),
});

function describeValue(value: unknown): string {
	if (value === undefined) return "(missing)";
	return encodeJson(value);
}

/** Integers outside the safe range become bigint so they keep every digit. */
function parseJsonNumber(text: string): number | bigint {
	if (INTEGER_PATTERN.test(text)) {
		const value = Number(text);
		return Number.isSafeInteger(value) ? value : BigInt(text);
	}
	return Number(text);
}

/** `JSON.parse` that keeps large integers exact. Throws `SyntaxError` on bad input. */
export function decodeJson(text: string): unknown {
	return parseJsonText(text, null, parseJsonNumber);
}

/** `JSON.stringify` that writes bigint values as plain JSON numbers. */
export function encodeJson(value: unknown, space?: number): string {
	const text = stringifyJson(value, undefined, space);
	if (text === undefined) {
		throw new TypeError("value has no JSON representation");
	}
	return text;
}

function formatIssues(error: z.ZodError, prefix?: string): string {
	const issue = error.issues[0];
	if (!issue) return "invalid request";
	const pathParts = prefix === undefined ? issue.path : [prefix, ...issue.path];
	const location = pathParts.length > 0 ? pathParts.join(".") : "request";
	return `${location}: ${issue.message}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseRequest(value: unknown, label?: string): CodecResult<JsonRpcRequest> {
	if (!isRecord(value)) {
		return { success: false, error: `${label ?? "request"}: expected a JSON object` };
	}
	const parsed = jsonRpcRequestSchema.safeParse(value);
	if (!parsed.success) {
		return { success: false, error: formatIssues(parsed.error, label) };
	}
	const id: JsonRpcId = parsed.data.id ?? null;
	const request: JsonRpcRequest = {
		jsonrpc: JSONRPC_VERSION,
		method: parsed.data.method,
		...("params" in value ? { params: value.params } : {}),
		id,
	};
	return { success: true, data: request };
}

/**
 * Classifies a decoded request body. One malformed element fails the whole
 * batch; the caller answers with a single envelope rather than an array.
 */
export function parseRequestPayload(value: unknown): CodecResult<ParsedPayload> {
	if (Array.isArray(value)) {
		const requests: JsonRpcRequest[] = [];
		for (let i = 0; i < value.length; i += 1) {
			const parsed = parseRequest(value[i], `[${i}]`);
			if (!parsed.success) return parsed;
			requests.push(parsed.data);
		}
		return { success: true, data: { kind: "batch", requests } };
	}
	if (isRecord(value)) {
		const parsed = parseRequest(value);
		if (!parsed.success) return parsed;
		return { success: true, data: { kind: "single", request: parsed.data } };
	}
	return { success: false, error: "expected a JSON object or array" };
}

export function parseResponse(value: unknown): CodecResult<JsonRpcResponse> {
	const parsed = jsonRpcResponseSchema.safeParse(value);
	if (!parsed.success) {
		return { success: false, error: formatIssues(parsed.error, "response") };
	}
	const { error, result, id } = parsed.data;
	if (error) {
		const errorObj: JsonRpcErrorObject = {
			code: error.code,
			message: error.message,
			...(error.data === undefined ? {} : { data: error.data }),
		};
		return { success: true, data: { jsonrpc: JSONRPC_VERSION, error: errorObj, id } };
	}
	if (!isRecord(value) || !("result" in value)) {
		return { success: false, error: "response: missing result or error" };
	}
	return { success: true, data: { jsonrpc: JSONRPC_VERSION, result, id } };
}

export function parseErrorResponse(reason: string): JsonRpcFailure {
	return {
		jsonrpc: JSONRPC_VERSION,
		error: errorObject(JsonRpcErrorCode.ParseError, undefined, reason),
		id: null,
	};
}

/** Flat `{ jsonrpc, result | error, id }`; `error.data` only when present. */
export function toWireResponse(response: JsonRpcResponse): Record<string, unknown> {
	if ("error" in response) {
		const { code, message, data } = response.error;
		return {
			jsonrpc: JSONRPC_VERSION,
			error: data === undefined ? { code, message } : { code, message, data },
			id: response.id,
		};
	}
	return { jsonrpc: JSONRPC_VERSION, result: response.result, id: response.id };
}

export function serializeResponse(response: JsonRpcResponse | JsonRpcResponse[]): string {
	if (Array.isArray(response)) {
		return encodeJson(response.map(toWireResponse));
	}
	return encodeJson(toWireResponse(response));
}

export function serializeRequest(request: JsonRpcRequest): string {
	return encodeJson({
		jsonrpc: request.jsonrpc,
		method: request.method,
		...(request.params === undefined ? {} : { params: request.params }),
		id: request.id,
	});
}
