import { type Address, getAddress, type Hex, hexToString, isAddress, isHex } from "viem";
import { z } from "zod";
import { type CodecResult, decodeJson } from "../jsonrpc/codec";
import type { JsonRpcRequest } from "../jsonrpc/types";

export const USER_REQUEST_METHODS = [
	"eth_sendTransaction",
	"personal_sign",
	"eth_signTypedData_v4",
] as const;

export type UserRequestMethod = (typeof USER_REQUEST_METHODS)[number];

const addressSchema = z
	.string()
	.refine((value) => isAddress(value, { strict: false }), { message: "invalid address" })
	.transform((value): Address => getAddress(value));

const quantitySchema = z
	.string()
	.regex(/^0x[0-9a-fA-F]+$/, { message: "expected a 0x-prefixed hex quantity" })
	.transform((value): Hex => `0x${value.slice(2)}`);

const hexDataSchema = z
	.string()
	.refine((value) => isHex(value, { strict: true }), { message: "expected 0x-prefixed hex data" })
	.transform((value): Hex => `0x${value.slice(2)}`);

const transactionSchema = z.object({
	from: addressSchema,
	to: addressSchema.nullish(),
	value: quantitySchema.optional(),
	data: hexDataSchema.optional(),
	input: hexDataSchema.optional(),
	gas: quantitySchema.optional(),
	gasPrice: quantitySchema.optional(),
	maxFeePerGas: quantitySchema.optional(),
	maxPriorityFeePerGas: quantitySchema.optional(),
	nonce: quantitySchema.optional(),
	chainId: quantitySchema.optional(),
});

export type TransactionFields = z.infer<typeof transactionSchema>;

const typedDataSchema = z.object({
	types: z.record(z.string(), z.array(z.object({ name: z.string(), type: z.string() }))),
	primaryType: z.string().min(1),
	domain: z.record(z.string(), z.unknown()),
	message: z.record(z.string(), z.unknown()),
});

export type TypedDataPayload = z.infer<typeof typedDataSchema>;

export type UserRequest =
	| { kind: "sendTransaction"; transaction: TransactionFields }
	| { kind: "signMessage"; address: Address; message: string; text: string }
	| { kind: "signTypedData"; address: Address; typedData: TypedDataPayload };

export function isUserRequestMethod(method: string): method is UserRequestMethod {
	return USER_REQUEST_METHODS.some((candidate) => candidate === method);
}

function firstIssue(error: z.ZodError, label: string): string {
	const issue = error.issues[0];
	if (!issue) return `${label}: invalid`;
	const location = [label, ...issue.path].join(".");
	return `${location}: ${issue.message}`;
}

function decodeMessageText(message: string): string {
	if (!isHex(message, { strict: true })) return message;
	try {
		return hexToString(message);
	} catch {
		return message;
	}
}

function parseSendTransaction(params: unknown[]): CodecResult<UserRequest> {
	const parsed = transactionSchema.safeParse(params[0]);
	if (!parsed.success) {
		return { success: false, error: firstIssue(parsed.error, "params.0") };
	}
	return { success: true, data: { kind: "sendTransaction", transaction: parsed.data } };
}

function parsePersonalSign(params: unknown[]): CodecResult<UserRequest> {
	const message = params[0];
	if (typeof message !== "string") {
		return { success: false, error: "params.0: expected a message string" };
	}
	const address = addressSchema.safeParse(params[1]);
	if (!address.success) {
		return { success: false, error: firstIssue(address.error, "params.1") };
	}
	return {
		success: true,
		data: { kind: "signMessage", address: address.data, message, text: decodeMessageText(message) },
	};
}

function parseSignTypedData(params: unknown[]): CodecResult<UserRequest> {
	const address = addressSchema.safeParse(params[0]);
	if (!address.success) {
		return { success: false, error: firstIssue(address.error, "params.0") };
	}
	let raw: unknown = params[1];
	if (typeof raw === "string") {
		try {
			raw = decodeJson(raw);
		} catch {
			return { success: false, error: "params.1: typed data is not valid JSON" };
		}
	}
	const typedData = typedDataSchema.safeParse(raw);
	if (!typedData.success) {
		return { success: false, error: firstIssue(typedData.error, "params.1") };
	}
	return {
		success: true,
		data: { kind: "signTypedData", address: address.data, typedData: typedData.data },
	};
}

/**
 * Typed view of a request that needs the user's decision. Returns null for
 * methods that never need one.
 */
export function parseUserRequest(request: JsonRpcRequest): CodecResult<UserRequest> | null {
	const method = request.method;
	if (!isUserRequestMethod(method)) return null;
	const params = request.params;
	if (!Array.isArray(params) || params.length < 1) {
		return { success: false, error: "params: expected a non-empty array" };
	}
	switch (method) {
		case "eth_sendTransaction":
			return parseSendTransaction(params);
		case "personal_sign":
			return parsePersonalSign(params);
		case "eth_signTypedData_v4":
			return parseSignTypedData(params);
	}
}
