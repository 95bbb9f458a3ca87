import pc from "picocolors";
import { formatEther, hexToBigInt, size } from "viem";
import { encodeJson } from "../jsonrpc/codec";
import type { PendingUserRequest } from "../wallet/approval-queue";
import type { TransactionFields, TypedDataPayload } from "../wallet/requests";

const COLORS = {
	ok: pc.green,
	warning: pc.yellow,
	danger: pc.red,
	// High-contrast on purpose: dim/gray is unreadable on many terminal themes.
	dim: pc.white,
	label: pc.cyan,
};

const MAX_MESSAGE_LINES = 12;

export function stripAnsi(input: string): string {
	// biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape sequence
	return input.replace(/\x1b\[[0-9;]*m/g, "");
}

function cleanLabel(input: string): string {
	return input
		.replace(/[\r\t]+/g, " ")
		// biome-ignore lint/suspicious/noControlCharactersInRegex: strip terminal control characters
		.replace(/[\x00-\x09\x0b-\x1f\x7f]/g, "")
		.trim();
}

function field(label: string, value: string): string {
	return `  ${COLORS.label(label.padEnd(9))} ${value}`;
}

function formatValue(value: `0x${string}` | undefined): string {
	if (!value) return "0 ETH";
	return `${formatEther(hexToBigInt(value))} ETH`;
}

function formatData(data: `0x${string}` | undefined): string {
	if (!data || data === "0x") return "(none)";
	const bytes = size(data);
	const preview = data.length > 74 ? `${data.slice(0, 74)}…` : data;
	return `${preview} (${bytes} bytes)`;
}

function transactionLines(tx: TransactionFields): string[] {
	const lines = [
		field("from", tx.from),
		field("to", tx.to ?? COLORS.warning("(contract creation)")),
		field("value", formatValue(tx.value)),
		field("data", formatData(tx.data ?? tx.input)),
	];
	if (tx.chainId) {
		lines.push(field("chainId", hexToBigInt(tx.chainId).toString()));
	}
	if (tx.gas) {
		lines.push(field("gas", hexToBigInt(tx.gas).toString()));
	}
	if (tx.nonce) {
		lines.push(field("nonce", hexToBigInt(tx.nonce).toString()));
	}
	return lines;
}

function messageLines(text: string): string[] {
	const rows = cleanLabel(text).split("\n");
	const shown = rows.slice(0, MAX_MESSAGE_LINES).map((row) => `    ${row}`);
	if (rows.length > MAX_MESSAGE_LINES) {
		shown.push(`    … ${rows.length - MAX_MESSAGE_LINES} more lines`);
	}
	return shown;
}

function typedDataLines(typedData: TypedDataPayload): string[] {
	const lines = [field("type", typedData.primaryType)];
	const domain = typedData.domain;
	if (typeof domain.name === "string") {
		lines.push(field("domain", cleanLabel(domain.name)));
	}
	if (
		typeof domain.chainId === "number" ||
		typeof domain.chainId === "bigint" ||
		typeof domain.chainId === "string"
	) {
		lines.push(field("chainId", String(domain.chainId)));
	}
	if (typeof domain.verifyingContract === "string") {
		lines.push(field("contract", domain.verifyingContract));
	}
	lines.push(field("message", ""));
	lines.push(...messageLines(encodeJson(typedData.message, 2)));
	return lines;
}

export function renderUserRequest(pending: PendingUserRequest, networkName?: string): string {
	const suffix = networkName ? ` on ${networkName}` : "";
	const user = pending.userRequest;
	switch (user.kind) {
		case "sendTransaction":
			return [
				renderHeading(`#${pending.id} Send transaction${suffix}`),
				...transactionLines(user.transaction),
			].join("\n");
		case "signMessage":
			return [
				renderHeading(`#${pending.id} Sign message${suffix}`),
				field("address", user.address),
				field("message", ""),
				...messageLines(user.text),
			].join("\n");
		case "signTypedData":
			return [
				renderHeading(`#${pending.id} Sign typed data${suffix}`),
				field("address", user.address),
				...typedDataLines(user.typedData),
			].join("\n");
	}
}

export function renderOk(text: string): string {
	return COLORS.ok(text);
}

export function renderWarning(text: string): string {
	return COLORS.warning(text);
}

export function renderHeading(text: string): string {
	return pc.bold(COLORS.dim(text));
}

export function renderError(text: string): string {
	return COLORS.danger(text);
}
