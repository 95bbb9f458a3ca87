import { type Address, getAddress, isAddress } from "viem";
import type { ApprovalPolicy } from "../types";

type OptionSpec = { takesValue: boolean };

type CommandOptionSpecs = Record<string, OptionSpec>;

const POLICY_OPTIONS: CommandOptionSpecs = {
	"--hostname": { takesValue: true },
	"--secret": { takesValue: true },
	"--account": { takesValue: true },
	"--on-request": { takesValue: true },
	"--timeout": { takesValue: true },
	"--cors": { takesValue: false },
	"--quiet": { takesValue: false },
};

export const OPTION_SPECS: Record<string, CommandOptionSpecs> = {
	proxy: {
		...POLICY_OPTIONS,
		"--upstream": { takesValue: true },
		"--save": { takesValue: false },
		"--port": { takesValue: true },
	},
	networks: {
		...POLICY_OPTIONS,
		"--base-port": { takesValue: true },
	},
};

export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

export function assertNoUnknownOptions(command: string, args: string[]): void {
	const specs = OPTION_SPECS[command];
	if (!specs) return;
	for (let i = 0; i < args.length; i += 1) {
		const arg = args[i];
		if (arg === undefined || arg === "--") return;
		if (!arg.startsWith("-")) continue;
		const spec = specs[arg];
		if (!spec) {
			throw new UsageError(`Unknown option ${arg}`);
		}
		if (spec.takesValue) {
			if (i + 1 >= args.length) {
				throw new UsageError(`Missing value for ${arg}`);
			}
			i += 1;
		}
	}
}

export function getFlagValue(args: string[], flags: string[]): string | undefined {
	const index = args.findIndex((arg) => flags.includes(arg));
	if (index === -1) return undefined;
	return args[index + 1];
}

export function parsePort(value: string, flag = "--port"): number {
	const parsed = Number.parseInt(value, 10);
	if (!/^\d+$/.test(value.trim()) || !Number.isFinite(parsed) || parsed < 0 || parsed > 65535) {
		throw new UsageError(`Invalid ${flag} value "${value}"`);
	}
	return parsed;
}

export function parseTimeout(value: string | undefined): number | undefined {
	if (value === undefined) return undefined;
	const parsed = Number.parseInt(value, 10);
	if (!/^\d+$/.test(value.trim()) || parsed <= 0) {
		throw new UsageError(`Invalid --timeout value "${value}" (milliseconds)`);
	}
	return parsed;
}

export function parseAccount(value: string | undefined): Address | undefined {
	if (value === undefined) return undefined;
	if (!isAddress(value, { strict: false })) {
		throw new UsageError(`Invalid --account address "${value}"`);
	}
	return getAddress(value);
}

export function parseApprovalPolicy(
	value: string | undefined,
	isInteractive: boolean,
): ApprovalPolicy {
	if (value === undefined) return isInteractive ? "prompt" : "reject";
	const normalized = value.toLowerCase();
	if (normalized === "prompt" || normalized === "forward" || normalized === "reject") {
		if (normalized === "prompt" && !isInteractive) {
			throw new UsageError("--on-request prompt needs an interactive terminal");
		}
		return normalized;
	}
	throw new UsageError(`Invalid --on-request value "${value}" (prompt|forward|reject)`);
}

export interface PolicyArgs {
	hostname?: string;
	secret?: string;
	account?: Address;
	policy: ApprovalPolicy;
	asyncTimeoutMs?: number;
	cors: boolean;
	quiet: boolean;
}

export function parsePolicyArgs(args: string[], isInteractive: boolean): PolicyArgs {
	return {
		hostname: getFlagValue(args, ["--hostname"]),
		secret: getFlagValue(args, ["--secret"]),
		account: parseAccount(getFlagValue(args, ["--account"])),
		policy: parseApprovalPolicy(getFlagValue(args, ["--on-request"]), isInteractive),
		asyncTimeoutMs: parseTimeout(getFlagValue(args, ["--timeout"])),
		cors: args.includes("--cors"),
		quiet: args.includes("--quiet"),
	};
}
