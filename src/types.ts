import type { Address } from "viem";

export type ApprovalPolicy = "prompt" | "forward" | "reject";

export interface NetworkConfig {
	name: string;
	rpcUrl: string;
	rpcPort?: number;
}

export interface Config {
	upstream?: string;
	account?: Address;
	hostname?: string;
	asyncTimeoutMs?: number;
	networks?: NetworkConfig[];
}
