import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { getAddress, isAddress } from "viem";
import type { Config, NetworkConfig } from "./types";

export const CONFIG_ENV = "RPCGATE_CONFIG";
export const UPSTREAM_ENV = "RPCGATE_UPSTREAM";
export const ACCOUNT_ENV = "RPCGATE_ACCOUNT";

export const DEFAULT_USER_CONFIG_PATH = path.join(os.homedir(), ".config", "rpcgate", "config.json");

function defaultConfigPaths(): string[] {
	return [path.resolve(process.cwd(), "rpcgate.config.json"), DEFAULT_USER_CONFIG_PATH];
}

export async function loadConfig(): Promise<Config> {
	const configPath = resolveConfigPath();
	const fileConfig = configPath ? await readConfigFile(configPath) : {};
	const envConfig = loadEnvConfig();
	return mergeConfig(fileConfig, envConfig);
}

export function resolveUserConfigPathForWrite(): string {
	const explicitPath = process.env[CONFIG_ENV];
	return explicitPath && explicitPath.trim().length > 0 ? explicitPath : DEFAULT_USER_CONFIG_PATH;
}

export async function saveUpstream(rpcUrl: string): Promise<string> {
	const configPath = resolveUserConfigPathForWrite();
	await mkdir(path.dirname(configPath), { recursive: true });

	const existing = await readJsonRecordIfExists(configPath);
	const next: Record<string, unknown> = { ...existing, upstream: rpcUrl };

	await writeFile(configPath, `${JSON.stringify(next, null, 2)}\n`, "utf-8");
	return configPath;
}

function resolveConfigPath(): string | undefined {
	const explicitPath = process.env[CONFIG_ENV];
	if (explicitPath) {
		if (!existsSync(explicitPath)) {
			throw new Error(`Config file not found at ${explicitPath}`);
		}
		return explicitPath;
	}
	for (const candidate of defaultConfigPaths()) {
		if (existsSync(candidate)) {
			return candidate;
		}
	}
	return undefined;
}

function loadEnvConfig(): Config {
	const config: Config = {};
	const upstream = process.env[UPSTREAM_ENV];
	if (isNonEmptyString(upstream)) {
		config.upstream = upstream.trim();
	}
	const account = process.env[ACCOUNT_ENV];
	if (isNonEmptyString(account)) {
		if (!isAddress(account.trim(), { strict: false })) {
			throw new Error(`${ACCOUNT_ENV} is not a valid address: ${account}`);
		}
		config.account = getAddress(account.trim());
	}
	return config;
}

async function readConfigFile(configPath: string): Promise<Config> {
	const raw = await readFile(configPath, "utf-8");
	const parsed = safeJsonParse(raw);
	if (parsed === null) {
		throw new Error(`Invalid JSON in config file: ${configPath}`);
	}
	return parseConfig(parsed);
}

function safeJsonParse(raw: string): unknown | null {
	try {
		return JSON.parse(raw);
	} catch {
		return null;
	}
}

async function readJsonRecordIfExists(configPath: string): Promise<Record<string, unknown>> {
	if (!existsSync(configPath)) return {};
	const raw = await readFile(configPath, "utf-8");
	const parsed = safeJsonParse(raw);
	if (parsed === null) {
		throw new Error(`Invalid JSON in config file: ${configPath}`);
	}
	if (!isRecord(parsed)) {
		throw new Error(`Config file must contain a JSON object: ${configPath}`);
	}
	return parsed;
}

export function parseConfig(value: unknown): Config {
	if (!isRecord(value)) {
		return {};
	}
	const config: Config = {};
	if (isHttpUrl(value.upstream)) {
		config.upstream = value.upstream.trim();
	}
	if (typeof value.account === "string" && isAddress(value.account.trim(), { strict: false })) {
		config.account = getAddress(value.account.trim());
	}
	if (isNonEmptyString(value.hostname)) {
		config.hostname = value.hostname.trim();
	}
	if (
		typeof value.asyncTimeoutMs === "number" &&
		Number.isInteger(value.asyncTimeoutMs) &&
		value.asyncTimeoutMs > 0
	) {
		config.asyncTimeoutMs = value.asyncTimeoutMs;
	}
	const networks = parseNetworks(value.networks);
	if (networks) {
		config.networks = networks;
	}
	return config;
}

function parseNetworks(value: unknown): NetworkConfig[] | undefined {
	if (!Array.isArray(value)) return undefined;
	const networks: NetworkConfig[] = [];
	const seen = new Set<string>();
	for (const entry of value) {
		if (!isRecord(entry)) continue;
		if (!isNonEmptyString(entry.name) || !isHttpUrl(entry.rpcUrl)) continue;
		const name = entry.name.trim();
		// Two networks with one name would export the same *_RPC_URL variable.
		if (seen.has(name.toLowerCase())) continue;
		seen.add(name.toLowerCase());
		const network: NetworkConfig = { name, rpcUrl: entry.rpcUrl.trim() };
		if (isPort(entry.rpcPort)) {
			network.rpcPort = entry.rpcPort;
		}
		networks.push(network);
	}
	return networks.length > 0 ? networks : undefined;
}

function mergeConfig(base: Config, override: Config): Config {
	return {
		upstream: override.upstream ?? base.upstream,
		account: override.account ?? base.account,
		hostname: override.hostname ?? base.hostname,
		asyncTimeoutMs: override.asyncTimeoutMs ?? base.asyncTimeoutMs,
		networks: override.networks ?? base.networks,
	};
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
	return typeof value === "string" && value.trim().length > 0;
}

function isHttpUrl(value: unknown): value is string {
	if (!isNonEmptyString(value)) return false;
	try {
		const url = new URL(value.trim());
		return url.protocol === "http:" || url.protocol === "https:";
	} catch {
		return false;
	}
}

function isPort(value: unknown): value is number {
	return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 65535;
}
