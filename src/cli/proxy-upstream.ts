import { resolveUserConfigPathForWrite, UPSTREAM_ENV } from "../config";
import type { Config } from "../types";

export type UpstreamSource = "cli" | "env" | "config";

function nonEmpty(value: string | undefined): string | undefined {
	if (typeof value !== "string") return undefined;
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : undefined;
}

/** `--upstream` wins over `$RPCGATE_UPSTREAM`, which wins over the config file. */
export function resolveProxyUpstreamUrl(options: {
	cliUpstream: string | undefined;
	envUpstream: string | undefined;
	config: Config;
}): { upstreamUrl: string; source: UpstreamSource } | null {
	const cli = nonEmpty(options.cliUpstream);
	if (cli) return { upstreamUrl: cli, source: "cli" };
	const env = nonEmpty(options.envUpstream);
	if (env) return { upstreamUrl: env, source: "env" };
	const fromConfig = nonEmpty(options.config.upstream);
	if (fromConfig) return { upstreamUrl: fromConfig, source: "config" };
	return null;
}

export function formatMissingUpstreamError(): string {
	const configPath = resolveUserConfigPathForWrite();
	return [
		"Error: no upstream JSON-RPC URL configured.",
		"Provide one of:",
		"  --upstream <rpc-url>",
		`  ${UPSTREAM_ENV}=<rpc-url>`,
		`  "upstream": "<rpc-url>" in ${configPath}`,
	].join("\n");
}
