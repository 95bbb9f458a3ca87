import path from "node:path";
import os from "node:os";
import { describe, expect, test } from "vitest";
import { formatMissingUpstreamError, resolveProxyUpstreamUrl } from "../src/cli/proxy-upstream";
import { CONFIG_ENV } from "../src/config";

function setEnv(key: string, value: string | undefined) {
	if (value === undefined) {
		delete process.env[key];
		return;
	}
	process.env[key] = value;
}

describe("proxy upstream", () => {
	test("resolution order: cli > env > config", () => {
		const config = { upstream: "https://config.example" };

		expect(
			resolveProxyUpstreamUrl({
				cliUpstream: "https://cli.example",
				envUpstream: "https://env.example",
				config,
			}),
		).toEqual({ upstreamUrl: "https://cli.example", source: "cli" });

		expect(
			resolveProxyUpstreamUrl({
				cliUpstream: undefined,
				envUpstream: "https://env.example",
				config,
			}),
		).toEqual({ upstreamUrl: "https://env.example", source: "env" });

		expect(
			resolveProxyUpstreamUrl({ cliUpstream: "  ", envUpstream: undefined, config }),
		).toEqual({ upstreamUrl: "https://config.example", source: "config" });
	});

	test("nothing configured resolves to null", () => {
		expect(
			resolveProxyUpstreamUrl({ cliUpstream: undefined, envUpstream: "", config: {} }),
		).toBeNull();
	});

	test("missing upstream error message shows env var + config path", () => {
		const tempConfigPath = path.join(os.tmpdir(), "rpcgate-upstream", "config.json");
		const previous = process.env[CONFIG_ENV];
		try {
			setEnv(CONFIG_ENV, tempConfigPath);
			expect(formatMissingUpstreamError()).toBe(
				[
					"Error: no upstream JSON-RPC URL configured.",
					"Provide one of:",
					"  --upstream <rpc-url>",
					"  RPCGATE_UPSTREAM=<rpc-url>",
					`  "upstream": "<rpc-url>" in ${tempConfigPath}`,
				].join("\n"),
			);
		} finally {
			setEnv(CONFIG_ENV, previous);
		}
	});
});
