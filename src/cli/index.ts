#!/usr/bin/env node
import { loadConfig, saveUpstream, UPSTREAM_ENV } from "../config";
import { errorMessage } from "../jsonrpc/errors";
import { createJsonRpcProxyServer } from "../jsonrpc/proxy";
import { createUpstreamForwarder, type ForwardFn, getUpstreamChainId } from "../jsonrpc/upstream";
import { createEventLogger, createNetworkEventLogger } from "../log";
import { ApprovalQueue } from "../wallet/approval-queue";
import { DEFAULT_BASE_PORT, generateSecret, startNetworkProxies } from "../wallet/networks";
import { createWalletOverride } from "../wallet/override";
import { runApprovalLoop } from "./approvals";
import {
	assertNoUnknownOptions,
	getFlagValue,
	type PolicyArgs,
	parsePolicyArgs,
	parsePort,
	UsageError,
} from "./args";
import { formatMissingUpstreamError, resolveProxyUpstreamUrl } from "./proxy-upstream";
import { renderError, renderHeading } from "./ui";

const DEFAULT_PROXY_PORT = 8545;
const DEFAULT_CLI_HOSTNAME = "127.0.0.1";

function printUsage() {
	console.log(`
rpcgate - Local JSON-RPC endpoint that asks before your wallet signs

Usage:
  rpcgate proxy [--upstream <rpc-url>] [--save] [--port <port>] [--hostname <host>] [--secret <secret>] [--account <address>] [--on-request <prompt|forward|reject>] [--timeout <ms>] [--cors] [--quiet]
  rpcgate networks [--base-port <port>] [--hostname <host>] [--secret <secret>] [--account <address>] [--on-request <prompt|forward|reject>] [--timeout <ms>] [--cors] [--quiet]

Options:
  --upstream     Upstream JSON-RPC HTTP URL to forward requests to
                 (default: $${UPSTREAM_ENV} or config "upstream")
  --save         Save --upstream to the config file
  --port         Port to bind (default: ${DEFAULT_PROXY_PORT})
  --base-port    First port for networks without rpcPort (default: ${DEFAULT_BASE_PORT})
  --hostname     Hostname to bind (default: config "hostname" or ${DEFAULT_CLI_HOSTNAME})
  --secret       URL path secret clients must POST to (default: random 32 bytes, hex)
  --account      Address answered for eth_accounts / eth_requestAccounts
  --on-request   What to do with eth_sendTransaction, personal_sign and eth_signTypedData_v4:
                 prompt (ask, default on a TTY), forward (approve all), reject (default otherwise)
  --timeout      How long a request may wait for a decision, in ms (default: 180000)
  --cors         Answer CORS preflights (dApps in a browser)
  --quiet        Suppress request logs

Approved requests are forwarded to the upstream node, which must hold the account
(for example a local development node).

Environment:
  ${UPSTREAM_ENV}        Default upstream JSON-RPC URL
  RPCGATE_ACCOUNT         Default account address
  RPCGATE_CONFIG          Config file path
`);
}

function isInteractive(): boolean {
	return Boolean(process.stdin.isTTY && process.stderr.isTTY);
}

function shutdownSignal(): AbortSignal {
	const controller = new AbortController();
	const stop = () => controller.abort();
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);
	return controller.signal;
}

async function runProxy(args: string[]) {
	const policyArgs = parsePolicyArgs(args, isInteractive());
	const port = parsePort(getFlagValue(args, ["--port"]) ?? String(DEFAULT_PROXY_PORT));
	const config = await loadConfig();
	const resolved = resolveProxyUpstreamUrl({
		cliUpstream: getFlagValue(args, ["--upstream"]),
		envUpstream: process.env[UPSTREAM_ENV],
		config,
	});
	if (!resolved) {
		console.error(renderError(formatMissingUpstreamError()));
		process.exit(1);
	}

	if (args.includes("--save")) {
		const savedPath = await saveUpstream(resolved.upstreamUrl);
		if (!policyArgs.quiet) {
			console.error(`Saved upstream to ${savedPath}`);
		}
	}

	const upstreamUrl = resolved.upstreamUrl;
	const hostname = policyArgs.hostname ?? config.hostname ?? DEFAULT_CLI_HOSTNAME;
	const secret = policyArgs.secret ?? generateSecret();
	const account = policyArgs.account ?? config.account;
	const queue = new ApprovalQueue();
	const forward = createUpstreamForwarder(upstreamUrl);
	const signal = shutdownSignal();

	const server = await createJsonRpcProxyServer({
		port,
		secret,
		upstreamUrl,
		hostname,
		asyncTimeoutMs: policyArgs.asyncTimeoutMs ?? config.asyncTimeoutMs,
		cors: policyArgs.cors,
		onEvent: createEventLogger({ quiet: policyArgs.quiet }),
		override: createWalletOverride({
			account,
			onUserRequest: (handoff) => {
				queue.enqueue(handoff);
			},
		}),
	});

	const chainId = await getUpstreamChainId(upstreamUrl);
	console.error(renderHeading(`JSON-RPC proxy listening on ${hostname}:${server.port}`));
	// Plain URL line so terminals auto-link it.
	console.log(`RPC URL: ${server.url}`);
	console.error(`Upstream: ${upstreamUrl} (${resolved.source})`);
	console.error(`Chain id: ${chainId ?? "unknown (upstream unreachable)"}`);
	console.error(`Account: ${account ?? "(none)"}`);
	console.error(`On request: ${policyArgs.policy}`);

	await runUntilStopped({
		signal,
		queue,
		policyArgs,
		forwardFor: () => forward,
		stopped: server.wait(),
		close: () => server.close(),
	});
}

async function runNetworks(args: string[]) {
	const policyArgs = parsePolicyArgs(args, isInteractive());
	const basePortValue = getFlagValue(args, ["--base-port"]);
	const basePort =
		basePortValue === undefined ? DEFAULT_BASE_PORT : parsePort(basePortValue, "--base-port");
	const config = await loadConfig();
	const networks = config.networks ?? [];
	if (networks.length === 0) {
		console.error(renderError('Error: no networks configured (add "networks" to the config file)'));
		process.exit(1);
	}

	const account = policyArgs.account ?? config.account;
	const queue = new ApprovalQueue();
	const forwarders = new Map<string, ForwardFn>();
	const signal = shutdownSignal();

	const started = await startNetworkProxies({
		networks,
		hostname: policyArgs.hostname ?? config.hostname ?? DEFAULT_CLI_HOSTNAME,
		basePort,
		secret: policyArgs.secret,
		asyncTimeoutMs: policyArgs.asyncTimeoutMs ?? config.asyncTimeoutMs,
		cors: policyArgs.cors,
		createOverride: (network, forward) => {
			forwarders.set(network.name, forward);
			return createWalletOverride({
				account,
				onUserRequest: (handoff) => {
					queue.enqueue({ ...handoff, network: network.name });
				},
			});
		},
		onEvent: policyArgs.quiet ? undefined : createNetworkEventLogger(),
	});

	console.error(renderHeading(`Started ${started.proxies.length} JSON-RPC proxies`));
	for (const proxy of started.proxies) {
		console.error(`${proxy.network.name}: port ${proxy.port} -> ${proxy.network.rpcUrl}`);
	}
	for (const [name, value] of Object.entries(started.env)) {
		console.log(`export ${name}=${value}`);
	}

	await runUntilStopped({
		signal,
		queue,
		policyArgs,
		forwardFor: (network) => (network ? forwarders.get(network) : undefined),
		stopped: Promise.all(started.proxies.map((proxy) => proxy.server.wait())).then(() => undefined),
		close: () => started.close(),
	});
}

async function runUntilStopped(options: {
	signal: AbortSignal;
	queue: ApprovalQueue;
	policyArgs: PolicyArgs;
	forwardFor: (network: string | undefined) => ForwardFn | undefined;
	stopped: Promise<void>;
	close: () => Promise<void>;
}) {
	const loopController = new AbortController();
	const shutdown = () => {
		loopController.abort();
		options.queue.rejectAll();
		options.close().catch((error: unknown) => {
			console.error(renderError(`Error while closing: ${errorMessage(error)}`));
		});
	};
	if (options.signal.aborted) {
		shutdown();
	} else {
		options.signal.addEventListener("abort", shutdown, { once: true });
	}

	const stopped = options.stopped.finally(() => loopController.abort());
	const loop = runApprovalLoop({
		queue: options.queue,
		policy: options.policyArgs.policy,
		signal: loopController.signal,
		forward: async (pending) => {
			const forward = options.forwardFor(pending.network);
			if (!forward) {
				throw new Error(`No upstream for network ${pending.network ?? "(default)"}`);
			}
			return await forward(pending.request, pending.signal);
		},
	});

	await Promise.all([loop, stopped]);
}

async function main() {
	const args = process.argv.slice(2);

	if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
		printUsage();
		process.exit(0);
	}

	const command = args[0];
	const commandArgs = args.slice(1);
	if (command === "proxy") {
		assertNoUnknownOptions(command, commandArgs);
		await runProxy(commandArgs);
		return;
	}
	if (command === "networks") {
		assertNoUnknownOptions(command, commandArgs);
		await runNetworks(commandArgs);
		return;
	}

	console.error(`Unknown command: ${command}`);
	printUsage();
	process.exit(1);
}

main().catch((error: unknown) => {
	if (error instanceof UsageError) {
		console.error(renderError(`Error: ${error.message}`));
		process.exit(1);
	}
	console.error(renderError(errorMessage(error)));
	process.exit(1);
});
