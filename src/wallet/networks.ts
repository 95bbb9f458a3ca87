import { randomBytes } from "node:crypto";
import { bytesToHex } from "viem";
import type { ProxyEvent } from "../jsonrpc/dispatcher";
import type { OverrideFn } from "../jsonrpc/override";
import { createJsonRpcProxyServer, type JsonRpcProxyServer } from "../jsonrpc/proxy";
import { createUpstreamForwarder, type ForwardFn } from "../jsonrpc/upstream";
import type { NetworkConfig } from "../types";

export const DEFAULT_BASE_PORT = 9393;

export interface NetworkProxy {
	network: NetworkConfig;
	port: number;
	/** Client-facing URL including the secret path. */
	url: string;
	envVar: string;
	server: JsonRpcProxyServer;
}

export interface NetworkProxies {
	secret: string;
	proxies: NetworkProxy[];
	env: Record<string, string>;
	close: () => Promise<void>;
}

export interface StartNetworkProxiesOptions {
	networks: NetworkConfig[];
	hostname?: string;
	/** First port handed out; each network without `rpcPort` takes the next one. 0 binds ephemeral ports. */
	basePort?: number;
	secret?: string;
	asyncTimeoutMs?: number;
	cors?: boolean;
	createOverride: (network: NetworkConfig, forward: ForwardFn) => OverrideFn;
	onEvent?: (network: NetworkConfig, event: ProxyEvent) => void;
}

export function generateSecret(): string {
	return bytesToHex(randomBytes(32)).slice(2);
}

export function rpcUrlEnvVar(networkName: string): string {
	return `${networkName.toUpperCase().replace(/ /g, "_")}_RPC_URL`;
}

export async function startNetworkProxies(
	options: StartNetworkProxiesOptions,
): Promise<NetworkProxies> {
	const secret = options.secret ?? generateSecret();
	const basePort = options.basePort ?? DEFAULT_BASE_PORT;
	const proxies: NetworkProxy[] = [];
	const env: Record<string, string> = {};

	const closeAll = async () => {
		await Promise.all(proxies.map((proxy) => proxy.server.close()));
	};

	for (const [index, network] of options.networks.entries()) {
		const port = network.rpcPort ?? (basePort === 0 ? 0 : basePort + index);
		const forward = createUpstreamForwarder(network.rpcUrl);
		let server: JsonRpcProxyServer;
		try {
			server = await createJsonRpcProxyServer({
				port,
				secret,
				upstreamUrl: network.rpcUrl,
				hostname: options.hostname,
				asyncTimeoutMs: options.asyncTimeoutMs,
				cors: options.cors,
				override: options.createOverride(network, forward),
				onEvent: options.onEvent
					? (event) => options.onEvent?.(network, event)
					: undefined,
			});
		} catch (error) {
			await closeAll();
			throw error;
		}

		const envVar = rpcUrlEnvVar(network.name);
		const url = `http://localhost:${server.port}/${secret}`;
		env[envVar] = url;
		proxies.push({ network, port: server.port, url, envVar, server });
	}

	return { secret, proxies, env, close: closeAll };
}
