import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import { decodeJson, parseErrorResponse, serializeResponse } from "./codec";
import { DEFAULT_ASYNC_TIMEOUT_MS, dispatchPayload, type ProxyEventSink } from "./dispatcher";
import { PortBindingFailedError, ServerCrashedError } from "./errors";
import { forwardAll, type OverrideFn } from "./override";
import { createUpstreamForwarder } from "./upstream";

export const DEFAULT_BIND_HOSTNAME = "0.0.0.0";

export interface ProxyOptions {
	port: number;
	/** Path component clients must POST to (`/<secret>`); empty means `/`. */
	secret: string;
	upstreamUrl: string;
	override?: OverrideFn;
	hostname?: string;
	asyncTimeoutMs?: number;
	/** Answer CORS preflights and add CORS headers, for dApps running in a browser. */
	cors?: boolean;
	onEvent?: ProxyEventSink;
}

export interface ServeOptions extends ProxyOptions {
	/** Closes the listener; `serve` resolves once it has stopped. */
	signal?: AbortSignal;
}

export interface JsonRpcProxyServer {
	readonly port: number;
	readonly hostname: string;
	readonly url: string;
	/** Settles when the listener stops: resolves on `close()`, rejects with `ServerCrashedError`. */
	wait(): Promise<void>;
	close(): Promise<void>;
}

function corsHeaders(): Record<string, string> {
	return {
		"access-control-allow-origin": "*",
		"access-control-allow-methods": "POST, OPTIONS",
		"access-control-allow-headers": "content-type",
		"access-control-max-age": "86400",
	};
}

function routePath(secret: string): string {
	return `/${secret}`;
}

function requestPath(request: IncomingMessage): string {
	const pathname = new URL(request.url ?? "/", "http://localhost").pathname;
	try {
		return decodeURIComponent(pathname);
	} catch {
		return pathname;
	}
}

async function readBody(request: IncomingMessage): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of request) {
		chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
	}
	return Buffer.concat(chunks).toString("utf-8");
}

function writeJson(
	response: ServerResponse,
	status: number,
	body: string,
	headers: Record<string, string> = {},
): void {
	response.writeHead(status, { "content-type": "application/json", ...headers });
	response.end(body);
}

function displayHost(hostname: string): string {
	if (hostname === "0.0.0.0" || hostname === "::") return "127.0.0.1";
	return hostname.includes(":") ? `[${hostname}]` : hostname;
}

export function createRequestListener(options: ProxyOptions) {
	const override = options.override ?? forwardAll;
	const forward = createUpstreamForwarder(options.upstreamUrl);
	const asyncTimeoutMs = options.asyncTimeoutMs ?? DEFAULT_ASYNC_TIMEOUT_MS;
	const path = routePath(options.secret);
	const extraHeaders = options.cors ? corsHeaders() : {};

	return async (request: IncomingMessage, response: ServerResponse): Promise<void> => {
		if (requestPath(request) !== path) {
			writeJson(response, 404, JSON.stringify({ error: "Not found" }));
			return;
		}
		if (options.cors && request.method === "OPTIONS") {
			response.writeHead(204, extraHeaders);
			response.end();
			return;
		}
		if (request.method !== "POST") {
			writeJson(response, 405, JSON.stringify({ error: "Method not allowed" }), {
				allow: "POST",
				...extraHeaders,
			});
			return;
		}

		const controller = new AbortController();
		response.on("close", () => {
			if (!response.writableFinished) {
				controller.abort();
			}
		});

		let rawBody: string;
		try {
			rawBody = await readBody(request);
		} catch (error) {
			response.destroy(error instanceof Error ? error : undefined);
			return;
		}

		let body: unknown;
		try {
			body = decodeJson(rawBody);
		} catch {
			const reason = "request body is not valid JSON";
			options.onEvent?.({ type: "parse_error", reason });
			writeJson(response, 400, serializeResponse(parseErrorResponse(reason)), extraHeaders);
			return;
		}

		const reply = await dispatchPayload(body, {
			override,
			forward,
			asyncTimeoutMs,
			signal: controller.signal,
			onEvent: options.onEvent,
		});
		if (controller.signal.aborted || response.destroyed) return;
		writeJson(response, 200, serializeResponse(reply), extraHeaders);
	};
}

function listen(server: Server, port: number, hostname: string): Promise<AddressInfo> {
	return new Promise((resolve, reject) => {
		const onError = (error: Error) => {
			reject(new PortBindingFailedError(port, error));
		};
		server.once("error", onError);
		server.listen(port, hostname, () => {
			server.off("error", onError);
			const address = server.address();
			if (address === null || typeof address === "string") {
				reject(new PortBindingFailedError(port, new Error("listener has no TCP address")));
				return;
			}
			resolve(address);
		});
	});
}

export async function createJsonRpcProxyServer(options: ProxyOptions): Promise<JsonRpcProxyServer> {
	const hostname = options.hostname ?? DEFAULT_BIND_HOSTNAME;
	const listener = createRequestListener(options);
	const server = createServer((request, response) => {
		listener(request, response).catch((error: unknown) => {
			// Dispatch never throws; this only guards socket-level write failures.
			response.destroy(error instanceof Error ? error : undefined);
		});
	});

	const address = await listen(server, options.port, hostname);

	let closing = false;
	const stopped = new Promise<void>((resolve, reject) => {
		server.once("close", () => resolve());
		server.once("error", (error) => {
			if (!closing) reject(new ServerCrashedError(error));
		});
	});
	// wait() may never be called; keep a crash from surfacing as an unhandled rejection.
	stopped.catch(() => undefined);

	return {
		port: address.port,
		hostname,
		url: `http://${displayHost(hostname)}:${address.port}${routePath(options.secret)}`,
		wait: () => stopped,
		close: async () => {
			if (closing) return await stopped;
			closing = true;
			await new Promise<void>((resolve, reject) => {
				server.close((error) => (error ? reject(error) : resolve()));
				server.closeAllConnections();
			});
		},
	};
}

/**
 * Runs the proxy until `signal` aborts or the server fails. Startup errors
 * (`PortBindingFailedError`) and later crashes (`ServerCrashedError`) reject;
 * nothing inside request handling does.
 */
export async function serve(options: ServeOptions): Promise<void> {
	const server = await createJsonRpcProxyServer(options);
	const signal = options.signal;
	if (signal) {
		const stop = () => {
			// close() only fails once the listener is down, and wait() reports that.
			server.close().catch(() => undefined);
		};
		if (signal.aborted) {
			stop();
		} else {
			signal.addEventListener("abort", stop, { once: true });
		}
	}
	await server.wait();
}
