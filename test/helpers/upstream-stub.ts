import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";

export type StubReply = { status?: number; json?: unknown; text?: string };

export type StubHandler = (body: unknown) => StubReply | Promise<StubReply>;

export interface UpstreamStub {
	url: string;
	/** Parsed JSON bodies in the order they arrived. */
	requests: unknown[];
	close: () => Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Answers `result: "upstream:<method>"` with the id it was sent. */
export const echoMethodHandler: StubHandler = (body) => {
	if (!isRecord(body)) {
		return { status: 400, json: { error: "expected an object" } };
	}
	return {
		json: { jsonrpc: "2.0", result: `upstream:${String(body.method)}`, id: body.id ?? null },
	};
};

export async function startUpstreamStub(
	handler: StubHandler = echoMethodHandler,
): Promise<UpstreamStub> {
	const requests: unknown[] = [];
	const server: Server = createServer((request, response) => {
		const chunks: Buffer[] = [];
		request.on("data", (chunk: Buffer) => chunks.push(chunk));
		request.on("end", () => {
			const raw = Buffer.concat(chunks).toString("utf-8");
			const body: unknown = raw.length > 0 ? JSON.parse(raw) : undefined;
			requests.push(body);
			Promise.resolve(handler(body))
				.then((reply) => {
					response.writeHead(reply.status ?? 200, { "content-type": "application/json" });
					response.end(reply.text ?? JSON.stringify(reply.json));
				})
				.catch((error: unknown) => {
					response.writeHead(500);
					response.end(String(error));
				});
		});
	});

	await new Promise<void>((resolve) => {
		server.listen(0, "127.0.0.1", () => resolve());
	});
	const address = server.address();
	if (address === null || typeof address === "string") {
		throw new Error("upstream stub has no TCP address");
	}
	const { port } = address satisfies AddressInfo;

	return {
		url: `http://127.0.0.1:${port}`,
		requests,
		close: () =>
			new Promise<void>((resolve, reject) => {
				server.close((error) => (error ? reject(error) : resolve()));
				server.closeAllConnections();
			}),
	};
}
