function causeMessage(cause: unknown): string {
	if (cause instanceof Error) return cause.message;
	return String(cause);
}

export class PortBindingFailedError extends Error {
	port: number;

	constructor(port: number, cause: unknown) {
		super(`Failed to bind to port ${port}. (Error: ${causeMessage(cause)})`, { cause });
		this.name = "PortBindingFailedError";
		this.port = port;
	}
}

export class ServerCrashedError extends Error {
	constructor(cause: unknown) {
		super(`Server crashed. (Error: ${causeMessage(cause)})`, { cause });
		this.name = "ServerCrashedError";
	}
}

export class OneshotClosedError extends Error {
	constructor() {
		super("Async reply sender closed without sending a response");
		this.name = "OneshotClosedError";
	}
}

export class OneshotTimeoutError extends Error {
	timeoutMs: number;

	constructor(timeoutMs: number) {
		super(`Timed out after ${timeoutMs}ms waiting for async reply`);
		this.name = "OneshotTimeoutError";
		this.timeoutMs = timeoutMs;
	}
}

export class OneshotCancelledError extends Error {
	constructor() {
		super("Request cancelled before async reply arrived");
		this.name = "OneshotCancelledError";
	}
}

export class UpstreamRequestFailedError extends Error {
	status?: number;

	constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
		super(
			`Forwarded RPC call failed. (Error: ${message})`,
			options.cause === undefined ? undefined : { cause: options.cause },
		);
		this.name = "UpstreamRequestFailedError";
		this.status = options.status;
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
