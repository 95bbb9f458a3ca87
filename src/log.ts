import pc from "picocolors";
import type { ProxyEvent, ProxyEventSink } from "./jsonrpc/dispatcher";
import type { JsonRpcId } from "./jsonrpc/types";

export interface EventLoggerOptions {
	quiet?: boolean;
	/** Defaults to stderr so stdout stays usable for `export` lines. */
	write?: (line: string) => void;
	/** Prefix for multi-network setups, e.g. the network name. */
	label?: string;
}

function formatId(id: JsonRpcId): string {
	if (id === null) return "null";
	if (typeof id === "bigint") return id.toString();
	return JSON.stringify(id);
}

export function formatEvent(event: ProxyEvent, label?: string): string {
	const prefix = label ? `[${label}] ` : "";
	if (event.type === "parse_error") {
		return `${prefix}${pc.red("✗")} parse error: ${event.reason}`;
	}
	const route = event.route ?? "error";
	const ms = `${Math.round(event.durationMs)}ms`;
	if (!event.ok) {
		return `${prefix}${pc.red("✗")} ${event.method} id=${formatId(event.id)} ${route} ${ms}: ${event.error ?? "failed"}`;
	}
	return `${prefix}${pc.green("✓")} ${event.method} id=${formatId(event.id)} ${route} ${ms}`;
}

export function createEventLogger(options: EventLoggerOptions = {}): ProxyEventSink {
	if (options.quiet) {
		return () => undefined;
	}
	const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
	return (event) => {
		write(formatEvent(event, options.label));
	};
}

/** Event sink for several proxies: one logger per network, labelled with its name. */
export function createNetworkEventLogger(
	options: Omit<EventLoggerOptions, "label"> = {},
): (network: { name: string }, event: ProxyEvent) => void {
	const loggers = new Map<string, ProxyEventSink>();
	return (network, event) => {
		let log = loggers.get(network.name);
		if (!log) {
			log = createEventLogger({ ...options, label: network.name });
			loggers.set(network.name, log);
		}
		log(event);
	};
}
