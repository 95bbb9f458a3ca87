import type { OneshotReceiver } from "./oneshot";
import type { JsonRpcRequest, ResponsePayload } from "./types";

export type OverrideOutcome =
	| { kind: "sync"; payload: ResponsePayload }
	| { kind: "async"; receiver: OneshotReceiver<ResponsePayload> }
	| { kind: "forward" };

export type OverrideRoute = OverrideOutcome["kind"];

/**
 * Decides how a request is answered. Throwing (or rejecting) is reported to
 * the caller as an Internal error carrying the message. It runs once per
 * request and may run concurrently for requests on different connections.
 */
export type OverrideFn = (request: JsonRpcRequest) => OverrideOutcome | Promise<OverrideOutcome>;

export const Override = {
	sync(payload: ResponsePayload): OverrideOutcome {
		return { kind: "sync", payload };
	},
	async(receiver: OneshotReceiver<ResponsePayload>): OverrideOutcome {
		return { kind: "async", receiver };
	},
	forward(): OverrideOutcome {
		return { kind: "forward" };
	},
};

export const forwardAll: OverrideFn = () => Override.forward();
