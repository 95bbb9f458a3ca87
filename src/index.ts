export {
	type CodecResult,
	decodeJson,
	encodeJson,
	type ParsedPayload,
	parseErrorResponse,
	parseRequest,
	parseRequestPayload,
	parseResponse,
	serializeRequest,
	serializeResponse,
} from "./jsonrpc/codec";
export {
	DEFAULT_ASYNC_TIMEOUT_MS,
	type DispatchContext,
	dispatchPayload,
	dispatchRequest,
	type ProxyEvent,
	type ProxyEventSink,
} from "./jsonrpc/dispatcher";
export {
	OneshotCancelledError,
	OneshotClosedError,
	OneshotTimeoutError,
	PortBindingFailedError,
	ServerCrashedError,
	UpstreamRequestFailedError,
} from "./jsonrpc/errors";
export { oneshot, type OneshotReceiver, type OneshotSender } from "./jsonrpc/oneshot";
export {
	forwardAll,
	Override,
	type OverrideFn,
	type OverrideOutcome,
	type OverrideRoute,
} from "./jsonrpc/override";
export {
	createJsonRpcProxyServer,
	DEFAULT_BIND_HOSTNAME,
	type JsonRpcProxyServer,
	type ProxyOptions,
	type ServeOptions,
	serve,
} from "./jsonrpc/proxy";
export {
	errorObject,
	failure,
	JSONRPC_VERSION,
	JsonRpcErrorCode,
	type JsonRpcErrorObject,
	type JsonRpcId,
	type JsonRpcRequest,
	type JsonRpcResponse,
	type ResponsePayload,
	success,
	userRejected,
} from "./jsonrpc/types";
export { createUpstreamForwarder, type ForwardFn, forwardToUpstream } from "./jsonrpc/upstream";
export { loadConfig } from "./config";
export type { ApprovalPolicy, Config, NetworkConfig } from "./types";
export { ApprovalQueue, type PendingUserRequest } from "./wallet/approval-queue";
export { generateSecret, rpcUrlEnvVar, startNetworkProxies } from "./wallet/networks";
export { createWalletOverride, type WalletOverrideOptions } from "./wallet/override";
export { parseUserRequest, type UserRequest } from "./wallet/requests";
