import type { Address } from "viem";
import { oneshot, type OneshotSender } from "../jsonrpc/oneshot";
import { Override, type OverrideFn } from "../jsonrpc/override";
import {
	errorObject,
	failure,
	JsonRpcErrorCode,
	type JsonRpcRequest,
	type ResponsePayload,
	success,
} from "../jsonrpc/types";
import { parseUserRequest, type UserRequest } from "./requests";

export const ACCOUNT_METHODS = ["eth_accounts", "eth_requestAccounts"];

export interface UserRequestHandoff {
	request: JsonRpcRequest;
	userRequest: UserRequest;
	reply: OneshotSender<ResponsePayload>;
}

export interface WalletOverrideOptions {
	account?: Address;
	/**
	 * Receives every request that needs the user. The handler owns `reply`
	 * and must eventually send on it or close it.
	 */
	onUserRequest: (handoff: UserRequestHandoff) => void;
}

/**
 * Wallet policy: accounts are answered locally, signing and sending wait for
 * the user, everything else goes upstream.
 */
export function createWalletOverride(options: WalletOverrideOptions): OverrideFn {
	return (request) => {
		if (ACCOUNT_METHODS.includes(request.method)) {
			return Override.sync(success(options.account ? [options.account] : []));
		}

		const parsed = parseUserRequest(request);
		if (!parsed) return Override.forward();
		if (!parsed.success) {
			return Override.sync(
				failure(errorObject(JsonRpcErrorCode.InvalidParams, undefined, parsed.error)),
			);
		}

		const [reply, receiver] = oneshot<ResponsePayload>();
		options.onUserRequest({ request, userRequest: parsed.data, reply });
		return Override.async(receiver);
	};
}
