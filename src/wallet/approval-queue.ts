import type { OneshotSender } from "../jsonrpc/oneshot";
import {
	failure,
	type JsonRpcRequest,
	type ResponsePayload,
	userRejected,
} from "../jsonrpc/types";
import type { UserRequest } from "./requests";

export interface PendingUserRequest {
	id: number;
	request: JsonRpcRequest;
	userRequest: UserRequest;
	/** Name of the network whose proxy received the request, when several run. */
	network?: string;
	receivedAt: Date;
	/** Aborts when the caller stops waiting (disconnect or timeout). */
	signal: AbortSignal;
}

interface QueueEntry {
	pending: PendingUserRequest;
	reply: OneshotSender<ResponsePayload>;
	unsubscribe: () => void;
}

type Waiter = (pending: PendingUserRequest) => void;

/**
 * Requests waiting for the user, oldest first. An entry leaves the queue when
 * it is answered or when its caller stops waiting.
 */
export class ApprovalQueue {
	readonly #entries: QueueEntry[] = [];
	readonly #waiters = new Set<Waiter>();
	#nextId = 1;

	get size(): number {
		return this.#entries.length;
	}

	peek(): PendingUserRequest | undefined {
		return this.#entries[0]?.pending;
	}

	list(): PendingUserRequest[] {
		return this.#entries.map((entry) => entry.pending);
	}

	enqueue(input: {
		request: JsonRpcRequest;
		userRequest: UserRequest;
		reply: OneshotSender<ResponsePayload>;
		network?: string;
	}): PendingUserRequest {
		const controller = new AbortController();
		const pending: PendingUserRequest = {
			id: this.#nextId++,
			request: input.request,
			userRequest: input.userRequest,
			...(input.network === undefined ? {} : { network: input.network }),
			receivedAt: new Date(),
			signal: controller.signal,
		};

		if (input.reply.isClosed) {
			controller.abort();
			return pending;
		}

		const entry: QueueEntry = {
			pending,
			reply: input.reply,
			unsubscribe: () => undefined,
		};
		entry.unsubscribe = input.reply.onClose(() => {
			this.#remove(pending.id);
			controller.abort();
		});
		this.#entries.push(entry);

		const waiters = [...this.#waiters];
		this.#waiters.clear();
		for (const waiter of waiters) {
			waiter(pending);
		}
		return pending;
	}

	/** Resolves with the oldest pending request, waiting for one if the queue is empty. */
	next(signal?: AbortSignal): Promise<PendingUserRequest> {
		const head = this.peek();
		if (head) return Promise.resolve(head);
		if (signal?.aborted) return Promise.reject(signal.reason);

		return new Promise<PendingUserRequest>((resolve, reject) => {
			const onAbort = () => {
				this.#waiters.delete(waiter);
				reject(signal?.reason);
			};
			const waiter: Waiter = (pending) => {
				signal?.removeEventListener("abort", onAbort);
				resolve(pending);
			};
			this.#waiters.add(waiter);
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}

	/** Sends `payload` as the reply. False when the request is no longer pending. */
	approve(id: number, payload: ResponsePayload): boolean {
		const entry = this.#remove(id);
		if (!entry) return false;
		return entry.reply.send(payload);
	}

	/** Replies with the user-rejected error (-4001). */
	reject(id: number): boolean {
		return this.approve(id, failure(userRejected()));
	}

	/** Rejects everything still pending, e.g. on shutdown. */
	rejectAll(): number {
		let count = 0;
		for (const pending of this.list()) {
			if (this.reject(pending.id)) count += 1;
		}
		return count;
	}

	#remove(id: number): QueueEntry | undefined {
		const index = this.#entries.findIndex((entry) => entry.pending.id === id);
		if (index === -1) return undefined;
		const [entry] = this.#entries.splice(index, 1);
		entry?.unsubscribe();
		return entry;
	}
}
