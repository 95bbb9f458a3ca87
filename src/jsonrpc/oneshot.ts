import { OneshotCancelledError, OneshotClosedError, OneshotTimeoutError } from "./errors";

/**
 * Sending half of a single-use channel. Whoever will produce the reply holds
 * it; `onClose` fires when the receiving side goes away first (timeout,
 * client disconnect) so the producer can abandon its work.
 */
export interface OneshotSender<T> {
	/** Returns false when the value can no longer be delivered. */
	send(value: T): boolean;
	/** Drops the sender without a value; the receiver fails with `OneshotClosedError`. */
	close(): void;
	readonly isClosed: boolean;
	onClose(listener: () => void): () => void;
}

export interface OneshotRecvOptions {
	timeoutMs?: number;
	signal?: AbortSignal;
}

export interface OneshotReceiver<T> {
	recv(options?: OneshotRecvOptions): Promise<T>;
	close(): void;
}

type ChannelState = "open" | "sent" | "senderClosed" | "receiverClosed";

interface Waiter<T> {
	resolve: (value: T) => void;
	reject: (error: Error) => void;
}

class OneshotChannel<T> {
	#state: ChannelState = "open";
	#box: { value: T } | null = null;
	#waiter: Waiter<T> | null = null;
	#consumed = false;
	readonly #closeListeners = new Set<() => void>();

	get isClosed(): boolean {
		return this.#state !== "open";
	}

	send(value: T): boolean {
		if (this.#state !== "open") return false;
		this.#state = "sent";
		this.#box = { value };
		this.#closeListeners.clear();
		const waiter = this.#waiter;
		this.#waiter = null;
		waiter?.resolve(value);
		return true;
	}

	closeSender(): void {
		if (this.#state !== "open") return;
		this.#state = "senderClosed";
		this.#closeListeners.clear();
		const waiter = this.#waiter;
		this.#waiter = null;
		waiter?.reject(new OneshotClosedError());
	}

	closeReceiver(): void {
		if (this.#state !== "open") return;
		this.#state = "receiverClosed";
		const listeners = [...this.#closeListeners];
		this.#closeListeners.clear();
		for (const listener of listeners) {
			listener();
		}
	}

	onClose(listener: () => void): () => void {
		if (this.#state === "receiverClosed") {
			listener();
			return () => undefined;
		}
		if (this.#state !== "open") return () => undefined;
		this.#closeListeners.add(listener);
		return () => {
			this.#closeListeners.delete(listener);
		};
	}

	recv(options: OneshotRecvOptions = {}): Promise<T> {
		if (this.#consumed) {
			return Promise.reject(new Error("Oneshot receiver already consumed"));
		}
		this.#consumed = true;

		if (this.#box) return Promise.resolve(this.#box.value);
		if (this.#state === "senderClosed") return Promise.reject(new OneshotClosedError());
		if (this.#state === "receiverClosed") return Promise.reject(new OneshotCancelledError());
		if (options.signal?.aborted) {
			this.closeReceiver();
			return Promise.reject(new OneshotCancelledError());
		}

		return new Promise<T>((resolve, reject) => {
			let timeoutId: ReturnType<typeof setTimeout> | undefined;
			const signal = options.signal;

			const onAbort = () => {
				cleanup();
				this.#waiter = null;
				this.closeReceiver();
				reject(new OneshotCancelledError());
			};

			const cleanup = () => {
				if (timeoutId) clearTimeout(timeoutId);
				signal?.removeEventListener("abort", onAbort);
			};

			this.#waiter = {
				resolve: (value) => {
					cleanup();
					resolve(value);
				},
				reject: (error) => {
					cleanup();
					reject(error);
				},
			};

			if (options.timeoutMs !== undefined) {
				const timeoutMs = options.timeoutMs;
				timeoutId = setTimeout(() => {
					cleanup();
					this.#waiter = null;
					this.closeReceiver();
					reject(new OneshotTimeoutError(timeoutMs));
				}, timeoutMs);
			}
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}
}

export function oneshot<T>(): [OneshotSender<T>, OneshotReceiver<T>] {
	const channel = new OneshotChannel<T>();
	const sender: OneshotSender<T> = {
		send: (value) => channel.send(value),
		close: () => channel.closeSender(),
		get isClosed() {
			return channel.isClosed;
		},
		onClose: (listener) => channel.onClose(listener),
	};
	const receiver: OneshotReceiver<T> = {
		recv: (options) => channel.recv(options),
		close: () => channel.closeReceiver(),
	};
	return [sender, receiver];
}
