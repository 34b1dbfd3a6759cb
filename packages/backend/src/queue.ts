/**
 * Unbounded FIFO queue with suspended consumers.
 *
 * Bridges push-style producers (subscription listeners) into pull-style
 * consumers. Items are handed to the oldest waiting consumer first.
 */

interface Waiter<T> {
	resolve: (item: T) => void;
	reject: (reason: unknown) => void;
}

export class AsyncQueue<T> {
	#items: Array<T>;
	#waiters: Array<Waiter<T>>;
	#failed: boolean;
	#reason: unknown;

	constructor() {
		this.#items = [];
		this.#waiters = [];
		this.#failed = false;
		this.#reason = undefined;
	}

	/** Number of buffered items */
	get size(): number {
		return this.#items.length;
	}

	get failed(): boolean {
		return this.#failed;
	}

	/** Enqueue an item. Ignored once the queue has failed. */
	push(item: T): void {
		if (this.#failed) return;
		const waiter = this.#waiters.shift();
		if (waiter) {
			waiter.resolve(item);
		} else {
			this.#items.push(item);
		}
	}

	/**
	 * Take the next item, suspending until one is pushed.
	 * Aborting `signal` rejects with its reason and removes the waiter, so the
	 * next pushed item goes to another consumer.
	 */
	shift(signal?: AbortSignal): Promise<T> {
		if (signal?.aborted) return Promise.reject(signal.reason);
		if (this.#items.length > 0) {
			const [item] = this.#items.splice(0, 1);
			return Promise.resolve(item);
		}
		if (this.#failed) return Promise.reject(this.#reason);

		return new Promise<T>((resolve, reject) => {
			const onAbort = () => {
				const index = this.#waiters.indexOf(waiter);
				if (index !== -1) this.#waiters.splice(index, 1);
				reject(signal?.reason);
			};
			const waiter: Waiter<T> = {
				resolve: (item) => {
					signal?.removeEventListener("abort", onAbort);
					resolve(item);
				},
				reject: (reason) => {
					signal?.removeEventListener("abort", onAbort);
					reject(reason);
				},
			};

			this.#waiters.push(waiter);
			signal?.addEventListener("abort", onAbort, {once: true});
		});
	}

	/**
	 * Fail the queue. Pending consumers reject with `reason`; buffered items
	 * are still handed out, after which every shift rejects.
	 */
	fail(reason: unknown): void {
		if (this.#failed) return;
		this.#failed = true;
		this.#reason = reason;
		const waiters = this.#waiters;
		this.#waiters = [];
		for (const waiter of waiters) {
			waiter.reject(reason);
		}
	}

	/** Drop buffered items and fail the queue */
	close(reason: unknown): void {
		this.#items = [];
		this.fail(reason);
	}

	/** Iterate items until the queue fails or `signal` aborts */
	async *iterate(signal?: AbortSignal): AsyncGenerator<T, void, undefined> {
		while (true) {
			yield await this.shift(signal);
		}
	}
}
