/**
 * One-shot readiness signal.
 *
 * Consumption loops wait on the gate until the first subscription exists.
 * Signaling is idempotent and the gate never resets.
 */
export class ReadinessGate {
	#signaled: boolean;
	#reason: unknown;
	#closed: boolean;
	#waiters: Set<{resolve: () => void; reject: (reason: unknown) => void}>;

	constructor() {
		this.#signaled = false;
		this.#reason = undefined;
		this.#closed = false;
		this.#waiters = new Set();
	}

	get signaled(): boolean {
		return this.#signaled;
	}

	/** Open the gate, releasing every waiter. No-op once signaled or closed. */
	signal(): void {
		if (this.#signaled || this.#closed) return;
		this.#signaled = true;
		for (const waiter of this.#waiters) {
			waiter.resolve();
		}
		this.#waiters.clear();
	}

	/**
	 * Reject current and future waiters with `reason`.
	 * Has no effect on a gate that was already signaled.
	 */
	close(reason: unknown): void {
		if (this.#signaled || this.#closed) return;
		this.#closed = true;
		this.#reason = reason;
		for (const waiter of this.#waiters) {
			waiter.reject(reason);
		}
		this.#waiters.clear();
	}

	wait(signal?: AbortSignal): Promise<void> {
		if (this.#signaled) return Promise.resolve();
		if (this.#closed) return Promise.reject(this.#reason);
		if (signal?.aborted) return Promise.reject(signal.reason);

		return new Promise<void>((resolve, reject) => {
			const onAbort = () => {
				this.#waiters.delete(waiter);
				reject(signal?.reason);
			};
			const waiter = {
				resolve: () => {
					signal?.removeEventListener("abort", onAbort);
					resolve();
				},
				reject: (reason: unknown) => {
					signal?.removeEventListener("abort", onAbort);
					reject(reason);
				},
			};

			this.#waiters.add(waiter);
			signal?.addEventListener("abort", onAbort, {once: true});
		});
	}
}
