/**
 * Broadcast Backend Interface
 *
 * Pluggable store adapter behind channel broadcasting. Transient (pub/sub)
 * and durable (stream) backends implement the same contract, so callers can
 * swap one for the other without changing how they consume messages.
 */

import type {BroadcastEvent} from "./event.js";

export interface ReceiveOptions {
	/** Abandon the wait. Backend state is left as it was. */
	signal?: AbortSignal;
}

export interface BroadcastBackend {
	/** Open the store connection(s). Rejects with ConnectionError when unreachable. */
	connect(): Promise<void>;
	/** Close all connections and stop background consumption. Never rejects. */
	disconnect(): Promise<void>;
	/** Register interest in a channel (idempotent) */
	subscribe(channel: string): Promise<void>;
	/** Remove interest in a channel (no-op when not subscribed) */
	unsubscribe(channel: string): Promise<void>;
	/** Send a message to a channel, whether or not anyone is listening */
	publish(channel: string, message: string): Promise<void>;
	/** Wait for the next event on any subscribed channel */
	receive(options?: ReceiveOptions): Promise<BroadcastEvent>;
}
