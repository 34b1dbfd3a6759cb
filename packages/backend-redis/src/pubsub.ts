/**
 * Transient broadcast backend over Redis PUBLISH/SUBSCRIBE.
 *
 * Messages exist only in transit: a message published while nobody is
 * subscribed is gone, and late subscribers see nothing from before.
 * Requires two Redis client connections (can't publish and subscribe on the same connection).
 */

import {getLogger} from "@logtape/logtape";
import {
	AsyncQueue,
	BroadcastEvent,
	ConnectionError,
	ConsumptionError,
	ReadinessGate,
	type BroadcastBackend,
	type ReceiveOptions,
} from "@broadcaster/backend";
import {
	closeClient,
	connectClient,
	createRedisClient,
	runCommand,
	type RedisClient,
} from "./client.js";
import {resolveRedisURL} from "./config.js";

const logger = getLogger(["broadcaster", "pubsub"]);

export interface RedisPubSubOptions {
	/** Redis connection URL (e.g., "redis://localhost:6379") */
	url?: string;
}

/**
 * Lifecycle of the background listener:
 * waiting for the first subscription, consuming the feed, or stopped.
 */
export type PubSubState = "waiting" | "consuming" | "stopped";

interface FeedMessage {
	channel: string;
	data: string;
}

/**
 * Redis pub/sub backend.
 *
 * The subscriber connection pushes messages into a feed; a background
 * listener drains the feed into an event queue that receive() pops. The
 * listener only starts draining once the first channel is subscribed.
 */
export class RedisPubSubBackend implements BroadcastBackend {
	#publisher: RedisClient;
	#subscriber: RedisClient;
	#channels: Set<string>;
	#ready: ReadinessGate;
	// Raw deliveries from the subscriber connection. The listener moves them
	// onto #events as soon as it is consuming, so undelivered events only
	// accumulate in #events.
	#feed: AsyncQueue<FeedMessage>;
	#events: AsyncQueue<BroadcastEvent>;
	#abort: AbortController;
	#state: PubSubState;
	#connected: boolean;
	#listener: Promise<void>;

	constructor(options: RedisPubSubOptions = {}) {
		const url = resolveRedisURL(options.url);
		this.#publisher = createRedisClient(url);
		this.#subscriber = createRedisClient(url);
		this.#channels = new Set();
		this.#ready = new ReadinessGate();
		this.#feed = new AsyncQueue();
		this.#events = new AsyncQueue();
		this.#abort = new AbortController();
		this.#state = "waiting";
		this.#connected = false;

		this.#publisher.on("error", (err) => {
			logger.error("Redis publisher error: {error}", {error: err});
		});
		this.#subscriber.on("error", (err) => {
			logger.error("Redis subscriber error: {error}", {error: err});
			// A dropped socket only surfaces as an error; with reconnection off
			// the client stays down
			if (this.#connected && !this.#subscriber.isReady) {
				this.#onConnectionLost(err);
			}
		});
		this.#subscriber.on("end", () => this.#onConnectionLost());

		this.#listener = this.#listen();
	}

	get state(): PubSubState {
		return this.#state;
	}

	async connect(): Promise<void> {
		await connectClient(this.#publisher, "publisher");
		await connectClient(this.#subscriber, "subscriber");
		this.#connected = true;
		logger.info("Redis pub/sub backend connected");
	}

	async disconnect(): Promise<void> {
		this.#abort.abort();
		this.#state = "stopped";
		const closed = new ConnectionError("Backend is disconnected");
		this.#ready.close(closed);
		this.#feed.close(closed);
		this.#events.close(closed);
		this.#channels.clear();
		await this.#listener;
		await closeClient(this.#subscriber, "subscriber");
		await closeClient(this.#publisher, "publisher");
	}

	async subscribe(channel: string): Promise<void> {
		this.#assertOpen();
		this.#ready.signal();
		await runCommand("SUBSCRIBE", () =>
			this.#subscriber.subscribe(channel, this.#onMessage),
		);
		this.#channels.add(channel);
	}

	async unsubscribe(channel: string): Promise<void> {
		this.#assertOpen();
		if (!this.#channels.delete(channel)) return;
		await runCommand("UNSUBSCRIBE", () =>
			this.#subscriber.unsubscribe(channel),
		);
	}

	async publish(channel: string, message: string): Promise<void> {
		this.#assertOpen();
		const receivers = await runCommand("PUBLISH", () =>
			this.#publisher.publish(channel, message),
		);
		logger.debug("Published to {channel} ({receivers} receivers)", {
			channel,
			receivers,
		});
	}

	async receive(options: ReceiveOptions = {}): Promise<BroadcastEvent> {
		while (true) {
			const event = await this.#events.shift(options.signal);
			if (this.#channels.has(event.channel)) return event;
			logger.debug("Dropping event for unsubscribed channel {channel}", {
				channel: event.channel,
			});
		}
	}

	#assertOpen(): void {
		if (this.#abort.signal.aborted) {
			throw new ConnectionError("Backend is disconnected");
		}
	}

	#onConnectionLost(cause?: unknown): void {
		if (this.#abort.signal.aborted || this.#feed.failed) return;
		const error = new ConsumptionError("Redis subscriber connection lost", {
			cause,
		});
		this.#ready.close(error);
		this.#feed.fail(error);
	}

	// One listener for every channel, so repeated SUBSCRIBE never registers a
	// second delivery path
	#onMessage = (data: string, channel: string): void => {
		this.#feed.push({channel, data});
	};

	async #listen(): Promise<void> {
		const signal = this.#abort.signal;
		try {
			// Nothing arrives on the subscriber connection before the first
			// SUBSCRIBE, so don't start draining until then
			await this.#ready.wait(signal);
			this.#state = "consuming";
			for await (const {channel, data} of this.#feed.iterate(signal)) {
				this.#events.push(new BroadcastEvent(channel, data));
			}
		} catch (error) {
			if (signal.aborted) return;
			this.#state = "stopped";
			logger.error("Redis subscription feed failed: {error}", {error});
			this.#events.fail(
				error instanceof ConsumptionError
					? error
					: new ConsumptionError("Redis subscription feed failed", {
							cause: error,
						}),
			);
		}
	}
}
