/**
 * Durable broadcast backend over Redis streams.
 *
 * Each channel is an append-only stream (XADD). The backend keeps one read
 * cursor per subscribed channel and polls every subscribed stream with a
 * bounded blocking XREAD, so published entries can be replayed from any
 * earlier position.
 */

import {getLogger} from "@logtape/logtape";
import {
	BroadcastEvent,
	ConnectionError,
	ReadinessGate,
	type BroadcastBackend,
	type ReceiveOptions,
} from "@broadcaster/backend";
import {
	closeClient,
	connectClient,
	createRedisClient,
	decode,
	isNoSuchKey,
	runCommand,
	type RedisClient,
} from "./client.js";
import {
	DEFAULT_BLOCK_MS,
	assertPositiveInteger,
	resolveRedisURL,
} from "./config.js";

const logger = getLogger(["broadcaster", "stream"]);

type StreamsReply = Awaited<ReturnType<RedisClient["xRead"]>>;

/** Cursor meaning "replay from the beginning of the stream" */
export const STREAM_START = "0";

/** Stream entry field holding the message payload */
const MESSAGE_FIELD = "message";

export interface RedisStreamOptions {
	/** Redis connection URL; redis-stream:// is accepted as an alias of redis:// */
	url?: string;
	/** Maximum wait of one blocking read, in milliseconds (default 1000) */
	blockMs?: number;
	/** Approximate maximum stream length kept on publish (default unbounded) */
	maxLength?: number;
}

/**
 * Redis stream backend.
 *
 * The producer connection appends and inspects streams; the consumer
 * connection is reserved for blocking reads. Polling happens inline in
 * receive(), so concurrent receive() calls on one instance must be
 * serialized by the caller.
 */
export class RedisStreamBackend implements BroadcastBackend {
	#producer: RedisClient;
	#consumer: RedisClient;
	#cursors: Map<string, string>;
	#ready: ReadinessGate;
	#blockMs: number;
	#maxLength: number | undefined;
	#closed: boolean;

	constructor(options: RedisStreamOptions = {}) {
		assertPositiveInteger("blockMs", options.blockMs);
		assertPositiveInteger("maxLength", options.maxLength);

		const url = resolveRedisURL(options.url);
		this.#producer = createRedisClient(url);
		this.#consumer = createRedisClient(url);
		this.#cursors = new Map();
		this.#ready = new ReadinessGate();
		this.#blockMs = options.blockMs ?? DEFAULT_BLOCK_MS;
		this.#maxLength = options.maxLength;
		this.#closed = false;

		this.#producer.on("error", (err) => {
			logger.error("Redis producer error: {error}", {error: err});
		});
		this.#consumer.on("error", (err) => {
			logger.error("Redis consumer error: {error}", {error: err});
		});
	}

	/** Last delivered position for a channel, or undefined if not subscribed */
	cursor(channel: string): string | undefined {
		return this.#cursors.get(channel);
	}

	async connect(): Promise<void> {
		await connectClient(this.#producer, "producer");
		await connectClient(this.#consumer, "consumer");
		logger.info("Redis stream backend connected");
	}

	async disconnect(): Promise<void> {
		this.#closed = true;
		this.#ready.close(new ConnectionError("Backend is disconnected"));
		this.#cursors.clear();
		await closeClient(this.#producer, "producer");
		await closeClient(this.#consumer, "consumer");
	}

	async subscribe(channel: string): Promise<void> {
		this.#assertOpen();
		if (!this.#cursors.has(channel)) {
			const cursor = await this.#lastGeneratedId(channel);
			// Another subscribe may have recorded a cursor while we waited
			if (!this.#cursors.has(channel)) {
				this.#cursors.set(channel, cursor);
				logger.debug("Subscribed to {channel} at {cursor}", {channel, cursor});
			}
		}

		this.#ready.signal();
	}

	async unsubscribe(channel: string): Promise<void> {
		this.#assertOpen();
		this.#cursors.delete(channel);
	}

	async publish(channel: string, message: string): Promise<void> {
		this.#assertOpen();
		const maxLength = this.#maxLength;
		const id = await runCommand("XADD", () =>
			this.#producer.xAdd(
				channel,
				"*",
				{[MESSAGE_FIELD]: message},
				maxLength === undefined
					? undefined
					: {
							TRIM: {
								strategy: "MAXLEN",
								strategyModifier: "~",
								threshold: maxLength,
							},
						},
			),
		);
		logger.debug("Appended {id} to {channel}", {id, channel});
	}

	async receive(options: ReceiveOptions = {}): Promise<BroadcastEvent> {
		const {signal} = options;
		await this.#ready.wait(signal);

		while (true) {
			this.#assertOpen();
			signal?.throwIfAborted();

			if (this.#cursors.size === 0) {
				// Everything was unsubscribed; wait for a new subscription
				await sleep(this.#blockMs, signal);
				continue;
			}

			// An abandoned XREAD keeps the consumer connection busy for up to
			// blockMs, so the next receive may start that much later
			const event = this.#take(await abortable(this.#read(), signal));
			if (event) return event;
		}
	}

	#assertOpen(): void {
		if (this.#closed) {
			throw new ConnectionError("Backend is disconnected");
		}
	}

	async #lastGeneratedId(channel: string): Promise<string> {
		try {
			const info = await runCommand("XINFO STREAM", () =>
				this.#producer.xInfoStream(channel),
			);
			return decode(info.lastGeneratedId);
		} catch (error) {
			// The stream is created by the first XADD
			if (isNoSuchKey(error)) return STREAM_START;
			throw error;
		}
	}

	#read(): Promise<StreamsReply> {
		const streams = Array.from(this.#cursors, ([key, id]) => ({key, id}));
		return runCommand("XREAD", () =>
			this.#consumer.xRead(streams, {COUNT: 1, BLOCK: this.#blockMs}),
		);
	}

	/**
	 * Advance the cursor for the first reply entry on a still-subscribed
	 * channel and turn it into an event. The cursor moves before the event is
	 * returned, so an entry is delivered at most once per backend.
	 */
	#take(reply: StreamsReply): BroadcastEvent | null {
		for (const stream of reply ?? []) {
			const channel = decode(stream.name);
			const [entry] = stream.messages;
			if (!entry || !this.#cursors.has(channel)) continue;

			const id = decode(entry.id);
			this.#cursors.set(channel, id);
			const message = entry.message[MESSAGE_FIELD];
			if (message === undefined) {
				logger.warn("Skipping entry {id} on {channel} without a message", {
					id,
					channel,
				});
				return null;
			}

			return new BroadcastEvent(channel, decode(message));
		}

		return null;
	}
}

/**
 * Settle with `promise`, or reject with the abort reason as soon as `signal`
 * aborts. The underlying promise keeps running; its outcome is discarded.
 */
function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
	if (!signal) return promise;
	return new Promise<T>((resolve, reject) => {
		const onAbort = () => reject(signal.reason);
		if (signal.aborted) {
			onAbort();
		} else {
			signal.addEventListener("abort", onAbort, {once: true});
		}
		void promise.then(resolve, reject).finally(() => {
			signal.removeEventListener("abort", onAbort);
		});
	});
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		const onAbort = () => {
			clearTimeout(timer);
			reject(signal?.reason);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, {once: true});
	});
}
