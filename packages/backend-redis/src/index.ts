/**
 * @broadcaster/backend-redis - Redis backends for channel broadcasting
 *
 * - RedisPubSubBackend: transient delivery over PUBLISH/SUBSCRIBE
 * - RedisStreamBackend: durable, replayable delivery over XADD/XREAD
 */

export {
	RedisPubSubBackend,
	type PubSubState,
	type RedisPubSubOptions,
} from "./pubsub.js";
export {
	RedisStreamBackend,
	STREAM_START,
	type RedisStreamOptions,
} from "./stream.js";
export {DEFAULT_BLOCK_MS, DEFAULT_REDIS_URL, resolveRedisURL} from "./config.js";
