/**
 * Option resolution for the Redis backends
 */

export const DEFAULT_REDIS_URL = "redis://localhost:6379";

/** How long a single blocking stream read waits, in milliseconds */
export const DEFAULT_BLOCK_MS = 1000;

// "redis-stream://host" selects the stream backend by scheme; node-redis only
// understands redis:// and rediss://
const STREAM_SCHEME = /^(redis|rediss)-streams?:\/\//;

/**
 * Resolve the Redis address for a backend: explicit option, then the
 * REDIS_URL environment variable, then localhost.
 */
export function resolveRedisURL(url?: string): string {
	const resolved = url || process.env.REDIS_URL || DEFAULT_REDIS_URL;
	return resolved.replace(STREAM_SCHEME, "$1://");
}

/** Throw a TypeError unless `value` is undefined or a positive integer */
export function assertPositiveInteger(
	name: string,
	value: number | undefined,
): void {
	if (value === undefined) return;
	if (!Number.isInteger(value) || value <= 0) {
		throw new TypeError(`${name} must be a positive integer, got ${value}`);
	}
}
