import {createClient, ErrorReply} from "redis";
import {getLogger} from "@logtape/logtape";
import {ConnectionError} from "@broadcaster/backend";

const logger = getLogger(["broadcaster", "backend"]);

export type RedisClient = ReturnType<typeof createClient>;

/**
 * Create a node-redis client without automatic reconnection.
 * A dropped connection surfaces as an error to the backend instead of being
 * silently re-established with its subscriptions lost.
 */
export function createRedisClient(url: string): RedisClient {
	return createClient({url, socket: {reconnectStrategy: false}});
}

/**
 * Connect a client unless it is already open
 */
export async function connectClient(
	client: RedisClient,
	role: string,
): Promise<void> {
	if (client.isOpen) return;
	try {
		await client.connect();
		logger.debug("Redis {role} connected", {role});
	} catch (error) {
		throw new ConnectionError(`Could not connect Redis ${role}`, {
			cause: error,
		});
	}
}

/**
 * Run a Redis command, mapping client-side failures (closed client, dropped
 * socket) to ConnectionError. Error replies from the server pass through.
 */
export async function runCommand<T>(
	command: string,
	run: () => Promise<T>,
): Promise<T> {
	try {
		return await run();
	} catch (error) {
		if (error instanceof ErrorReply) throw error;
		throw new ConnectionError(`Redis ${command} failed`, {cause: error});
	}
}

/** True when the server replied that a key does not exist */
export function isNoSuchKey(error: unknown): boolean {
	return error instanceof ErrorReply && /no such key/i.test(error.message);
}

/**
 * Close a client, forcing a disconnect if graceful quit fails.
 * Never throws: failures are logged.
 */
export async function closeClient(
	client: RedisClient,
	role: string,
): Promise<void> {
	if (!client.isOpen) return;
	try {
		await client.quit(); // Graceful shutdown - waits for pending commands
		logger.debug("Redis {role} closed", {role});
	} catch (error) {
		logger.error("Error closing Redis {role}: {error}", {role, error});
		try {
			await client.disconnect();
		} catch (disconnectError) {
			logger.error("Error forcing Redis {role} disconnect: {error}", {
				role,
				error: disconnectError,
			});
		}
	}
}

/** Decode a reply value that may come back as a Buffer */
export function decode(value: string | Buffer): string {
	return typeof value === "string" ? value : value.toString("utf8");
}
