/**
 * Error classes shared by every broadcast backend
 */

const BROADCASTER_ERROR = Symbol.for("broadcaster.error");

/** Options for creating broadcaster errors */
export interface BroadcasterErrorOptions {
	/** Original error that caused this one */
	cause?: unknown;
}

/** Base class for errors raised by broadcast backends */
export class BroadcasterError extends Error {
	constructor(message: string, options: BroadcasterErrorOptions = {}) {
		super(message, {cause: options.cause});
		this.name = this.constructor.name;
	}

	/**
	 * Convert error to a plain object for serialization
	 */
	toJSON() {
		return {
			name: this.name,
			message: this.message,
		};
	}
}

Object.defineProperty(BroadcasterError.prototype, BROADCASTER_ERROR, {
	value: true,
});

/**
 * The store is unreachable or the connection is closed.
 * Raised by connect, publish, subscribe and unsubscribe, and by receive once
 * the backend has been disconnected. Never retried by the backend itself.
 */
export class ConnectionError extends BroadcasterError {}

/**
 * Background consumption of a subscription feed ended unexpectedly.
 * Fatal to the backend instance that raised it.
 */
export class ConsumptionError extends BroadcasterError {}

/**
 * Check if a value is a BroadcasterError, including instances created by
 * another copy of this module
 */
export function isBroadcasterError(value: unknown): value is BroadcasterError {
	return (
		value instanceof BroadcasterError ||
		(typeof value === "object" && value !== null && BROADCASTER_ERROR in value)
	);
}
