/**
 * @broadcaster/backend - Backend contract for channel broadcasting
 *
 * Defines the contract every store backend implements, the event type they
 * deliver, the shared error taxonomy and the concurrency primitives the
 * backends are built from.
 */

export {BroadcastEvent} from "./event.js";
export type {BroadcastBackend, ReceiveOptions} from "./backend.js";
export {
	BroadcasterError,
	ConnectionError,
	ConsumptionError,
	isBroadcasterError,
	type BroadcasterErrorOptions,
} from "./errors.js";
export {ReadinessGate} from "./gate.js";
export {AsyncQueue} from "./queue.js";
export {
	BROADCASTER_CATEGORIES,
	configureLogging,
	type BroadcasterCategory,
	type LoggingConfig,
	type LogLevel,
} from "./logging.js";
