/**
 * LogTape configuration for broadcaster loggers.
 *
 * Library code only calls getLogger(["broadcaster", ...]); applications call
 * configureLogging once at startup to route those loggers to the console.
 */

import {configure, getConsoleSink, type LogLevel} from "@logtape/logtape";

export type {LogLevel};

export const BROADCASTER_CATEGORIES = ["backend", "pubsub", "stream"] as const;

export type BroadcasterCategory = (typeof BROADCASTER_CATEGORIES)[number];

export interface LoggingConfig {
	/** Default level for every broadcaster category (default: "info") */
	level?: LogLevel;
	/** Per-category overrides, e.g. {stream: "debug"} */
	categories?: Partial<Record<BroadcasterCategory, LogLevel>>;
}

/**
 * Configure LogTape console output for broadcaster loggers.
 *
 * @param options.reset - Whether to reset existing LogTape config (default: true)
 */
export async function configureLogging(
	config: LoggingConfig = {},
	options: {reset?: boolean} = {},
): Promise<void> {
	const level = config.level ?? "info";
	const categories = config.categories ?? {};
	const reset = options.reset !== false;

	const loggers = BROADCASTER_CATEGORIES.map((category) => {
		const sinks: Array<"console"> = ["console"];
		return {
			category: ["broadcaster", category],
			lowestLevel: categories[category] ?? level,
			sinks,
		};
	});

	await configure({
		reset,
		sinks: {
			console: getConsoleSink(),
		},
		loggers: [
			...loggers,
			// Suppress info messages about LogTape itself
			{category: ["logtape", "meta"], lowestLevel: "warning", sinks: []},
		],
	});
}
