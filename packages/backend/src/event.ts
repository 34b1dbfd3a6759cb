/**
 * A message delivered from a channel.
 *
 * Backends create events when a message arrives; publishers only ever send
 * raw payloads.
 */
export class BroadcastEvent {
	readonly channel: string;
	readonly message: string;

	constructor(channel: string, message: string) {
		if (!channel) {
			throw new TypeError("BroadcastEvent channel must be a non-empty string");
		}

		this.channel = channel;
		this.message = message;
		Object.freeze(this);
	}

	/** Value equality: same channel and same payload */
	equals(other: BroadcastEvent): boolean {
		return this.channel === other.channel && this.message === other.message;
	}

	toJSON() {
		return {channel: this.channel, message: this.message};
	}
}
