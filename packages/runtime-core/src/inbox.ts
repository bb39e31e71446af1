import type { ObjectId } from "./types";

export type InboxMessageType = "message" | "error";

/**
 * Serialized message addressed to a bound script object
 */
export interface InboxMessage {
	objectId: ObjectId;
	type: InboxMessageType;
	buffer: Uint8Array;
}

/**
 * Double-buffered message queue. Producers append to the back buffer; the owning thread swaps
 * the buffers and drains the front one during its update pass.
 */
export class Inbox {
	private queued: InboxMessage[] = [];

	post(message: InboxMessage): void {
		this.queued.push(message);
	}

	/**
	 * Take the messages posted since the last swap. The returned array is never reused,
	 * so a nested swap while it is being dispatched leaves it intact.
	 */
	swap(): readonly InboxMessage[] {
		const drained = this.queued;
		this.queued = [];
		return drained;
	}

	get pending(): number {
		return this.queued.length;
	}

	clear(): void {
		this.queued = [];
	}
}
