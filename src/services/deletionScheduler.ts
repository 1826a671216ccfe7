/**
 * Deferred message deletion.
 * Schedules a message for deletion after a delay; timers are tracked by
 * `group:messageId` so that a later schedule for the same message replaces
 * the earlier one and a pending deletion can be cancelled.
 *
 * Configuration changes never touch timers that are already running.
 *
 * @module services/deletionScheduler
 */

import type { GroupId } from "../types";
import { logger } from "../utils/logger";
import type { GatewayResult } from "./enforcementGateway";

/** Longest delay a Node timer honours; anything above fires at once */
export const MAX_DELAY_SECONDS = Math.floor(0x7fffffff / 1000);

export type DeleteFn = (
	groupId: GroupId,
	messageId: number,
) => Promise<GatewayResult>;

export class DeletionScheduler {
	private readonly pending = new Map<string, NodeJS.Timeout>();

	constructor(private readonly deleteMessage: DeleteFn) {}

	/**
	 * Schedule a message for deletion.
	 * @returns Cancel function to abort the scheduled deletion
	 */
	schedule(groupId: GroupId, messageId: number, delayMs: number): () => void {
		const key = `${groupId}:${messageId}`;

		const existing = this.pending.get(key);
		if (existing) {
			clearTimeout(existing);
		}

		const timeout = setTimeout(() => {
			this.pending.delete(key);
			this.deleteMessage(groupId, messageId)
				.then((result) => {
					if (!result.ok) {
						logger.debug("Deferred deletion skipped", {
							groupId,
							messageId,
							error: result.error.message,
						});
					}
				})
				.catch((error: unknown) => {
					logger.warn("Deferred deletion failed", { groupId, messageId, error });
				});
		}, delayMs);

		this.pending.set(key, timeout);

		return () => {
			if (this.pending.get(key) === timeout) {
				clearTimeout(timeout);
				this.pending.delete(key);
			}
		};
	}

	/** @returns true if a deletion was cancelled, false if none was scheduled */
	cancel(groupId: GroupId, messageId: number): boolean {
		const key = `${groupId}:${messageId}`;
		const timeout = this.pending.get(key);
		if (!timeout) return false;

		clearTimeout(timeout);
		this.pending.delete(key);
		return true;
	}

	pendingCount(): number {
		return this.pending.size;
	}

	/** Drops every pending deletion (shutdown) */
	clearAll(): void {
		for (const timeout of this.pending.values()) {
			clearTimeout(timeout);
		}
		this.pending.clear();
		logger.info("Cleared all scheduled message deletions");
	}
}
