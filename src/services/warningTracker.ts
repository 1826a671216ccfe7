/**
 * Escalating warning counter per (group, member).
 *
 * The stored count never reaches the group's threshold: the warning that
 * would reach it resets the count to 0 and reports `muted` in the same
 * transaction. Applying the mute is left to the caller.
 *
 * @module services/warningTracker
 */

import { type Db, execute, get } from "../database";
import type { MemberKey, WarningOutcome } from "../types";
import { StructuredLogger } from "../utils/logger";
import type { ConfigStore } from "./configStore";

interface WarningRow {
	count: number;
}

export class WarningTracker {
	private readonly recordTx: (key: MemberKey) => WarningOutcome;

	constructor(
		private readonly db: Db,
		private readonly configStore: ConfigStore,
	) {
		this.recordTx = db.transaction((key: MemberKey): WarningOutcome => {
			const { warnThreshold, muteDurationHours } = this.configStore.get(
				key.groupId,
			);
			const count = this.readStored(key) + 1;
			const muted = count >= warnThreshold;

			this.write(key, muted ? 0 : count);

			return {
				count,
				muted,
				threshold: warnThreshold,
				muteDurationHours,
			};
		});
	}

	recordWarning(key: MemberKey): WarningOutcome {
		const outcome = this.recordTx(key);

		StructuredLogger.logSecurityEvent(
			outcome.muted ? "Warning threshold reached" : "Warning recorded",
			{
				groupId: key.groupId,
				userId: key.userId,
				operation: "record_warning",
				count: outcome.count,
				threshold: outcome.threshold,
			},
		);
		return outcome;
	}

	/**
	 * Current count, 0 for members never warned.
	 * Clamped below the threshold in case the threshold was lowered after the
	 * count was stored; the next warning escalates such a member.
	 */
	getCount(key: MemberKey): number {
		const { warnThreshold } = this.configStore.get(key.groupId);
		return Math.min(this.readStored(key), Math.max(warnThreshold - 1, 0));
	}

	/** @returns the count that was cleared */
	reset(key: MemberKey): number {
		const previous = this.getCount(key);
		this.write(key, 0);
		return previous;
	}

	private readStored(key: MemberKey): number {
		const row = get<WarningRow>(
			this.db,
			"SELECT count FROM member_warnings WHERE group_id = ? AND user_id = ?",
			[key.groupId, key.userId],
		);
		return row?.count ?? 0;
	}

	private write(key: MemberKey, count: number): void {
		execute(
			this.db,
			`INSERT INTO member_warnings (group_id, user_id, count, updated_at) VALUES (?, ?, ?, ?)
       ON CONFLICT(group_id, user_id) DO UPDATE SET count = excluded.count, updated_at = excluded.updated_at`,
			[key.groupId, key.userId, count, Math.floor(Date.now() / 1000)],
		);
	}
}
