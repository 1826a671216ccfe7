/**
 * Per-(group, member) capability flags.
 *
 * A member without a row behaves exactly like a member whose flags are all
 * false. Whether a row exists matters in one place only: a row with
 * `link = false` exempts the member from link deletion (see `allowsLinks`).
 *
 * `flood`, `checks` and `night` are stored and toggled but no enforcement
 * step reads them yet.
 *
 * @module services/restrictionMatrix
 */

import type { ChatPermissions } from "telegraf/types";
import { type Db, execute, get, toSqlBool } from "../database";
import {
	isRestrictionFlag,
	type MemberKey,
	RESTRICTION_FLAGS,
	type RestrictionFlag,
	type RestrictionSet,
} from "../types";
import { InvalidInputError } from "../utils/errors";
import { StructuredLogger } from "../utils/logger";

type RestrictionRow = Record<RestrictionFlag, number>;

export const emptyRestrictionSet = (): RestrictionSet => ({
	flood: false,
	spam: false,
	media: false,
	checks: false,
	night: false,
	sticker: false,
	gif: false,
	link: false,
});

const FLAG_COLUMNS = RESTRICTION_FLAGS.join(", ");

export class RestrictionMatrix {
	private readonly toggleTx: (
		key: MemberKey,
		flag: RestrictionFlag,
	) => RestrictionSet;

	constructor(private readonly db: Db) {
		this.toggleTx = db.transaction(
			(key: MemberKey, flag: RestrictionFlag): RestrictionSet => {
				this.ensure(key);
				execute(
					this.db,
					`UPDATE member_restrictions SET ${flag} = 1 - ${flag}, updated_at = ?
           WHERE group_id = ? AND user_id = ?`,
					[Math.floor(Date.now() / 1000), key.groupId, key.userId],
				);
				return this.getFlags(key);
			},
		);
	}

	getFlags(key: MemberKey): RestrictionSet {
		const row = this.readRow(key);
		if (!row) return emptyRestrictionSet();

		const flags = emptyRestrictionSet();
		for (const name of RESTRICTION_FLAGS) {
			flags[name] = row[name] === 1;
		}
		return flags;
	}

	hasEntry(key: MemberKey): boolean {
		return this.readRow(key) !== undefined;
	}

	/**
	 * Materializes an all-false row if the member has none.
	 * Opening the restriction panel does this, which also lifts link deletion
	 * for that member until the link flag is switched on.
	 */
	ensure(key: MemberKey): RestrictionSet {
		execute(
			this.db,
			"INSERT OR IGNORE INTO member_restrictions (group_id, user_id) VALUES (?, ?)",
			[key.groupId, key.userId],
		);
		return this.getFlags(key);
	}

	/**
	 * Flips one flag, creating the row first if needed.
	 *
	 * @throws {InvalidInputError} for a name that is not a restriction flag
	 */
	toggleFlag(key: MemberKey, name: string): RestrictionSet {
		if (!isRestrictionFlag(name)) {
			throw new InvalidInputError(
				`❌ Unknown restriction "${name}". Valid: ${RESTRICTION_FLAGS.join(", ")}`,
			);
		}

		const flags = this.toggleTx(key, name);
		StructuredLogger.logSecurityEvent("Restriction flag toggled", {
			groupId: key.groupId,
			userId: key.userId,
			operation: "toggle_restriction",
			flag: name,
			value: flags[name],
		});
		return flags;
	}

	/** Overwrites every flag at once, creating the row if needed */
	setFlags(key: MemberKey, flags: RestrictionSet): void {
		const assignments = RESTRICTION_FLAGS.map((name) => `${name} = ?`).join(
			", ",
		);
		this.ensure(key);
		execute(
			this.db,
			`UPDATE member_restrictions SET ${assignments}, updated_at = ? WHERE group_id = ? AND user_id = ?`,
			[
				...RESTRICTION_FLAGS.map((name) => toSqlBool(flags[name])),
				Math.floor(Date.now() / 1000),
				key.groupId,
				key.userId,
			],
		);
	}

	/** Removes the row entirely; the member is back to "no record" */
	clear(key: MemberKey): boolean {
		const result = execute(
			this.db,
			"DELETE FROM member_restrictions WHERE group_id = ? AND user_id = ?",
			[key.groupId, key.userId],
		);
		return result.changes > 0;
	}

	/** A recorded row with `link` off is the only thing that exempts links */
	allowsLinks(key: MemberKey): boolean {
		const row = this.readRow(key);
		return row !== undefined && row.link === 0;
	}

	private readRow(key: MemberKey): RestrictionRow | undefined {
		return get<RestrictionRow>(
			this.db,
			`SELECT ${FLAG_COLUMNS} FROM member_restrictions WHERE group_id = ? AND user_id = ?`,
			[key.groupId, key.userId],
		);
	}
}

export const activeFlags = (flags: RestrictionSet): RestrictionFlag[] =>
	RESTRICTION_FLAGS.filter((name) => flags[name]);

export const FULL_PERMISSIONS: ChatPermissions = {
	can_send_messages: true,
	can_send_audios: true,
	can_send_documents: true,
	can_send_photos: true,
	can_send_videos: true,
	can_send_video_notes: true,
	can_send_voice_notes: true,
	can_send_polls: true,
	can_send_other_messages: true,
	can_add_web_page_previews: true,
};

export const MUTED_PERMISSIONS: ChatPermissions = {
	can_send_messages: false,
	can_send_audios: false,
	can_send_documents: false,
	can_send_photos: false,
	can_send_videos: false,
	can_send_video_notes: false,
	can_send_voice_notes: false,
	can_send_polls: false,
	can_send_other_messages: false,
	can_add_web_page_previews: false,
};

/**
 * Platform permissions for "Save & Apply".
 * No flag set grants everything. Otherwise `media` denies media sending,
 * `spam` or `link` deny polls and link previews, and text stays allowed.
 * The remaining flags have no platform permission of their own.
 */
export const projectPermissions = (flags: RestrictionSet): ChatPermissions => {
	if (activeFlags(flags).length === 0) {
		return { ...FULL_PERMISSIONS };
	}

	const canSendMedia = !flags.media;
	const canShareLinks = !(flags.spam || flags.link);

	return {
		can_send_messages: true,
		can_send_audios: canSendMedia,
		can_send_documents: canSendMedia,
		can_send_photos: canSendMedia,
		can_send_videos: canSendMedia,
		can_send_video_notes: canSendMedia,
		can_send_voice_notes: canSendMedia,
		can_send_polls: canShareLinks,
		can_send_other_messages: true,
		can_add_web_page_previews: canShareLinks,
	};
};
