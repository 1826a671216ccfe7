/** Keyword-triggered media responses, one table of keywords per group */

import { type Db, execute, get, query } from "../database";
import type { FilterEntry, GroupId, MediaKind } from "../types";
import { StructuredLogger } from "../utils/logger";

interface FilterRow {
	keyword: string;
	media_kind: MediaKind;
	media_handle: string;
	caption: string;
}

const toEntry = (row: FilterRow): FilterEntry => ({
	keyword: row.keyword,
	mediaKind: row.media_kind,
	mediaHandle: row.media_handle,
	caption: row.caption,
});

/** Keywords are stored case-folded with surrounding whitespace removed */
export const normalizeKeyword = (keyword: string): string =>
	keyword.trim().toLowerCase();

export class KeywordFilterTable {
	constructor(private readonly db: Db) {}

	/** Adds or overwrites the filter for this keyword in the group */
	set(
		groupId: GroupId,
		keyword: string,
		mediaKind: MediaKind,
		mediaHandle: string,
		caption = "",
	): FilterEntry {
		const normalized = normalizeKeyword(keyword);
		execute(
			this.db,
			`INSERT INTO keyword_filters (group_id, keyword, media_kind, media_handle, caption)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(group_id, keyword) DO UPDATE SET
         media_kind = excluded.media_kind,
         media_handle = excluded.media_handle,
         caption = excluded.caption`,
			[groupId, normalized, mediaKind, mediaHandle, caption],
		);

		StructuredLogger.logModerationEvent("Keyword filter set", {
			groupId,
			operation: "set_filter",
			keyword: normalized,
			mediaKind,
		});

		return { keyword: normalized, mediaKind, mediaHandle, caption };
	}

	/** @returns false when no filter existed for the keyword */
	remove(groupId: GroupId, keyword: string): boolean {
		const normalized = normalizeKeyword(keyword);
		const result = execute(
			this.db,
			"DELETE FROM keyword_filters WHERE group_id = ? AND keyword = ?",
			[groupId, normalized],
		);
		return result.changes > 0;
	}

	get(groupId: GroupId, keyword: string): FilterEntry | undefined {
		const row = get<FilterRow>(
			this.db,
			"SELECT * FROM keyword_filters WHERE group_id = ? AND keyword = ?",
			[groupId, normalizeKeyword(keyword)],
		);
		return row ? toEntry(row) : undefined;
	}

	/** Every filter of the group, in no particular order */
	list(groupId: GroupId): FilterEntry[] {
		return query<FilterRow>(
			this.db,
			"SELECT * FROM keyword_filters WHERE group_id = ?",
			[groupId],
		).map(toEntry);
	}

	/**
	 * First filter whose keyword occurs anywhere in the case-folded text.
	 * When several keywords match, which one wins is unspecified.
	 */
	matchFirst(groupId: GroupId, text: string): FilterEntry | undefined {
		const folded = text.toLowerCase();
		return this.list(groupId).find(
			(entry) => entry.keyword.length > 0 && folded.includes(entry.keyword),
		);
	}
}
