/**
 * Per-group moderation settings.
 * A group that never ran a settings command reads back the defaults below;
 * resetting one field stores NULL for it, which reads back as that field's default.
 *
 * @module services/configStore
 */

import { type Db, execute, get, toSqlBool } from "../database";
import type { GroupConfig, GroupId } from "../types";
import { StructuredLogger } from "../utils/logger";

export const DEFAULT_GROUP_CONFIG: GroupConfig = {
	warnThreshold: 3,
	muteDurationHours: 24,
	editDeletionEnabled: false,
	nsfwFilterEnabled: false,
	selfDestructSeconds: 0,
	serviceMsg: { enabled: true, deleteAfterSeconds: 30 },
	eventMsg: { enabled: true, deleteAfterSeconds: 30 },
};

/** Settable fields, flattened so each one maps onto a single column */
export interface GroupSettingValues {
	warnThreshold: number;
	muteDurationHours: number;
	editDeletionEnabled: boolean;
	nsfwFilterEnabled: boolean;
	selfDestructSeconds: number;
	serviceMsgEnabled: boolean;
	serviceMsgDeleteAfterSeconds: number;
	eventMsgEnabled: boolean;
	eventMsgDeleteAfterSeconds: number;
	welcomeText: string;
	welcomeImageHandle: string;
	serviceInfoText: string;
}

export type GroupSetting = keyof GroupSettingValues;

const COLUMNS: Record<GroupSetting, string> = {
	warnThreshold: "warn_threshold",
	muteDurationHours: "mute_duration_hours",
	editDeletionEnabled: "edit_deletion",
	nsfwFilterEnabled: "nsfw_filter",
	selfDestructSeconds: "self_destruct_seconds",
	serviceMsgEnabled: "service_enabled",
	serviceMsgDeleteAfterSeconds: "service_delete_after",
	eventMsgEnabled: "event_enabled",
	eventMsgDeleteAfterSeconds: "event_delete_after",
	welcomeText: "welcome_text",
	welcomeImageHandle: "welcome_image",
	serviceInfoText: "service_info_text",
};

interface GroupSettingsRow {
	group_id: number;
	warn_threshold: number | null;
	mute_duration_hours: number | null;
	edit_deletion: number | null;
	nsfw_filter: number | null;
	self_destruct_seconds: number | null;
	service_enabled: number | null;
	service_delete_after: number | null;
	event_enabled: number | null;
	event_delete_after: number | null;
	welcome_text: string | null;
	welcome_image: string | null;
	service_info_text: string | null;
}

const flag = (value: number | null, fallback: boolean): boolean =>
	value === null ? fallback : value === 1;

const toColumnValue = (value: string | number | boolean): string | number =>
	typeof value === "boolean" ? toSqlBool(value) : value;

export class ConfigStore {
	constructor(private readonly db: Db) {}

	/** Effective settings for a group, defaults filled in */
	get(groupId: GroupId): GroupConfig {
		const row = get<GroupSettingsRow>(
			this.db,
			"SELECT * FROM group_settings WHERE group_id = ?",
			[groupId],
		);
		if (!row) {
			return {
				...DEFAULT_GROUP_CONFIG,
				serviceMsg: { ...DEFAULT_GROUP_CONFIG.serviceMsg },
				eventMsg: { ...DEFAULT_GROUP_CONFIG.eventMsg },
			};
		}

		const d = DEFAULT_GROUP_CONFIG;
		return {
			warnThreshold: row.warn_threshold ?? d.warnThreshold,
			muteDurationHours: row.mute_duration_hours ?? d.muteDurationHours,
			editDeletionEnabled: flag(row.edit_deletion, d.editDeletionEnabled),
			nsfwFilterEnabled: flag(row.nsfw_filter, d.nsfwFilterEnabled),
			selfDestructSeconds: row.self_destruct_seconds ?? d.selfDestructSeconds,
			serviceMsg: {
				enabled: flag(row.service_enabled, d.serviceMsg.enabled),
				deleteAfterSeconds:
					row.service_delete_after ?? d.serviceMsg.deleteAfterSeconds,
			},
			eventMsg: {
				enabled: flag(row.event_enabled, d.eventMsg.enabled),
				deleteAfterSeconds:
					row.event_delete_after ?? d.eventMsg.deleteAfterSeconds,
			},
			welcomeText: row.welcome_text ?? undefined,
			welcomeImageHandle: row.welcome_image ?? undefined,
			serviceInfoText: row.service_info_text ?? undefined,
		};
	}

	set<K extends GroupSetting>(
		groupId: GroupId,
		field: K,
		value: GroupSettingValues[K],
	): void {
		const column = COLUMNS[field];
		execute(
			this.db,
			`INSERT INTO group_settings (group_id, ${column}, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(group_id) DO UPDATE SET ${column} = excluded.${column}, updated_at = excluded.updated_at`,
			[groupId, toColumnValue(value), Math.floor(Date.now() / 1000)],
		);

		StructuredLogger.logModerationEvent("Group setting changed", {
			groupId,
			operation: "set_setting",
			field,
		});
	}

	/**
	 * Reverts one field to its default.
	 *
	 * @returns false when the field already held its default
	 */
	reset(groupId: GroupId, field: GroupSetting): boolean {
		const column = COLUMNS[field];
		const result = execute(
			this.db,
			`UPDATE group_settings SET ${column} = NULL, updated_at = ?
       WHERE group_id = ? AND ${column} IS NOT NULL`,
			[Math.floor(Date.now() / 1000), groupId],
		);

		if (result.changes > 0) {
			StructuredLogger.logModerationEvent("Group setting reset", {
				groupId,
				operation: "reset_setting",
				field,
			});
		}
		return result.changes > 0;
	}
}
