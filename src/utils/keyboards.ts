/**
 * Inline keyboard layouts for the moderation commands.
 *
 * Callback data formats:
 * - `banstatus_<userId>_<banned|unbanned>`
 * - `mutestatus_<userId>_<muted|unmuted>`
 * - `action_<userId>_<warn|mute|ban|permissions>`
 * - `free_<userId>_<flag|apply>`
 *
 * @module utils/keyboards
 */

import type { InlineKeyboardButton, InlineKeyboardMarkup } from "telegraf/types";
import {
	RESTRICTION_FLAGS,
	type RestrictionFlag,
	type RestrictionSet,
	type UserId,
} from "../types";

export const FLAG_LABELS: Record<RestrictionFlag, string> = {
	flood: "Flood",
	spam: "Spam",
	media: "Media",
	checks: "Checks",
	night: "Silence/Night",
	sticker: "Sticker",
	gif: "GIF",
	link: "Link",
};

const mark = (on: boolean): string => (on ? "✅" : "❌");

export function banStatusKeyboard(
	userId: UserId,
	banned: boolean,
): InlineKeyboardMarkup {
	return {
		inline_keyboard: [
			[
				{
					text: `${mark(banned)} Banned`,
					callback_data: `banstatus_${userId}_banned`,
				},
				{
					text: `${mark(!banned)} Unbanned`,
					callback_data: `banstatus_${userId}_unbanned`,
				},
			],
		],
	};
}

export function muteStatusKeyboard(
	userId: UserId,
	muted: boolean,
): InlineKeyboardMarkup {
	return {
		inline_keyboard: [
			[
				{
					text: `${mark(muted)} Muted`,
					callback_data: `mutestatus_${userId}_muted`,
				},
				{
					text: `${mark(!muted)} Unmuted`,
					callback_data: `mutestatus_${userId}_unmuted`,
				},
			],
		],
	};
}

/** Shown under /info for non-privileged targets */
export function memberActionsKeyboard(userId: UserId): InlineKeyboardMarkup {
	return {
		inline_keyboard: [
			[
				{ text: "⚠️ Warn", callback_data: `action_${userId}_warn` },
				{ text: "🔇 Mute", callback_data: `action_${userId}_mute` },
			],
			[
				{ text: "🔨 Ban", callback_data: `action_${userId}_ban` },
				{
					text: "🔧 Permissions",
					callback_data: `action_${userId}_permissions`,
				},
			],
		],
	};
}

/** One toggle per restriction flag, two per row, then Save & Apply */
export function restrictionPanelKeyboard(
	userId: UserId,
	flags: RestrictionSet,
): InlineKeyboardMarkup {
	const toggles: InlineKeyboardButton[] = RESTRICTION_FLAGS.map((flag) => ({
		text: `${mark(flags[flag])} ${FLAG_LABELS[flag]}`,
		callback_data: `free_${userId}_${flag}`,
	}));

	const rows: InlineKeyboardButton[][] = [];
	for (let i = 0; i < toggles.length; i += 2) {
		rows.push(toggles.slice(i, i + 2));
	}
	rows.push([{ text: "💾 Save & Apply", callback_data: `free_${userId}_apply` }]);

	return { inline_keyboard: rows };
}
