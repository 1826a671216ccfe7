/**
 * Per-group settings commands. Every value is validated before it is
 * stored; an invalid value leaves the previous setting in place.
 *
 * @module commands/settings
 */

import { bold, type FmtString, fmt, italic } from "telegraf/format";
import type { CommandDefinition } from "../services/commandRouter";
import type { GroupSetting } from "../services/configStore";
import { MAX_DELAY_SECONDS } from "../services/deletionScheduler";
import type { GroupConfig, MessageVisibility } from "../types";
import { InvalidInputError } from "../utils/errors";

const onOff = (value: boolean): string => (value ? "✅ On" : "❌ Off");

/** Parses a whole number within `[min, max]`, or throws the usage text */
export function parseWholeNumber(
	raw: string | undefined,
	min: number,
	usage: string,
	max = Number.MAX_SAFE_INTEGER,
): number {
	if (raw === undefined || !/^\d+$/.test(raw)) throw new InvalidInputError(usage);
	const value = Number(raw);
	if (value < min || value > max) throw new InvalidInputError(usage);
	return value;
}

export function parseOnOff(raw: string | undefined, usage: string): boolean {
	const value = raw?.toLowerCase();
	if (value !== "on" && value !== "off") throw new InvalidInputError(usage);
	return value === "on";
}

export type VisibilityChange =
	| { enabled: false }
	| { enabled: true; deleteAfterSeconds?: number };

/** `on`, `off`, or a delay in seconds (0 keeps the messages forever) */
export function parseVisibility(
	raw: string | undefined,
	usage: string,
): VisibilityChange {
	const value = raw?.toLowerCase();
	if (value === "on") return { enabled: true };
	if (value === "off") return { enabled: false };
	return {
		enabled: true,
		deleteAfterSeconds: parseWholeNumber(value, 0, usage, MAX_DELAY_SECONDS),
	};
}

function describeVisibility(visibility: MessageVisibility): string {
	if (!visibility.enabled) return "❌ Deleted immediately";
	if (visibility.deleteAfterSeconds === 0) return "✅ Kept";
	return `⏱️ Deleted after ${visibility.deleteAfterSeconds}s`;
}

export function settingsSummary(config: GroupConfig): FmtString {
	const selfDestruct =
		config.selfDestructSeconds > 0 ? `${config.selfDestructSeconds}s` : "Off";

	return fmt`⚙️ ${bold("Group Settings")}

Warning limit: ${String(config.warnThreshold)}
Auto-mute duration: ${String(config.muteDurationHours)} hour(s)
Delete edited messages: ${onOff(config.editDeletionEnabled)}
NSFW filter: ${onOff(config.nsfwFilterEnabled)}
Bot reply self-destruct: ${selfDestruct}
Service messages: ${describeVisibility(config.serviceMsg)}
Event messages: ${describeVisibility(config.eventMsg)}
Custom welcome: ${config.welcomeText ? "✅" : "❌"} text, ${config.welcomeImageHandle ? "✅" : "❌"} image

${italic("Use /help to see the commands that change these.")}`;
}

/** Builds a reset command that reports whether anything changed */
function resetCommand(
	name: string,
	description: string,
	field: GroupSetting,
	label: string,
	current: (config: GroupConfig) => string,
): CommandDefinition {
	return {
		name,
		description,
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const changed = services.configStore.reset(request.chatId, field);
			const value = current(services.configStore.get(request.chatId));
			return {
				content: changed
					? `✅ ${label} reset to default (${value}).`
					: `ℹ️ ${label} is already the default (${value}).`,
			};
		},
	};
}

function visibilityCommand(
	name: "servicemsg" | "eventmsg",
	label: string,
	enabledField: "serviceMsgEnabled" | "eventMsgEnabled",
	delayField: "serviceMsgDeleteAfterSeconds" | "eventMsgDeleteAfterSeconds",
): CommandDefinition {
	const usage = `❌ Usage: /${name} on|off|<seconds>

on - keep ${label} messages (with the current delay)
off - delete ${label} messages immediately
<seconds> - delete ${label} messages after this many seconds (0 = never, at most ${MAX_DELAY_SECONDS})`;

	return {
		name,
		description: `Control ${label} messages (on/off/seconds)`,
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const change = parseVisibility(request.args[0], usage);
			const { configStore } = services;

			configStore.set(request.chatId, enabledField, change.enabled);
			if (change.enabled && change.deleteAfterSeconds !== undefined) {
				configStore.set(request.chatId, delayField, change.deleteAfterSeconds);
			}

			const config = configStore.get(request.chatId);
			const visibility = name === "servicemsg" ? config.serviceMsg : config.eventMsg;
			return {
				content: `✅ ${label.charAt(0).toUpperCase()}${label.slice(1)} messages: ${describeVisibility(visibility)}`,
			};
		},
	};
}

export const settingsCommands: CommandDefinition[] = [
	{
		name: "setwarnlimit",
		description: "Set the number of warnings before auto-mute",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const limit = parseWholeNumber(
				request.args[0],
				1,
				"❌ Usage: /setwarnlimit <number>\n\nThe limit must be a whole number of 1 or more.",
			);
			services.configStore.set(request.chatId, "warnThreshold", limit);
			return { content: `✅ Warning limit set to ${limit}.` };
		},
	},
	resetCommand(
		"resetwarnlimit",
		"Reset the warning limit to default",
		"warnThreshold",
		"Warning limit",
		(config) => String(config.warnThreshold),
	),
	{
		name: "setmutetime",
		description: "Set the auto-mute duration in hours",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const hours = parseWholeNumber(
				request.args[0],
				1,
				"❌ Usage: /setmutetime <hours>\n\nThe duration must be a whole number of 1 or more.",
			);
			services.configStore.set(request.chatId, "muteDurationHours", hours);
			return { content: `✅ Auto-mute duration set to ${hours} hour(s).` };
		},
	},
	resetCommand(
		"resetmutetime",
		"Reset the auto-mute duration to default",
		"muteDurationHours",
		"Auto-mute duration",
		(config) => `${config.muteDurationHours} hour(s)`,
	),
	{
		name: "editdelete",
		description: "Delete edited messages (on/off)",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const enabled = parseOnOff(request.args[0], "❌ Usage: /editdelete on|off");
			services.configStore.set(request.chatId, "editDeletionEnabled", enabled);
			return {
				content: enabled
					? "✅ Edited messages from members will be deleted."
					: "✅ Edited messages will no longer be deleted.",
			};
		},
	},
	{
		name: "nsfw",
		description: "Toggle the NSFW filter (on/off)",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const enabled = parseOnOff(request.args[0], "❌ Usage: /nsfw on|off");
			services.configStore.set(request.chatId, "nsfwFilterEnabled", enabled);
			return {
				content: enabled ? "✅ NSFW filter enabled." : "✅ NSFW filter disabled.",
			};
		},
	},
	{
		name: "setselfdestruct",
		description: "Delete bot replies after a number of seconds",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const seconds = parseWholeNumber(
				request.args[0],
				1,
				`❌ Usage: /setselfdestruct <seconds>\n\nThe delay must be a whole number from 1 to ${MAX_DELAY_SECONDS}.`,
				MAX_DELAY_SECONDS,
			);
			services.configStore.set(request.chatId, "selfDestructSeconds", seconds);
			return {
				content: `✅ Bot replies will be deleted after ${seconds} second(s).`,
			};
		},
	},
	{
		name: "resetselfdestruct",
		description: "Keep bot replies",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			if (!services.configStore.reset(request.chatId, "selfDestructSeconds")) {
				return { content: "ℹ️ Self-destruct is already off." };
			}
			return { content: "✅ Self-destruct disabled. Bot replies will be kept." };
		},
	},
	visibilityCommand(
		"servicemsg",
		"service",
		"serviceMsgEnabled",
		"serviceMsgDeleteAfterSeconds",
	),
	visibilityCommand("eventmsg", "event", "eventMsgEnabled", "eventMsgDeleteAfterSeconds"),
	{
		name: "settings",
		description: "Show this group's settings",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			return { content: settingsSummary(services.configStore.get(request.chatId)) };
		},
	},
];
