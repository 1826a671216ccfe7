/**
 * Member management commands: info, ban/unban, mute/unmute, and manual
 * warnings.
 *
 * @module commands/moderation
 */

import { bold, code, type FmtString, fmt, mention } from "telegraf/format";
import type { CommandDefinition, CommandReply } from "../services/commandRouter";
import type { MemberStatus } from "../services/enforcementGateway";
import { applyWarning, muteUntil } from "../services/escalation";
import { manualWarningNotice } from "../services/notifications";
import {
	activeFlags,
	FULL_PERMISSIONS,
	MUTED_PERMISSIONS,
} from "../services/restrictionMatrix";
import { type MemberProfile, memberKey, type RestrictionSet, type UserId } from "../types";
import { InvalidInputError } from "../utils/errors";
import {
	banStatusKeyboard,
	FLAG_LABELS,
	memberActionsKeyboard,
	muteStatusKeyboard,
} from "../utils/keyboards";
import { StructuredLogger } from "../utils/logger";
import {
	remainingArgs,
	requireTarget,
	type ResolvedTarget,
} from "../utils/targetResolver";

const STATUS_EMOJI: Record<MemberStatus["status"], string> = {
	creator: "👑",
	administrator: "🛡️",
	member: "👤",
	restricted: "🚫",
	left: "🚻",
	kicked: "❌",
};

const INFO_USAGE = `❌ Please specify a user by:
• Replying to their message
• Mentioning them (@username)
• Providing their user ID

Example: /info @username or /info 123456789`;

const titleCase = (value: string): string =>
	value.charAt(0).toUpperCase() + value.slice(1);

const yesNo = (value: boolean): string => (value ? "✅ Yes" : "❌ No");

const tick = (value: boolean | undefined): string => (value ? "✅" : "❌");

export function banStatusReply(userId: UserId, banned: boolean): CommandReply {
	return {
		content: fmt`🔨 ${bold("Ban Status Manager")}

User ID: ${code(String(userId))}

Current Status: ✅ ${banned ? "Banned" : "Unbanned"}

Click to toggle:`,
		keyboard: banStatusKeyboard(userId, banned),
	};
}

export function muteStatusReply(
	userId: UserId,
	muted: boolean,
	hours?: number,
): CommandReply {
	const duration = hours ? `\nDuration: ${hours} hour(s)\n` : "";
	return {
		content: fmt`🔇 ${bold("Mute Status Manager")}

User ID: ${code(String(userId))}
${duration}
Current Status: ✅ ${muted ? "Muted" : "Unmuted"}

Click to toggle:`,
		keyboard: muteStatusKeyboard(userId, muted),
	};
}

/** Restriction summary as shown by /info, "None" without active flags */
export function describeRestrictions(flags: RestrictionSet): string {
	const active = activeFlags(flags).map((flag) => FLAG_LABELS[flag]);
	return active.length > 0 ? active.join(", ") : "None";
}

function infoCard(
	status: MemberStatus,
	warnings: number,
	threshold: number,
	restrictions: string,
	withActions: boolean,
): FmtString {
	const { user } = status;
	const permissions = status.permissions;

	const permissionBlock = permissions
		? fmt`
🔒 ${bold("Permissions:")}
Send Messages: ${tick(permissions.can_send_messages)}
Send Media: ${tick(permissions.can_send_photos)}
Send Polls: ${tick(permissions.can_send_polls)}
Add Web Preview: ${tick(permissions.can_add_web_page_previews)}
`
		: "";

	const actionsBlock = withActions
		? fmt`

🛠️ ${bold("Admin Actions:")}
Click buttons below to manage user.`
		: "";

	return fmt`📍 ${bold("User Information")}

🏷️ ${bold("Basic Info:")}
Name: ${user.firstName} ${user.lastName ?? "N/A"}
Username: ${user.username ? `@${user.username}` : "N/A"}
User ID: ${code(String(user.id))}
Bot: ${yesNo(user.isBot)}

📊 ${bold("Group Status:")}
Status: ${STATUS_EMOJI[status.status]} ${titleCase(status.status)}
Warnings: ⚠️ ${warnings}/${threshold}
Restrictions: ${restrictions}
${permissionBlock}
👤 Profile: ${mention(user.firstName, user.id)}${actionsBlock}`;
}

const profileOf = (target: ResolvedTarget): MemberProfile =>
	target.profile ?? { id: target.userId, firstName: "User", isBot: false };

/** Parses the optional hours argument of /mute */
export function parseMuteHours(args: string[]): number | undefined {
	const [raw] = args;
	if (raw === undefined) return undefined;

	const hours = Number(raw);
	if (!Number.isInteger(hours) || hours < 1) {
		throw new InvalidInputError(
			"❌ Mute duration must be a whole number of hours (1 or more).\n\nUsage: /mute <user> [hours]",
		);
	}
	return hours;
}

export const moderationCommands: CommandDefinition[] = [
	{
		name: "info",
		description: "Get user information (reply/mention/ID/@username)",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const target = await requireTarget(request, services.gateway, INFO_USAGE);
			const key = memberKey(request.chatId, target.userId);

			const status = await services.gateway.getMemberStatus(
				request.chatId,
				target.userId,
			);
			if (!status.ok) {
				return { content: `❌ Failed to get user info: ${status.error.message}` };
			}

			const { warnThreshold } = services.configStore.get(request.chatId);
			const withActions = !status.value.privileged;

			return {
				content: infoCard(
					status.value,
					services.warnings.getCount(key),
					warnThreshold,
					describeRestrictions(services.restrictions.getFlags(key)),
					withActions,
				),
				keyboard: withActions ? memberActionsKeyboard(target.userId) : undefined,
			};
		},
	},
	{
		name: "ban",
		description: "Ban user (reply/mention/ID/@username)",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const target = await requireTarget(request, services.gateway);
			const result = await services.gateway.banMember(
				request.chatId,
				target.userId,
			);
			if (!result.ok) {
				return { content: `❌ Failed to ban user: ${result.error.message}` };
			}

			StructuredLogger.logSecurityEvent("Member banned", {
				groupId: request.chatId,
				userId: target.userId,
				adminId: request.issuer.id,
				operation: "ban",
			});
			return banStatusReply(target.userId, true);
		},
	},
	{
		name: "unban",
		description: "Unban user (reply/mention/ID/@username)",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const target = await requireTarget(request, services.gateway);
			const result = await services.gateway.unbanMember(
				request.chatId,
				target.userId,
			);
			if (!result.ok) {
				return { content: `❌ Failed to unban user: ${result.error.message}` };
			}

			StructuredLogger.logSecurityEvent("Member unbanned", {
				groupId: request.chatId,
				userId: target.userId,
				adminId: request.issuer.id,
				operation: "unban",
			});
			return { content: "✅ User has been unbanned." };
		},
	},
	{
		name: "mute",
		description: "Mute user, optionally for a number of hours",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const target = await requireTarget(request, services.gateway);
			const hours = parseMuteHours(remainingArgs(request, target));

			const result = await services.gateway.restrictMember(
				request.chatId,
				target.userId,
				{ ...MUTED_PERMISSIONS },
				hours ? muteUntil(hours) : undefined,
			);
			if (!result.ok) {
				return { content: `❌ Failed to mute user: ${result.error.message}` };
			}

			StructuredLogger.logSecurityEvent("Member muted", {
				groupId: request.chatId,
				userId: target.userId,
				adminId: request.issuer.id,
				operation: "mute",
				hours,
			});
			return muteStatusReply(target.userId, true, hours);
		},
	},
	{
		name: "unmute",
		description: "Unmute user (reply/mention/ID/@username)",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const target = await requireTarget(request, services.gateway);
			const result = await services.gateway.restrictMember(
				request.chatId,
				target.userId,
				{ ...FULL_PERMISSIONS },
			);
			if (!result.ok) {
				return { content: `❌ Failed to unmute user: ${result.error.message}` };
			}

			StructuredLogger.logSecurityEvent("Member unmuted", {
				groupId: request.chatId,
				userId: target.userId,
				adminId: request.issuer.id,
				operation: "unmute",
			});
			return { content: "✅ User has been unmuted." };
		},
	},
	{
		name: "warn",
		description: "Warn user; reaching the limit mutes them",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const target = await requireTarget(request, services.gateway);
			const { outcome } = await applyWarning(
				services.warnings,
				services.gateway,
				memberKey(request.chatId, target.userId),
			);

			return {
				content: manualWarningNotice(request.issuer, profileOf(target), outcome),
			};
		},
	},
	{
		name: "warnings",
		description: "Check user warnings",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const target = await requireTarget(request, services.gateway);
			const count = services.warnings.getCount(
				memberKey(request.chatId, target.userId),
			);
			const { warnThreshold } = services.configStore.get(request.chatId);
			return { content: `⚠️ User has ${count}/${warnThreshold} warnings.` };
		},
	},
	{
		name: "resetwarns",
		description: "Clear a user's warnings",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const target = await requireTarget(request, services.gateway);
			const previous = services.warnings.reset(
				memberKey(request.chatId, target.userId),
			);

			StructuredLogger.logSecurityEvent("Warnings reset", {
				groupId: request.chatId,
				userId: target.userId,
				adminId: request.issuer.id,
				operation: "reset_warnings",
				previous,
			});
			return { content: `✅ Warnings reset (was ${previous}).` };
		},
	},
];
