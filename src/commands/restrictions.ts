/**
 * Restriction panel: /free opens an inline keyboard with one toggle per
 * capability flag; "Save & Apply" projects the flags onto platform
 * permissions.
 *
 * @module commands/restrictions
 */

import { bold, code, fmt } from "telegraf/format";
import type { CommandDefinition, CommandReply } from "../services/commandRouter";
import { isPrivileged } from "../services/enforcementGateway";
import { activeFlags, projectPermissions } from "../services/restrictionMatrix";
import type { ModerationServices } from "../services";
import type { MemberKey, RestrictionSet, UserId } from "../types";
import { InvalidInputError } from "../utils/errors";
import { FLAG_LABELS, restrictionPanelKeyboard } from "../utils/keyboards";
import { StructuredLogger } from "../utils/logger";
import { requireTarget, targetName } from "../utils/targetResolver";

const FREE_USAGE = `❌ Please specify a user by:
• Replying to their message
• Mentioning them (@username)
• Providing their user ID

Example: /free @username or /free 123456789`;

export const PRIVILEGED_TARGET_REFUSAL = "❌ Cannot apply restrictions to admins.";

export function restrictionPanelReply(
	userId: UserId,
	name: string | undefined,
	flags: RestrictionSet,
): CommandReply {
	const who = name ? fmt`User: ${name}\n` : "";
	return {
		content: fmt`🔧 ${bold("Restriction Manager")}

${who}ID: ${code(String(userId))}

Toggle restrictions:
✅ = Restricted | ❌ = Allowed

Click 'Save & Apply' when done.`,
		keyboard: restrictionPanelKeyboard(userId, flags),
	};
}

/**
 * Opens the panel for a member, creating the restriction record.
 *
 * @throws {InvalidInputError} for privileged targets
 */
export async function openRestrictionPanel(
	services: ModerationServices,
	key: MemberKey,
	name?: string,
): Promise<CommandReply> {
	if (await isPrivileged(services.gateway, key.groupId, key.userId)) {
		throw new InvalidInputError(PRIVILEGED_TARGET_REFUSAL);
	}

	const flags = services.restrictions.ensure(key);
	return restrictionPanelReply(key.userId, name, flags);
}

/** "Save & Apply": pushes the projected permissions to the platform */
export async function applyRestrictions(
	services: ModerationServices,
	key: MemberKey,
	adminId: UserId,
): Promise<string> {
	const flags = services.restrictions.getFlags(key);
	const result = await services.gateway.restrictMember(
		key.groupId,
		key.userId,
		projectPermissions(flags),
	);
	if (!result.ok) {
		return `❌ Failed: ${result.error.message}`;
	}

	const active = activeFlags(flags).map((flag) => FLAG_LABELS[flag]);
	StructuredLogger.logSecurityEvent("Restrictions applied", {
		groupId: key.groupId,
		userId: key.userId,
		adminId,
		operation: "apply_restrictions",
		active,
	});

	if (active.length === 0) {
		return `✅ All restrictions removed!\n\nUser ID: ${key.userId}`;
	}
	return `✅ Restrictions applied!\n\nActive restrictions: ${active.join(", ")}\n\nUser ID: ${key.userId}`;
}

export const restrictionCommands: CommandDefinition[] = [
	{
		name: "free",
		description: "Manage user restrictions (reply/mention/ID/@username)",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const target = await requireTarget(request, services.gateway, FREE_USAGE);
			return openRestrictionPanel(
				services,
				{ groupId: request.chatId, userId: target.userId },
				target.profile ? targetName(target) : undefined,
			);
		},
	},
];
