/**
 * Role templates granted through the platform's administrator rights.
 *
 * @module commands/roles
 */

import type { CommandDefinition } from "../services/commandRouter";
import type { AdminRights } from "../services/enforcementGateway";
import { StructuredLogger } from "../utils/logger";
import { requireTarget, targetName } from "../utils/targetResolver";

export type RoleName = "mod" | "admin";

export const ROLE_TEMPLATES: Record<RoleName, AdminRights> = {
	mod: {
		can_delete_messages: true,
		can_restrict_members: true,
		can_pin_messages: true,
		can_invite_users: true,
	},
	admin: {
		can_manage_chat: true,
		can_delete_messages: true,
		can_manage_video_chats: true,
		can_restrict_members: true,
		can_promote_members: true,
		can_change_info: true,
		can_invite_users: true,
		can_pin_messages: true,
		can_manage_topics: true,
	},
};

/** Every right set to false; the platform treats this as a demotion */
export const NO_RIGHTS: AdminRights = {
	can_manage_chat: false,
	can_delete_messages: false,
	can_manage_video_chats: false,
	can_restrict_members: false,
	can_promote_members: false,
	can_change_info: false,
	can_invite_users: false,
	can_pin_messages: false,
	can_manage_topics: false,
};

const ROLE_LABELS: Record<RoleName, string> = {
	mod: "Moderator",
	admin: "Administrator",
};

const PROMOTE_USAGE = `❌ Please specify a user by:
• Replying to their message
• Mentioning them (@username)
• Providing their user ID

Usage: /promote [mod|admin] <user>`;

const isRoleName = (value: string | undefined): value is RoleName =>
	value === "mod" || value === "admin";

export const roleCommands: CommandDefinition[] = [
	{
		name: "promote",
		description: "Promote user to moderator or admin",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const requested = request.args[0]?.toLowerCase();
			const role: RoleName = isRoleName(requested) ? requested : "mod";
			// the role word comes before the target
			const targetRequest = isRoleName(requested)
				? { ...request, args: request.args.slice(1) }
				: request;

			const target = await requireTarget(targetRequest, services.gateway, PROMOTE_USAGE);
			const result = await services.gateway.promoteMember(
				request.chatId,
				target.userId,
				ROLE_TEMPLATES[role],
			);
			if (!result.ok) {
				return { content: `❌ Failed to promote user: ${result.error.message}` };
			}

			StructuredLogger.logSecurityEvent("Member promoted", {
				groupId: request.chatId,
				userId: target.userId,
				adminId: request.issuer.id,
				operation: "promote",
				role,
			});
			return {
				content: `✅ ${targetName(target)} promoted to ${ROLE_LABELS[role]}.`,
			};
		},
	},
	{
		name: "demote",
		description: "Remove a user's admin rights",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const target = await requireTarget(request, services.gateway);
			const result = await services.gateway.promoteMember(
				request.chatId,
				target.userId,
				NO_RIGHTS,
			);
			if (!result.ok) {
				return { content: `❌ Failed to demote user: ${result.error.message}` };
			}

			StructuredLogger.logSecurityEvent("Member demoted", {
				groupId: request.chatId,
				userId: target.userId,
				adminId: request.issuer.id,
				operation: "demote",
			});
			return { content: `✅ ${targetName(target)} has been demoted.` };
		},
	},
];
