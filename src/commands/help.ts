/**
 * Informational commands: /start, /help and the bot's own /status.
 *
 * /help lists every registered command, public ones first, using each
 * definition's description.
 *
 * @module commands/help
 */

import { bold, type FmtString, fmt, join } from "telegraf/format";
import type { CommandDefinition } from "../services/commandRouter";
import type { AdminRights, MemberStatus } from "../services/enforcementGateway";

const STATUS_RIGHTS: Array<[label: string, right: keyof AdminRights]> = [
	["Delete messages", "can_delete_messages"],
	["Restrict members", "can_restrict_members"],
	["Invite users", "can_invite_users"],
	["Pin messages", "can_pin_messages"],
	["Manage topics", "can_manage_topics"],
	["Change info", "can_change_info"],
];

const commandLine = (definition: CommandDefinition): string =>
	`/${definition.name} - ${definition.description}`;

export function helpText(catalog: CommandDefinition[]): FmtString {
	const publicCommands = catalog.filter((d) => d.access === "public");
	const adminCommands = catalog.filter((d) => d.access === "privileged");

	return fmt`🤖 ${bold("Group Moderation Bot")}

${bold("General commands:")}
${join(publicCommands.map(commandLine), "\n")}

${bold("Admin commands:")}
${join(adminCommands.map(commandLine), "\n")}`;
}

/** Whether the bot holds a right; the owner holds all of them */
const holds = (status: MemberStatus, right: keyof AdminRights): boolean =>
	status.status === "creator" || status.rights?.[right] === true;

export function botStatusText(status: MemberStatus): FmtString {
	const lines = STATUS_RIGHTS.map(
		([label, right]) => `${holds(status, right) ? "✅" : "❌"} ${label}`,
	);
	return fmt`🤖 ${bold("Bot Status")}

Status: ${status.status}

${bold("Permissions:")}
${join(lines, "\n")}`;
}

/**
 * @param catalog - every registered command, read when /help runs
 */
export function helpCommands(
	catalog: () => CommandDefinition[],
): CommandDefinition[] {
	return [
		{
			name: "start",
			description: "Check that the bot is running",
			access: "public",
			scope: "any",
			async run({ request }) {
				if (request.chatKind === "private") {
					return {
						content:
							"👋 Hello! Add me to a group and make me an admin to manage it.\nUse /help to see all commands.",
					};
				}
				return { content: "✅ Bot is active! Use /help to see available commands." };
			},
		},
		{
			name: "help",
			description: "Show this command list",
			access: "public",
			scope: "any",
			async run() {
				return { content: helpText(catalog()) };
			},
		},
		{
			name: "status",
			description: "Show the bot's permissions in this group",
			access: "public",
			scope: "group",
			async run({ request, services, botId }) {
				const status = await services.gateway.getMemberStatus(request.chatId, botId);
				if (!status.ok) {
					return { content: `❌ Failed to get bot status: ${status.error.message}` };
				}
				return { content: botStatusText(status.value) };
			},
		},
	];
}
