/**
 * Welcome template and image, and the free-service information text.
 *
 * @module commands/welcome
 */

import { bold, fmt, italic } from "telegraf/format";
import type { CommandDefinition } from "../services/commandRouter";
import { renderWelcome, SAMPLE_WELCOME_MEMBER } from "../services/welcome";
import { InvalidInputError } from "../utils/errors";

const WELCOME_USAGE = `❌ Please provide a welcome message.

Usage: /setwelcomemessage Your welcome message here

You can use these placeholders:
{name} - User's first name
{mention} - Mention the user
{username} - User's username
{id} - User's ID
{group} - Group name

Example: /setwelcomemessage Welcome {mention} to {group}! Your ID: {id}`;

const SERVICE_USAGE = `❌ Please provide service information.

Usage: /setservice Your service details here

Example: /setservice 🎁 Free courses available! Contact @admin for details.`;

export const DEFAULT_SERVICE_INFO = fmt`🎁 ${bold("Free Services Available")}

• No service information set yet.

${italic("Admins can use /setservice to add service details.")}`;

export const welcomeCommands: CommandDefinition[] = [
	{
		name: "setwelcomemessage",
		description: "Set custom welcome message",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const template = request.argText.trim();
			if (!template) throw new InvalidInputError(WELCOME_USAGE);

			services.configStore.set(request.chatId, "welcomeText", template);

			const preview = renderWelcome(
				template,
				SAMPLE_WELCOME_MEMBER,
				request.chatTitle ?? "Group",
			);
			return {
				content: `✅ Welcome message set successfully!\n\nPreview:\n${preview}`,
				options: { parseMode: "HTML" },
			};
		},
	},
	{
		name: "setwelcomeimage",
		description: "Set welcome image (reply to image)",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const photo = request.replyTo?.media.find(
				(attachment) => attachment.kind === "photo",
			);
			if (!photo) {
				throw new InvalidInputError(
					"❌ Please reply to an image with /setwelcomeimage to set it as the welcome image.",
				);
			}

			services.configStore.set(request.chatId, "welcomeImageHandle", photo.fileId);
			return { content: "✅ Welcome image set successfully!" };
		},
	},
	{
		name: "resetwelcome",
		description: "Reset welcome message and image to default",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const messageRemoved = services.configStore.reset(request.chatId, "welcomeText");
			const imageRemoved = services.configStore.reset(
				request.chatId,
				"welcomeImageHandle",
			);

			if (!messageRemoved && !imageRemoved) {
				return {
					content: "ℹ️ No custom welcome settings found. Already using default.",
				};
			}

			const items = [
				...(messageRemoved ? ["message"] : []),
				...(imageRemoved ? ["image"] : []),
			];
			return { content: `✅ Welcome ${items.join(" and ")} reset to default!` };
		},
	},
	{
		name: "resetwelcomeimage",
		description: "Reset welcome image to default",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			if (!services.configStore.reset(request.chatId, "welcomeImageHandle")) {
				return {
					content: "ℹ️ No custom welcome image found. Already using default.",
				};
			}
			return { content: "✅ Welcome image reset to default!" };
		},
	},
	{
		name: "service",
		description: "View free service information",
		access: "public",
		scope: "group",
		async run({ request, services }) {
			const { serviceInfoText } = services.configStore.get(request.chatId);
			return { content: serviceInfoText ?? DEFAULT_SERVICE_INFO };
		},
	},
	{
		name: "setservice",
		description: "Set free service information",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			const text = request.argText.trim();
			if (!text) throw new InvalidInputError(SERVICE_USAGE);

			services.configStore.set(request.chatId, "serviceInfoText", text);
			return {
				content: `✅ Service information set successfully!\n\nPreview:\n${text}`,
			};
		},
	},
	{
		name: "resetservice",
		description: "Reset service information",
		access: "privileged",
		scope: "group",
		async run({ request, services }) {
			if (!services.configStore.reset(request.chatId, "serviceInfoText")) {
				return {
					content:
						"ℹ️ No custom service information found. Already using default.",
				};
			}
			return { content: "✅ Service information reset to default!" };
		},
	},
];
