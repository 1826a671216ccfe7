/**
 * Telegram transport for the command router: turns a command message into
 * a CommandRequest, sends the reply, and schedules self-destruct of both
 * the command and the reply when the group asks for it.
 *
 * @module handlers/commands
 */

import type { Context, Telegraf } from "telegraf";
import type { Message, MessageEntity } from "telegraf/types";
import type { ModerationServices } from "../services";
import type {
	ChatKind,
	CommandReply,
	CommandRequest,
	CommandRouter,
} from "../services/commandRouter";
import { toMemberProfile } from "../services/telegramGateway";
import { logger } from "../utils/logger";
import { chatTitle, collectMedia } from "./normalize";

/** Blanks out the spans covered by the given entities, keeping offsets */
function blankEntities(text: string, entities: MessageEntity[]): string {
	let result = text;
	for (const entity of entities) {
		result =
			result.slice(0, entity.offset) +
			" ".repeat(entity.length) +
			result.slice(entity.offset + entity.length);
	}
	return result;
}

/**
 * @returns undefined unless the message starts with a bot command
 */
export function buildCommandRequest(message: Message): CommandRequest | undefined {
	if (!("text" in message) || !message.from) return undefined;

	const entities = message.entities ?? [];
	const [commandEntity] = entities;
	if (commandEntity?.type !== "bot_command" || commandEntity.offset !== 0) {
		return undefined;
	}

	const { text } = message;
	// "/ban@SomeBot" addresses this bot by name
	const command = text
		.slice(1, commandEntity.length)
		.split("@")[0]
		?.toLowerCase();
	if (!command) return undefined;

	const textMentionEntities = entities.flatMap((entity) =>
		entity.type === "text_mention" ? [entity] : [],
	);
	const argumentText = blankEntities(text, textMentionEntities).slice(
		commandEntity.length,
	);

	const replied = message.reply_to_message;

	return {
		command,
		chatId: message.chat.id,
		chatKind: message.chat.type satisfies ChatKind,
		chatTitle: chatTitle(message.chat),
		messageId: message.message_id,
		issuer: toMemberProfile(message.from),
		args: argumentText.split(/\s+/).filter(Boolean),
		argText: text.slice(commandEntity.length).trim(),
		replyTo: replied
			? {
					messageId: replied.message_id,
					sender: replied.from ? toMemberProfile(replied.from) : undefined,
					media: collectMedia(replied),
					caption: "caption" in replied ? replied.caption : undefined,
				}
			: undefined,
		textMentions: textMentionEntities.map((entity) => toMemberProfile(entity.user)),
		mentionedUsernames: entities
			.filter((entity) => entity.type === "mention")
			.map((entity) => text.slice(entity.offset + 1, entity.offset + entity.length)),
	};
}

/** Sends a reply and, in groups with self-destruct on, schedules its removal */
export async function deliverReply(
	services: ModerationServices,
	request: Pick<CommandRequest, "chatId" | "chatKind" | "messageId">,
	reply: CommandReply,
): Promise<void> {
	const sent = await services.gateway.sendText(request.chatId, reply.content, {
		...reply.options,
		keyboard: reply.keyboard,
	});

	const inGroup = request.chatKind === "group" || request.chatKind === "supergroup";
	if (!inGroup) return;

	const { selfDestructSeconds } = services.configStore.get(request.chatId);
	if (selfDestructSeconds <= 0) return;

	const delayMs = selfDestructSeconds * 1000;
	services.scheduler.schedule(request.chatId, request.messageId, delayMs);
	if (sent.ok) {
		services.scheduler.schedule(request.chatId, sent.value.messageId, delayMs);
	}
}

/**
 * Routes every command message through the router. Messages the router does
 * not answer continue down the middleware chain.
 */
export function registerCommandHandlers(
	bot: Telegraf<Context>,
	router: CommandRouter,
	services: ModerationServices,
): void {
	bot.on("message", async (ctx, next) => {
		const request = buildCommandRequest(ctx.message);
		if (!request || !router.get(request.command)) return next();

		const reply = await router.dispatch(request);
		if (!reply) return;

		await deliverReply(services, request, reply);
		logger.debug("Command handled", {
			command: request.command,
			chatId: request.chatId,
			userId: request.issuer.id,
			chatKind: request.chatKind,
		});
	});
}
