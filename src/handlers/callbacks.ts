/**
 * Callback query handler for the moderation keyboards.
 * Processes button presses and applies the response to the message the
 * keyboard belongs to.
 *
 * @module handlers/callbacks
 */

import type { Context, Telegraf } from "telegraf";
import type { ModerationServices } from "../services";
import {
	type CallbackResponse,
	handleCallbackAction,
} from "../services/callbackActions";
import { toMemberProfile } from "../services/telegramGateway";
import { logger } from "../utils/logger";

/** Replaces the pressed message or its keyboard; "not modified" errors are expected */
async function updateMessage(ctx: Context, response: CallbackResponse): Promise<void> {
	try {
		if (response.edit) {
			const { content, options, keyboard } = response.edit;
			await ctx.editMessageText(content, {
				parse_mode: options?.parseMode,
				reply_markup: keyboard,
			});
		} else if (response.markup) {
			await ctx.editMessageReplyMarkup(response.markup);
		}
	} catch (error) {
		logger.debug("Callback message not updated", { error });
	}
}

/**
 * Registers the callback query handler with the bot
 */
export function registerCallbackHandlers(
	bot: Telegraf<Context>,
	services: ModerationServices,
): void {
	bot.on("callback_query", async (ctx) => {
		const query = ctx.callbackQuery;
		const chatId = ctx.chat?.id;
		if (!("data" in query) || chatId === undefined) {
			await ctx.answerCbQuery();
			return;
		}

		let response: CallbackResponse;
		try {
			response =
				(await handleCallbackAction(services, {
					chatId,
					issuer: toMemberProfile(query.from),
					data: query.data,
				})) ?? {};
		} catch (error) {
			logger.error("Error handling callback query", {
				userId: query.from.id,
				data: query.data,
				error,
			});
			await ctx.answerCbQuery("An error occurred. Please try again.");
			return;
		}

		await ctx.answerCbQuery(response.answer, { show_alert: response.alert });
		await updateMessage(ctx, response);
	});
}
