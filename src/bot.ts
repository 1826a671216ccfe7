/**
 * Main entry point for the group moderation bot.
 * Opens the moderation store, wires the policy evaluator and command router
 * to Telegram, and manages graceful shutdown.
 *
 * @module bot
 */

import { Telegraf } from "telegraf";
import { allCommands } from "./commands";
import { config, validateConfig } from "./config";
import { openDatabase } from "./database";
import { registerCallbackHandlers } from "./handlers/callbacks";
import { registerCommandHandlers } from "./handlers/commands";
import { createMessageFilter } from "./middleware/messageFilter";
import { createModerationServices } from "./services";
import { CommandRouter } from "./services/commandRouter";
import { TelegramGateway } from "./services/telegramGateway";
import { logger, updateLogLevel } from "./utils/logger";

/**
 * Main initialization and startup function.
 *
 * 1. Validates configuration from environment variables
 * 2. Opens the database and creates tables
 * 3. Builds the moderation services around the Telegram gateway
 * 4. Registers the moderation middleware, commands and button handlers
 * 5. Configures graceful shutdown and launches long polling
 *
 * @throws {Error} If configuration validation fails or the bot cannot start
 */
async function main() {
	validateConfig();
	updateLogLevel(config.logLevel);

	const db = openDatabase();
	const bot = new Telegraf(config.botToken);
	const services = createModerationServices(db, new TelegramGateway(bot.telegram));

	const me = await bot.telegram.getMe();
	const router = new CommandRouter(services, me.id).register(...allCommands());

	// Moderation runs before any command handler sees the message
	bot.use(createMessageFilter(services.evaluator));
	registerCommandHandlers(bot, router, services);
	registerCallbackHandlers(bot, services);

	bot.catch((err, ctx) => {
		logger.error("Bot error", { error: err, updateId: ctx.update.update_id });
	});

	await bot.telegram
		.setMyCommands(
			router.list().map(({ name, description }) => ({ command: name, description })),
		)
		.catch((error: unknown) => {
			logger.warn("Could not publish the command list", { error });
		});

	const shutdown = (signal: string) => {
		services.scheduler.clearAll();
		bot.stop(signal);
		db.close();
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));

	await bot.launch(
		{
			allowedUpdates: [
				"message",
				"edited_message",
				"chat_join_request",
				"callback_query",
			],
		},
		() => {
			logger.info("Bot started successfully", {
				username: me.username,
				commands: router.list().length,
			});
		},
	);
}

main().catch((error: unknown) => {
	logger.error("Failed to start bot", { error });
	process.exit(1);
});
