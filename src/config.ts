/**
 * Configuration module for the moderation bot.
 * Loads environment variables and provides typed configuration object.
 * Validates required configuration values on startup.
 *
 * Per-group moderation settings are not configured here; they live in the
 * group config store with their own defaults and are changed through bot commands.
 *
 * @module config
 */

import * as dotenv from "dotenv";
import { logger } from "./utils/logger";

// Load environment variables from .env file
dotenv.config();

/**
 * Configuration interface defining all bot settings.
 *
 * @interface Config
 */
interface Config {
	/** Telegram bot API token from BotFather */
	botToken: string;

	/**
	 * SQLite database location. Defaults to an in-memory database, so all
	 * moderation state lives only as long as the process.
	 */
	databasePath: string;

	/** Logging level (error, warn, info, debug) */
	logLevel: string;
}

/**
 * Main configuration object populated from environment variables.
 * Falls back to default values where appropriate.
 */
export const config: Config = {
	botToken: process.env.BOT_TOKEN || "",
	databasePath: process.env.DATABASE_PATH || ":memory:",
	logLevel: process.env.LOG_LEVEL || "info",
};

/**
 * Validates that all required configuration values are present.
 * Called at bot startup before anything talks to Telegram.
 *
 * @throws {Error} If BOT_TOKEN is not set
 */
export function validateConfig(): void {
	if (!config.botToken) {
		throw new Error("BOT_TOKEN is required in environment variables");
	}

	if (config.databasePath !== ":memory:") {
		logger.warn(
			"DATABASE_PATH points at a file; moderation state is still treated as disposable",
			{ databasePath: config.databasePath },
		);
	}
}
