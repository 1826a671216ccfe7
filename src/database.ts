/**
 * Database module for the moderation bot.
 * Provides the SQLite connection, typed query helpers, and schema initialization.
 * Uses better-sqlite3 for synchronous database operations: a store's
 * read-modify-write runs inside one transaction and nothing can interleave with it.
 *
 * @module database
 */

import Database from "better-sqlite3";
import { config } from "./config";
import { logger } from "./utils/logger";

export type Db = Database.Database;

/**
 * Opens a database and makes sure the schema exists.
 *
 * @param path - File path, or ":memory:" (the default) for process-lifetime state
 *
 * @example
 * ```typescript
 * const db = openDatabase();            // uses config.databasePath
 * const scratch = openDatabase(':memory:');
 * ```
 */
export const openDatabase = (path: string = config.databasePath): Db => {
	const db = new Database(path);
	initDb(db);
	logger.debug("Database opened", { path });
	return db;
};

/**
 * Executes a SELECT query and returns all matching rows as typed objects.
 *
 * @example
 * ```typescript
 * const rows = query<FilterRow>(db, 'SELECT * FROM keyword_filters WHERE group_id = ?', [groupId]);
 * ```
 */
export const query = <T>(db: Db, sql: string, params: unknown[] = []): T[] => {
	try {
		const stmt = db.prepare(sql);
		return stmt.all(params) as T[];
	} catch (error) {
		logger.error(`Database query failed: ${sql}`, error);
		throw error;
	}
};

/**
 * Executes an INSERT, UPDATE, or DELETE statement.
 *
 * @returns RunResult object containing changes count and lastInsertRowid
 */
export const execute = (
	db: Db,
	sql: string,
	params: unknown[] = [],
): Database.RunResult => {
	try {
		const stmt = db.prepare(sql);
		return stmt.run(params);
	} catch (error) {
		logger.error(`Database execution failed: ${sql}`, error);
		throw error;
	}
};

/**
 * Executes a SELECT query and returns a single row, or undefined if no rows match.
 */
export const get = <T>(
	db: Db,
	sql: string,
	params: unknown[] = [],
): T | undefined => {
	try {
		const stmt = db.prepare(sql);
		return stmt.get(params) as T | undefined;
	} catch (error) {
		logger.error(`Database get failed: ${sql}`, error);
		throw error;
	}
};

/** SQLite has no boolean type and better-sqlite3 refuses to bind JS booleans */
export const toSqlBool = (value: boolean): number => (value ? 1 : 0);

/**
 * Creates the tables owned by the four moderation stores.
 *
 * - group_settings: one row per group; NULL columns mean "use the default"
 * - member_warnings: warning counter per (group, user)
 * - member_restrictions: capability flags per (group, user)
 * - keyword_filters: keyword to media response per (group, keyword)
 *
 * Safe to call multiple times - uses IF NOT EXISTS clauses.
 */
export const initDb = (db: Db): void => {
	db.exec(`
    CREATE TABLE IF NOT EXISTS group_settings (
      group_id INTEGER PRIMARY KEY,
      warn_threshold INTEGER,
      mute_duration_hours INTEGER,
      edit_deletion INTEGER,
      nsfw_filter INTEGER,
      self_destruct_seconds INTEGER,
      service_enabled INTEGER,
      service_delete_after INTEGER,
      event_enabled INTEGER,
      event_delete_after INTEGER,
      welcome_text TEXT,
      welcome_image TEXT,
      service_info_text TEXT,
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );

    CREATE TABLE IF NOT EXISTS member_warnings (
      group_id INTEGER NOT NULL,
      user_id INTEGER NOT NULL,
      count INTEGER NOT NULL DEFAULT 0,
      updated_at INTEGER DEFAULT (strftime('%s', 'now')),
      PRIMARY KEY (group_id, user_id)
    );

    CREATE TABLE IF NOT EXISTS member_restrictions (
      group_id INTEGER NOT NULL,
      user_id INTEGER NOT NULL,
      flood INTEGER NOT NULL DEFAULT 0,
      spam INTEGER NOT NULL DEFAULT 0,
      media INTEGER NOT NULL DEFAULT 0,
      checks INTEGER NOT NULL DEFAULT 0,
      night INTEGER NOT NULL DEFAULT 0,
      sticker INTEGER NOT NULL DEFAULT 0,
      gif INTEGER NOT NULL DEFAULT 0,
      link INTEGER NOT NULL DEFAULT 0,
      updated_at INTEGER DEFAULT (strftime('%s', 'now')),
      PRIMARY KEY (group_id, user_id)
    );

    CREATE TABLE IF NOT EXISTS keyword_filters (
      group_id INTEGER NOT NULL,
      keyword TEXT NOT NULL,
      media_kind TEXT NOT NULL,
      media_handle TEXT NOT NULL,
      caption TEXT NOT NULL DEFAULT '',
      created_at INTEGER DEFAULT (strftime('%s', 'now')),
      PRIMARY KEY (group_id, keyword)
    );
  `);
};
