/**
 * Every command the bot answers, in /help order.
 *
 * @module commands
 */

import type { CommandDefinition } from "../services/commandRouter";
import { filterCommands } from "./filters";
import { helpCommands } from "./help";
import { moderationCommands } from "./moderation";
import { restrictionCommands } from "./restrictions";
import { roleCommands } from "./roles";
import { settingsCommands } from "./settings";
import { welcomeCommands } from "./welcome";

export function allCommands(): CommandDefinition[] {
	const catalog: CommandDefinition[] = [];
	catalog.push(
		...helpCommands(() => catalog),
		...moderationCommands,
		...restrictionCommands,
		...filterCommands,
		...welcomeCommands,
		...settingsCommands,
		...roleCommands,
	);
	return catalog;
}
