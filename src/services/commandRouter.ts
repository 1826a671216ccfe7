/**
 * Administrative command registry.
 *
 * Commands are plain definitions over a platform-neutral request. The
 * router applies the group-only scope and the privilege gate, runs the
 * command, and turns a thrown CommandError into the reply for the issuer.
 * Commands validate before they mutate, so a rejected command leaves every
 * store as it was.
 *
 * @module services/commandRouter
 */

import type { InlineKeyboardMarkup } from "telegraf/types";
import type { GroupId, MediaAttachment, MemberProfile } from "../types";
import { isCommandError, toError, UnauthorizedError } from "../utils/errors";
import { StructuredLogger } from "../utils/logger";
import {
	isPrivileged,
	type MessageContent,
	type SendOptions,
} from "./enforcementGateway";
import type { ModerationServices } from "./index";

export type ChatKind = "private" | "group" | "supergroup" | "channel";

export interface RepliedMessage {
	messageId: number;
	sender?: MemberProfile;
	media: MediaAttachment[];
	caption?: string;
}

export interface CommandRequest {
	command: string;
	chatId: GroupId;
	chatKind: ChatKind;
	chatTitle?: string;
	messageId: number;
	issuer: MemberProfile;
	/** Whitespace-separated words after the command, minus text-mention words */
	args: string[];
	/** Everything after the command, line breaks kept */
	argText: string;
	replyTo?: RepliedMessage;
	/** Users linked through text-mention entities */
	textMentions: MemberProfile[];
	/** `@username` mention entities, without the @ */
	mentionedUsernames: string[];
}

export interface CommandReply {
	content: MessageContent;
	options?: SendOptions;
	keyboard?: InlineKeyboardMarkup;
}

export interface CommandContext {
	request: CommandRequest;
	services: ModerationServices;
	/** The bot's own user id, for /status */
	botId: number;
}

export interface CommandDefinition {
	name: string;
	description: string;
	/** Public commands skip the privilege gate */
	access: "public" | "privileged";
	/** Group commands are ignored outside groups */
	scope: "group" | "any";
	run(context: CommandContext): Promise<CommandReply | undefined>;
}

export const GENERIC_FAILURE = "❌ An error occurred while processing the command.";

export class CommandRouter {
	private readonly commands = new Map<string, CommandDefinition>();

	constructor(
		private readonly services: ModerationServices,
		private readonly botId: number,
	) {}

	register(...definitions: CommandDefinition[]): this {
		for (const definition of definitions) {
			if (this.commands.has(definition.name)) {
				throw new Error(`Command /${definition.name} registered twice`);
			}
			this.commands.set(definition.name, definition);
		}
		return this;
	}

	get(name: string): CommandDefinition | undefined {
		return this.commands.get(name.toLowerCase());
	}

	list(): CommandDefinition[] {
		return [...this.commands.values()];
	}

	/**
	 * @returns the reply to send, or undefined when the command is unknown,
	 * out of scope, or chose to stay silent
	 */
	async dispatch(request: CommandRequest): Promise<CommandReply | undefined> {
		const definition = this.get(request.command);
		if (!definition) return undefined;

		const inGroup =
			request.chatKind === "group" || request.chatKind === "supergroup";
		if (definition.scope === "group" && !inGroup) return undefined;

		try {
			if (definition.access === "privileged") {
				const allowed = await isPrivileged(
					this.services.gateway,
					request.chatId,
					request.issuer.id,
				);
				if (!allowed) throw new UnauthorizedError();
			}

			return await definition.run({
				request,
				services: this.services,
				botId: this.botId,
			});
		} catch (error) {
			if (isCommandError(error)) {
				StructuredLogger.logDebug("Command rejected", {
					groupId: request.chatId,
					adminId: request.issuer.id,
					operation: definition.name,
					code: error.code,
				});
				return { content: error.message };
			}

			StructuredLogger.logError(toError(error), {
				groupId: request.chatId,
				adminId: request.issuer.id,
				operation: definition.name,
			});
			return { content: GENERIC_FAILURE };
		}
	}
}
