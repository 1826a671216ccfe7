/**
 * Enforcement gateway backed by the Telegram Bot API through telegraf.
 * Every call is wrapped so that a rejected API request becomes a failed
 * GatewayResult and a warn-level log line instead of an exception.
 *
 * @module services/telegramGateway
 */

import type { Telegram } from "telegraf";
import type {
	ChatMember,
	ChatPermissions,
	InlineKeyboardMarkup,
	User,
} from "telegraf/types";
import type { GroupId, MemberProfile, UserId } from "../types";
import { toError } from "../utils/errors";
import { logger } from "../utils/logger";
import {
	type AdminRights,
	type EnforcementGateway,
	failed,
	type GatewayResult,
	type MediaReference,
	type MemberStatus,
	type MessageContent,
	type SendOptions,
	type SentMessage,
	succeeded,
} from "./enforcementGateway";

export const toMemberProfile = (user: User): MemberProfile => ({
	id: user.id,
	firstName: user.first_name,
	lastName: user.last_name,
	username: user.username,
	isBot: user.is_bot,
});

export const toMemberStatus = (member: ChatMember): MemberStatus => {
	const status: MemberStatus = {
		status: member.status,
		privileged:
			member.status === "creator" || member.status === "administrator",
		user: toMemberProfile(member.user),
	};

	if (member.status === "administrator") {
		status.rights = {
			can_manage_chat: member.can_manage_chat,
			can_delete_messages: member.can_delete_messages,
			can_manage_video_chats: member.can_manage_video_chats,
			can_restrict_members: member.can_restrict_members,
			can_promote_members: member.can_promote_members,
			can_change_info: member.can_change_info,
			can_invite_users: member.can_invite_users,
			can_pin_messages: member.can_pin_messages,
			can_manage_topics: member.can_manage_topics,
		};
	}

	if (member.status === "restricted") {
		status.permissions = {
			can_send_messages: member.can_send_messages,
			can_send_audios: member.can_send_audios,
			can_send_documents: member.can_send_documents,
			can_send_photos: member.can_send_photos,
			can_send_videos: member.can_send_videos,
			can_send_video_notes: member.can_send_video_notes,
			can_send_voice_notes: member.can_send_voice_notes,
			can_send_polls: member.can_send_polls,
			can_send_other_messages: member.can_send_other_messages,
			can_add_web_page_previews: member.can_add_web_page_previews,
		};
	}
	return status;
};

export class TelegramGateway implements EnforcementGateway {
	constructor(private readonly telegram: Telegram) {}

	deleteMessage(groupId: GroupId, messageId: number): Promise<GatewayResult> {
		return this.attempt("deleteMessage", { groupId, messageId }, async () => {
			await this.telegram.deleteMessage(groupId, messageId);
		});
	}

	sendText(
		chatId: number,
		content: MessageContent,
		options: SendOptions = {},
	): Promise<GatewayResult<SentMessage>> {
		return this.attempt("sendText", { chatId }, async () => {
			const sent = await this.telegram.sendMessage(chatId, content, {
				parse_mode: options.parseMode,
				reply_markup: options.keyboard,
			});
			return { chatId, messageId: sent.message_id };
		});
	}

	sendMedia(
		chatId: number,
		media: MediaReference,
		caption?: string,
		options: SendOptions = {},
	): Promise<GatewayResult<SentMessage>> {
		return this.attempt(
			"sendMedia",
			{ chatId, mediaKind: media.kind },
			async () => {
				const extra = {
					caption: caption || undefined,
					parse_mode: options.parseMode,
					reply_markup: options.keyboard,
				};
				const sent = await this.sendByKind(chatId, media, extra);
				const messageId = sent.message_id;
				return { chatId, messageId };
			},
		);
	}

	sendDirect(
		userId: UserId,
		content: MessageContent,
	): Promise<GatewayResult<SentMessage>> {
		return this.attempt("sendDirect", { userId }, async () => {
			const sent = await this.telegram.sendMessage(userId, content);
			return { chatId: userId, messageId: sent.message_id };
		});
	}

	restrictMember(
		groupId: GroupId,
		userId: UserId,
		permissions: ChatPermissions,
		until?: Date,
	): Promise<GatewayResult> {
		return this.attempt("restrictMember", { groupId, userId }, async () => {
			await this.telegram.restrictChatMember(groupId, userId, {
				permissions,
				use_independent_chat_permissions: true,
				until_date: until ? Math.floor(until.getTime() / 1000) : undefined,
			});
		});
	}

	banMember(groupId: GroupId, userId: UserId): Promise<GatewayResult> {
		return this.attempt("banMember", { groupId, userId }, async () => {
			await this.telegram.banChatMember(groupId, userId);
		});
	}

	unbanMember(groupId: GroupId, userId: UserId): Promise<GatewayResult> {
		return this.attempt("unbanMember", { groupId, userId }, async () => {
			await this.telegram.unbanChatMember(groupId, userId, {
				only_if_banned: true,
			});
		});
	}

	promoteMember(
		groupId: GroupId,
		userId: UserId,
		rights: AdminRights,
	): Promise<GatewayResult> {
		return this.attempt("promoteMember", { groupId, userId }, async () => {
			await this.telegram.promoteChatMember(groupId, userId, rights);
		});
	}

	getMemberStatus(
		groupId: GroupId,
		userId: UserId,
	): Promise<GatewayResult<MemberStatus>> {
		return this.attempt("getMemberStatus", { groupId, userId }, async () =>
			toMemberStatus(await this.telegram.getChatMember(groupId, userId)),
		);
	}

	approveJoinRequest(groupId: GroupId, userId: UserId): Promise<GatewayResult> {
		return this.attempt("approveJoinRequest", { groupId, userId }, async () => {
			await this.telegram.approveChatJoinRequest(groupId, userId);
		});
	}

	resolveFileHandle(handle: string): Promise<GatewayResult<string>> {
		return this.attempt("resolveFileHandle", {}, async () => {
			const file = await this.telegram.getFile(handle);
			if (!file.file_path) {
				throw new Error("File has no downloadable path");
			}
			return file.file_path;
		});
	}

	findAdministrator(
		groupId: GroupId,
		username: string,
	): Promise<GatewayResult<MemberProfile | undefined>> {
		const wanted = username.replace(/^@/, "").toLowerCase();
		return this.attempt("findAdministrator", { groupId }, async () => {
			const admins = await this.telegram.getChatAdministrators(groupId);
			const match = admins.find(
				(admin) => admin.user.username?.toLowerCase() === wanted,
			);
			return match ? toMemberProfile(match.user) : undefined;
		});
	}

	private sendByKind(
		chatId: number,
		media: MediaReference,
		extra: {
			caption?: string;
			parse_mode?: "HTML";
			reply_markup?: InlineKeyboardMarkup;
		},
	) {
		switch (media.kind) {
			case "photo":
				return this.telegram.sendPhoto(chatId, media.handle, extra);
			case "sticker":
				// Stickers carry no caption
				return this.telegram.sendSticker(chatId, media.handle, {
					reply_markup: extra.reply_markup,
				});
			case "animation":
				return this.telegram.sendAnimation(chatId, media.handle, extra);
			case "video":
				return this.telegram.sendVideo(chatId, media.handle, extra);
		}
	}

	private async attempt<T>(
		operation: string,
		context: Record<string, unknown>,
		call: () => Promise<T>,
	): Promise<GatewayResult<T>> {
		try {
			return succeeded(await call());
		} catch (error) {
			const err = toError(error);
			logger.warn("Telegram call failed", {
				operation,
				...context,
				error: err.message,
			});
			return failed(err);
		}
	}
}
