/**
 * Maps raw Telegram updates onto the platform-neutral events the policy
 * evaluator understands. Only group and supergroup chats produce events.
 *
 * @module handlers/normalize
 */

import type { Chat, Message, MessageEntity, Update } from "telegraf/types";
import { toMemberProfile } from "../services/telegramGateway";
import type { ChatMessage, MediaAttachment, ModerationEvent } from "../types";

/** Platform notices about the chat itself rather than member content */
const SERVICE_FIELDS = [
	"left_chat_member",
	"new_chat_title",
	"new_chat_photo",
	"delete_chat_photo",
	"group_chat_created",
	"supergroup_chat_created",
	"migrate_to_chat_id",
	"migrate_from_chat_id",
	"pinned_message",
	"message_auto_delete_timer_changed",
	"video_chat_scheduled",
	"video_chat_started",
	"video_chat_ended",
	"video_chat_participants_invited",
	"forum_topic_created",
	"forum_topic_edited",
	"forum_topic_closed",
	"forum_topic_reopened",
	"general_forum_topic_hidden",
	"general_forum_topic_unhidden",
	"write_access_allowed",
	"proximity_alert_triggered",
] as const;

/** Content that is neither text, media nor a service notice */
const EVENT_FIELDS = [
	"poll",
	"dice",
	"location",
	"venue",
	"contact",
	"game",
	"story",
] as const;

export const isGroupChat = (chat: Chat): boolean =>
	chat.type === "group" || chat.type === "supergroup";

export const chatTitle = (chat: Chat): string | undefined =>
	"title" in chat ? chat.title : undefined;

const hasAnyField = (
	message: Message,
	fields: readonly string[],
): boolean => fields.some((field) => field in message);

/** A message as it appears in `reply_to_message` */
export type RepliedTelegramMessage = NonNullable<Message.TextMessage["reply_to_message"]>;

export function collectMedia(
	message: Message | RepliedTelegramMessage,
): MediaAttachment[] {
	const media: MediaAttachment[] = [];

	if ("photo" in message) {
		// Sizes are ordered smallest first
		const largest = message.photo[message.photo.length - 1];
		if (largest) media.push({ kind: "photo", fileId: largest.file_id });
	}
	if ("sticker" in message) {
		media.push({ kind: "sticker", fileId: message.sticker.file_id });
	}
	if ("animation" in message) {
		media.push({ kind: "animation", fileId: message.animation.file_id });
	} else if ("document" in message) {
		// GIFs arrive with a document copy as well; only count real documents
		media.push({ kind: "document", fileId: message.document.file_id });
	}
	if ("video" in message) {
		media.push({ kind: "video", fileId: message.video.file_id });
	}

	return media;
}

const isUrlEntity = (entity: MessageEntity): boolean =>
	entity.type === "url" || entity.type === "text_link";

/**
 * Normalizes one group message.
 *
 * @returns undefined for messages without a sender (channel posts)
 */
export function normalizeMessage(
	message: Message,
	options: { edited: boolean },
): ChatMessage | undefined {
	if (!message.from) return undefined;

	const text = "text" in message ? message.text : undefined;
	const caption = "caption" in message ? message.caption : undefined;
	const entities = "entities" in message ? (message.entities ?? []) : [];
	const captionEntities =
		"caption_entities" in message ? (message.caption_entities ?? []) : [];
	const [firstEntity] = entities;

	return {
		groupId: message.chat.id,
		groupTitle: chatTitle(message.chat),
		messageId: message.message_id,
		sender: toMemberProfile(message.from),
		text,
		caption,
		hasUrlEntity:
			entities.some(isUrlEntity) || captionEntities.some(isUrlEntity),
		media: collectMedia(message),
		isCommand: firstEntity?.type === "bot_command" && firstEntity.offset === 0,
		edited: options.edited,
	};
}

/**
 * One event per update, or undefined when the update is not moderated
 * (private chats, channel posts, callback queries, ...).
 */
export function classifyUpdate(update: Update): ModerationEvent | undefined {
	if ("chat_join_request" in update) {
		const request = update.chat_join_request;
		return {
			kind: "join_request",
			groupId: request.chat.id,
			userId: request.from.id,
		};
	}

	if ("edited_message" in update) {
		const edited = update.edited_message;
		if (!isGroupChat(edited.chat)) return undefined;
		const message = normalizeMessage(edited, { edited: true });
		return message ? { kind: "edited", message } : undefined;
	}

	if (!("message" in update)) return undefined;

	const raw = update.message;
	if (!isGroupChat(raw.chat)) return undefined;

	if ("new_chat_members" in raw) {
		return {
			kind: "members_joined",
			groupId: raw.chat.id,
			groupTitle: chatTitle(raw.chat),
			messageId: raw.message_id,
			members: raw.new_chat_members.map(toMemberProfile),
		};
	}

	if (hasAnyField(raw, SERVICE_FIELDS)) {
		return { kind: "service", groupId: raw.chat.id, messageId: raw.message_id };
	}

	if (hasAnyField(raw, EVENT_FIELDS)) {
		return { kind: "event", groupId: raw.chat.id, messageId: raw.message_id };
	}

	const message = normalizeMessage(raw, { edited: false });
	return message ? { kind: "message", message } : undefined;
}
