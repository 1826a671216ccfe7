/**
 * The boundary through which every chat-platform side effect passes.
 *
 * Calls never throw. Each returns a `GatewayResult`, and a failure (network
 * error, missing bot permission, member already in the requested state) is
 * a value the caller may inspect or drop. The policy evaluator drops them.
 *
 * @module services/enforcementGateway
 */

import type { FmtString } from "telegraf/format";
import type { ChatPermissions, InlineKeyboardMarkup } from "telegraf/types";
import type { GroupId, MediaKind, MemberProfile, UserId } from "../types";

export type GatewayResult<T = void> =
	| { ok: true; value: T }
	| { ok: false; error: Error };

export const succeeded = <T>(value: T): GatewayResult<T> => ({
	ok: true,
	value,
});

export const failed = <T = void>(error: Error): GatewayResult<T> => ({
	ok: false,
	error,
});

/** Plain text, or entity-formatted text built with telegraf/format */
export type MessageContent = string | FmtString;

export interface SendOptions {
	/** Only meaningful for plain-string content */
	parseMode?: "HTML";
	keyboard?: InlineKeyboardMarkup;
}

export interface SentMessage {
	chatId: number;
	messageId: number;
}

export interface MediaReference {
	kind: MediaKind;
	handle: string;
}

export type MemberStatusName =
	| "creator"
	| "administrator"
	| "member"
	| "restricted"
	| "left"
	| "kicked";

export interface MemberStatus {
	status: MemberStatusName;
	/** Owner or administrator */
	privileged: boolean;
	user: MemberProfile;
	/** Present for restricted members */
	permissions?: ChatPermissions;
	/** Present for administrators; the owner holds every right */
	rights?: AdminRights;
}

/** Subset of Telegram administrator rights granted by role templates */
export interface AdminRights {
	can_manage_chat?: boolean;
	can_delete_messages?: boolean;
	can_manage_video_chats?: boolean;
	can_restrict_members?: boolean;
	can_promote_members?: boolean;
	can_change_info?: boolean;
	can_invite_users?: boolean;
	can_pin_messages?: boolean;
	can_manage_topics?: boolean;
}

export interface EnforcementGateway {
	deleteMessage(groupId: GroupId, messageId: number): Promise<GatewayResult>;
	sendText(
		chatId: number,
		content: MessageContent,
		options?: SendOptions,
	): Promise<GatewayResult<SentMessage>>;
	sendMedia(
		chatId: number,
		media: MediaReference,
		caption?: string,
		options?: SendOptions,
	): Promise<GatewayResult<SentMessage>>;
	/** Private message to a member; fails when they never started the bot */
	sendDirect(
		userId: UserId,
		content: MessageContent,
	): Promise<GatewayResult<SentMessage>>;
	restrictMember(
		groupId: GroupId,
		userId: UserId,
		permissions: ChatPermissions,
		until?: Date,
	): Promise<GatewayResult>;
	banMember(groupId: GroupId, userId: UserId): Promise<GatewayResult>;
	unbanMember(groupId: GroupId, userId: UserId): Promise<GatewayResult>;
	promoteMember(
		groupId: GroupId,
		userId: UserId,
		rights: AdminRights,
	): Promise<GatewayResult>;
	getMemberStatus(
		groupId: GroupId,
		userId: UserId,
	): Promise<GatewayResult<MemberStatus>>;
	approveJoinRequest(groupId: GroupId, userId: UserId): Promise<GatewayResult>;
	/** Remote path of an uploaded file, e.g. "videos/file_12.mp4" */
	resolveFileHandle(handle: string): Promise<GatewayResult<string>>;
	/** Looks a username up among the group's administrators */
	findAdministrator(
		groupId: GroupId,
		username: string,
	): Promise<GatewayResult<MemberProfile | undefined>>;
}

/**
 * The single privilege check used everywhere: owner or administrator
 * according to the platform. A failed lookup counts as not privileged.
 */
export const isPrivileged = async (
	gateway: EnforcementGateway,
	groupId: GroupId,
	userId: UserId,
): Promise<boolean> => {
	const result = await gateway.getMemberStatus(groupId, userId);
	return result.ok && result.value.privileged;
};
