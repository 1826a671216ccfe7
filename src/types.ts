/** Domain types shared by the stores, the policy evaluator and the command layer */

/** Telegram chat ID of a moderated group */
export type GroupId = number;

/** Telegram user ID */
export type UserId = number;

/**
 * Composite key for per-member state (warnings, restriction flags).
 * Compared by value: two keys with the same group and user address the same row.
 */
export interface MemberKey {
	readonly groupId: GroupId;
	readonly userId: UserId;
}

export const memberKey = (groupId: GroupId, userId: UserId): MemberKey => ({
	groupId,
	userId,
});

export const RESTRICTION_FLAGS = [
	"flood",
	"spam",
	"media",
	"checks",
	"night",
	"sticker",
	"gif",
	"link",
] as const;

export type RestrictionFlag = (typeof RESTRICTION_FLAGS)[number];

/** true = the capability is forbidden for this member */
export type RestrictionSet = Record<RestrictionFlag, boolean>;

export const isRestrictionFlag = (name: string): name is RestrictionFlag =>
	(RESTRICTION_FLAGS as readonly string[]).includes(name);

export const MEDIA_KINDS = ["photo", "sticker", "animation", "video"] as const;

/** Media a keyword filter can answer with */
export type MediaKind = (typeof MEDIA_KINDS)[number];

export interface FilterEntry {
	keyword: string;
	mediaKind: MediaKind;
	mediaHandle: string;
	caption: string;
}

/** Visibility of platform-generated messages (service notices or "event" content) */
export interface MessageVisibility {
	enabled: boolean;
	deleteAfterSeconds: number;
}

export interface GroupConfig {
	warnThreshold: number;
	muteDurationHours: number;
	editDeletionEnabled: boolean;
	nsfwFilterEnabled: boolean;
	/** 0 = bot messages are never removed */
	selfDestructSeconds: number;
	serviceMsg: MessageVisibility;
	eventMsg: MessageVisibility;
	welcomeText?: string;
	welcomeImageHandle?: string;
	serviceInfoText?: string;
}

export interface WarningOutcome {
	/** Post-increment count; equals the threshold when the warning escalated */
	count: number;
	muted: boolean;
	threshold: number;
	muteDurationHours: number;
}

/** Participant data carried by inbound events */
export interface MemberProfile {
	id: UserId;
	firstName: string;
	lastName?: string;
	username?: string;
	isBot: boolean;
}

export interface MediaAttachment {
	kind: MediaKind | "document";
	fileId: string;
}

/** Platform-neutral view of a group message */
export interface ChatMessage {
	groupId: GroupId;
	groupTitle?: string;
	messageId: number;
	sender: MemberProfile;
	text?: string;
	caption?: string;
	/** URL or text-link entity present in text or caption */
	hasUrlEntity: boolean;
	media: MediaAttachment[];
	isCommand: boolean;
	edited: boolean;
}

export type ModerationEvent =
	| { kind: "message"; message: ChatMessage }
	| { kind: "edited"; message: ChatMessage }
	| {
			kind: "members_joined";
			groupId: GroupId;
			groupTitle?: string;
			messageId: number;
			members: MemberProfile[];
	  }
	| { kind: "join_request"; groupId: GroupId; userId: UserId }
	| { kind: "service"; groupId: GroupId; messageId: number }
	| { kind: "event"; groupId: GroupId; messageId: number };

export type ViolationReason =
	| "nsfw"
	| "link"
	| "edit"
	| "sticker"
	| "gif"
	| "media";
