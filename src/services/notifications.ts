/**
 * Group and direct-message texts sent by the policy evaluator and the
 * warning commands. Built with telegraf/format so names need no escaping.
 *
 * @module services/notifications
 */

import { type FmtString, fmt, mention } from "telegraf/format";
import type { MemberProfile, ViolationReason, WarningOutcome } from "../types";

/** How a violation reads after "warned for" / "due to" */
const VIOLATION_PHRASES: Record<ViolationReason, string> = {
	nsfw: "sending NSFW content",
	link: "sending links",
	edit: "editing messages",
	sticker: "sending stickers",
	gif: "sending GIFs",
	media: "sending media",
};

const REMOVAL_LEADS: Record<ViolationReason, string> = {
	nsfw: "Your message was removed as NSFW content",
	link: "Your message with a link was removed",
	edit: "Your edited message was removed",
	sticker: "Your sticker was removed",
	gif: "Your GIF was removed",
	media: "Your media was removed",
};

const memberMention = (member: MemberProfile) =>
	mention(member.firstName, member.id);

export interface ViolationNotice {
	group: FmtString;
	direct: string;
}

/** Group and direct texts after an automatic warning */
export function violationNotice(
	member: MemberProfile,
	reason: ViolationReason,
	outcome: WarningOutcome,
): ViolationNotice {
	const phrase = VIOLATION_PHRASES[reason];

	if (outcome.muted) {
		return {
			group: fmt`🔇 ${memberMention(member)} has been auto-muted for ${outcome.muteDurationHours} hours due to ${phrase} (${outcome.threshold} warnings).`,
			direct: `🔇 You have been auto-muted for ${outcome.muteDurationHours} hours due to ${phrase}.`,
		};
	}

	return {
		group: fmt`⚠️ ${memberMention(member)} warned for ${phrase}. Warnings: ${outcome.count}/${outcome.threshold}`,
		direct: `⚠️ ${REMOVAL_LEADS[reason]}. Warnings: ${outcome.count}/${outcome.threshold}`,
	};
}

/** Privileged senders lose the link but get no warning */
export function privilegedLinkNotice(member: MemberProfile): ViolationNotice {
	return {
		group: fmt`🔗 Admin link removed: ${memberMention(member)}`,
		direct: "🔗 Your message with a link was removed (admin action).",
	};
}

/** Group text after an admin issued /warn or pressed the warn button */
export function manualWarningNotice(
	admin: MemberProfile,
	target: MemberProfile,
	outcome: WarningOutcome,
): FmtString {
	if (outcome.muted) {
		return fmt`⚠️ ${memberMention(admin)} warned ${memberMention(target)}.
🔇 Auto-muted for ${outcome.muteDurationHours} hours due to ${outcome.threshold} warnings.`;
	}
	return fmt`⚠️ ${memberMention(admin)} warned ${memberMention(target)}.
Warnings: ${outcome.count}/${outcome.threshold}`;
}
