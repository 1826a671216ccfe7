/**
 * Welcome messages for new members.
 *
 * Templates are HTML. Placeholders:
 * - `{name}` first name
 * - `{mention}` clickable link to the member
 * - `{username}` `@username`, or N/A
 * - `{id}` numeric user id
 * - `{group}` group title, or "this group"
 *
 * @module services/welcome
 */

import type { GroupConfig, GroupId, MemberProfile } from "../types";
import { escapeHtml, htmlMention } from "../utils/format";
import { StructuredLogger } from "../utils/logger";
import type {
	EnforcementGateway,
	GatewayResult,
	SentMessage,
} from "./enforcementGateway";

export const DEFAULT_WELCOME_TEMPLATE = [
	"👋 Hello {mention}!",
	"",
	"✨ Welcome to {group} ✨",
	"",
	"➺ Name: {name}",
	"➺ Username: {username}",
	"➺ User ID: {id}",
	"",
	"Please read the rules and be respectful.",
].join("\n");

export const SAMPLE_WELCOME_MEMBER: MemberProfile = {
	id: 123456,
	firstName: "John",
	username: "john",
	isBot: false,
};

export function renderWelcome(
	template: string,
	member: MemberProfile,
	groupTitle: string | undefined,
): string {
	const values: Record<string, string> = {
		"{name}": escapeHtml(member.firstName),
		"{mention}": htmlMention(member),
		"{username}": member.username ? `@${member.username}` : "N/A",
		"{id}": String(member.id),
		"{group}": groupTitle ? escapeHtml(groupTitle) : "this group",
	};

	return template.replace(
		/\{(name|mention|username|id|group)\}/g,
		(placeholder) => values[placeholder] ?? placeholder,
	);
}

/**
 * Sends the welcome for one member: as a photo caption when a welcome image
 * is configured, as text otherwise or when the photo cannot be sent.
 */
export async function deliverWelcome(
	gateway: EnforcementGateway,
	groupId: GroupId,
	groupTitle: string | undefined,
	member: MemberProfile,
	config: Pick<GroupConfig, "welcomeText" | "welcomeImageHandle">,
): Promise<GatewayResult<SentMessage>> {
	const text = renderWelcome(
		config.welcomeText ?? DEFAULT_WELCOME_TEMPLATE,
		member,
		groupTitle,
	);

	let result: GatewayResult<SentMessage> | undefined;
	if (config.welcomeImageHandle) {
		result = await gateway.sendMedia(
			groupId,
			{ kind: "photo", handle: config.welcomeImageHandle },
			text,
			{ parseMode: "HTML" },
		);
	}
	if (!result?.ok) {
		result = await gateway.sendText(groupId, text, { parseMode: "HTML" });
	}

	if (result.ok) {
		StructuredLogger.logModerationEvent("Member welcomed", {
			groupId,
			userId: member.id,
			operation: "welcome",
		});
	}
	return result;
}
