/** Works out which member an administrative command addresses */

import type { CommandRequest } from "../services/commandRouter";
import type { EnforcementGateway } from "../services/enforcementGateway";
import type { MemberProfile, UserId } from "../types";
import { UnresolvedTargetError } from "./errors";

export type TargetSource = "reply" | "text_mention" | "id" | "username" | "mention";

export interface ResolvedTarget {
	userId: UserId;
	/** Known when the target came from a reply or a mention */
	profile?: MemberProfile;
	source: TargetSource;
}

const NUMERIC_ID = /^\d+$/;

/**
 * Resolution order:
 * 1. sender of the replied-to message
 * 2. text-mention entity (members without a username)
 * 3. numeric id as first argument
 * 4. `@username` as first argument, looked up among the group's administrators
 * 5. `@mention` entities in the text, same lookup
 *
 * Usernames can only be resolved for administrators: the platform offers no
 * username lookup for ordinary members.
 */
export async function resolveTarget(
	request: CommandRequest,
	gateway: EnforcementGateway,
): Promise<ResolvedTarget | undefined> {
	const replied = request.replyTo?.sender;
	if (replied) {
		return { userId: replied.id, profile: replied, source: "reply" };
	}

	const [textMention] = request.textMentions;
	if (textMention) {
		return {
			userId: textMention.id,
			profile: textMention,
			source: "text_mention",
		};
	}

	const [first] = request.args;
	if (first && NUMERIC_ID.test(first)) {
		return { userId: Number(first), source: "id" };
	}

	if (first?.startsWith("@")) {
		const admin = await gateway.findAdministrator(request.chatId, first);
		if (admin.ok && admin.value) {
			return { userId: admin.value.id, profile: admin.value, source: "username" };
		}
	}

	for (const username of request.mentionedUsernames) {
		const admin = await gateway.findAdministrator(request.chatId, username);
		if (admin.ok && admin.value) {
			return { userId: admin.value.id, profile: admin.value, source: "mention" };
		}
	}

	return undefined;
}

/** @throws {UnresolvedTargetError} when no target can be found */
export async function requireTarget(
	request: CommandRequest,
	gateway: EnforcementGateway,
	usage?: string,
): Promise<ResolvedTarget> {
	const target = await resolveTarget(request, gateway);
	if (!target) {
		throw usage ? new UnresolvedTargetError(usage) : new UnresolvedTargetError();
	}
	return target;
}

/**
 * Arguments left once the target is accounted for. Text-mention words never
 * reach `args`, so only id, `@username` and `@mention` targets are removed.
 */
export function remainingArgs(
	request: CommandRequest,
	target: ResolvedTarget,
): string[] {
	switch (target.source) {
		case "id":
		case "username":
			return request.args.slice(1);
		case "mention":
			return request.args.filter((arg) => !arg.startsWith("@"));
		default:
			return request.args;
	}
}

/** Display name for replies; falls back to "User" when only the id is known */
export const targetName = (target: ResolvedTarget): string =>
	target.profile?.firstName ?? "User";
