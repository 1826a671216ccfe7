/**
 * Inline button presses on the moderation keyboards.
 *
 * Every button is privileged. The handler works on a parsed callback and
 * returns what the transport should do: answer the press, replace the
 * message, or swap only its keyboard.
 *
 * @module services/callbackActions
 */

import type { InlineKeyboardMarkup } from "telegraf/types";
import {
	applyRestrictions,
	openRestrictionPanel,
} from "../commands/restrictions";
import { banStatusReply, muteStatusReply } from "../commands/moderation";
import {
	type GroupId,
	isRestrictionFlag,
	type MemberKey,
	memberKey,
	type MemberProfile,
} from "../types";
import { InvalidInputError, isCommandError, toError } from "../utils/errors";
import { FLAG_LABELS, restrictionPanelKeyboard } from "../utils/keyboards";
import { StructuredLogger } from "../utils/logger";
import { type CommandReply, GENERIC_FAILURE } from "./commandRouter";
import { isPrivileged } from "./enforcementGateway";
import { applyWarning } from "./escalation";
import type { ModerationServices } from "./index";
import { FULL_PERMISSIONS, MUTED_PERMISSIONS } from "./restrictionMatrix";

export const BUTTON_UNAUTHORIZED = "❌ Only admins can use this button.";

export interface CallbackRequest {
	chatId: GroupId;
	issuer: MemberProfile;
	data: string;
}

export interface CallbackResponse {
	/** Text for the button-press answer */
	answer?: string;
	/** Show the answer as a modal alert instead of a toast */
	alert?: boolean;
	/** Replaces the message the keyboard belongs to */
	edit?: CommandReply;
	/** Replaces only the keyboard */
	markup?: InlineKeyboardMarkup;
}

type ButtonFamily = "banstatus" | "mutestatus" | "action" | "free";

export interface ParsedCallback {
	family: ButtonFamily;
	userId: number;
	argument: string;
}

const CALLBACK_PATTERN = /^(banstatus|mutestatus|action|free)_(\d+)_([a-z]+)$/;

const isButtonFamily = (value: string): value is ButtonFamily =>
	value === "banstatus" ||
	value === "mutestatus" ||
	value === "action" ||
	value === "free";

/** @returns undefined for data that no moderation keyboard produces */
export function parseCallbackData(data: string): ParsedCallback | undefined {
	const match = CALLBACK_PATTERN.exec(data);
	if (!match) return undefined;

	const [, family, userId, argument] = match;
	if (!family || !isButtonFamily(family) || !userId || !argument) return undefined;
	return { family, userId: Number(userId), argument };
}

type ButtonHandler = (
	services: ModerationServices,
	key: MemberKey,
	argument: string,
	issuer: MemberProfile,
) => Promise<CallbackResponse>;

const failedEdit = (error: Error): CallbackResponse => ({
	edit: { content: `❌ Failed: ${error.message}` },
});

const handleBanStatus: ButtonHandler = async (services, key, argument, issuer) => {
	const banned = argument === "banned";
	const result = banned
		? await services.gateway.banMember(key.groupId, key.userId)
		: await services.gateway.unbanMember(key.groupId, key.userId);
	if (!result.ok) return failedEdit(result.error);

	StructuredLogger.logSecurityEvent(banned ? "Member banned" : "Member unbanned", {
		groupId: key.groupId,
		userId: key.userId,
		adminId: issuer.id,
		operation: banned ? "ban" : "unban",
	});
	return {
		answer: banned ? "🔨 User banned" : "✅ User unbanned",
		edit: banStatusReply(key.userId, banned),
	};
};

const handleMuteStatus: ButtonHandler = async (services, key, argument, issuer) => {
	const muted = argument === "muted";
	const result = await services.gateway.restrictMember(
		key.groupId,
		key.userId,
		muted ? { ...MUTED_PERMISSIONS } : { ...FULL_PERMISSIONS },
	);
	if (!result.ok) return failedEdit(result.error);

	StructuredLogger.logSecurityEvent(muted ? "Member muted" : "Member unmuted", {
		groupId: key.groupId,
		userId: key.userId,
		adminId: issuer.id,
		operation: muted ? "mute" : "unmute",
	});
	return {
		answer: muted ? "🔇 User muted" : "🔊 User unmuted",
		edit: muteStatusReply(key.userId, muted),
	};
};

const handleMemberAction: ButtonHandler = async (services, key, argument, issuer) => {
	switch (argument) {
		case "warn": {
			const { outcome } = await applyWarning(services.warnings, services.gateway, key);
			return {
				alert: true,
				answer: outcome.muted
					? `⚠️ User warned and auto-muted for ${outcome.muteDurationHours}h (${outcome.threshold} warnings)!`
					: `⚠️ User warned! Warnings: ${outcome.count}/${outcome.threshold}`,
			};
		}
		case "mute": {
			const result = await services.gateway.restrictMember(key.groupId, key.userId, {
				...MUTED_PERMISSIONS,
			});
			if (!result.ok) return failedEdit(result.error);
			StructuredLogger.logSecurityEvent("Member muted", {
				groupId: key.groupId,
				userId: key.userId,
				adminId: issuer.id,
				operation: "mute",
			});
			return { alert: true, answer: "🔇 User has been muted!" };
		}
		case "ban": {
			const result = await services.gateway.banMember(key.groupId, key.userId);
			if (!result.ok) return failedEdit(result.error);
			StructuredLogger.logSecurityEvent("Member banned", {
				groupId: key.groupId,
				userId: key.userId,
				adminId: issuer.id,
				operation: "ban",
			});
			return { alert: true, answer: "🔨 User has been banned!" };
		}
		case "permissions":
			return { edit: await openRestrictionPanel(services, key) };
		default:
			return {};
	}
};

const handleRestrictionPanel: ButtonHandler = async (services, key, argument, issuer) => {
	if (argument === "apply") {
		return { edit: { content: await applyRestrictions(services, key, issuer.id) } };
	}

	if (!isRestrictionFlag(argument)) {
		throw new InvalidInputError(`❌ Unknown restriction "${argument}".`);
	}

	const flags = services.restrictions.toggleFlag(key, argument);
	return {
		answer: `${FLAG_LABELS[argument]}: ${flags[argument] ? "restricted" : "allowed"}`,
		markup: restrictionPanelKeyboard(key.userId, flags),
	};
};

const HANDLERS: Record<ButtonFamily, ButtonHandler> = {
	banstatus: handleBanStatus,
	mutestatus: handleMuteStatus,
	action: handleMemberAction,
	free: handleRestrictionPanel,
};

/**
 * @returns undefined when the data belongs to no moderation keyboard
 */
export async function handleCallbackAction(
	services: ModerationServices,
	request: CallbackRequest,
): Promise<CallbackResponse | undefined> {
	const parsed = parseCallbackData(request.data);
	if (!parsed) return undefined;

	if (!(await isPrivileged(services.gateway, request.chatId, request.issuer.id))) {
		StructuredLogger.logSecurityEvent("Unauthorized button press", {
			groupId: request.chatId,
			userId: request.issuer.id,
			operation: parsed.family,
		});
		return { answer: BUTTON_UNAUTHORIZED, alert: true };
	}

	const key = memberKey(request.chatId, parsed.userId);
	try {
		return await HANDLERS[parsed.family](
			services,
			key,
			parsed.argument,
			request.issuer,
		);
	} catch (error) {
		if (isCommandError(error)) {
			return { answer: error.message, alert: true };
		}
		StructuredLogger.logError(toError(error), {
			groupId: request.chatId,
			adminId: request.issuer.id,
			operation: `callback_${parsed.family}`,
		});
		return { answer: GENERIC_FAILURE, alert: true };
	}
}
