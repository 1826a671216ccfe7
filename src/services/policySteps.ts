/**
 * The moderation cascade as an ordered list of pure steps.
 *
 * A step only decides: it reads the prepared `PolicyInput` and returns the
 * actions to take. Carrying them out is the evaluator's job. The first
 * step that reports `consumed` ends the cascade for that message.
 *
 * @module services/policySteps
 */

import type {
	ChatMessage,
	FilterEntry,
	GroupConfig,
	RestrictionFlag,
	RestrictionSet,
	ViolationReason,
} from "../types";
import { type ContentClassifier, containsUrl } from "./contentClassifier";
import type { KeywordFilterTable } from "./filterTable";

/** Everything a step may look at, gathered once per message */
export interface PolicyInput {
	message: ChatMessage;
	config: GroupConfig;
	/** Owner or administrator; a failed status lookup counts as false */
	privileged: boolean;
	flags: RestrictionSet;
	/** A restriction record exists for the sender with `link` off */
	linksAllowed: boolean;
	/** Remote path of the first attachment, resolved only for the NSFW gate */
	filePath?: string;
}

export type PolicyAction =
	| { type: "delete" }
	| { type: "warn"; reason: ViolationReason }
	| { type: "notify_privileged_link" }
	| { type: "respond"; entry: FilterEntry };

export interface PolicyOutcome {
	consumed: boolean;
	actions: PolicyAction[];
}

export type PolicyStepId = "nsfw" | "restriction" | "link" | "edit" | "keyword";

export interface PolicyStep {
	id: PolicyStepId;
	evaluate(input: PolicyInput): PolicyOutcome;
}

const PASS: PolicyOutcome = { consumed: false, actions: [] };

const deleteAndWarn = (reason: ViolationReason): PolicyOutcome => ({
	consumed: true,
	actions: [{ type: "delete" }, { type: "warn", reason }],
});

/** URL entity from the platform, or a URL-looking run in text or caption */
export const messageHasLink = (message: ChatMessage): boolean =>
	message.hasUrlEntity ||
	containsUrl(message.text) ||
	containsUrl(message.caption);

/** Runs even for privileged senders */
export const createNsfwStep = (classifier: ContentClassifier): PolicyStep => ({
	id: "nsfw",
	evaluate({ message, config, filePath }) {
		if (!config.nsfwFilterEnabled) return PASS;

		const flagged =
			classifier.isFlagged(message.text) ||
			classifier.isFlagged(message.caption) ||
			classifier.isFlagged(filePath);

		return flagged ? deleteAndWarn("nsfw") : PASS;
	},
});

const RESTRICTION_REASONS: Record<
	"sticker" | "animation" | "video" | "photo" | "document",
	{ flag: RestrictionFlag; reason: ViolationReason }
> = {
	sticker: { flag: "sticker", reason: "sticker" },
	animation: { flag: "gif", reason: "gif" },
	video: { flag: "media", reason: "media" },
	photo: { flag: "media", reason: "media" },
	document: { flag: "media", reason: "media" },
};

/** Capability flags of non-privileged senders */
export const restrictionStep: PolicyStep = {
	id: "restriction",
	evaluate({ message, privileged, flags }) {
		if (privileged) return PASS;

		for (const attachment of message.media) {
			const { flag, reason } = RESTRICTION_REASONS[attachment.kind];
			if (flags[flag]) return deleteAndWarn(reason);
		}

		if (flags.link && messageHasLink(message)) {
			return deleteAndWarn("link");
		}
		return PASS;
	},
};

/**
 * Links are removed unless the sender has a restriction record with `link`
 * off. Privileged senders are not warned.
 */
export const linkStep: PolicyStep = {
	id: "link",
	evaluate({ message, privileged, linksAllowed }) {
		if (linksAllowed || !messageHasLink(message)) return PASS;

		if (privileged) {
			return {
				consumed: true,
				actions: [{ type: "delete" }, { type: "notify_privileged_link" }],
			};
		}
		return deleteAndWarn("link");
	},
};

/** Any edit is removed when edit deletion is on; content is not re-read */
export const editStep: PolicyStep = {
	id: "edit",
	evaluate({ message, config, privileged }) {
		if (!message.edited || !config.editDeletionEnabled || privileged) {
			return PASS;
		}
		return deleteAndWarn("edit");
	},
};

export const createKeywordStep = (filters: KeywordFilterTable): PolicyStep => ({
	id: "keyword",
	evaluate({ message }) {
		if (message.edited || message.isCommand) return PASS;

		const text = message.text ?? message.caption;
		if (!text) return PASS;

		const entry = filters.matchFirst(message.groupId, text);
		return entry
			? { consumed: true, actions: [{ type: "respond", entry }] }
			: PASS;
	},
});

export const createPolicySteps = (
	classifier: ContentClassifier,
	filters: KeywordFilterTable,
): PolicyStep[] => [
	createNsfwStep(classifier),
	restrictionStep,
	linkStep,
	editStep,
	createKeywordStep(filters),
];

export interface CascadeResult {
	consumedBy?: PolicyStepId;
	actions: PolicyAction[];
}

/** Runs the steps in order and stops at the first one that consumes the message */
export function runCascade(
	steps: readonly PolicyStep[],
	input: PolicyInput,
): CascadeResult {
	for (const step of steps) {
		const outcome = step.evaluate(input);
		if (outcome.consumed) {
			return { consumedBy: step.id, actions: outcome.actions };
		}
	}
	return { actions: [] };
}
