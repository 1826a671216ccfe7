/**
 * Event dispatcher: runs the moderation cascade for messages and edits,
 * and the housekeeping for joins, join requests, service notices and
 * "event" content.
 *
 * Holds no state of its own. Every gateway call returns a GatewayResult
 * which is recorded in the report and otherwise dropped, so a failed
 * delete or send never stops the rest of the evaluation.
 *
 * @module services/policyEvaluator
 */

import {
	type ChatMessage,
	type GroupConfig,
	type GroupId,
	type MemberProfile,
	type MessageVisibility,
	type ModerationEvent,
	memberKey,
	type ViolationReason,
} from "../types";
import { StructuredLogger } from "../utils/logger";
import type { ConfigStore } from "./configStore";
import type { ContentClassifier } from "./contentClassifier";
import type { DeletionScheduler } from "./deletionScheduler";
import {
	type EnforcementGateway,
	type GatewayResult,
	isPrivileged,
	type MessageContent,
	type SentMessage,
} from "./enforcementGateway";
import { applyWarning } from "./escalation";
import type { KeywordFilterTable } from "./filterTable";
import { privilegedLinkNotice, violationNotice } from "./notifications";
import {
	createPolicySteps,
	type PolicyAction,
	type PolicyInput,
	type PolicyStep,
	type PolicyStepId,
	runCascade,
} from "./policySteps";
import type { RestrictionMatrix } from "./restrictionMatrix";
import type { WarningTracker } from "./warningTracker";
import { deliverWelcome } from "./welcome";

export interface PolicyEvaluatorDeps {
	gateway: EnforcementGateway;
	configStore: ConfigStore;
	warnings: WarningTracker;
	restrictions: RestrictionMatrix;
	filters: KeywordFilterTable;
	classifier: ContentClassifier;
	scheduler: DeletionScheduler;
	/** Defaults to nsfw, restriction, link, edit, keyword */
	steps?: PolicyStep[];
}

export interface EffectRecord {
	operation: string;
	ok: boolean;
}

export interface EvaluationReport {
	consumedBy?: PolicyStepId;
	actions: PolicyAction[];
	effects: EffectRecord[];
}

export class PolicyEvaluator {
	private readonly steps: PolicyStep[];

	constructor(private readonly deps: PolicyEvaluatorDeps) {
		this.steps = deps.steps ?? createPolicySteps(deps.classifier, deps.filters);
	}

	async handle(event: ModerationEvent): Promise<EvaluationReport> {
		const report: EvaluationReport = { actions: [], effects: [] };

		switch (event.kind) {
			case "message":
			case "edited":
				await this.moderateMessage(event.message, report);
				break;
			case "members_joined":
				await this.welcomeMembers(
					event.groupId,
					event.groupTitle,
					event.members,
					report,
				);
				await this.housekeep(
					event.groupId,
					event.messageId,
					this.deps.configStore.get(event.groupId).serviceMsg,
					report,
				);
				break;
			case "join_request":
				await this.approve(event.groupId, event.userId, report);
				break;
			case "service":
				await this.housekeep(
					event.groupId,
					event.messageId,
					this.deps.configStore.get(event.groupId).serviceMsg,
					report,
				);
				break;
			case "event":
				await this.housekeep(
					event.groupId,
					event.messageId,
					this.deps.configStore.get(event.groupId).eventMsg,
					report,
				);
				break;
		}

		return report;
	}

	/** Gathers config, privilege, flags and (for the NSFW gate) the file path */
	async buildInput(
		message: ChatMessage,
		report?: EvaluationReport,
	): Promise<PolicyInput> {
		const { configStore, restrictions, gateway } = this.deps;
		const key = memberKey(message.groupId, message.sender.id);
		const config = configStore.get(message.groupId);

		const privileged = await isPrivileged(
			gateway,
			message.groupId,
			message.sender.id,
		);

		const input: PolicyInput = {
			message,
			config,
			privileged,
			flags: restrictions.getFlags(key),
			linksAllowed: restrictions.allowsLinks(key),
		};

		const [attachment] = message.media;
		if (config.nsfwFilterEnabled && attachment) {
			const path = await gateway.resolveFileHandle(attachment.fileId);
			report?.effects.push({ operation: "resolveFileHandle", ok: path.ok });
			if (path.ok) input.filePath = path.value;
		}

		return input;
	}

	private async moderateMessage(
		message: ChatMessage,
		report: EvaluationReport,
	): Promise<void> {
		const input = await this.buildInput(message, report);
		const { consumedBy, actions } = runCascade(this.steps, input);

		report.consumedBy = consumedBy;
		report.actions = actions;

		for (const action of actions) {
			await this.perform(action, input, report);
		}
	}

	private async perform(
		action: PolicyAction,
		{ message, config }: PolicyInput,
		report: EvaluationReport,
	): Promise<void> {
		const { gateway } = this.deps;
		const { groupId, sender } = message;

		switch (action.type) {
			case "delete": {
				const result = await gateway.deleteMessage(groupId, message.messageId);
				report.effects.push({ operation: "deleteMessage", ok: result.ok });
				StructuredLogger.logSecurityEvent("Message removed", {
					groupId,
					userId: sender.id,
					operation: report.consumedBy,
					messageId: message.messageId,
					deleted: result.ok,
				});
				return;
			}
			case "warn":
				await this.warn(groupId, sender, action.reason, config, report);
				return;
			case "notify_privileged_link": {
				const notice = privilegedLinkNotice(sender);
				await this.notifyGroup(groupId, notice.group, config, report);
				await this.notifyDirect(sender.id, notice.direct, report);
				return;
			}
			case "respond": {
				const { entry } = action;
				const result = await gateway.sendMedia(
					groupId,
					{ kind: entry.mediaKind, handle: entry.mediaHandle },
					entry.caption || undefined,
				);
				report.effects.push({ operation: "sendMedia", ok: result.ok });
				if (result.ok) {
					StructuredLogger.logModerationEvent("Filter response sent", {
						groupId,
						userId: sender.id,
						operation: "filter_response",
						keyword: entry.keyword,
					});
				}
				return;
			}
		}
	}

	private async warn(
		groupId: GroupId,
		member: MemberProfile,
		reason: ViolationReason,
		config: GroupConfig,
		report: EvaluationReport,
	): Promise<void> {
		const { outcome, mute } = await applyWarning(
			this.deps.warnings,
			this.deps.gateway,
			memberKey(groupId, member.id),
		);
		if (mute) {
			report.effects.push({ operation: "restrictMember", ok: mute.ok });
		}

		const notice = violationNotice(member, reason, outcome);
		await this.notifyGroup(groupId, notice.group, config, report);
		await this.notifyDirect(member.id, notice.direct, report);
	}

	/** Group notices self-destruct when the group has a timer set */
	private async notifyGroup(
		groupId: GroupId,
		content: MessageContent,
		config: GroupConfig,
		report: EvaluationReport,
	): Promise<GatewayResult<SentMessage>> {
		const result = await this.deps.gateway.sendText(groupId, content);
		report.effects.push({ operation: "sendText", ok: result.ok });

		if (result.ok && config.selfDestructSeconds > 0) {
			this.deps.scheduler.schedule(
				groupId,
				result.value.messageId,
				config.selfDestructSeconds * 1000,
			);
		}
		return result;
	}

	/** Best effort: fails whenever the member never started the bot */
	private async notifyDirect(
		userId: number,
		text: string,
		report: EvaluationReport,
	): Promise<void> {
		const result = await this.deps.gateway.sendDirect(userId, text);
		report.effects.push({ operation: "sendDirect", ok: result.ok });
	}

	private async welcomeMembers(
		groupId: GroupId,
		groupTitle: string | undefined,
		members: MemberProfile[],
		report: EvaluationReport,
	): Promise<void> {
		const config = this.deps.configStore.get(groupId);

		for (const member of members) {
			if (member.isBot) continue;
			const result = await deliverWelcome(
				this.deps.gateway,
				groupId,
				groupTitle,
				member,
				config,
			);
			report.effects.push({ operation: "welcome", ok: result.ok });
		}
	}

	private async approve(
		groupId: GroupId,
		userId: number,
		report: EvaluationReport,
	): Promise<void> {
		const result = await this.deps.gateway.approveJoinRequest(groupId, userId);
		report.effects.push({ operation: "approveJoinRequest", ok: result.ok });

		if (result.ok) {
			StructuredLogger.logModerationEvent("Join request approved", {
				groupId,
				userId,
				operation: "approve_join",
			});
		}
	}

	/**
	 * Disabled: delete now. Enabled with a positive delay: delete later.
	 * Enabled with no delay: leave it.
	 */
	private async housekeep(
		groupId: GroupId,
		messageId: number,
		visibility: MessageVisibility,
		report: EvaluationReport,
	): Promise<void> {
		if (!visibility.enabled) {
			const result = await this.deps.gateway.deleteMessage(groupId, messageId);
			report.effects.push({ operation: "deleteMessage", ok: result.ok });
			return;
		}

		if (visibility.deleteAfterSeconds > 0) {
			this.deps.scheduler.schedule(
				groupId,
				messageId,
				visibility.deleteAfterSeconds * 1000,
			);
			report.effects.push({ operation: "scheduleDelete", ok: true });
		}
	}
}
