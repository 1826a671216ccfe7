/**
 * Records a warning and, when it crosses the group's threshold, mutes the
 * member for the configured number of hours.
 *
 * A mute that the platform rejects does not undo the counter reset: the
 * warnings are spent either way.
 *
 * @module services/escalation
 */

import type { MemberKey, WarningOutcome } from "../types";
import { StructuredLogger } from "../utils/logger";
import type { EnforcementGateway, GatewayResult } from "./enforcementGateway";
import { MUTED_PERMISSIONS } from "./restrictionMatrix";
import type { WarningTracker } from "./warningTracker";

const HOUR_MS = 60 * 60 * 1000;

export interface EscalationResult {
	outcome: WarningOutcome;
	/** Present only when the warning escalated */
	mute?: GatewayResult;
}

export const muteUntil = (hours: number, now: number = Date.now()): Date =>
	new Date(now + hours * HOUR_MS);

export async function applyWarning(
	warnings: WarningTracker,
	gateway: EnforcementGateway,
	key: MemberKey,
): Promise<EscalationResult> {
	const outcome = warnings.recordWarning(key);
	if (!outcome.muted) return { outcome };

	const mute = await gateway.restrictMember(
		key.groupId,
		key.userId,
		{ ...MUTED_PERMISSIONS },
		muteUntil(outcome.muteDurationHours),
	);

	StructuredLogger.logSecurityEvent("Member auto-muted", {
		groupId: key.groupId,
		userId: key.userId,
		operation: "escalation",
		hours: outcome.muteDurationHours,
		applied: mute.ok,
	});

	return { outcome, mute };
}
