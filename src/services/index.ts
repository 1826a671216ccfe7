/** Wires the stores, the classifier and the evaluator around one database and gateway */

import type { Db } from "../database";
import { ConfigStore } from "./configStore";
import { ContentClassifier } from "./contentClassifier";
import { DeletionScheduler } from "./deletionScheduler";
import type { EnforcementGateway } from "./enforcementGateway";
import { KeywordFilterTable } from "./filterTable";
import { PolicyEvaluator } from "./policyEvaluator";
import { RestrictionMatrix } from "./restrictionMatrix";
import { WarningTracker } from "./warningTracker";

export interface ModerationServices {
	gateway: EnforcementGateway;
	configStore: ConfigStore;
	warnings: WarningTracker;
	restrictions: RestrictionMatrix;
	filters: KeywordFilterTable;
	classifier: ContentClassifier;
	scheduler: DeletionScheduler;
	evaluator: PolicyEvaluator;
}

export function createModerationServices(
	db: Db,
	gateway: EnforcementGateway,
	classifier: ContentClassifier = new ContentClassifier(),
): ModerationServices {
	const configStore = new ConfigStore(db);
	const warnings = new WarningTracker(db, configStore);
	const restrictions = new RestrictionMatrix(db);
	const filters = new KeywordFilterTable(db);
	const scheduler = new DeletionScheduler((groupId, messageId) =>
		gateway.deleteMessage(groupId, messageId),
	);

	const evaluator = new PolicyEvaluator({
		gateway,
		configStore,
		warnings,
		restrictions,
		filters,
		classifier,
		scheduler,
	});

	return {
		gateway,
		configStore,
		warnings,
		restrictions,
		filters,
		classifier,
		scheduler,
		evaluator,
	};
}
