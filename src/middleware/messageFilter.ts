/**
 * @module middleware/messageFilter
 * @description Moderation middleware. Every group update is normalized and handed to the
 * policy evaluator: messages and edits run the moderation cascade, joins are welcomed,
 * join requests approved, and service/event notices cleaned up on the group's schedule.
 */

import { Context, MiddlewareFn } from 'telegraf';
import type { Update } from 'telegraf/types';
import { classifyUpdate } from '../handlers/normalize';
import type { PolicyEvaluator } from '../services/policyEvaluator';
import { logger } from '../utils/logger';

/**
 * Runs one update through moderation.
 *
 * @returns false when the evaluation deleted the message, so nothing else should answer it
 */
export async function moderateUpdate(evaluator: PolicyEvaluator, update: Update): Promise<boolean> {
  const event = classifyUpdate(update);
  if (!event) {
    return true;
  }

  try {
    const report = await evaluator.handle(event);

    if (report.consumedBy) {
      logger.debug('Message handled by moderation', {
        groupId: event.kind === 'message' || event.kind === 'edited' ? event.message.groupId : undefined,
        step: report.consumedBy,
      });
    }

    return !report.actions.some((action) => action.type === 'delete');
  } catch (error) {
    logger.error('Error in message filter middleware', { kind: event.kind, error });
    return true;
  }
}

/**
 * Builds the middleware that moderates every update before command handlers see it.
 * Commands and untouched messages continue down the chain.
 *
 * @example
 * bot.use(createMessageFilter(services.evaluator));
 */
export const createMessageFilter = (evaluator: PolicyEvaluator): MiddlewareFn<Context> =>
  async (ctx, next) => {
    if (await moderateUpdate(evaluator, ctx.update)) {
      return next();
    }
  };
