/**
 * @fileoverview Urgency domain wiring.
 */

import config from '../../../config.js';
import type { ScoreUrgencyOptions } from '../service/scorer.js';

export {
  scoreUrgency,
  hasUrgentKeyword,
  hasNearDeadline,
  tierRank,
  DEFAULT_URGENCY_WEIGHTS,
  NORMAL_URGENCY,
} from '../service/scorer.js';
export type { ScoreUrgencyOptions } from '../service/scorer.js';
export type * from '../types.js';

/**
 * Scoring options from configuration. No classifier ships with the bot.
 */
export function getUrgencyOptions(): ScoreUrgencyOptions {
  return {
    keywords: config.urgency.keywords,
    threshold: config.urgency.threshold,
    deadlineHorizonHours: config.urgency.deadlineHorizonHours,
    threadActivityMin: config.urgency.threadActivityMin,
  };
}
