/**
 * Urgency domain types.
 */

import type { DateExtractor } from '../../services/date/extractor.js';
import type { Message } from '../mailbox/types.js';
import type { SummaryResult } from '../summarization/types.js';

export type UrgencyTier = 'normal' | 'urgent' | 'important';

export type UrgencyRule = 'keyword' | 'deadline' | 'important_sender' | 'thread_activity';

export type UrgencyReason = UrgencyRule | 'classifier';

export interface UrgencyResult {
  /** In [0,1]. */
  score: number;
  tier: UrgencyTier;
  /** Triggered rules in evaluation order. */
  reasons: UrgencyReason[];
}

export type UrgencyWeights = Record<UrgencyRule, number>;

/**
 * Inputs resolved by the caller so scoring stays a pure function.
 */
export interface UrgencyContext {
  isSenderImportant: boolean;
  /** Messages in the same thread within the trailing activity window. */
  threadActivity: number;
  now: Date;
  extractor: DateExtractor;
}

/**
 * Optional learned model. When ready, its score replaces the rule score.
 */
export interface UrgencyClassifier {
  readonly ready: boolean;
  predict(message: Message, summary: SummaryResult | null): number;
}
