/**
 * @fileoverview Rule-based urgency scoring.
 *
 * Signals are evaluated in a fixed order; each contributes its weight and the
 * sum is clamped to [0,1]. An important sender always yields the `important`
 * tier, whichever path produced the score.
 */

import { messagePlainText } from '../../summarization/service/source.js';
import type { Message } from '../../mailbox/types.js';
import type { SummaryResult } from '../../summarization/types.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import { errorMessage } from '../../../utils/errors.js';
import type {
  UrgencyClassifier,
  UrgencyContext,
  UrgencyResult,
  UrgencyRule,
  UrgencyTier,
  UrgencyWeights,
} from '../types.js';

export const DEFAULT_URGENCY_WEIGHTS: UrgencyWeights = {
  keyword: 0.7,
  deadline: 0.7,
  important_sender: 0.3,
  thread_activity: 0.3,
};

const RULE_ORDER: UrgencyRule[] = ['keyword', 'deadline', 'important_sender', 'thread_activity'];

/** A deadline cue must directly precede the date phrase. */
const DEADLINE_CUE = /\b(?:due(?:\s+date)?(?:\s+by)?|deadline(?:\s+is)?|submit(?:ted)?\s+by|complete(?:d)?\s+by|by)\s*[:-]?\s*(?:on\s+|at\s+)?$/i;

export interface ScoreUrgencyOptions {
  keywords: readonly string[];
  /** Score at or above which a message is `urgent`. */
  threshold: number;
  deadlineHorizonHours: number;
  threadActivityMin: number;
  weights?: Partial<UrgencyWeights>;
  classifier?: UrgencyClassifier | null;
  logger?: AppLogger;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function keywordPattern(keywords: readonly string[]): RegExp | null {
  const alternatives = keywords
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword.length > 0)
    .map((keyword) => escapeRegExp(keyword).replace(/\s+/g, '\\s+'));
  if (alternatives.length === 0) return null;
  return new RegExp(`(?<![\\w])(?:${alternatives.join('|')})(?![\\w])`, 'i');
}

function scoringText(message: Message, summary: SummaryResult | null): string {
  return [message.subject, summary?.text ?? '', messagePlainText(message)].join('\n');
}

export function hasUrgentKeyword(text: string, keywords: readonly string[]): boolean {
  return keywordPattern(keywords)?.test(text) ?? false;
}

/**
 * True when a date phrase right after a deadline cue falls in (now, now + horizon].
 */
export function hasNearDeadline(text: string, context: UrgencyContext, horizonHours: number): boolean {
  const now = context.now.getTime();
  const horizon = now + horizonHours * 60 * 60 * 1000;

  return context.extractor.extract(text, context.now).some((date) => {
    const preceding = text.slice(Math.max(0, date.index - 40), date.index);
    if (!DEADLINE_CUE.test(preceding)) return false;
    const at = date.start.getTime();
    return at > now && at <= horizon;
  });
}

function tierFor(score: number, isSenderImportant: boolean, threshold: number): UrgencyTier {
  if (isSenderImportant) return 'important';
  return score >= threshold ? 'urgent' : 'normal';
}

function clampScore(value: number): number {
  return Math.round(Math.min(1, Math.max(0, value)) * 10000) / 10000;
}

function ruleBasedScore(
  message: Message,
  summary: SummaryResult | null,
  context: UrgencyContext,
  options: ScoreUrgencyOptions
): UrgencyResult {
  const weights = { ...DEFAULT_URGENCY_WEIGHTS, ...options.weights };
  const text = scoringText(message, summary);

  const triggered: Record<UrgencyRule, boolean> = {
    keyword: hasUrgentKeyword(text, options.keywords),
    deadline: hasNearDeadline(text, context, options.deadlineHorizonHours),
    important_sender: context.isSenderImportant,
    thread_activity: context.threadActivity >= options.threadActivityMin,
  };

  const reasons = RULE_ORDER.filter((rule) => triggered[rule]);
  const score = clampScore(reasons.reduce((sum, rule) => sum + weights[rule], 0));

  return {
    score,
    tier: tierFor(score, context.isSenderImportant, options.threshold),
    reasons,
  };
}

/**
 * Score one message. Deterministic for identical inputs.
 */
export function scoreUrgency(
  message: Message,
  summary: SummaryResult | null,
  context: UrgencyContext,
  options: ScoreUrgencyOptions
): UrgencyResult {
  const classifier = options.classifier;
  if (classifier?.ready) {
    try {
      const predicted = classifier.predict(message, summary);
      if (Number.isFinite(predicted) && predicted >= 0 && predicted <= 1) {
        return {
          score: predicted,
          tier: tierFor(predicted, context.isSenderImportant, options.threshold),
          reasons: ['classifier'],
        };
      }
      options.logger?.warn('urgency_classifier_out_of_range', { messageId: message.id, score: predicted });
    } catch (error) {
      options.logger?.warn('urgency_classifier_failed', { messageId: message.id, error: errorMessage(error) });
    }
  }

  return ruleBasedScore(message, summary, context, options);
}

const TIER_RANK: Record<UrgencyTier, number> = { normal: 0, urgent: 1, important: 2 };

export function tierRank(tier: UrgencyTier): number {
  return TIER_RANK[tier];
}

/** Neutral result used when analysis of a message fails. */
export const NORMAL_URGENCY: UrgencyResult = { score: 0, tier: 'normal', reasons: [] };
