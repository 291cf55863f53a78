/**
 * @fileoverview Same-sender grouping helpers.
 */

import { splitSentences, truncateText } from '../../../utils/text.js';
import { tierRank } from '../../urgency/service/scorer.js';
import type { EventCandidate } from '../../calendar-tagger/types.js';
import type { UrgencyReason, UrgencyResult } from '../../urgency/types.js';
import type { MessageAnalysis } from '../types.js';

export const DEDUPE_SIMILARITY = 0.9;
export const SUBJECT_MAX_CHARS = 200;

/**
 * Partition analyses by lower-cased sender address, keeping first-seen order.
 * Members of each group are sorted chronologically.
 */
export function groupBySender(analyses: readonly MessageAnalysis[]): MessageAnalysis[][] {
  const groups = new Map<string, MessageAnalysis[]>();
  for (const analysis of analyses) {
    const key = analysis.message.sender.address.toLowerCase();
    const group = groups.get(key);
    if (group) {
      group.push(analysis);
    } else {
      groups.set(key, [analysis]);
    }
  }
  return [...groups.values()].map((group) =>
    [...group].sort((a, b) => a.message.receivedAt.getTime() - b.message.receivedAt.getTime())
  );
}

function tokenSet(sentence: string): Set<string> {
  return new Set(sentence.toLowerCase().match(/\w+/g) ?? []);
}

export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 1;
  let shared = 0;
  for (const token of a) {
    if (b.has(token)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

/**
 * Drop sentences near-identical to one already kept, across all texts.
 * Texts left with no sentences are omitted.
 */
export function dedupeSentences(texts: readonly string[], threshold = DEDUPE_SIMILARITY): string[] {
  const kept: Set<string>[] = [];
  const result: string[] = [];

  for (const text of texts) {
    const sentences = splitSentences(text).filter((sentence) => {
      const tokens = tokenSet(sentence);
      if (kept.some((seen) => jaccardSimilarity(seen, tokens) >= threshold)) {
        return false;
      }
      kept.push(tokens);
      return true;
    });
    if (sentences.length > 0) {
      result.push(sentences.join(' '));
    }
  }
  return result;
}

/** Unique subjects joined by `; `, capped. */
export function combineSubjects(subjects: readonly string[], maxChars = SUBJECT_MAX_CHARS): string {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const subject of subjects) {
    const trimmed = subject.trim();
    const key = trimmed.toLowerCase();
    if (!trimmed || seen.has(key)) continue;
    seen.add(key);
    unique.push(trimmed);
  }
  return truncateText(unique.join('; '), maxChars);
}

/**
 * Highest tier, maximum score, and the union of reasons in first-seen order.
 */
export function mergeUrgency(results: readonly UrgencyResult[]): UrgencyResult {
  let merged: UrgencyResult = { score: 0, tier: 'normal', reasons: [] };
  const reasons: UrgencyReason[] = [];

  for (const result of results) {
    if (tierRank(result.tier) > tierRank(merged.tier)) {
      merged = { ...merged, tier: result.tier };
    }
    merged = { ...merged, score: Math.max(merged.score, result.score) };
    for (const reason of result.reasons) {
      if (!reasons.includes(reason)) reasons.push(reason);
    }
  }
  return { ...merged, reasons };
}

export function earliestCandidate(candidates: readonly (EventCandidate | null)[]): EventCandidate | undefined {
  let earliest: EventCandidate | undefined;
  for (const candidate of candidates) {
    if (candidate && (!earliest || candidate.start.getTime() < earliest.start.getTime())) {
      earliest = candidate;
    }
  }
  return earliest;
}
