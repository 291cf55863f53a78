/**
 * @fileoverview Turns per-message analyses into ordered digest items.
 *
 * Senders with at least `groupingThreshold` messages become one combined item
 * whose summary is re-generated from the deduplicated, chronologically
 * concatenated bodies. A group whose combined summary fails falls back to
 * one item per message.
 */

import { estimateReadingMinutes, truncateText } from '../../../utils/text.js';
import { errorMessage } from '../../../utils/errors.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import { messagePlainText } from '../../summarization/service/source.js';
import type { Summarizer } from '../../summarization/types.js';
import { tierRank } from '../../urgency/service/scorer.js';
import type { DigestItem, MessageAnalysis } from '../types.js';
import {
  SUBJECT_MAX_CHARS,
  combineSubjects,
  dedupeSentences,
  earliestCandidate,
  groupBySender,
  mergeUrgency,
} from './grouping.js';

export interface BuildItemsOptions {
  summarizer: Summarizer;
  groupingThreshold: number;
  combinedMaxChars: number;
  logger?: AppLogger;
}

type DraftItem = Omit<DigestItem, 'index' | 'state'>;

function singleItem(analysis: MessageAnalysis): DraftItem {
  const { message } = analysis;
  return {
    messageRef: message.id,
    messageRefs: [message.id],
    sender: message.sender,
    subject: truncateText(message.subject, SUBJECT_MAX_CHARS),
    summary: analysis.summary,
    urgency: analysis.urgency,
    eventCandidate: analysis.eventCandidate ?? undefined,
    groupKey: message.sender.address.toLowerCase(),
    groupSize: 1,
    receivedAt: message.receivedAt,
    readingMinutes: estimateReadingMinutes(messagePlainText(message)),
  };
}

async function combinedItem(group: MessageAnalysis[], options: BuildItemsOptions): Promise<DraftItem> {
  const [first] = group;
  const bodies = group.map((analysis) => messagePlainText(analysis.message));
  const subject = combineSubjects(group.map((analysis) => analysis.message.subject));
  const text = dedupeSentences(bodies).join('\n\n');

  const summary = await options.summarizer.summarize({ subject, text }, options.combinedMaxChars);

  return {
    messageRef: first.message.id,
    messageRefs: group.map((analysis) => analysis.message.id),
    sender: first.message.sender,
    subject,
    summary,
    urgency: mergeUrgency(group.map((analysis) => analysis.urgency)),
    eventCandidate: earliestCandidate(group.map((analysis) => analysis.eventCandidate)),
    groupKey: first.message.sender.address.toLowerCase(),
    groupSize: group.length,
    receivedAt: first.message.receivedAt,
    readingMinutes: estimateReadingMinutes(bodies.join('\n')),
  };
}

/**
 * Presentation order: important, then urgent, then normal; oldest first within a tier.
 */
export function compareItems(a: DraftItem, b: DraftItem): number {
  const byTier = tierRank(b.urgency.tier) - tierRank(a.urgency.tier);
  if (byTier !== 0) return byTier;
  return a.receivedAt.getTime() - b.receivedAt.getTime();
}

export async function buildItems(
  analyses: readonly MessageAnalysis[],
  options: BuildItemsOptions
): Promise<DigestItem[]> {
  const drafts = await Promise.all(
    groupBySender(analyses).map(async (group): Promise<DraftItem[]> => {
      if (group.length < options.groupingThreshold) {
        return group.map(singleItem);
      }
      try {
        return [await combinedItem(group, options)];
      } catch (error) {
        options.logger?.warn('digest_group_degraded', {
          groupSize: group.length,
          error: errorMessage(error),
        });
        return group.map(singleItem);
      }
    })
  );

  return drafts
    .flat()
    .sort(compareItems)
    .map((draft, index): DigestItem => ({ ...draft, index, state: 'pending' }));
}
