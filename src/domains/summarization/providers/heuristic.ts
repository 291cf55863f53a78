/**
 * @fileoverview Last-resort summary: the opening sentences, or the subject
 * when there is no body.
 */

import { splitSentences } from '../../../utils/text.js';
import type { ProviderOutcome, SummaryProvider, SummarySource } from '../types.js';

export function heuristicSummary(source: SummarySource, sentenceCount = 3): string {
  const sentences = splitSentences(source.text);
  if (sentences.length === 0) {
    return source.subject.trim() || '(no content)';
  }
  return sentences.slice(0, sentenceCount).join(' ');
}

export class HeuristicSummaryProvider implements SummaryProvider {
  readonly name = 'heuristic';

  constructor(private readonly sentenceCount: number = 3) {}

  async summarize(source: SummarySource): Promise<ProviderOutcome> {
    return { ok: true, text: heuristicSummary(source, this.sentenceCount) };
  }
}
