/**
 * @fileoverview Offline extractive summarizer.
 *
 * Ranks sentences by the average document frequency of their content words
 * (stop words removed), keeps the best few, and returns them in their
 * original order. Needs no network and no model.
 */

import { readFileSync } from 'fs';
import { splitSentences } from '../../../utils/text.js';
import type { ProviderOutcome, SummaryProvider, SummarySource } from '../types.js';

const LEAD_SENTENCE_BONUS = 0.15;

let stopWords: Set<string> | null = null;

function loadStopWords(): Set<string> {
  if (stopWords) return stopWords;
  const raw = readFileSync(new URL('../data/stopwords.json', import.meta.url), 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error('stopwords.json must contain an array');
  }
  stopWords = new Set(parsed.filter((word): word is string => typeof word === 'string'));
  return stopWords;
}

function tokenize(sentence: string): string[] {
  return sentence.toLowerCase().match(/[a-z0-9][a-z0-9']*/g) ?? [];
}

type ScoredSentence = { index: number; text: string; score: number };

/**
 * Score each sentence by the frequency of its content words.
 */
export function rankSentences(sentences: string[]): ScoredSentence[] {
  const stop = loadStopWords();
  const contentWords = sentences.map((sentence) => tokenize(sentence).filter((word) => !stop.has(word)));

  const frequency = new Map<string, number>();
  for (const words of contentWords) {
    for (const word of words) {
      frequency.set(word, (frequency.get(word) ?? 0) + 1);
    }
  }
  const maxFrequency = Math.max(1, ...frequency.values());

  return sentences.map((text, index) => {
    const words = contentWords[index];
    const total = words.reduce((sum, word) => sum + (frequency.get(word) ?? 0) / maxFrequency, 0);
    const average = words.length > 0 ? total / words.length : 0;
    return { index, text, score: average + (index === 0 ? LEAD_SENTENCE_BONUS : 0) };
  });
}

export class LocalSummaryProvider implements SummaryProvider {
  readonly name = 'local';

  constructor(private readonly sentenceCount: number = 3) {}

  async summarize(source: SummarySource, maxLength: number): Promise<ProviderOutcome> {
    const sentences = splitSentences(source.text);
    if (sentences.length === 0) {
      return { ok: true, text: source.subject || '(no content)' };
    }
    if (sentences.length <= this.sentenceCount) {
      return { ok: true, text: sentences.join(' ') };
    }

    const selected = rankSentences(sentences)
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .slice(0, this.sentenceCount);

    // Drop the weakest picks until the summary fits; the chain truncates the last one.
    while (selected.length > 1 && joinInOrder(selected).length > maxLength) {
      selected.pop();
    }

    return { ok: true, text: joinInOrder(selected) };
  }
}

function joinInOrder(selected: ScoredSentence[]): string {
  return [...selected]
    .sort((a, b) => a.index - b.index)
    .map((sentence) => sentence.text)
    .join(' ');
}
