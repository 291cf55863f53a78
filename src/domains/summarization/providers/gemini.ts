/**
 * @fileoverview Secondary summary provider backed by Google Gemini.
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import { classifyProviderError, isRateLimitNotice } from '../service/classify.js';
import { ProviderError, type ProviderOutcome, type SummaryProvider, type SummarySource } from '../types.js';
import { SUMMARY_SYSTEM_PROMPT, buildSummaryPrompt, isPromptEcho } from './prompt.js';

export interface GeminiSummaryOptions {
  apiKey: string | undefined;
  model: string;
}

export class GeminiSummaryProvider implements SummaryProvider {
  readonly name = 'secondary';

  constructor(private readonly options: GeminiSummaryOptions) {}

  async summarize(source: SummarySource, maxLength: number, signal: AbortSignal): Promise<ProviderOutcome> {
    try {
      if (!this.options.apiKey) {
        throw new ProviderError('unusable', 'GEMINI_API_KEY not configured');
      }

      const model = new GoogleGenerativeAI(this.options.apiKey).getGenerativeModel({
        model: this.options.model,
        systemInstruction: SUMMARY_SYSTEM_PROMPT,
      });
      const result = await model.generateContent(buildSummaryPrompt(source, maxLength), { signal });
      const text = result.response.text().trim();

      if (!text) throw new ProviderError('unusable', 'empty response');
      if (isRateLimitNotice(text)) throw new ProviderError('rate_limited', 'rate limit notice in response body');
      if (isPromptEcho(text)) throw new ProviderError('unusable', 'response echoed the prompt');

      return { ok: true, text };
    } catch (error) {
      return classifyProviderError(error);
    }
  }
}
