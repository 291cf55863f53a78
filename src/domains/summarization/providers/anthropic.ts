/**
 * @fileoverview Primary summary provider backed by the Anthropic Messages API.
 */

import { getClient } from '../../../services/anthropic/client.js';
import { classifyProviderError, isRateLimitNotice } from '../service/classify.js';
import { ProviderError, type ProviderOutcome, type SummaryProvider, type SummarySource } from '../types.js';
import { SUMMARY_SYSTEM_PROMPT, buildSummaryPrompt, isPromptEcho } from './prompt.js';

export interface AnthropicSummaryOptions {
  model: string;
}

export class AnthropicSummaryProvider implements SummaryProvider {
  readonly name = 'primary';

  constructor(private readonly options: AnthropicSummaryOptions) {}

  async summarize(source: SummarySource, maxLength: number, signal: AbortSignal): Promise<ProviderOutcome> {
    try {
      const response = await getClient().messages.create(
        {
          model: this.options.model,
          // Roughly four characters per token, with headroom.
          max_tokens: Math.max(64, Math.ceil(maxLength / 3)),
          system: SUMMARY_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: buildSummaryPrompt(source, maxLength) }],
        },
        { signal }
      );

      const text = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();

      if (!text) throw new ProviderError('unusable', 'empty response');
      if (isRateLimitNotice(text)) throw new ProviderError('rate_limited', 'rate limit notice in response body');
      if (isPromptEcho(text)) throw new ProviderError('unusable', 'response echoed the prompt');

      return { ok: true, text };
    } catch (error) {
      return classifyProviderError(error);
    }
  }
}
