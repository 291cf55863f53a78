/**
 * Anthropic client singleton.
 */

import Anthropic from '@anthropic-ai/sdk';
import config from '../../config.js';
import { ProviderError } from '../../domains/summarization/types.js';

let client: Anthropic | null = null;

/**
 * Get the Anthropic client instance.
 *
 * The SDK's own retry loop (bounded by `maxRetries`, capped exponential
 * backoff) is the only client-side retry for the primary provider.
 */
export function getClient(): Anthropic {
  if (!client) {
    if (!config.anthropicApiKey) {
      throw new ProviderError('unusable', 'ANTHROPIC_API_KEY not configured');
    }
    client = new Anthropic({
      apiKey: config.anthropicApiKey,
      maxRetries: config.summary.clientMaxRetries,
      timeout: config.summary.providerTimeoutMs,
    });
  }
  return client;
}
