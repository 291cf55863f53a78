/**
 * @fileoverview Summarization domain wiring.
 *
 * Builds the fallback chain from configuration. Remote providers without
 * credentials are left out; the local and heuristic tiers are always present
 * so the chain terminates.
 */

import config from '../../../config.js';
import { createLogger } from '../../../utils/observability/index.js';
import { AnthropicSummaryProvider } from '../providers/anthropic.js';
import { GeminiSummaryProvider } from '../providers/gemini.js';
import { HeuristicSummaryProvider } from '../providers/heuristic.js';
import { LocalSummaryProvider } from '../providers/local.js';
import { SummarizationChain } from '../service/chain.js';
import type { SummaryProvider, SummaryProviderName } from '../types.js';

export { SummarizationChain } from '../service/chain.js';
export { classifyProviderError, parseRetryAfter } from '../service/classify.js';
export { cleanSummaryText, finalizeSummary } from '../service/postprocess.js';
export { messagePlainText, toSummarySource } from '../service/source.js';
export { heuristicSummary } from '../providers/heuristic.js';
export type * from '../types.js';

const log = createLogger({ domain: 'summarization' });

const ALWAYS_AVAILABLE: SummaryProviderName[] = ['local', 'heuristic'];

function isProviderName(name: string): name is SummaryProviderName {
  return name === 'primary' || name === 'secondary' || name === 'local' || name === 'heuristic';
}

function createProvider(name: SummaryProviderName): SummaryProvider | null {
  switch (name) {
    case 'primary':
      return config.anthropicApiKey ? new AnthropicSummaryProvider({ model: config.models.summary }) : null;
    case 'secondary':
      return config.google.geminiApiKey
        ? new GeminiSummaryProvider({ apiKey: config.google.geminiApiKey, model: config.google.geminiModel })
        : null;
    case 'local':
      return new LocalSummaryProvider(config.summary.heuristicSentences);
    case 'heuristic':
      return new HeuristicSummaryProvider(config.summary.heuristicSentences);
  }
}

/**
 * Resolve the configured priority list into provider order.
 */
export function resolveProviderOrder(configured: readonly string[]): SummaryProviderName[] {
  const order = configured.filter(isProviderName);
  for (const name of ALWAYS_AVAILABLE) {
    if (!order.includes(name)) order.push(name);
  }
  return [...new Set(order)];
}

let chain: SummarizationChain | null = null;

export function getSummarizationChain(): SummarizationChain {
  if (chain) return chain;

  const providers: SummaryProvider[] = [];
  for (const name of resolveProviderOrder(config.summary.providers)) {
    const provider = createProvider(name);
    if (provider) {
      providers.push(provider);
    } else {
      log.info('summary_provider_unavailable', { provider: name });
    }
  }

  chain = new SummarizationChain(providers, {
    timeoutMs: config.summary.providerTimeoutMs,
    transientRetryDelayMs: config.summary.transientRetryDelayMs,
  });
  log.info('summary_chain_ready', { providers: chain.order });
  return chain;
}
