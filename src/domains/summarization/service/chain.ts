/**
 * @fileoverview Summarization fallback chain.
 *
 * Tries each provider in priority order until one produces text:
 * - rate_limited: logged, then the next provider is tried immediately
 * - transient (including per-provider timeout): one retry after a short delay
 * - unusable: the next provider is tried immediately
 *
 * `summarize()` never throws. If every provider fails it falls back to the
 * heuristic summary computed inline.
 */

import { createLogger, type AppLogger } from '../../../utils/observability/index.js';
import { heuristicSummary } from '../providers/heuristic.js';
import type {
  ProviderFailure,
  ProviderOutcome,
  SummaryProvider,
  Summarizer,
  SummaryResult,
  SummarySource,
} from '../types.js';
import { classifyProviderError } from './classify.js';
import { finalizeSummary } from './postprocess.js';

export interface FallbackChainOptions {
  /** Per-call timeout for each provider attempt. */
  timeoutMs: number;
  /** Delay before the single retry of a transient failure. */
  transientRetryDelayMs: number;
  logger?: AppLogger;
}

async function sleep(ms: number): Promise<void> {
  if (ms <= 0) return;
  await new Promise((resolve) => setTimeout(resolve, ms));
}

export class SummarizationChain implements Summarizer {
  private readonly log: AppLogger;

  constructor(
    private readonly providers: readonly SummaryProvider[],
    private readonly options: FallbackChainOptions
  ) {
    this.log = options.logger ?? createLogger({ domain: 'summarization' });
  }

  /** Provider names in the order they will be tried. */
  get order(): string[] {
    return this.providers.map((provider) => provider.name);
  }

  async summarize(source: SummarySource, maxLength: number): Promise<SummaryResult> {
    for (const provider of this.providers) {
      const outcome = await this.attempt(provider, source, maxLength);
      if (outcome.ok) {
        const result = finalizeSummary(outcome.text, provider.name, maxLength);
        this.log.debug('summary_completed', {
          provider: provider.name,
          fallbackUsed: result.fallbackUsed,
          truncated: result.truncated,
          textLength: result.text.length,
        });
        return result;
      }
    }

    this.log.error('summary_chain_exhausted', { providers: this.order });
    return finalizeSummary(heuristicSummary(source), 'heuristic', maxLength);
  }

  private async attempt(
    provider: SummaryProvider,
    source: SummarySource,
    maxLength: number
  ): Promise<ProviderOutcome> {
    let outcome = await this.callWithTimeout(provider, source, maxLength);

    if (!outcome.ok && outcome.kind === 'transient') {
      this.log.warn('summary_provider_transient_retry', {
        provider: provider.name,
        error: outcome.message,
        delayMs: this.options.transientRetryDelayMs,
      });
      await sleep(this.options.transientRetryDelayMs);
      outcome = await this.callWithTimeout(provider, source, maxLength);
    }

    if (!outcome.ok) {
      this.logFailure(provider, outcome);
    }
    return outcome;
  }

  private logFailure(provider: SummaryProvider, failure: ProviderFailure): void {
    if (failure.kind === 'rate_limited') {
      this.log.warn('summary_provider_rate_limited', {
        provider: provider.name,
        at: new Date().toISOString(),
        retryAfterMs: failure.retryAfterMs,
        error: failure.message,
      });
      return;
    }
    this.log.warn('summary_provider_failed', {
      provider: provider.name,
      kind: failure.kind,
      error: failure.message,
    });
  }

  private async callWithTimeout(
    provider: SummaryProvider,
    source: SummarySource,
    maxLength: number
  ): Promise<ProviderOutcome> {
    const controller = new AbortController();
    const timeoutMs = this.options.timeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timedOut = new Promise<ProviderOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, kind: 'transient', message: `timed out after ${timeoutMs}ms` });
      }, timeoutMs);
    });

    const call = Promise.resolve()
      .then(() => provider.summarize(source, maxLength, controller.signal))
      .then((outcome): ProviderOutcome => {
        if (outcome.ok && !outcome.text.trim()) {
          return { ok: false, kind: 'unusable', message: 'empty summary' };
        }
        return outcome;
      })
      .catch((error: unknown) => classifyProviderError(error));

    try {
      return await Promise.race([call, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }
}
