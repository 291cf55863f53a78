/**
 * Summarization domain types.
 */

import { AppError } from '../../utils/errors.js';

/** Provenance of a summary, in fallback priority order. */
export type SummaryProviderName = 'primary' | 'secondary' | 'local' | 'heuristic';

export type ProviderFailureKind = 'rate_limited' | 'transient' | 'unusable';

export interface SummaryResult {
  text: string;
  provider: SummaryProviderName;
  /** True unless the primary provider produced the text. */
  fallbackUsed: boolean;
  /** The provider's raw output was longer than the requested cap. */
  truncated: boolean;
}

/** What a provider is asked to summarize. */
export interface SummarySource {
  subject: string;
  text: string;
}

export type ProviderFailure = {
  ok: false;
  kind: ProviderFailureKind;
  message: string;
  retryAfterMs?: number;
};

export type ProviderOutcome = { ok: true; text: string } | ProviderFailure;

/**
 * One tier of the fallback chain. Implementations report failures as
 * outcomes rather than throwing; the chain still guards against throws.
 */
export interface SummaryProvider {
  readonly name: SummaryProviderName;
  summarize(source: SummarySource, maxLength: number, signal: AbortSignal): Promise<ProviderOutcome>;
}

/**
 * Anything that can summarize a message-like source. The digest builder
 * depends on this rather than on the chain class.
 */
export interface Summarizer {
  summarize(source: SummarySource, maxLength: number): Promise<SummaryResult>;
}

/**
 * Provider failure raised inside provider implementations and mapped to an
 * outcome before it leaves the provider.
 */
export class ProviderError extends AppError {
  constructor(
    public readonly kind: ProviderFailureKind,
    message: string,
    public readonly retryAfterMs?: number
  ) {
    super(message, `PROVIDER_${kind.toUpperCase()}`, kind !== 'unusable');
    this.name = 'ProviderError';
  }
}
