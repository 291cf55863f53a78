/**
 * @fileoverview Maps provider SDK errors onto the fallback chain's failure kinds.
 *
 * Works on duck-typed error shapes so the Anthropic and Gemini SDKs (and
 * plain network errors) classify the same way.
 */

import { ProviderError, type ProviderFailure, type ProviderFailureKind } from '../types.js';

/** Retryable network error codes commonly surfaced by undici/fetch. */
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const TRANSIENT_ERROR_NAMES = new Set([
  'AbortError',
  'TimeoutError',
  'APIConnectionError',
  'APIConnectionTimeoutError',
]);

const RATE_LIMIT_PATTERN = /rate.?limit|too many requests|quota|resource.?exhausted|overloaded/i;
const TRANSIENT_PATTERN = /timed? ?out|timeout|fetch failed|network|socket hang up|econnreset/i;

function readStatus(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function readCode(error: object): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if ('cause' in error && typeof error.cause === 'object' && error.cause !== null) {
    return readCode(error.cause);
  }
  return undefined;
}

function readHeader(error: object, name: string): string | undefined {
  if (!('headers' in error)) return undefined;
  const headers = error.headers;
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }
  if (typeof headers === 'object' && headers !== null && name in headers) {
    const value: unknown = Reflect.get(headers, name);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

/**
 * Parse a `retry-after` value (delta seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: string | undefined, now: Date = new Date()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now.getTime());
}

function kindForStatus(status: number): ProviderFailureKind | undefined {
  if (status === 429 || status === 529) return 'rate_limited';
  if (status === 408 || status === 425 || status >= 500) return 'transient';
  if (status >= 400) return 'unusable';
  return undefined;
}

/**
 * Classify any thrown value from a provider call.
 *
 * Unknown errors are treated as `unusable`: they fall through without retry.
 */
export function classifyProviderError(error: unknown): ProviderFailure {
  if (error instanceof ProviderError) {
    return { ok: false, kind: error.kind, message: error.message, retryAfterMs: error.retryAfterMs };
  }

  const message = error instanceof Error ? error.message : String(error);
  if (typeof error !== 'object' || error === null) {
    return { ok: false, kind: 'unusable', message };
  }

  const retryAfterMs = parseRetryAfter(readHeader(error, 'retry-after'));
  const status = readStatus(error);
  const statusKind = status !== undefined ? kindForStatus(status) : undefined;
  if (statusKind) {
    return { ok: false, kind: statusKind, message, retryAfterMs };
  }

  if (RATE_LIMIT_PATTERN.test(message)) {
    return { ok: false, kind: 'rate_limited', message, retryAfterMs };
  }

  const code = readCode(error);
  const name = error instanceof Error ? error.name : '';
  if ((code && TRANSIENT_ERROR_CODES.has(code)) || TRANSIENT_ERROR_NAMES.has(name) || TRANSIENT_PATTERN.test(message)) {
    return { ok: false, kind: 'transient', message };
  }

  return { ok: false, kind: 'unusable', message };
}

/**
 * Some providers answer a throttled request with a 200 whose body is a
 * rate-limit notice instead of a summary.
 */
export function isRateLimitNotice(text: string): boolean {
  const head = text.slice(0, 200);
  return /too many requests|rate limit(ed)?( exceeded)?|error 429|quota exceeded/i.test(head);
}
