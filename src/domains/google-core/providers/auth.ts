/**
 * @fileoverview Shared Google OAuth utilities.
 *
 * The bot runs against a single Google account whose refresh token comes
 * from configuration. This module owns access-token refresh, client caching,
 * retry logic and scope-error handling for the Gmail and Calendar adapters.
 */

import { OAuth2Client } from 'google-auth-library';
import config from '../../../config.js';
import { createLogger } from '../../../utils/observability/index.js';
import { AuthRequiredError } from '../types.js';

const log = createLogger({ domain: 'google-auth' });

/** Token refresh threshold: refresh if expiring within 5 minutes. */
const REFRESH_THRESHOLD_MS = 5 * 60 * 1000;

/** Retry configuration for Google API calls. */
const MAX_RETRIES = 2;
const RETRY_DELAY_MS = 1000;

let cached: { client: OAuth2Client; expiresAt: number } | null = null;

/**
 * Clear the cached client (used by tests to avoid cross-test pollution).
 */
export function clearClientCache(): void {
  cached = null;
}

/**
 * Create a bare OAuth2 client (no credentials set).
 */
export function createOAuth2Client(): OAuth2Client {
  return new OAuth2Client(config.google.clientId, config.google.clientSecret);
}

/**
 * Exchange the configured refresh token for an access token.
 */
export async function refreshAccessToken(
  refreshToken: string
): Promise<{ accessToken: string; expiresAt: number }> {
  const oauth2Client = createOAuth2Client();
  oauth2Client.setCredentials({ refresh_token: refreshToken });

  const { credentials } = await oauth2Client.refreshAccessToken();

  if (!credentials.access_token) {
    throw new Error('Failed to refresh access token');
  }

  return {
    accessToken: credentials.access_token,
    expiresAt: credentials.expiry_date || Date.now() + 3600000,
  };
}

/**
 * Get a valid OAuth2 client for the configured account.
 * Refreshes the access token when it is about to expire.
 *
 * @throws AuthRequiredError if no refresh token is configured or refresh fails
 */
export async function getAuthenticatedClient(serviceName: string): Promise<OAuth2Client> {
  if (cached && cached.expiresAt > Date.now() + REFRESH_THRESHOLD_MS) {
    return cached.client;
  }

  const refreshToken = config.google.refreshToken;
  if (!refreshToken) {
    throw new AuthRequiredError(serviceName, 'GOOGLE_REFRESH_TOKEN is not set');
  }

  try {
    const refreshed = await refreshAccessToken(refreshToken);
    const client = createOAuth2Client();
    client.setCredentials({ access_token: refreshed.accessToken, refresh_token: refreshToken });
    cached = { client, expiresAt: refreshed.expiresAt };
    log.info('access_token_refreshed', { service: serviceName, expiresAt: refreshed.expiresAt });
    return client;
  } catch (error) {
    cached = null;
    log.warn('access_token_refresh_failed', {
      service: serviceName,
      error: error instanceof Error ? error.message : String(error),
    });
    throw new AuthRequiredError(serviceName, 'token refresh failed');
  }
}

/**
 * Check if an error is retryable (429 or 5xx). Google API errors carry the
 * HTTP status in `code`.
 */
export function isRetryableError(error: unknown): boolean {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'number') {
    return error.code === 429 || (error.code >= 500 && error.code < 600);
  }
  return false;
}

export function isInsufficientScopesError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return message.includes('insufficient authentication scopes') ||
         message.includes('Insufficient Permission');
}

/**
 * Sleep for a specified duration (used between retries).
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic and scope-error handling.
 * Retries 429/5xx up to MAX_RETRIES times with linear backoff.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  serviceName = 'Google',
  retryDelayMs = RETRY_DELAY_MS
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (isInsufficientScopesError(error)) {
        clearClientCache();
        throw new AuthRequiredError(serviceName, 'missing scopes');
      }

      lastError = error;
      if (attempt < MAX_RETRIES && isRetryableError(error)) {
        log.warn('google_api_retry', {
          service: serviceName,
          attempt: attempt + 1,
          maxRetries: MAX_RETRIES,
        });
        await sleep(retryDelayMs * (attempt + 1));
      } else {
        throw error;
      }
    }
  }
  throw lastError;
}
