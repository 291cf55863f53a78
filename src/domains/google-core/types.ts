/**
 * @fileoverview Google-core shared type definitions.
 *
 * Types shared across the Gmail and Calendar adapters.
 */

import { AppError } from '../../utils/errors.js';

/**
 * Raised when the configured refresh token is missing, revoked, or lacks the
 * scopes a service needs. Not recoverable without new credentials.
 */
export class AuthRequiredError extends AppError {
  constructor(public readonly serviceName: string, reason?: string) {
    super(
      `Google authentication required for ${serviceName}${reason ? `: ${reason}` : ''}`,
      'GOOGLE_AUTH_REQUIRED',
      false
    );
    this.name = 'AuthRequiredError';
  }
}

/** Scopes the refresh token must carry. */
export const GOOGLE_SCOPES = [
  'https://www.googleapis.com/auth/gmail.modify',
  'https://www.googleapis.com/auth/gmail.send',
  'https://www.googleapis.com/auth/calendar.events',
] as const;
