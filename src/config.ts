/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the bot requires.
 *
 * @see .env.example for required environment variables
 */

import 'dotenv/config';
import { isValidTimezone } from './services/date/extractor.js';

// ---------------------------------------------------------------------------
// Config helpers: required vs optional
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key];
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional float env var with a default. */
function optionalFloat(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseFloat(raw) : defaultValue;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return defaultValue;
  return raw !== (defaultValue ? 'false' : 'true') ? defaultValue : !defaultValue;
}

/** Read a comma-separated list env var. Blank entries are dropped. */
function optionalList(key: string, defaultValue: string[]): string[] {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/** Return a path that differs between dev and production. */
function dbPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

export const SUMMARY_PROVIDER_NAMES = ['primary', 'secondary', 'local', 'heuristic'] as const;

const DEFAULT_URGENCY_KEYWORDS = [
  'urgent',
  'asap',
  'emergency',
  'important',
  'action required',
  'deadline',
  'due',
  'immediately',
  'critical',
  'time sensitive',
  'priority',
];

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),
  timezone: optional('TIMEZONE', 'UTC'),

  /** Telegram bot transport */
  telegram: {
    botToken: required('TELEGRAM_BOT_TOKEN'),
    /** When set the bot registers a webhook; otherwise it long-polls. */
    webhookUrl: process.env.TELEGRAM_WEBHOOK_URL,
    webhookSecret: process.env.TELEGRAM_WEBHOOK_SECRET,
    allowedChatIds: optionalList('TELEGRAM_ALLOWED_CHAT_IDS', []),
  },

  anthropicApiKey: process.env.ANTHROPIC_API_KEY,

  /** Claude model IDs - centralized to avoid hardcoding across files */
  models: {
    summary: optional('SUMMARY_MODEL_ID', 'claude-3-5-haiku-20241022'),
  },

  /** Google OAuth (pre-issued refresh token) and Gemini */
  google: {
    clientId: required('GOOGLE_CLIENT_ID'),
    clientSecret: required('GOOGLE_CLIENT_SECRET'),
    refreshToken: required('GOOGLE_REFRESH_TOKEN'),
    geminiApiKey: process.env.GEMINI_API_KEY,
    geminiModel: optional('GEMINI_MODEL', 'gemini-2.0-flash'),
  },

  /** Summarization fallback chain */
  summary: {
    providers: optionalList('SUMMARY_PROVIDERS', [...SUMMARY_PROVIDER_NAMES]),
    itemMaxChars: optionalInt('SUMMARY_ITEM_MAX_CHARS', 500),
    combinedMaxChars: optionalInt('SUMMARY_COMBINED_MAX_CHARS', 1000),
    providerTimeoutMs: optionalInt('SUMMARY_PROVIDER_TIMEOUT_MS', 15000),
    transientRetryDelayMs: optionalInt('SUMMARY_TRANSIENT_RETRY_DELAY_MS', 500),
    clientMaxRetries: optionalInt('SUMMARY_CLIENT_MAX_RETRIES', 2),
    heuristicSentences: optionalInt('SUMMARY_HEURISTIC_SENTENCES', 3),
  },

  /** Digest sessions and rendering */
  digest: {
    groupingThreshold: optionalInt('DIGEST_GROUPING_THRESHOLD', 2),
    sessionTtlMs: optionalInt('DIGEST_SESSION_TTL_MS', 30 * 60 * 1000),
    maxMessageChars: optionalInt('DIGEST_MAX_MESSAGE_CHARS', 4096),
    maxEmails: optionalInt('DIGEST_MAX_EMAILS', 25),
    gmailQuery: optional('DIGEST_GMAIL_QUERY', 'is:unread in:inbox'),
    windowHours: optionalInt('DIGEST_WINDOW_HOURS', 0),
    addEventOnNext: optionalBool('DIGEST_ADD_EVENT_ON_NEXT', false),
    sweepIntervalMs: optionalInt('DIGEST_SWEEP_INTERVAL_MS', 60000),
    forwardEmail: process.env.FORWARD_EMAIL,
  },

  /** Rule-based urgency scoring */
  urgency: {
    keywords: optionalList('URGENCY_KEYWORDS', DEFAULT_URGENCY_KEYWORDS),
    deadlineHorizonHours: optionalInt('URGENCY_DEADLINE_HORIZON_HOURS', 72),
    threshold: optionalFloat('URGENCY_THRESHOLD', 0.66),
    threadActivityMin: optionalInt('URGENCY_THREAD_ACTIVITY_MIN', 3),
    threadWindowHours: optionalInt('URGENCY_THREAD_WINDOW_HOURS', 24),
  },

  /** Calendar suggestions */
  calendar: {
    enabled: optionalBool('CALENDAR_ENABLED', true),
    calendarId: optional('CALENDAR_ID', 'primary'),
    lookaheadDays: optionalInt('CALENDAR_LOOKAHEAD_DAYS', 30),
    defaultEventMinutes: optionalInt('CALENDAR_DEFAULT_EVENT_MINUTES', 60),
    conflictTag: optional('CALENDAR_CONFLICT_TAG', '**CONFLICT**'),
    reminderMinutes: optionalInt('CALENDAR_REMINDER_MINUTES', 60),
  },

  /** Local SQLite storage (chat settings, important senders, alert dedupe) */
  storage: {
    sqlitePath: dbPath('DATA_SQLITE_PATH', '/app/data/digest.db', './data/digest.db'),
  },

  /** Scheduled digests and important-email alerts */
  scheduler: {
    enabled: optionalBool('SCHEDULER_ENABLED', true),
    intervalMs: optionalInt('SCHEDULER_INTERVAL_MS', 60000),
    defaultDigestIntervalHours: optionalFloat('DEFAULT_DIGEST_INTERVAL_HOURS', 2),
    alertMaxMessages: optionalInt('ALERT_MAX_MESSAGES', 15),
  },
};

export type AppConfig = typeof config;

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (!config.telegram.botToken) errors.push('TELEGRAM_BOT_TOKEN is required');

  // Google OAuth (required for Gmail/Calendar)
  if (!config.google.clientId) errors.push('GOOGLE_CLIENT_ID is required');
  if (!config.google.clientSecret) errors.push('GOOGLE_CLIENT_SECRET is required');
  if (!config.google.refreshToken) errors.push('GOOGLE_REFRESH_TOKEN is required');

  if (config.telegram.webhookUrl && !config.telegram.webhookUrl.startsWith('https://')) {
    errors.push('TELEGRAM_WEBHOOK_URL must be an https:// URL');
  }

  for (const provider of config.summary.providers) {
    if (!SUMMARY_PROVIDER_NAMES.some((name) => name === provider)) {
      errors.push(`SUMMARY_PROVIDERS contains unknown provider "${provider}"`);
    }
  }

  // Numeric bounds
  if (config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (config.summary.itemMaxChars < 50) {
    errors.push(`SUMMARY_ITEM_MAX_CHARS must be >= 50, got ${config.summary.itemMaxChars}`);
  }
  if (config.summary.combinedMaxChars < config.summary.itemMaxChars) {
    errors.push('SUMMARY_COMBINED_MAX_CHARS must be >= SUMMARY_ITEM_MAX_CHARS');
  }
  if (config.digest.maxMessageChars <= config.summary.combinedMaxChars) {
    errors.push('DIGEST_MAX_MESSAGE_CHARS must be greater than SUMMARY_COMBINED_MAX_CHARS');
  }
  if (config.summary.providerTimeoutMs < 1000) {
    errors.push(`SUMMARY_PROVIDER_TIMEOUT_MS must be >= 1000, got ${config.summary.providerTimeoutMs}`);
  }
  if (config.digest.groupingThreshold < 2) {
    errors.push(`DIGEST_GROUPING_THRESHOLD must be >= 2, got ${config.digest.groupingThreshold}`);
  }
  if (config.digest.sessionTtlMs < 60000) {
    errors.push(`DIGEST_SESSION_TTL_MS must be >= 60000, got ${config.digest.sessionTtlMs}`);
  }
  if (config.digest.maxEmails < 1 || config.digest.maxEmails > 100) {
    errors.push(`DIGEST_MAX_EMAILS must be 1-100, got ${config.digest.maxEmails}`);
  }
  if (config.urgency.threshold < 0 || config.urgency.threshold > 1) {
    errors.push(`URGENCY_THRESHOLD must be 0-1, got ${config.urgency.threshold}`);
  }
  if (config.scheduler.intervalMs < 10000) {
    errors.push(`SCHEDULER_INTERVAL_MS must be >= 10000, got ${config.scheduler.intervalMs}`);
  }
  if (!isValidTimezone(config.timezone)) {
    errors.push(`TIMEZONE must be a valid IANA time zone, got ${config.timezone}`);
  }
  if (config.digest.forwardEmail && !EMAIL_PATTERN.test(config.digest.forwardEmail)) {
    errors.push('FORWARD_EMAIL must be an email address');
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
