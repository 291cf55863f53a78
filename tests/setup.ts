/**
 * Global test setup for Vitest.
 *
 * This file runs before all tests. It configures the test environment
 * and sets up mock cleanup between tests.
 */

import { beforeEach, vi } from 'vitest';

// Set test environment variables before any imports
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.TIMEZONE = 'UTC';
process.env.ANTHROPIC_API_KEY = 'test-api-key';
process.env.GEMINI_API_KEY = 'test-gemini-key';
process.env.TELEGRAM_BOT_TOKEN = 'test-bot-token';
process.env.TELEGRAM_WEBHOOK_SECRET = 'test-secret';
process.env.GOOGLE_CLIENT_ID = 'test-client-id';
process.env.GOOGLE_CLIENT_SECRET = 'test-client-secret';
process.env.GOOGLE_REFRESH_TOKEN = 'test-refresh-token';
process.env.FORWARD_EMAIL = 'assistant@example.com';
process.env.DATA_SQLITE_PATH = ':memory:';
process.env.SCHEDULER_ENABLED = 'false';

// Import mocks
import './mocks/anthropic.js';
import './mocks/gemini.js';
import './mocks/googleapis.js';

// Reset mocks before each test
beforeEach(() => {
  vi.clearAllMocks();
});
