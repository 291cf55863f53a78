export type * from './types.js';

export {
  createRequestId,
  createRunId,
  createSessionId,
  withLogContext,
  getLogContext,
} from './context.js';

export {
  createLogger,
  initObservability,
} from './logger.js';

export {
  redactEmail,
  redactSecrets,
  safeSnippet,
} from './redaction.js';
