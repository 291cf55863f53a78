/**
 * @fileoverview Digest domain wiring.
 */

import config from '../../../config.js';
import { createDateExtractor } from '../../../services/date/extractor.js';
import { createLogger } from '../../../utils/observability/index.js';
import { createIntervalPoller, type Poller } from '../../../utils/poller.js';
import { getCalendar } from '../../calendar-tagger/runtime/index.js';
import { getMailbox } from '../../mailbox/runtime/index.js';
import { getSummarizationChain } from '../../summarization/runtime/index.js';
import { getUrgencyOptions } from '../../urgency/runtime/index.js';
import { DigestSessionRegistry } from '../service/registry.js';
import { DigestService, type DigestServiceSettings } from './service.js';

export { DigestService } from './service.js';
export type { DigestServiceDeps, DigestServiceSettings } from './service.js';
export { DigestSessionMachine, idempotencyKey } from '../service/machine.js';
export { DigestSessionRegistry } from '../service/registry.js';
export { buildItems, compareItems } from '../service/builder.js';
export { encodeCallbackData, decodeCallbackData } from '../service/callback-data.js';
export {
  renderBlocks,
  renderItem,
  EXHAUSTED_TEXT,
  STALE_TEXT,
  EMPTY_DIGEST_TEXT,
} from '../service/render.js';
export type * from '../types.js';

const log = createLogger({ domain: 'digest' });

export function digestSettingsFromConfig(): DigestServiceSettings {
  return {
    timezone: config.timezone,
    itemMaxChars: config.summary.itemMaxChars,
    combinedMaxChars: config.summary.combinedMaxChars,
    heuristicSentences: config.summary.heuristicSentences,
    groupingThreshold: config.digest.groupingThreshold,
    sessionTtlMs: config.digest.sessionTtlMs,
    maxMessageChars: config.digest.maxMessageChars,
    maxEmails: config.digest.maxEmails,
    windowHours: config.digest.windowHours,
    addEventOnNext: config.digest.addEventOnNext,
    forwardEmail: config.digest.forwardEmail,
    threadWindowHours: config.urgency.threadWindowHours,
    calendarLookaheadDays: config.calendar.lookaheadDays,
    defaultEventMinutes: config.calendar.defaultEventMinutes,
  };
}

let registry: DigestSessionRegistry | null = null;
let service: DigestService | null = null;

export function getDigestRegistry(): DigestSessionRegistry {
  if (!registry) {
    registry = new DigestSessionRegistry(log);
  }
  return registry;
}

export function getDigestService(): DigestService {
  if (!service) {
    service = new DigestService({
      mailbox: getMailbox(),
      calendar: getCalendar(),
      summarizer: getSummarizationChain(),
      extractor: createDateExtractor(config.timezone),
      registry: getDigestRegistry(),
      urgency: getUrgencyOptions(),
      settings: digestSettingsFromConfig(),
      logger: log,
    });
  }
  return service;
}

/**
 * Close expired sessions on an interval.
 */
export function createSessionSweeper(intervalMs = config.digest.sweepIntervalMs): Poller {
  return createIntervalPoller(
    async () => {
      await getDigestRegistry().sweepExpired(new Date());
    },
    intervalMs,
    { name: 'digest-session-sweeper', runOnStart: false }
  );
}
