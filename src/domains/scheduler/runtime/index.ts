/**
 * @fileoverview Scheduler lifecycle.
 *
 * Runs DigestScheduler.tick on the interval poller: scheduled digests for
 * chats whose interval has elapsed, then important-email alerts.
 */

import config from '../../../config.js';
import { createDateExtractor } from '../../../services/date/extractor.js';
import { getAlertDedupeStore } from '../../../services/alerts/dedupe.js';
import { getChatSettingsStore } from '../../../services/chat-settings/index.js';
import { createIntervalPoller, type Poller } from '../../../utils/poller.js';
import { createLogger, createRunId, withLogContext } from '../../../utils/observability/index.js';
import { getDigestService } from '../../digest/runtime/index.js';
import { getMailbox } from '../../mailbox/runtime/index.js';
import { getUrgencyOptions } from '../../urgency/runtime/index.js';
import { DigestScheduler } from '../service/scheduler.js';
import type { ChatNotifier } from '../types.js';

export { DigestScheduler } from '../service/scheduler.js';
export type { DigestSchedulerDeps } from '../service/scheduler.js';
export { isDigestDue, parseDigestInterval, MIN_DIGEST_INTERVAL_HOURS, MAX_DIGEST_INTERVAL_HOURS } from '../service/due.js';
export { renderAlert, shouldAlert, ALERT_HEADER } from '../service/alerts.js';
export type * from '../types.js';

let poller: Poller | null = null;
const log = createLogger({ domain: 'scheduler-runtime' });

/**
 * Start the scheduler background service.
 */
export function startScheduler(notifier: ChatNotifier): void {
  if (!config.scheduler.enabled) {
    log.info('scheduler_disabled');
    return;
  }

  if (poller) {
    log.info('scheduler_already_running');
    return;
  }

  const scheduler = new DigestScheduler({
    store: getChatSettingsStore(),
    digest: getDigestService(),
    mailbox: getMailbox(),
    dedupe: getAlertDedupeStore(),
    notifier,
    extractor: createDateExtractor(config.timezone),
    urgency: getUrgencyOptions(),
    timezone: config.timezone,
    alertMaxMessages: config.scheduler.alertMaxMessages,
    threadWindowHours: config.urgency.threadWindowHours,
    logger: log,
  });

  poller = createIntervalPoller(async () => {
    await withLogContext({ runId: createRunId('sched') }, async () => {
      const startedAt = Date.now();
      const result = await scheduler.tick();
      log.info('run_completed', { ...result, durationMs: Date.now() - startedAt });
    });
  }, config.scheduler.intervalMs, { name: 'scheduler', runOnStart: false });

  poller.start();
  log.info('scheduler_started', { intervalMs: config.scheduler.intervalMs });
}

/**
 * Stop the scheduler. Waits for an in-flight pass to complete.
 */
export async function stopScheduler(): Promise<void> {
  if (!poller) {
    return;
  }
  await poller.stop();
  poller = null;
  log.info('scheduler_stopped');
}
