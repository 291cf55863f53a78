/**
 * @fileoverview Polling abstraction for background jobs.
 *
 * Used by the session TTL sweeper and the digest/alert scheduler.
 * Overlapping runs are skipped rather than queued.
 */

import { createLogger } from './observability/index.js';

/**
 * Interface for job polling implementations.
 */
export interface Poller {
  /** Start the polling loop */
  start(): void;
  /** Stop the polling loop and wait for any in-flight operation to complete */
  stop(): Promise<void>;
  /** Check if the poller is running */
  isRunning(): boolean;
}

export interface IntervalPollerOptions {
  /** Name stamped on the poller's log records. */
  name?: string;
  /** Run once immediately on start (default true). */
  runOnStart?: boolean;
}

/**
 * Create an interval-based poller.
 *
 * @param run - Function to call on each interval
 * @param intervalMs - Polling interval in milliseconds
 */
export function createIntervalPoller(
  run: () => Promise<void>,
  intervalMs: number = 60000,
  options: IntervalPollerOptions = {}
): Poller {
  const log = createLogger({ domain: 'poller', poller: options.name ?? 'default' });
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<void> | null = null;

  return {
    start(): void {
      if (intervalId !== null) {
        log.debug('poller_already_running');
        return;
      }

      log.info('poller_started', { intervalMs });

      if (options.runOnStart ?? true) {
        void runSafe();
      }

      intervalId = setInterval(() => {
        void runSafe();
      }, intervalMs);
    },

    async stop(): Promise<void> {
      if (intervalId === null) {
        return;
      }

      clearInterval(intervalId);
      intervalId = null;

      // Wait for any in-flight operation to complete
      if (inFlight) {
        await inFlight;
      }

      log.info('poller_stopped');
    },

    isRunning(): boolean {
      return intervalId !== null;
    },
  };

  /**
   * Wrapper to prevent overlapping executions and catch errors.
   */
  async function runSafe(): Promise<void> {
    if (inFlight) {
      log.debug('poller_skip_overlap');
      return;
    }

    const current = (async () => {
      try {
        await run();
      } catch (error) {
        log.error('poller_error', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    })();
    inFlight = current;
    try {
      await current;
    } finally {
      if (inFlight === current) inFlight = null;
    }
  }
}
