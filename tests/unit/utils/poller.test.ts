import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createIntervalPoller } from '../../../src/utils/poller.js';

describe('createIntervalPoller', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs on start and then every interval', async () => {
    const run = vi.fn(async () => {});
    const poller = createIntervalPoller(run, 1000, { name: 'test' });

    poller.start();
    expect(run).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(2000);
    expect(run).toHaveBeenCalledTimes(3);

    await poller.stop();
    expect(poller.isRunning()).toBe(false);
  });

  it('waits for the first interval when runOnStart is false', async () => {
    const run = vi.fn(async () => {});
    const poller = createIntervalPoller(run, 1000, { runOnStart: false });

    poller.start();
    expect(run).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1000);
    expect(run).toHaveBeenCalledTimes(1);
    await poller.stop();
  });

  it('skips a tick while the previous run is still in flight', async () => {
    let release: () => void = () => {};
    const run = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );
    const poller = createIntervalPoller(run, 1000, { runOnStart: false });

    poller.start();
    await vi.advanceTimersByTimeAsync(1000);
    await vi.advanceTimersByTimeAsync(1000);
    expect(run).toHaveBeenCalledTimes(1);

    release();
    await poller.stop();
  });

  it('keeps polling after a run throws', async () => {
    const run = vi.fn(async () => {
      throw new Error('boom');
    });
    const poller = createIntervalPoller(run, 1000, { runOnStart: false });

    poller.start();
    await vi.advanceTimersByTimeAsync(2000);

    expect(run).toHaveBeenCalledTimes(2);
    expect(poller.isRunning()).toBe(true);
    await poller.stop();
  });
});
