import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HotScoreRefresher } from '../../src/arena/jobs/hot-score-refresher.js';
import type { HotScoreRefreshResult } from '../../src/arena/types.js';

function result(updatedCount: number): HotScoreRefreshResult {
  return { updatedCount, skills: updatedCount, comments: 0, refreshedAt: 0 };
}

describe('HotScoreRefresher', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should refresh on every interval once started', async () => {
    const refresh = vi.fn().mockResolvedValue(result(3));
    const onRefresh = vi.fn();
    const refresher = new HotScoreRefresher(refresh, { intervalMs: 1000, onRefresh });

    refresher.start();
    expect(refresher.isRunning()).toBe(true);
    expect(refresh).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(3000);

    expect(refresh).toHaveBeenCalledTimes(3);

    await refresher.stop();
    expect(refresher.isRunning()).toBe(false);
    expect(onRefresh).toHaveBeenCalledWith(result(3));
    expect(refresher.getStats().runs).toBe(3);

    await vi.advanceTimersByTimeAsync(3000);
    expect(refresh).toHaveBeenCalledTimes(3);
  });

  it('should skip a run while another is in flight', async () => {
    let finish: (value: HotScoreRefreshResult) => void = () => undefined;
    const refresh = vi.fn(
      () =>
        new Promise<HotScoreRefreshResult>(resolve => {
          finish = resolve;
        })
    );
    const refresher = new HotScoreRefresher(refresh);

    const first = refresher.runOnce();
    const second = await refresher.runOnce();

    expect(second).toBeNull();
    expect(refresh).toHaveBeenCalledTimes(1);

    finish(result(1));
    expect(await first).toEqual(result(1));
    expect(refresher.getStats()).toMatchObject({ runs: 1, skipped: 1, failures: 0 });
  });

  it('should count failures and keep going', async () => {
    const refresh = vi
      .fn<() => Promise<HotScoreRefreshResult>>()
      .mockRejectedValueOnce(new Error('database is locked'))
      .mockResolvedValueOnce(result(2));
    const refresher = new HotScoreRefresher(refresh);

    expect(await refresher.runOnce()).toBeNull();
    expect(refresher.getStats()).toMatchObject({ failures: 1, lastError: 'database is locked', runs: 0 });

    expect(await refresher.runOnce()).toEqual(result(2));
    expect(refresher.getStats()).toMatchObject({ failures: 1, lastError: null, runs: 1, lastResult: result(2) });
  });

  it('should wait for a refresh in progress when stopped', async () => {
    let finish: (value: HotScoreRefreshResult) => void = () => undefined;
    const refresher = new HotScoreRefresher(
      () =>
        new Promise<HotScoreRefreshResult>(resolve => {
          finish = resolve;
        })
    );

    const running = refresher.runOnce();
    let stopped = false;
    const stopping = refresher.stop().then(() => {
      stopped = true;
    });

    await Promise.resolve();
    expect(stopped).toBe(false);

    finish(result(0));
    await stopping;
    await running;
    expect(stopped).toBe(true);
  });

  it('should ignore a second start', () => {
    const refresher = new HotScoreRefresher(vi.fn().mockResolvedValue(result(0)), { intervalMs: 1000 });

    refresher.start();
    refresher.start();

    expect(vi.getTimerCount()).toBe(1);
    return refresher.stop();
  });
});
