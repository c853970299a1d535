import type { Logger } from 'pino';
import { getModuleLogger } from '../../observability/logger.js';
import type { HotScoreRefreshResult } from '../types.js';

const logger = (): Logger => getModuleLogger('HotScoreRefresher');

// ============================================================================
// Hot Score Refresher Types
// ============================================================================

export interface HotScoreRefresherConfig {
  /** Milliseconds between refreshes (default: 300000 = 5 min) */
  intervalMs?: number;
  /** Called after each successful refresh */
  onRefresh?: (result: HotScoreRefreshResult) => void;
}

export interface HotScoreRefresherStats {
  runs: number;
  failures: number;
  skipped: number;
  lastResult: HotScoreRefreshResult | null;
  lastError: string | null;
  lastRunAt: number | null;
}

// ============================================================================
// Hot Score Refresher
// ============================================================================

/**
 * Periodically recomputes hot scores. A tick that arrives while a refresh is
 * still running is skipped.
 */
export class HotScoreRefresher {
  private readonly intervalMs: number;
  private readonly onRefresh: ((result: HotScoreRefreshResult) => void) | undefined;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<HotScoreRefreshResult | null> | null = null;
  private readonly stats: HotScoreRefresherStats = {
    runs: 0,
    failures: 0,
    skipped: 0,
    lastResult: null,
    lastError: null,
    lastRunAt: null,
  };

  constructor(
    private readonly refresh: () => Promise<HotScoreRefreshResult>,
    config: HotScoreRefresherConfig = {}
  ) {
    this.intervalMs = config.intervalMs ?? 300_000;
    this.onRefresh = config.onRefresh;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.tick().catch(err => {
        logger().error({ error: err instanceof Error ? err.message : String(err) }, 'Hot score refresh tick error');
      });
    }, this.intervalMs);
    this.timer.unref();

    logger().info({ intervalMs: this.intervalMs }, 'Hot score refresher started');
  }

  /**
   * Stop the timer and wait for a refresh in progress
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger().info('Hot score refresher stopped');
    }

    if (this.inFlight) {
      await this.inFlight;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Refresh now. Returns null when a refresh is already running or it failed.
   */
  async runOnce(): Promise<HotScoreRefreshResult | null> {
    if (this.inFlight) {
      this.stats.skipped++;
      logger().debug('Hot score refresh already running, skipping');
      return null;
    }

    this.inFlight = this.execute();
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  getStats(): HotScoreRefresherStats {
    return { ...this.stats };
  }

  private async tick(): Promise<void> {
    await this.runOnce();
  }

  private async execute(): Promise<HotScoreRefreshResult | null> {
    this.stats.lastRunAt = Date.now();
    try {
      const result = await this.refresh();
      this.stats.runs++;
      this.stats.lastResult = result;
      this.stats.lastError = null;
      this.onRefresh?.(result);
      return result;
    } catch (error) {
      this.stats.failures++;
      this.stats.lastError = error instanceof Error ? error.message : String(error);
      logger().error({ error: this.stats.lastError }, 'Hot score refresh failed');
      return null;
    }
  }
}
