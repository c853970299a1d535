/**
 * Ranking Service
 *
 * Time-decayed hot scores, refreshed in batch for every rankable target
 */

import type { Logger } from 'pino';
import { getModuleLogger } from '../../observability/logger.js';
import { DEFAULT_HOT_GRAVITY, MS_PER_HOUR } from '../constants.js';
import type { ArenaUnitOfWork, VoteTargetStore } from '../stores/index.js';
import { systemClock, type Clock, type HotScoreRefreshResult } from '../types.js';
import { roundTo } from './reputation.js';

const logger = (): Logger => getModuleLogger('RankingService');

/**
 * hot = log10(max(|up - down|, 1)) + ageHours / gravity, rounded to 4 decimals.
 * The sign of the vote score does not affect the result.
 */
export function calculateHotScore(
  upvotes: number,
  downvotes: number,
  createdAt: number,
  now: number,
  gravity: number = DEFAULT_HOT_GRAVITY
): number {
  const score = upvotes - downvotes;
  const order = Math.log10(Math.max(Math.abs(score), 1));
  const ageHours = (now - createdAt) / MS_PER_HOUR;
  return roundTo(order + ageHours / gravity, 4);
}

export class RankingService {
  constructor(
    private readonly unitOfWork: ArenaUnitOfWork,
    private readonly gravity: number = DEFAULT_HOT_GRAVITY,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Recompute and persist hot scores of every public skill and every comment
   */
  async refreshHotScores(): Promise<HotScoreRefreshResult> {
    const started = Date.now();

    const result = await this.unitOfWork.run(async stores => {
      const now = this.clock.now();
      const skills = await this.refresh(stores.skills, now);
      const comments = await this.refresh(stores.comments, now);
      return { updatedCount: skills + comments, skills, comments, refreshedAt: now };
    });

    logger().info(
      { updatedCount: result.updatedCount, skills: result.skills, comments: result.comments, durationMs: Date.now() - started },
      'Hot scores refreshed'
    );

    return result;
  }

  private async refresh(targets: VoteTargetStore, now: number): Promise<number> {
    const inputs = await targets.listHotScoreInputs();
    for (const input of inputs) {
      const hotScore = calculateHotScore(input.upvotes, input.downvotes, input.createdAt, now, this.gravity);
      await targets.updateHotScore(input.id, hotScore);
    }
    return inputs.length;
  }
}
