/**
 * Usage Service
 *
 * Records skill usage reports. Total usage per (agent, skill) gates and weights reviews.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { Logger } from 'pino';
import { getModuleLogger } from '../../observability/logger.js';
import { IdentityNotFoundError, SkillNotFoundError, ValidationError } from '../errors.js';
import type { ArenaUnitOfWork } from '../stores/index.js';
import type { IdentityResolver } from '../identity/resolver.js';
import { systemClock, type Clock, type UsageInput, type UsageRecord, type UsageResult } from '../types.js';

const logger = (): Logger => getModuleLogger('UsageService');

const UsageInputSchema = z.object({
  usageCount: z.number().int().min(0),
  totalTime: z.number().finite().min(0),
  avgResponseTime: z.number().finite().min(0).optional(),
  successRate: z.number().min(0).max(1).optional(),
});

export class UsageService {
  constructor(
    private readonly unitOfWork: ArenaUnitOfWork,
    private readonly identities: IdentityResolver,
    private readonly clock: Clock = systemClock
  ) {}

  async recordUsage(skillId: string, token: string, input: UsageInput): Promise<UsageResult> {
    const parsed = UsageInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid usage report', {
        issues: parsed.error.errors.map(e => ({ path: e.path.join('.'), message: e.message })),
      });
    }
    const usage = parsed.data;

    const identity = await this.identities.resolve(token);
    if (!identity) {
      throw new IdentityNotFoundError(token);
    }

    return this.unitOfWork.run(async stores => {
      if (!(await stores.skills.getById(skillId))) {
        throw new SkillNotFoundError(skillId);
      }

      const now = this.clock.now();
      const record: UsageRecord = {
        usageId: randomUUID(),
        skillId,
        agentId: identity.agentId,
        usageCount: usage.usageCount,
        totalTime: usage.totalTime,
        avgResponseTime:
          usage.avgResponseTime ?? (usage.usageCount > 0 ? usage.totalTime / usage.usageCount : 0),
        successRate: usage.successRate ?? 1,
        createdAt: now,
      };

      await stores.usage.insert(record);
      await stores.skills.addUsage(skillId, usage.usageCount, usage.totalTime, now);
      await stores.agents.touch(identity.agentId, now);

      const skill = await stores.skills.getById(skillId);
      if (!skill) {
        throw new SkillNotFoundError(skillId);
      }

      logger().debug({ skillId, agentId: identity.agentId, usageCount: usage.usageCount }, 'Usage recorded');

      return {
        usageId: record.usageId,
        usageCount: skill.usageCount,
        totalUsageTime: skill.totalUsageTime,
        avgResponseTime: skill.avgResponseTime,
      };
    });
  }
}
