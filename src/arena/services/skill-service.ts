/**
 * Skill Service
 *
 * Publishes skills, deduplicating by content hash. Re-uploading identical
 * content credits the original skill with an upvote from the new uploader.
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import type { Logger } from 'pino';
import { getModuleLogger } from '../../observability/logger.js';
import { IdentityNotFoundError, ValidationError, VersionConflictError } from '../errors.js';
import type { ArenaStores, ArenaUnitOfWork } from '../stores/index.js';
import type { IdentityResolver } from '../identity/resolver.js';
import {
  SKILL_VISIBILITIES,
  systemClock,
  type Clock,
  type Identity,
  type PlatformStats,
  type PublishResult,
  type PublishSkillInput,
  type Skill,
} from '../types.js';
import { roundTo } from './reputation.js';
import { applyVote } from './vote-service.js';

const logger = (): Logger => getModuleLogger('SkillService');

const PublishSkillSchema = z.object({
  name: z
    .string()
    .min(1)
    .max(64)
    .regex(/^[a-zA-Z0-9][a-zA-Z0-9._-]*$/, 'Name may only contain letters, digits, ".", "_" and "-"'),
  version: z.string().min(1).max(32),
  description: z.string().max(2000).default(''),
  contentHash: z
    .string()
    .regex(/^[a-f0-9]{64}$/, 'Content hash must be a lowercase SHA-256 hex digest'),
  community: z.string().min(1).max(64).default('general'),
  categories: z.array(z.string().min(1).max(64)).max(10).default([]),
  visibility: z.enum(SKILL_VISIBILITIES).default('public'),
});

type ParsedSkillInput = z.infer<typeof PublishSkillSchema>;

/**
 * SHA-256 of a skill bundle, as lowercase hex
 */
export function computeContentHash(content: Buffer | Uint8Array | string): string {
  return createHash('sha256').update(content).digest('hex');
}

export function buildSkillId(name: string, contentHash: string): string {
  return `skill-${name}-${contentHash.slice(0, 8)}`;
}

export class SkillService {
  constructor(
    private readonly unitOfWork: ArenaUnitOfWork,
    private readonly identities: IdentityResolver,
    private readonly clock: Clock = systemClock
  ) {}

  async publishSkill(token: string, input: PublishSkillInput): Promise<PublishResult> {
    const parsed = PublishSkillSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid skill', {
        issues: parsed.error.errors.map(e => ({ path: e.path.join('.'), message: e.message })),
      });
    }
    const data = parsed.data;

    const identity = await this.identities.resolve(token);
    if (!identity) {
      throw new IdentityNotFoundError(token);
    }

    return this.unitOfWork.run(async stores => {
      const now = this.clock.now();

      const existing = await stores.skills.getByContentHash(data.contentHash);
      if (existing) {
        return this.registerDuplicate(stores, existing, identity, now);
      }

      const sameVersion = await stores.skills.getByNameAndVersion(data.name, data.version);
      if (sameVersion) {
        throw new VersionConflictError(data.name, data.version, sameVersion.skillId);
      }

      const isNewVersion = (await stores.skills.countVersions(data.name)) > 0;
      const skill = this.buildSkill(data, identity, now);

      await stores.skills.insert(skill);
      await stores.skills.addUploader(skill.skillId, identity.agentId, now);

      logger().info({ skillId: skill.skillId, uploaderId: identity.agentId, isNewVersion }, 'Skill published');

      return {
        status: 'uploaded',
        skillId: skill.skillId,
        skill,
        isNewVersion,
        newUploader: true,
      };
    });
  }

  async getSkill(skillId: string): Promise<Skill | null> {
    return this.unitOfWork.read().skills.getById(skillId);
  }

  /**
   * Public and unlisted versions of a skill name, newest first
   */
  async listSkillVersions(name: string): Promise<Skill[]> {
    return this.unitOfWork.read().skills.listByName(name);
  }

  async getLatestSkillVersion(name: string): Promise<Skill | null> {
    const [latest] = await this.listSkillVersions(name);
    return latest ?? null;
  }

  async getPlatformStats(): Promise<PlatformStats> {
    const totals = await this.unitOfWork.read().skills.totals();
    return {
      ...totals,
      averageRating: roundTo(totals.averageRating, 2),
      generatedAt: this.clock.now(),
    };
  }

  private async registerDuplicate(
    stores: ArenaStores,
    existing: Skill,
    identity: Identity,
    now: number
  ): Promise<PublishResult> {
    const newUploader = await stores.skills.addUploader(existing.skillId, identity.agentId, now);

    if (newUploader) {
      await stores.skills.incrementUploaderCount(existing.skillId, now);
      const applied = await applyVote(stores, 'skill', existing.skillId, identity.agentId, 'upvote', now);
      logger().info(
        { skillId: existing.skillId, uploaderId: identity.agentId, voteOutcome: applied.transition.outcome },
        'Duplicate upload credited to existing skill'
      );
    }

    const skill = (await stores.skills.getById(existing.skillId)) ?? existing;

    return {
      status: 'duplicate',
      skillId: existing.skillId,
      skill,
      isNewVersion: false,
      newUploader,
    };
  }

  private buildSkill(data: ParsedSkillInput, identity: Identity, now: number): Skill {
    return {
      skillId: buildSkillId(data.name, data.contentHash),
      name: data.name,
      version: data.version,
      description: data.description,
      contentHash: data.contentHash,
      community: data.community,
      categories: data.categories,
      visibility: data.visibility,
      uploaderId: identity.agentId,
      uploaderCount: 1,
      upvotes: 0,
      downvotes: 0,
      voteScore: 0,
      hotScore: 0,
      rating: 0,
      reviewsCount: 0,
      usageCount: 0,
      totalUsageTime: 0,
      avgResponseTime: 0,
      commentsCount: 0,
      downloadsCount: 0,
      createdAt: now,
      updatedAt: now,
    };
  }
}
