/**
 * Download Service
 *
 * Gates skill downloads by visibility and counts the ones that go through
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { getModuleLogger } from '../../observability/logger.js';
import { DownloadForbiddenError, IdentityNotFoundError, SkillNotFoundError } from '../errors.js';
import type { ArenaStores, ArenaUnitOfWork } from '../stores/index.js';
import type { IdentityResolver } from '../identity/resolver.js';
import {
  systemClock,
  type Clock,
  type DownloadPermission,
  type DownloadRecord,
  type DownloadResult,
  type Identity,
  type Skill,
} from '../types.js';

const logger = (): Logger => getModuleLogger('DownloadService');

async function resolvePermission(stores: ArenaStores, skill: Skill, agentId: string): Promise<DownloadPermission> {
  if (skill.visibility === 'public' || skill.visibility === 'unlisted') {
    return { canDownload: true, reason: skill.visibility };
  }
  if (await stores.skills.hasUploader(skill.skillId, agentId)) {
    return { canDownload: true, reason: 'uploader' };
  }
  return { canDownload: false, reason: 'private' };
}

export class DownloadService {
  constructor(
    private readonly unitOfWork: ArenaUnitOfWork,
    private readonly identities: IdentityResolver,
    private readonly clock: Clock = systemClock
  ) {}

  async checkDownloadPermission(skillId: string, token: string): Promise<DownloadPermission> {
    const identity = await this.requireIdentity(token);
    const stores = this.unitOfWork.read();

    const skill = await stores.skills.getById(skillId);
    if (!skill) {
      throw new SkillNotFoundError(skillId);
    }
    return resolvePermission(stores, skill, identity.agentId);
  }

  async recordDownload(skillId: string, token: string): Promise<DownloadResult> {
    const identity = await this.requireIdentity(token);

    return this.unitOfWork.run(async stores => {
      const skill = await stores.skills.getById(skillId);
      if (!skill) {
        throw new SkillNotFoundError(skillId);
      }

      const permission = await resolvePermission(stores, skill, identity.agentId);
      if (!permission.canDownload) {
        logger().debug({ skillId, agentId: identity.agentId }, 'Download refused');
        throw new DownloadForbiddenError(skillId, identity.agentId);
      }

      const now = this.clock.now();
      const record: DownloadRecord = {
        downloadId: randomUUID(),
        skillId,
        agentId: identity.agentId,
        createdAt: now,
      };

      await stores.downloads.insert(record);
      await stores.skills.incrementDownloadsCount(skillId, now);
      await stores.agents.touch(identity.agentId, now);

      logger().debug({ skillId, agentId: identity.agentId, reason: permission.reason }, 'Download recorded');

      return {
        downloadId: record.downloadId,
        skillId,
        reason: permission.reason,
        downloadsCount: skill.downloadsCount + 1,
      };
    });
  }

  private async requireIdentity(token: string): Promise<Identity> {
    const identity = await this.identities.resolve(token);
    if (!identity) {
      throw new IdentityNotFoundError(token);
    }
    return identity;
  }
}
