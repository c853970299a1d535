/**
 * Identity Resolution
 *
 * Maps a caller token (a DID) to the identity votes, reviews and uploads are
 * attributed to
 */

import { createHash, randomUUID } from 'crypto';
import { z } from 'zod';
import { DatabaseError, type Queryable } from '../../persistence/database.js';
import type { Logger } from 'pino';
import { getModuleLogger } from '../../observability/logger.js';
import { ValidationError } from '../errors.js';
import { DatabaseAgentStore, type AgentStore } from '../stores/agent-store.js';
import { systemClock, type Agent, type Clock, type Identity } from '../types.js';

const logger = (): Logger => getModuleLogger('IdentityResolver');

// =============================================================================
// Resolver Interface
// =============================================================================

export interface IdentityResolver {
  /** Resolve a token to an identity, or null when no agent matches */
  resolve(token: string): Promise<Identity | null>;
}

export interface RegisterAgentInput {
  did: string;
  username: string;
  displayName?: string;
  bio?: string;
}

const RegisterAgentSchema = z.object({
  did: z.string().regex(/^did:[a-z0-9]+:.+$/i, 'DID must look like did:<method>:<id>'),
  username: z.string().trim().min(1).max(64),
  displayName: z.string().trim().min(1).max(128).optional(),
  bio: z.string().max(2000).optional(),
});

/**
 * Derive a DID from an agent's public key
 */
export function generateDid(publicKey: string): string {
  const digest = createHash('sha256').update(publicKey).digest('hex');
  return `did:arena:${digest.slice(0, 32)}`;
}

function toIdentity(agent: Agent): Identity {
  return {
    agentId: agent.agentId,
    did: agent.did,
    username: agent.username,
    displayName: agent.displayName,
  };
}

function parseRegistration(input: RegisterAgentInput): RegisterAgentInput {
  const parsed = RegisterAgentSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid agent registration', {
      issues: parsed.error.errors.map(e => ({ path: e.path.join('.'), message: e.message })),
    });
  }
  return parsed.data;
}

// =============================================================================
// Database Implementation
// =============================================================================

export class DatabaseIdentityResolver implements IdentityResolver {
  private readonly agents: AgentStore;

  constructor(
    db: Queryable,
    private readonly clock: Clock = systemClock
  ) {
    this.agents = new DatabaseAgentStore(db);
  }

  async resolve(token: string): Promise<Identity | null> {
    const agent = await this.agents.getByDid(token);
    return agent ? toIdentity(agent) : null;
  }

  /**
   * Register an agent. Registering a DID twice returns the existing agent.
   */
  async registerAgent(input: RegisterAgentInput): Promise<Agent> {
    const data = parseRegistration(input);

    const existing = await this.agents.getByDid(data.did);
    if (existing) {
      return existing;
    }

    const now = this.clock.now();
    const agent: Agent = {
      agentId: randomUUID(),
      did: data.did,
      username: data.username,
      displayName: data.displayName ?? data.username,
      bio: data.bio ?? null,
      createdAt: now,
      lastActiveAt: now,
    };

    try {
      await this.agents.insert(agent);
    } catch (error) {
      // Lost a race with a concurrent registration of the same DID
      const registered = error instanceof DatabaseError && error.uniqueViolation
        ? await this.agents.getByDid(data.did)
        : null;
      if (registered) {
        return registered;
      }
      throw error;
    }

    logger().info({ agentId: agent.agentId, did: agent.did }, 'Agent registered');
    return agent;
  }
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

export class InMemoryIdentityResolver implements IdentityResolver {
  private readonly identities = new Map<string, Identity>();

  constructor(identities: Identity[] = []) {
    for (const identity of identities) {
      this.add(identity);
    }
  }

  add(identity: Identity): void {
    this.identities.set(identity.did, identity);
  }

  remove(did: string): boolean {
    return this.identities.delete(did);
  }

  async resolve(token: string): Promise<Identity | null> {
    return this.identities.get(token) ?? null;
  }
}
