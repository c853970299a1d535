import { ArenaManager, type ArenaManagerOptions } from '../../src/arena/index.js';
import { computeContentHash } from '../../src/arena/services/skill-service.js';
import type { Agent, Clock, PublishSkillInput } from '../../src/arena/types.js';
import type { ArenaConfigInput } from '../../src/config/schema.js';

export const HOUR = 3_600_000;
export const START = Date.UTC(2024, 0, 1);

/**
 * Clock the test advances by hand
 */
export class ManualClock implements Clock {
  constructor(private current: number = START) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(at: number): void {
    this.current = at;
  }
}

export interface TestArena {
  arena: ArenaManager;
  clock: ManualClock;
}

export async function createTestArena(
  config: ArenaConfigInput = {},
  options: Omit<ArenaManagerOptions, 'config' | 'clock'> = {}
): Promise<TestArena> {
  const clock = new ManualClock();
  const arena = new ArenaManager({
    ...options,
    clock,
    config: {
      env: 'test',
      ...config,
      database: { filename: ':memory:', ...config.database },
    },
  });
  await arena.initialize();
  return { arena, clock };
}

export async function registerAgents(arena: ArenaManager, ...names: string[]): Promise<Agent[]> {
  const agents: Agent[] = [];
  for (const name of names) {
    agents.push(await arena.registerAgent({ did: `did:arena:${name}`, username: name }));
  }
  return agents;
}

export function skillInput(name: string, overrides: Partial<PublishSkillInput> = {}): PublishSkillInput {
  return {
    name,
    version: '1.0.0',
    description: `${name} skill`,
    contentHash: computeContentHash(`${name}@${overrides.version ?? '1.0.0'}`),
    ...overrides,
  };
}

/**
 * Publish a skill as `did` and return its id
 */
export async function publish(
  arena: ArenaManager,
  did: string,
  name: string,
  overrides: Partial<PublishSkillInput> = {}
): Promise<string> {
  const result = await arena.publishSkill(did, skillInput(name, overrides));
  return result.skillId;
}
