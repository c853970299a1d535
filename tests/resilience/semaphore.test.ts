import { describe, it, expect } from 'vitest';
import { Semaphore } from '../../src/resilience/index.js';

describe('Semaphore', () => {
  it('should hand out permits up to the limit', async () => {
    const semaphore = new Semaphore(2);

    await semaphore.acquire();
    expect(semaphore.available()).toBe(1);
    await semaphore.acquire();
    expect(semaphore.available()).toBe(0);
  });

  it('should wake waiters in order on release', async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    await semaphore.acquire();
    const first = semaphore.acquire().then(() => order.push('first'));
    const second = semaphore.acquire().then(() => order.push('second'));
    await Promise.resolve();
    expect(order).toEqual([]);

    semaphore.release();
    await first;
    semaphore.release();
    await second;

    expect(order).toEqual(['first', 'second']);
    expect(semaphore.available()).toBe(0);
  });

  it('should not exceed its permits on extra releases', () => {
    const semaphore = new Semaphore(1);

    semaphore.release();

    expect(semaphore.available()).toBe(1);
  });

  it('should run tasks one at a time with a single permit', async () => {
    const semaphore = new Semaphore(1);
    let active = 0;
    let maxActive = 0;

    const task = () =>
      semaphore.run(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise(resolve => setTimeout(resolve, 5));
        active--;
      });

    await Promise.all([task(), task(), task()]);

    expect(maxActive).toBe(1);
    expect(semaphore.available()).toBe(1);
  });

  it('should release the permit when the task throws', async () => {
    const semaphore = new Semaphore(1);

    await expect(semaphore.run(async () => {
      throw new Error('task failed');
    })).rejects.toThrow('task failed');

    expect(semaphore.available()).toBe(1);
  });

  it('should reject invalid permit counts', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore permits must be a positive integer, got 0');
  });
});
