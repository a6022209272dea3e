import { describe, expect, it } from 'vitest';
import { ServiceLocks } from '../service-locks.js';

const tick = () => new Promise((resolve) => setTimeout(resolve, 5));

describe('ServiceLocks', () => {
  it('runs work for the same key one at a time, in order', async () => {
    const locks = new ServiceLocks();
    const events: string[] = [];

    const job = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([locks.run('quiz-bot', job('a')), locks.run('quiz-bot', job('b'))]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('lets different keys overlap', async () => {
    const locks = new ServiceLocks();
    const events: string[] = [];

    await Promise.all([
      locks.run('a', async () => {
        events.push('a:start');
        await tick();
        events.push('a:end');
      }),
      locks.run('b', async () => {
        events.push('b:start');
        await tick();
        events.push('b:end');
      }),
    ]);

    expect(events.slice(0, 2)).toEqual(['a:start', 'b:start']);
  });

  it('releases the key when work fails', async () => {
    const locks = new ServiceLocks();

    await expect(
      locks.run('quiz-bot', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(locks.run('quiz-bot', async () => 'next')).resolves.toBe('next');
  });
});
