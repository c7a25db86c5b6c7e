import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../session/lock.js';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('KeyedMutex', () => {
  it('should run work on the same key one at a time', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const slow = mutex.run('k', async () => {
      events.push('a:start');
      await tick();
      await tick();
      events.push('a:end');
    });
    const fast = mutex.run('k', async () => {
      events.push('b:start');
      events.push('b:end');
    });

    await Promise.all([slow, fast]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should not make different keys wait for each other', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const first = mutex.run('k1', async () => {
      events.push('k1:start');
      await tick();
      events.push('k1:end');
    });
    const second = mutex.run('k2', async () => {
      events.push('k2:start');
    });

    await Promise.all([first, second]);

    expect(events.indexOf('k2:start')).toBeLessThan(events.indexOf('k1:end'));
  });

  it('should release the key when the work throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.run('k', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.run('k', async () => 'next')).resolves.toBe('next');
    expect(mutex.size).toBe(0);
  });

  it('should keep read-modify-write sequences consistent', async () => {
    const mutex = new KeyedMutex();
    let counter = 0;

    await Promise.all(
      Array.from({ length: 20 }, () =>
        mutex.run('counter', async () => {
          const current = counter;
          await tick();
          counter = current + 1;
        })
      )
    );

    expect(counter).toBe(20);
  });
});
