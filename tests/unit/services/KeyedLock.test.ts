import { describe, expect, it } from 'vitest';
import { KeyedLock } from '../../../src/services/KeyedLock.js';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs work for the same key one call at a time', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run('user-1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = lock.run('user-1', async () => {
      events.push('second:start');
      return 2;
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(events).toEqual(['first:start']);
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();

    const blocked = lock.run('user-1', () => gate.promise);
    const other = await lock.run('user-2', async () => 'done');

    expect(other).toBe('done');
    gate.resolve();
    await blocked;
  });

  it('releases the key when the work throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('user-1', async () => {
        throw new Error('refresh failed');
      })
    ).rejects.toThrow('refresh failed');

    expect(await lock.run('user-1', async () => 'next')).toBe('next');
  });
});
