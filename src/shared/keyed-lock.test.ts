import { describe, expect, it } from 'vitest';
import { KeyedLock } from './keyed-lock';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs callers for one key one at a time, in order', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive('k', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.runExclusive('k', async () => {
      events.push('second');
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.size).toBe(0);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();

    const held = lock.runExclusive('a', () => gate.promise);
    const other = await lock.runExclusive('b', async () => 'done');

    expect(other).toBe('done');
    gate.resolve();
    await held;
  });

  it('releases the key when the callback throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.runExclusive('k', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(await lock.runExclusive('k', async () => 42)).toBe(42);
    expect(lock.size).toBe(0);
  });
});
