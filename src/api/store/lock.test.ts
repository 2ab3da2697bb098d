import { describe, it, expect } from 'vitest';
import { ReadWriteLock } from './lock.ts';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('ReadWriteLock', () => {
  it('lets readers share the lock', async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    let observed = 0;

    const first = lock.read(async () => {
      await gate.promise;
    });
    await lock.read(() => {
      observed = lock.readers;
    });

    expect(observed).toBe(2);
    gate.resolve();
    await first;
    expect(lock.readers).toBe(0);
  });

  it('makes a writer wait for active readers', async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    const events: string[] = [];

    const reader = lock.read(async () => {
      events.push('read start');
      await gate.promise;
      events.push('read end');
    });
    const writer = lock.write(() => {
      events.push('write');
    });

    await tick();
    expect(events).toEqual(['read start']);
    expect(lock.writing).toBe(false);

    gate.resolve();
    await Promise.all([reader, writer]);
    expect(events).toEqual(['read start', 'read end', 'write']);
  });

  it('queues a late reader behind a waiting writer', async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.read(async () => {
      await gate.promise;
      events.push('first read');
    });
    const writer = lock.write(() => {
      events.push('write');
    });
    const late = lock.read(() => {
      events.push('late read');
    });

    await tick();
    expect(events).toEqual([]);

    gate.resolve();
    await Promise.all([first, writer, late]);
    expect(events).toEqual(['first read', 'write', 'late read']);
  });

  it('runs writers one at a time', async () => {
    const lock = new ReadWriteLock();
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      [1, 2, 3].map(() =>
        lock.write(async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await tick();
          active--;
        }),
      ),
    );

    expect(maxActive).toBe(1);
  });

  it('releases the lock when the callback throws', async () => {
    const lock = new ReadWriteLock();
    await expect(
      lock.write(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(lock.writing).toBe(false);
    await expect(lock.read(() => 'ok')).resolves.toBe('ok');
  });
});
