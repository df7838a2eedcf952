import { describe, it, expect } from 'vitest';
import { Mutex } from '../src/consciousness/mutex';

const nextMacrotask = () => new Promise<void>(resolve => setTimeout(resolve, 0));

describe('Mutex', () => {
  it('should grant the lock immediately when free', async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    expect(mutex.isLocked()).toBe(true);
    release();
    expect(mutex.isLocked()).toBe(false);
  });

  it('should hand the lock to waiters in arrival order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const first = await mutex.acquire();
    const waiters = ['a', 'b', 'c'].map(name =>
      mutex.acquire().then(release => {
        order.push(name);
        release();
      })
    );
    expect(mutex.pending).toBe(3);

    first();
    await Promise.all(waiters);
    expect(order).toEqual(['a', 'b', 'c']);
    expect(mutex.isLocked()).toBe(false);
  });

  it('should never interleave two exclusive sections', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const section = (name: string) => mutex.runExclusive(async () => {
      events.push(`${name}:start`);
      await nextMacrotask();
      events.push(`${name}:end`);
    });

    await Promise.all([section('life'), section('input'), section('life2')]);
    expect(events).toEqual([
      'life:start', 'life:end',
      'input:start', 'input:end',
      'life2:start', 'life2:end',
    ]);
  });

  it('should release the lock when the section throws', async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(() => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(mutex.isLocked()).toBe(false);
    await expect(mutex.runExclusive(() => 7)).resolves.toBe(7);
  });

  it('should ignore a second call to the same release', async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    const waiting = mutex.acquire();

    release();
    release();

    const second = await waiting;
    expect(mutex.isLocked()).toBe(true);
    second();
    expect(mutex.isLocked()).toBe(false);
  });
});
