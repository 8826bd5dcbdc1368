import { setTimeout as sleep } from 'node:timers/promises';
import { describe, expect, it } from 'vitest';
import { KeyedMutex } from './KeyedMutex';

describe('KeyedMutex', () => {
  it('runs tasks for one key in call order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string, delayMs: number) =>
      mutex.runExclusive('meeting', async () => {
        events.push(`start ${name}`);
        await sleep(delayMs);
        events.push(`end ${name}`);
        return name;
      });

    const results = await Promise.all([task('a', 20), task('b', 0)]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b']);
    expect(mutex.isLocked('meeting')).toBe(false);
  });

  it('releases the key when a task fails', async () => {
    const mutex = new KeyedMutex();

    await expect(mutex.runExclusive('meeting', async () => Promise.reject(new Error('boom')))).rejects.toThrow(
      'boom'
    );
    expect(await mutex.runExclusive('meeting', async () => 'next')).toBe('next');
  });
});
