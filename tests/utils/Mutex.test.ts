import { describe, it, expect } from 'vitest';
import { Mutex } from '../../backend/src/utils/Mutex';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('Mutex', () => {
  it('runs sections one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const trace: string[] = [];

    const section = (name: string, ms: number) => mutex.runExclusive(async () => {
      trace.push(`${name}:start`);
      await delay(ms);
      trace.push(`${name}:end`);
      return name;
    });

    const results = await Promise.all([section('a', 10), section('b', 1), section('c', 1)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(trace).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('releases after a rejected section', async () => {
    const mutex = new Mutex();
    await expect(mutex.runExclusive(async () => { throw new Error('boom'); })).rejects.toThrow('boom');

    expect(mutex.isLocked).toBe(false);
    expect(await mutex.runExclusive(async () => 'next')).toBe('next');
  });
});
