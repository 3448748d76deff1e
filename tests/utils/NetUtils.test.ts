import { describe, it, expect } from 'vitest';
import { NetUtils, ProbeTimeoutError } from '../../backend/src/utils/NetUtils';

const errno = (code: string) => Object.assign(new Error(code), { code });

describe('NetUtils.classifyDnsError', () => {
  it.each([
    ['ETIMEOUT', 'timeout'],
    ['ECANCELLED', 'timeout'],
    ['EREFUSED', 'refused'],
    ['ECONNREFUSED', 'refused'],
    ['ENOTFOUND', 'not_found'],
    ['ENODATA', 'not_found'],
    ['ESERVFAIL', 'unreachable']
  ])('maps %s to %s', (code, failure) => {
    expect(NetUtils.classifyDnsError(errno(code))).toBe(failure);
  });

  it('treats its own timeout error as a timeout', () => {
    expect(NetUtils.classifyDnsError(new ProbeTimeoutError(50))).toBe('timeout');
  });
});

describe('NetUtils.withTimeout', () => {
  it('passes through a fast result', async () => {
    expect(await NetUtils.withTimeout(Promise.resolve(7), 100)).toBe(7);
  });

  it('rejects a slow one and calls onTimeout', async () => {
    let cancelled = false;
    const slow = new Promise<number>(resolve => setTimeout(() => resolve(1), 200));

    await expect(NetUtils.withTimeout(slow, 10, () => { cancelled = true; })).rejects.toBeInstanceOf(ProbeTimeoutError);
    expect(cancelled).toBe(true);
  });
});
