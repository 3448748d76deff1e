import { describe, it, expect } from 'vitest';
import { ProbeResult, Provider } from '../../../shared/types';
import { PROVIDERS, getProviderById } from '../../../shared/utils/ProviderUtils';
import { Benchmarker, median } from '../../../backend/src/features/probing/Benchmarker';
import { ProbeEngine } from '../../../backend/src/features/probing/ProbeEngine';
import { MockDnsTransport } from '../../mocks/MockDnsTransport';

const ok = (provider: Provider, latency: number): ProbeResult => ({
  providerId: provider.id,
  serverAddress: provider.primaryAddress,
  targetDomain: 'a.test',
  latency,
  resolvedAddress: '203.0.113.10',
  success: true
});

const timedOut = (provider: Provider): ProbeResult => ({
  providerId: provider.id,
  serverAddress: provider.primaryAddress,
  targetDomain: 'a.test',
  latency: 'timeout',
  resolvedAddress: null,
  success: false,
  failure: 'timeout'
});

const google = getProviderById('google');
const cloudflare = getProviderById('cloudflare');
const quad9 = getProviderById('quad9');
const adguard = getProviderById('adguard');
const cleanbrowsing = getProviderById('cleanbrowsing');

describe('median', () => {
  it('handles empty, odd and even inputs', () => {
    expect(median([])).toBeNull();
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });
});

describe('Benchmarker.rank', () => {
  const results: ProbeResult[] = [
    ok(google, 30), ok(google, 10), ok(google, 20),
    ok(cloudflare, 5), ok(cloudflare, 15), timedOut(cloudflare), timedOut(cloudflare),
    ok(quad9, 2), timedOut(quad9), timedOut(quad9), timedOut(quad9)
  ];

  it('orders by median latency and sinks unreliable providers', () => {
    const ranking = Benchmarker.rank([google, cloudflare, quad9], results, 0.5);

    expect(ranking.map(e => [e.provider.id, e.score, e.successRate, e.unreliable])).toEqual([
      ['cloudflare', 10, 0.5, false],
      ['google', 20, 1, false],
      ['quad9', 2, 0.25, true]
    ]);
    expect(ranking.map(e => e.samples)).toEqual([4, 3, 4]);
  });

  it('is deterministic regardless of result order', () => {
    const reversed = [...results].reverse();
    const a = Benchmarker.rank([quad9, google, cloudflare], results, 0.5).map(e => e.provider.id);
    const b = Benchmarker.rank([cloudflare, quad9, google], reversed, 0.5).map(e => e.provider.id);

    expect(a).toEqual(b);
  });

  it('breaks ties by provider id', () => {
    const tied = [ok(cleanbrowsing, 12), ok(adguard, 12)];
    expect(Benchmarker.rank([cleanbrowsing, adguard], tied, 0.5).map(e => e.provider.id)).toEqual(['adguard', 'cleanbrowsing']);
  });

  it('gives a provider with no successes a null score', () => {
    const [entry] = Benchmarker.rank([google], [timedOut(google)], 0.5);
    expect(entry).toMatchObject({ score: null, successRate: 0, unreliable: true });
  });
});

describe('Benchmarker.run', () => {
  it('probes every provider and picks a reliable winner', async () => {
    const transport = new MockDnsTransport({ '9.9.9.9': 'timeout', '149.112.112.112': 'timeout' }, 1);
    const benchmarker = new Benchmarker(new ProbeEngine(transport), { timeoutMs: 100, concurrency: 4 });

    const report = await benchmarker.run([...PROVIDERS], ['a.test'], 2);

    expect(report.ranking).toHaveLength(5);
    expect(report.ranking.every(e => e.samples === 4)).toBe(true);
    expect(report.ranking[4]).toMatchObject({ score: null, successRate: 0, unreliable: true });
    expect(report.ranking[4].provider.id).toBe('quad9');
    expect(report.winner?.unreliable).toBe(false);
    expect(report.winner?.provider.id).not.toBe('quad9');
  });

  it('reports no winner when everything times out', async () => {
    const behaviors = Object.fromEntries(
      PROVIDERS.flatMap(p => [p.primaryAddress, p.secondaryAddress ?? p.primaryAddress]).map(a => [a, 'timeout' as const])
    );
    const benchmarker = new Benchmarker(new ProbeEngine(new MockDnsTransport(behaviors, 1)));

    const report = await benchmarker.run([...PROVIDERS], ['a.test'], 1);

    expect(report.winner).toBeNull();
    expect(report.ranking.map(e => e.provider.id)).toEqual(['adguard', 'cleanbrowsing', 'cloudflare', 'google', 'quad9']);
  });
});
