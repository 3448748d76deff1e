import fs from 'fs-extra';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildProgram } from '../backend/src/cli';
import { Container, createContainer } from '../backend/src/container';
import { DEFAULT_TRANSPORT } from '../backend/src/features/dns/ConfigRenderer';
import { DEFAULT_SETTINGS } from '../backend/src/features/system/SettingsService';
import { MockConfigLock } from './mocks/MockConfigLock';
import { MockDnsTransport } from './mocks/MockDnsTransport';
import { MockResolverPath } from './mocks/MockResolverPath';
import { MockResolverService } from './mocks/MockResolverService';
import { makeTempDir } from './mocks/tmp';

describe('dnsswitch CLI', () => {
  let dir: string;
  let container: Container;
  let lines: string[];
  let resolverPath: MockResolverPath;

  const run = (...args: string[]) => {
    const program = buildProgram(container, line => { lines.push(line); });
    program.exitOverride();
    return program.parseAsync(['node', 'dnsswitch', ...args]);
  };

  beforeEach(async () => {
    dir = await makeTempDir('cli');
    const resolvConf = path.join(dir, 'resolv.conf');
    await fs.writeFile(resolvConf, 'nameserver 192.168.1.1\n');

    const resolver = new MockResolverService();
    resolver.transport = DEFAULT_TRANSPORT;
    resolverPath = new MockResolverPath('1.1.1.1');

    container = createContainer({
      paths: {
        RESOLV_CONF: resolvConf,
        RESOLVED_CONF: path.join(dir, 'resolved.conf'),
        DATA_DIR: dir,
        STATE_FILE: path.join(dir, 'state.json'),
        SETTINGS_FILE: path.join(dir, 'settings.json'),
        BACKUPS_DIR: path.join(dir, 'backups'),
        TRANSPORT_BACKUPS_DIR: path.join(dir, 'backups-resolved'),
        LOCK_FILE: path.join(dir, 'dnsswitch.lock')
      },
      context: { privileged: true, platform: 'linux' },
      settings: { ...DEFAULT_SETTINGS, leakDomains: ['a.test'], benchmarkDomains: ['a.test'], samplesPerDomain: 1 },
      lock: new MockConfigLock(),
      resolver,
      transport: new MockDnsTransport(),
      resolverPath
    });
    lines = [];
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('lists providers in menu order', async () => {
    await run('--list');

    expect(lines).toEqual([
      '1. Google (8.8.8.8, 8.8.4.4)  [DoT]',
      '2. Cloudflare (1.1.1.1, 1.0.0.1)  [DoT]',
      '3. Quad9 (Security) (9.9.9.9, 149.112.112.112)  [DoT]',
      '4. AdGuard (No Ads) (94.140.14.14, 94.140.15.15)  [DoT]',
      '5. CleanBrowsing (Family) (185.228.168.9, 185.228.169.9)  [DoT]'
    ]);
  });

  it('switches by menu index and runs a leak check', async () => {
    await run('2');

    expect((await container.state.read()).activeProviderId).toBe('cloudflare');
    expect(lines.some(l => l.includes('No leak: resolver matches 1.1.1.1'))).toBe(true);
  });

  it('rejects an unknown provider', async () => {
    await expect(run('opendns')).rejects.toMatchObject({ errorCode: 'E_UNKNOWN_PROVIDER' });
  });

  it('reports a leak from --test', async () => {
    await run('cloudflare');
    resolverPath.server = '8.8.8.8';
    lines = [];

    await run('--test');

    expect(lines.some(l => l.includes('DNS LEAK: expected 1.1.1.1, answered by 8.8.8.8'))).toBe(true);
  });

  it('prints backups after a switch', async () => {
    await run('google');
    lines = [];

    await run('--backups');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^backup-\d+  \S+Z  pre-switch  23 bytes$/);
  });

  it('prints the configured nameservers in --status', async () => {
    await run('--status');

    expect(lines).toContain('Nameservers     : 192.168.1.1');
    expect(lines).toContain('Last switch     : never');
  });

  it('ranks providers in --benchmark', async () => {
    await run('--benchmark');

    expect(lines).toHaveLength(7);
    expect(lines.slice(1, 6).every(l => l.includes('100% ok'))).toBe(true);
  });
});
