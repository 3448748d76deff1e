import fs from 'fs-extra';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SystemdResolverService } from '../../../backend/src/features/system/ResolverService';
import { makeTempDir } from '../../mocks/tmp';

describe('SystemdResolverService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('resolved');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('reads a missing descriptor as empty', async () => {
    expect(await new SystemdResolverService(path.join(dir, 'resolved.conf')).readTransport()).toBe('');
  });

  it('does not rewrite or restart when the descriptor already matches', async () => {
    const file = path.join(dir, 'resolved.conf');
    await fs.writeFile(file, '[Resolve]\nDNSOverTLS=yes\n');
    const before = (await fs.stat(file)).mtimeMs;

    const changed = await new SystemdResolverService(file).applyTransport('[Resolve]\nDNSOverTLS=yes\n');

    expect(changed).toBe(false);
    expect((await fs.stat(file)).mtimeMs).toBe(before);
  });
});

describe('SystemdResolverService.flushCaches', () => {
  it('falls through to the nscd restart when the systemd tools fail', async () => {
    const commands: string[] = [];
    const service = new SystemdResolverService('/nonexistent/resolved.conf', async command => {
      commands.push(command);
      if (command !== 'service nscd restart') throw new Error(`${command}: not found`);
      return '';
    });

    await service.flushCaches();

    expect(commands).toEqual(['resolvectl flush-caches', 'systemd-resolve --flush-caches', 'service nscd restart']);
  });

  it('stops at the first command that succeeds', async () => {
    const commands: string[] = [];
    await new SystemdResolverService('/nonexistent/resolved.conf', async command => {
      commands.push(command);
      return '';
    }).flushCaches();

    expect(commands).toEqual(['resolvectl flush-caches']);
  });
});
