import fs from 'fs-extra';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Logger } from '../../backend/src/utils/logger';
import { makeTempDir } from '../mocks/tmp';

describe('Logger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('logs');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('appends structured events as timestamp | action | json', async () => {
    const log = new Logger({ dir, console: false });
    log.event('SWITCH', { provider: 'google', dot: false });

    const lines = (await fs.readFile(path.join(dir, 'events.log'), 'utf8')).trimEnd().split('\n');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \| SWITCH \| \{"provider":"google","dot":false\}$/);
  });

  it('writes levelled messages and collapses immediate repeats', async () => {
    const log = new Logger({ dir, console: false });
    log.info('hello');
    log.info('hello');
    log.warn('careful');

    const lines = (await fs.readFile(path.join(dir, 'dnsswitch.log'), 'utf8')).trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\[\+\] DNSSwitch: .* - INFO: hello$/);
    expect(lines[1]).toMatch(/ - STABILITY: \(Previous message repeated 1 times\)$/);
    expect(lines[2]).toMatch(/ - WARNING: careful$/);
  });
});
