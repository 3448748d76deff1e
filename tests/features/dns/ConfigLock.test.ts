import fs from 'fs-extra';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ChattrLock, LockFileLock } from '../../../backend/src/features/dns/ConfigLock';
import { SafetyService } from '../../../backend/src/features/system/SafetyService';
import { makeTempDir } from '../../mocks/tmp';

describe('LockFileLock', () => {
  let dir: string;
  let live: string;
  const root = new SafetyService({ privileged: true, platform: 'linux' });

  beforeEach(async () => {
    dir = await makeTempDir('lock');
    live = path.join(dir, 'resolv.conf');
    await fs.writeFile(live, 'nameserver 1.1.1.1\n');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('acquires and releases idempotently', async () => {
    const lock = new LockFileLock(live, root);

    await lock.acquire();
    await lock.acquire();
    expect(await lock.isLocked()).toBe(true);
    expect(await fs.readFile(`${live}.dnsswitch.lock`, 'utf8')).toBe(`${process.pid}\n`);

    await lock.release();
    await lock.release();
    expect(await lock.isLocked()).toBe(false);
  });

  it('refuses to run without privileges', async () => {
    const lock = new LockFileLock(live, new SafetyService({ privileged: false, platform: 'linux' }));

    await expect(lock.acquire()).rejects.toMatchObject({ errorCode: 'E_PERMISSION_DENIED', exitCode: 77 });
    await expect(lock.release()).rejects.toMatchObject({ errorCode: 'E_PERMISSION_DENIED' });
    expect(await lock.isLocked()).toBe(false);
  });
});

describe('ChattrLock', () => {
  let dir: string;
  let live: string;
  const root = new SafetyService({ privileged: true, platform: 'linux' });

  beforeEach(async () => {
    dir = await makeTempDir('chattr');
    live = path.join(dir, 'resolv.conf');
    await fs.writeFile(live, 'nameserver 1.1.1.1\n');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  const runner = (lsattr: () => Promise<string>) => {
    const commands: string[] = [];
    const run = async (command: string) => {
      commands.push(command);
      return command.startsWith('lsattr') ? lsattr() : '';
    };
    return { commands, run };
  };

  it('reads the immutable flag from the lsattr attribute column', async () => {
    const { run } = runner(async () => `----i---------e----- ${live}\n`);

    expect(await new ChattrLock(live, root, run).isLocked()).toBe(true);
  });

  it('clears the flag only when it is set', async () => {
    const { commands, run } = runner(async () => `--------------e----- ${live}\n`);
    const lock = new ChattrLock(live, root, run);

    await lock.release();
    await lock.acquire();

    expect(commands).toEqual([
      `lsattr -d ${JSON.stringify(live)}`,
      `lsattr -d ${JSON.stringify(live)}`,
      `chattr +i ${JSON.stringify(live)}`
    ]);
  });

  it('fails instead of reporting unlocked when lsattr fails', async () => {
    const { commands, run } = runner(async () => {
      throw Object.assign(new Error('Command failed: lsattr'), { stderr: 'lsattr: Input/output error While reading flags' });
    });
    const lock = new ChattrLock(live, root, run);

    await expect(lock.isLocked()).rejects.toMatchObject({ errorCode: 'E_IO_FAILURE', details: { path: live } });
    await expect(lock.release()).rejects.toMatchObject({ errorCode: 'E_IO_FAILURE' });
    expect(commands.some(c => c.startsWith('chattr'))).toBe(false);
  });

  it('maps a refused lsattr to E_PERMISSION_DENIED', async () => {
    const { run } = runner(async () => {
      throw Object.assign(new Error('Command failed: lsattr'), { stderr: 'lsattr: Permission denied While reading flags' });
    });

    await expect(new ChattrLock(live, root, run).isLocked()).rejects.toMatchObject({ errorCode: 'E_PERMISSION_DENIED' });
  });

  it('treats a filesystem without attribute support as unlocked', async () => {
    const { run } = runner(async () => {
      throw Object.assign(new Error('Command failed: lsattr'), { stderr: 'lsattr: Inappropriate ioctl for device While reading flags' });
    });

    expect(await new ChattrLock(live, root, run).isLocked()).toBe(false);
  });
});
