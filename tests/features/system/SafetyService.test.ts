import { describe, it, expect } from 'vitest';
import { SafetyService } from '../../../backend/src/features/system/SafetyService';

describe('SafetyService', () => {
  it('lets privileged callers through', () => {
    const safety = new SafetyService({ privileged: true, platform: 'linux' });
    expect(() => safety.assertPrivileged('switch')).not.toThrow();
  });

  it('rejects unprivileged callers with a permission error', () => {
    const safety = new SafetyService({ privileged: false, platform: 'darwin' });

    expect(() => safety.assertPrivileged('reset')).toThrow("'reset' requires root privileges (run with sudo).");
    expect(safety.platform).toBe('darwin');
  });
});
