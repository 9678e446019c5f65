import { describe, expect, it } from 'vitest';

import { describeFiles, formatFileLines, formatFileMode } from '../file-display.js';

describe('file-display', () => {
  it('formats modes as four octal digits', () => {
    expect(formatFileMode(0o600)).toBe('0600');
    expect(formatFileMode(0o100644)).toBe('0644');
    expect(formatFileMode(0o7)).toBe('0007');
  });

  it('lists files relative to a base directory', () => {
    const files = [
      { path: '/out/TESTPOOL-pledge.base_addr', mode: 0o644 },
      { path: '/out/TESTPOOL-pledge.staking_skey', mode: 0o600 },
    ];

    expect(formatFileLines('/out', files)).toBe('0644  TESTPOOL-pledge.base_addr\n0600  TESTPOOL-pledge.staking_skey');
    expect(describeFiles(files)).toEqual([
      { path: '/out/TESTPOOL-pledge.base_addr', mode: '0644' },
      { path: '/out/TESTPOOL-pledge.staking_skey', mode: '0600' },
    ]);
  });
});
