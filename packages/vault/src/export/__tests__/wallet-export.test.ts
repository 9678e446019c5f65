import { existsSync, readdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import tmp from 'tmp';
import { describe, expect, it } from 'vitest';

import { createStandardWallet, TEST_ITERATIONS, TEST_PASSWORD } from '../../__tests__/wallet-fixture.js';
import { decryptBundle, exportFileSet, exportWallet } from '../wallet-export.js';

function modeOf(path: string): number {
  return statSync(path).mode & 0o777;
}

function exportFixture() {
  const fixture = createStandardWallet();
  const exported = exportWallet({
    walletDir: fixture.walletDir,
    ticker: 'TESTPOOL',
    purpose: 'pledge',
    password: TEST_PASSWORD,
    iterations: TEST_ITERATIONS,
  })._unsafeUnwrap();
  return { fixture, exported };
}

describe('exportFileSet', () => {
  it('leaves the recovery phrase out', () => {
    expect(exportFileSet('TESTPOOL', 'rewards', 'standard')).toEqual([
      'TESTPOOL-rewards.base_addr',
      'TESTPOOL-rewards.reward_addr',
      'TESTPOOL-rewards.staking_skey',
      'TESTPOOL-rewards.staking_vkey',
    ]);
  });

  it('adds the key envelopes in complete mode', () => {
    const names = exportFileSet('TESTPOOL', 'pledge', 'complete');

    expect(names).toHaveLength(4 + 25);
    expect(names).toContain('delegation.cert');
    expect(names.some((name) => name.endsWith('.mnemonic.txt'))).toBe(false);
  });
});

describe('exportWallet', () => {
  it('writes the bundle and key file into the exports directory', () => {
    const { fixture, exported } = exportFixture();
    const exportsDir = join(fixture.rootDir, '.CSPO_TESTPOOL', 'exports');

    expect(exported.bundlePath).toBe(join(exportsDir, 'TESTPOOL-pledge-export.bundle.enc'));
    expect(exported.keyPath).toBe(join(exportsDir, 'TESTPOOL-pledge-export.key'));
    expect(exported.mode).toBe('standard');
    expect(modeOf(exported.bundlePath)).toBe(0o600);
    expect(modeOf(exported.keyPath)).toBe(0o600);
    expect(readdirSync(exportsDir).sort()).toEqual(['TESTPOOL-pledge-export.bundle.enc', 'TESTPOOL-pledge-export.key']);

    const bundle = readFileSync(exported.bundlePath);
    expect(bundle.subarray(0, 5)).toEqual(Buffer.from([0x53, 0x50, 0x4f, 0x42, 0x01]));
    expect(bundle.includes(Buffer.from('sim_sk1placeholdersigning'))).toBe(false);

    const keyFile: unknown = JSON.parse(readFileSync(exported.keyPath, 'utf8'));
    expect(keyFile).toMatchObject({ version: 1, kdf: 'pbkdf2-sha256', iterations: TEST_ITERATIONS });
  });

  it('names every missing source file', () => {
    const fixture = createStandardWallet();

    const result = exportWallet({
      walletDir: fixture.walletDir,
      ticker: 'TESTPOOL',
      purpose: 'rewards',
      password: TEST_PASSWORD,
      iterations: TEST_ITERATIONS,
    });

    expect(result._unsafeUnwrapErr().code).toBe('MISSING_SOURCE_FILES');
    expect(result._unsafeUnwrapErr().details?.['missing']).toEqual([
      'TESTPOOL-rewards.base_addr',
      'TESTPOOL-rewards.reward_addr',
      'TESTPOOL-rewards.staking_skey',
      'TESTPOOL-rewards.staking_vkey',
    ]);
    expect(existsSync(join(fixture.rootDir, '.CSPO_TESTPOOL', 'exports'))).toBe(false);
  });

  it('expects the complete-mode files once base.addr is present', () => {
    const fixture = createStandardWallet();
    writeFileSync(join(fixture.walletDir, 'base.addr'), 'addr_test1placeholder\n');

    const result = exportWallet({
      walletDir: fixture.walletDir,
      ticker: 'TESTPOOL',
      purpose: 'pledge',
      password: TEST_PASSWORD,
      iterations: TEST_ITERATIONS,
    });

    const missing = result._unsafeUnwrapErr().details?.['missing'];
    expect(missing).toContain('payment.skey');
    expect(missing).not.toContain('base.addr');
  });
});

describe('decryptBundle', () => {
  it('restores byte-identical files with their modes', () => {
    const { fixture, exported } = exportFixture();
    const outputDir = join(tmp.dirSync({ unsafeCleanup: true }).name, 'restored');

    const result = decryptBundle({
      bundlePath: exported.bundlePath,
      keyPath: exported.keyPath,
      password: TEST_PASSWORD,
      outputDir,
    })._unsafeUnwrap();

    expect(result.ticker).toBe('TESTPOOL');
    expect(result.purpose).toBe('pledge');
    expect(readdirSync(outputDir).sort()).toEqual([
      'TESTPOOL-pledge.base_addr',
      'TESTPOOL-pledge.reward_addr',
      'TESTPOOL-pledge.staking_skey',
      'TESTPOOL-pledge.staking_vkey',
    ]);
    for (const name of readdirSync(outputDir)) {
      expect(readFileSync(join(outputDir, name), 'utf8')).toBe(fixture.contents[name]);
    }
    expect(modeOf(join(outputDir, 'TESTPOOL-pledge.staking_skey'))).toBe(0o600);
    expect(modeOf(join(outputDir, 'TESTPOOL-pledge.base_addr'))).toBe(0o644);
  });

  it('rejects a wrong password without writing anything', () => {
    const { exported } = exportFixture();
    const outputDir = join(tmp.dirSync({ unsafeCleanup: true }).name, 'restored');

    const result = decryptBundle({
      bundlePath: exported.bundlePath,
      keyPath: exported.keyPath,
      password: 'wrong-secret',
      outputDir,
    });

    expect(result._unsafeUnwrapErr().code).toBe('WRONG_PASSWORD');
    expect(existsSync(outputDir)).toBe(false);
  });

  it('detects a modified bundle', () => {
    const { exported } = exportFixture();
    const bundle = readFileSync(exported.bundlePath);
    bundle[bundle.length - 1] = (bundle[bundle.length - 1] ?? 0) ^ 0xff;
    writeFileSync(exported.bundlePath, bundle);
    const outputDir = join(tmp.dirSync({ unsafeCleanup: true }).name, 'restored');

    const result = decryptBundle({
      bundlePath: exported.bundlePath,
      keyPath: exported.keyPath,
      password: TEST_PASSWORD,
      outputDir,
    });

    expect(result._unsafeUnwrapErr().code).toBe('CORRUPT_ARCHIVE');
    expect(existsSync(outputDir)).toBe(false);
  });

  it('rejects a file that is not a bundle', () => {
    const { exported } = exportFixture();
    writeFileSync(exported.bundlePath, Buffer.alloc(64, 0x41));

    const result = decryptBundle({
      bundlePath: exported.bundlePath,
      keyPath: exported.keyPath,
      password: TEST_PASSWORD,
      outputDir: join(tmp.dirSync({ unsafeCleanup: true }).name, 'restored'),
    });

    expect(result._unsafeUnwrapErr().message).toBe(`${exported.bundlePath} is corrupt: not a wallet bundle`);
  });

  it('rejects a key file from another export', () => {
    const first = exportFixture();
    const second = exportFixture();

    const result = decryptBundle({
      bundlePath: first.exported.bundlePath,
      keyPath: second.exported.keyPath,
      password: TEST_PASSWORD,
      outputDir: join(tmp.dirSync({ unsafeCleanup: true }).name, 'restored'),
    });

    expect(result._unsafeUnwrapErr().code).toBe('CORRUPT_ARCHIVE');
  });

  it('rejects a malformed key file', () => {
    const { exported } = exportFixture();
    writeFileSync(exported.keyPath, JSON.stringify({ version: 1, kdf: 'pbkdf2-sha256', iterations: 10 }));

    const result = decryptBundle({
      bundlePath: exported.bundlePath,
      keyPath: exported.keyPath,
      password: TEST_PASSWORD,
      outputDir: join(tmp.dirSync({ unsafeCleanup: true }).name, 'restored'),
    });

    expect(result._unsafeUnwrapErr().code).toBe('CORRUPT_ARCHIVE');
    expect(result._unsafeUnwrapErr().message).toContain('key file rejected (iterations:');
  });

  it('refuses a non-empty output directory', () => {
    const { exported } = exportFixture();
    const outputDir = tmp.dirSync({ unsafeCleanup: true }).name;
    writeFileSync(join(outputDir, 'keep.txt'), 'keep');

    const result = decryptBundle({
      bundlePath: exported.bundlePath,
      keyPath: exported.keyPath,
      password: TEST_PASSWORD,
      outputDir,
    });

    expect(result._unsafeUnwrapErr().code).toBe('ALREADY_EXISTS');
    expect(readdirSync(outputDir)).toEqual(['keep.txt']);
  });

  it('reports a missing key file', () => {
    const { exported } = exportFixture();

    const result = decryptBundle({
      bundlePath: exported.bundlePath,
      keyPath: `${exported.keyPath}.missing`,
      password: TEST_PASSWORD,
      outputDir: join(tmp.dirSync({ unsafeCleanup: true }).name, 'restored'),
    });

    expect(result._unsafeUnwrapErr().code).toBe('MISSING_SOURCE_FILES');
  });
});
