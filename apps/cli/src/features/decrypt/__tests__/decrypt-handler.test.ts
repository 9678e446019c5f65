import { readFileSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { exportWallet } from '@spo-wallet/vault';
import { AlreadyExistsError, WrongPasswordError } from '@spo-wallet/wallet';
import tmp from 'tmp';
import { describe, expect, it } from 'vitest';

import { generateTestWallet, TEST_ITERATIONS, TEST_PASSWORD } from '../../shared/__tests__/wallet-fixture.js';
import { DecryptHandler } from '../decrypt-handler.js';
import { buildDecryptParamsFromFlags } from '../decrypt-utils.js';

function exportedWallet() {
  const wallet = generateTestWallet();
  const exported = exportWallet({
    walletDir: wallet.walletDir,
    ticker: 'TESTPOOL',
    purpose: 'pledge',
    password: TEST_PASSWORD,
    iterations: TEST_ITERATIONS,
  })._unsafeUnwrap();
  return { wallet, exported };
}

describe('DecryptHandler', () => {
  it('recovers the exported files with their modes', async () => {
    const { wallet, exported } = exportedWallet();
    const outputDir = join(tmp.dirSync({ unsafeCleanup: true }).name, 'recovered');

    const result = (
      await new DecryptHandler().execute({
        bundlePath: exported.bundlePath,
        keyPath: exported.keyPath,
        outputDir,
        password: TEST_PASSWORD,
      })
    )._unsafeUnwrap();

    expect(result.ticker).toBe('TESTPOOL');
    expect(result.purpose).toBe('pledge');
    expect(result.files.map((file) => file.path)).toEqual(
      exported.files.map((name) => join(outputDir, name))
    );
    const skey = join(outputDir, 'TESTPOOL-pledge.staking_skey');
    expect(readFileSync(skey, 'utf8')).toBe(readFileSync(join(wallet.walletDir, 'TESTPOOL-pledge.staking_skey'), 'utf8'));
    expect(statSync(skey).mode & 0o777).toBe(0o600);
  });

  it('rejects a wrong password', async () => {
    const { exported } = exportedWallet();
    const outputDir = join(tmp.dirSync({ unsafeCleanup: true }).name, 'recovered');

    const error = (
      await new DecryptHandler().execute({
        bundlePath: exported.bundlePath,
        keyPath: exported.keyPath,
        outputDir,
        password: 'not-the-password',
      })
    )._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(WrongPasswordError);
  });

  it('refuses to write into a non-empty directory', async () => {
    const { exported } = exportedWallet();
    const outputDir = tmp.dirSync({ unsafeCleanup: true }).name;
    writeFileSync(join(outputDir, 'existing.txt'), 'keep\n');

    const error = (
      await new DecryptHandler().execute({
        bundlePath: exported.bundlePath,
        keyPath: exported.keyPath,
        outputDir,
        password: TEST_PASSWORD,
      })
    )._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(AlreadyExistsError);
    expect(readFileSync(join(outputDir, 'existing.txt'), 'utf8')).toBe('keep\n');
  });
});

describe('buildDecryptParamsFromFlags', () => {
  it('resolves relative paths against the working directory', () => {
    expect(
      buildDecryptParamsFromFlags({ bundle: 'a.bundle.enc', key: '/keys/a.key', outputDir: 'out' }, TEST_PASSWORD)
    ).toEqual({
      bundlePath: join(process.cwd(), 'a.bundle.enc'),
      keyPath: '/keys/a.key',
      outputDir: join(process.cwd(), 'out'),
      password: TEST_PASSWORD,
    });
  });
});
