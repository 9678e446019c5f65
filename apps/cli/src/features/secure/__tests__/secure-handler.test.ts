import { existsSync, statSync } from 'node:fs';
import { join } from 'node:path';

import { MissingSourceFilesError } from '@spo-wallet/wallet';
import tmp from 'tmp';
import { describe, expect, it } from 'vitest';

import { generateTestWallet, TEST_ITERATIONS, TEST_PASSWORD } from '../../shared/__tests__/wallet-fixture.js';
import { resolveWalletTarget } from '../../shared/wallet-target.js';
import { SecureHandler } from '../secure-handler.js';

describe('SecureHandler', () => {
  it('replaces the signing key and recovery phrase with .enc files', async () => {
    const wallet = generateTestWallet();
    const target = resolveWalletTarget(wallet.rootDir, 'TESTPOOL', 'pledge')._unsafeUnwrap();

    const result = (
      await new SecureHandler({ kdfIterations: TEST_ITERATIONS }).execute({ ...target, password: TEST_PASSWORD })
    )._unsafeUnwrap();

    expect(result.files.map((file) => file.encryptedPath)).toEqual([
      join(wallet.walletDir, 'TESTPOOL-pledge.mnemonic.txt.enc'),
      join(wallet.walletDir, 'TESTPOOL-pledge.staking_skey.enc'),
    ]);
    expect(existsSync(join(wallet.walletDir, 'TESTPOOL-pledge.staking_skey'))).toBe(false);
    expect(existsSync(join(wallet.walletDir, 'TESTPOOL-pledge.base_addr'))).toBe(true);
    expect(statSync(join(wallet.walletDir, 'TESTPOOL-pledge.staking_skey.enc')).mode & 0o777).toBe(0o600);
  });

  it('fails with a missing-files error for a wallet that was never generated', async () => {
    const rootDir = tmp.dirSync({ unsafeCleanup: true }).name;
    const target = resolveWalletTarget(rootDir, 'TESTPOOL', 'rewards')._unsafeUnwrap();

    const error = (
      await new SecureHandler({ kdfIterations: TEST_ITERATIONS }).execute({ ...target, password: TEST_PASSWORD })
    )._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(MissingSourceFilesError);
  });
});
