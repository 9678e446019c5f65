import { readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import { secureWallet } from '@spo-wallet/vault';
import { WrongPasswordError } from '@spo-wallet/wallet';
import { describe, expect, it } from 'vitest';

import { generateTestWallet, TEST_ITERATIONS, TEST_PASSWORD } from '../../shared/__tests__/wallet-fixture.js';
import { resolveWalletTarget } from '../../shared/wallet-target.js';
import { ViewHandler } from '../view-handler.js';
import { originalNameOf, securedPathFor } from '../view-utils.js';

function securedWallet() {
  const wallet = generateTestWallet();
  const skey = readFileSync(join(wallet.walletDir, 'TESTPOOL-pledge.staking_skey'), 'utf8');
  secureWallet(wallet.walletDir, TEST_PASSWORD, { iterations: TEST_ITERATIONS })._unsafeUnwrap();
  const target = resolveWalletTarget(wallet.rootDir, 'TESTPOOL', 'pledge')._unsafeUnwrap();
  return { wallet, target, skey };
}

describe('ViewHandler', () => {
  it('lists secured files by their original names', async () => {
    const { target } = securedWallet();

    const result = (await new ViewHandler().execute({ ...target, action: 'list' }))._unsafeUnwrap();

    expect(result).toEqual({
      action: 'list',
      walletDir: target.walletDir,
      files: ['TESTPOOL-pledge.mnemonic.txt', 'TESTPOOL-pledge.staking_skey'],
    });
  });

  it('decrypts a file into memory without writing it', async () => {
    const { target, skey } = securedWallet();
    const before = readdirSync(target.walletDir).sort();

    const result = (
      await new ViewHandler().execute({
        ...target,
        action: 'show',
        file: 'TESTPOOL-pledge.staking_skey.enc',
        password: TEST_PASSWORD,
      })
    )._unsafeUnwrap();

    expect(result).toEqual({
      action: 'show',
      walletDir: target.walletDir,
      file: 'TESTPOOL-pledge.staking_skey',
      content: skey,
    });
    expect(readdirSync(target.walletDir).sort()).toEqual(before);
  });

  it('rejects a wrong password', async () => {
    const { target } = securedWallet();

    const error = (
      await new ViewHandler().execute({
        ...target,
        action: 'show',
        file: 'TESTPOOL-pledge.staking_skey',
        password: 'wrong-secret',
      })
    )._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(WrongPasswordError);
  });
});

describe('view-utils', () => {
  it('accepts the file name with or without the .enc suffix', () => {
    expect(securedPathFor('/w', 'A.staking_skey')).toBe('/w/A.staking_skey.enc');
    expect(securedPathFor('/w', 'A.staking_skey.enc')).toBe('/w/A.staking_skey.enc');
    expect(originalNameOf('A.staking_skey.enc')).toBe('A.staking_skey');
    expect(originalNameOf('A.staking_skey')).toBe('A.staking_skey');
  });
});
