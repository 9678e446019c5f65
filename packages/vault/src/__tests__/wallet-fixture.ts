import { chmodSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { fileModeFor, purposeDirectory, standardFileNames, type Purpose } from '@spo-wallet/wallet';
import tmp from 'tmp';

export const TEST_PASSWORD = 'test-secret';
export const TEST_ITERATIONS = 100_000;

export interface WalletFixture {
  rootDir: string;
  walletDir: string;
  contents: Record<string, string>;
}

/** A standard-mode purpose directory with placeholder contents. */
export function createStandardWallet(ticker = 'TESTPOOL', purpose: Purpose = 'pledge'): WalletFixture {
  const rootDir = tmp.dirSync({ unsafeCleanup: true }).name;
  const walletDir = purposeDirectory(rootDir, ticker, purpose);
  mkdirSync(walletDir, { recursive: true, mode: 0o700 });

  const names = standardFileNames(ticker, purpose);
  const contents: Record<string, string> = {
    [names.baseAddress]: 'addr_sim1placeholderbase\n',
    [names.rewardAddress]: 'stake_sim1placeholderreward\n',
    [names.stakingSigningKey]: 'sim_sk1placeholdersigning\n',
    [names.stakingVerificationKey]: 'sim_vk1placeholderverification\n',
    [names.mnemonic]: 'abandon abandon abandon placeholder phrase\n',
  };

  for (const [name, content] of Object.entries(contents)) {
    const path = join(walletDir, name);
    writeFileSync(path, content);
    chmodSync(path, fileModeFor(name));
  }

  return { rootDir, walletDir, contents };
}
