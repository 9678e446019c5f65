import { join } from 'node:path';

import type { KeyRole } from '../derivation/derivation-paths.js';
import type { Purpose } from '../wallet-types.js';

export const FILE_MODES = {
  secret: 0o600,
  public: 0o644,
  directory: 0o700,
} as const;

export const TICKER_DIR_PREFIX = '.CSPO_';
export const EXPORTS_DIR_NAME = 'exports';
export const ENCRYPTED_SUFFIX = '.enc';

/** Marker file of a complete-mode wallet. */
export const COMPLETE_MODE_MARKER = 'base.addr';

export function tickerDirectory(rootDir: string, ticker: string): string {
  return join(rootDir, `${TICKER_DIR_PREFIX}${ticker}`);
}

export function purposeDirectory(rootDir: string, ticker: string, purpose: Purpose): string {
  return join(tickerDirectory(rootDir, ticker), purpose);
}

export function sharedMnemonicPath(rootDir: string, ticker: string): string {
  return join(tickerDirectory(rootDir, ticker), `${ticker}-shared.mnemonic.txt`);
}

export function exportDirectory(rootDir: string, ticker: string): string {
  return join(tickerDirectory(rootDir, ticker), EXPORTS_DIR_NAME);
}

export interface StandardFileNames {
  baseAddress: string;
  rewardAddress: string;
  stakingSigningKey: string;
  stakingVerificationKey: string;
  mnemonic: string;
}

export function standardFileNames(ticker: string, purpose: Purpose): StandardFileNames {
  const stem = `${ticker}-${purpose}`;
  return {
    baseAddress: `${stem}.base_addr`,
    rewardAddress: `${stem}.reward_addr`,
    stakingSigningKey: `${stem}.staking_skey`,
    stakingVerificationKey: `${stem}.staking_vkey`,
    mnemonic: `${stem}.mnemonic.txt`,
  };
}

export interface ExportFileNames {
  bundle: string;
  key: string;
}

export function exportFileNames(ticker: string, purpose: Purpose): ExportFileNames {
  const stem = `${ticker}-${purpose}-export`;
  return {
    bundle: `${stem}.bundle.enc`,
    key: `${stem}.key`,
  };
}

/** Key file stems used by complete mode (`payment.skey`, `ms_stake.vkey`, ...). */
export const COMPLETE_KEY_STEMS: Record<KeyRole, string> = {
  payment: 'payment',
  staking: 'stake',
  'cc-cold': 'cc-cold',
  'cc-hot': 'cc-hot',
  drep: 'drep',
  'ms-payment': 'ms_payment',
  'ms-staking': 'ms_stake',
  'ms-drep': 'ms_drep',
};

/** Roles that get a `.cred` file in complete mode. */
export const CREDENTIAL_ROLES: readonly KeyRole[] = ['payment', 'staking', 'ms-payment', 'ms-staking'];

export const COMPLETE_ADDRESS_FILES = ['base.addr', 'payment.addr', 'reward.addr'] as const;
export const COMPLETE_CERTIFICATE_FILES = ['stake.cert', 'delegation.cert'] as const;

export function completeFileNames(): string[] {
  const keyFiles = Object.values(COMPLETE_KEY_STEMS).flatMap((stem) => [`${stem}.skey`, `${stem}.vkey`]);
  const credentialFiles = CREDENTIAL_ROLES.map((role) => `${COMPLETE_KEY_STEMS[role]}.cred`);
  return [...COMPLETE_ADDRESS_FILES, ...keyFiles, ...credentialFiles, ...COMPLETE_CERTIFICATE_FILES];
}

/**
 * Files holding secrets: signing keys in either naming scheme and recovery
 * phrases.
 */
export function isSensitiveFileName(name: string): boolean {
  return name.endsWith('.skey') || name.endsWith('_skey') || name.endsWith('.mnemonic.txt');
}

export function fileModeFor(name: string): number {
  return isSensitiveFileName(name) ? FILE_MODES.secret : FILE_MODES.public;
}
