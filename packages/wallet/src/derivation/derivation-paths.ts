import { err, ok, type Result } from 'neverthrow';

import { InvalidPathError } from '../errors.js';
import type { Purpose, WalletMode } from '../wallet-types.js';

export const KEY_ROLES = [
  'payment',
  'staking',
  'drep',
  'ms-payment',
  'ms-staking',
  'ms-drep',
  'cc-cold',
  'cc-hot',
] as const;
export type KeyRole = (typeof KEY_ROLES)[number];

export const CIP1852_PURPOSE = 1852;
export const ADA_COIN_TYPE = 1815;
export const HARDENED_OFFSET = 0x80000000;

export interface DerivationPath {
  readonly purpose: typeof CIP1852_PURPOSE;
  readonly coinType: typeof ADA_COIN_TYPE;
  readonly account: number;
  readonly role: number;
  readonly index: number;
}

/**
 * Role and address index for every key role.
 * Committee cold/hot keys sit on the payment and staking chains at index 1.
 */
const ROLE_SLOTS: Record<KeyRole, { role: number; index: number }> = {
  payment: { role: 0, index: 0 },
  staking: { role: 2, index: 0 },
  drep: { role: 3, index: 0 },
  'ms-payment': { role: 4, index: 0 },
  'ms-staking': { role: 5, index: 0 },
  'ms-drep': { role: 6, index: 0 },
  'cc-cold': { role: 0, index: 1 },
  'cc-hot': { role: 2, index: 1 },
};

const PURPOSE_ACCOUNTS: Record<Purpose, number> = {
  pledge: 0,
  rewards: 1,
};

export const STANDARD_ROLES: readonly KeyRole[] = ['payment', 'staking'];
export const COMPLETE_ROLES: readonly KeyRole[] = KEY_ROLES;

const MAX_ROLE = 6;

export function rolesForMode(mode: WalletMode): readonly KeyRole[] {
  return mode === 'complete' ? COMPLETE_ROLES : STANDARD_ROLES;
}

/**
 * Account index for a wallet purpose. Each purpose gets its own account so
 * pledge and rewards keys never share a path under the ticker's phrase.
 */
export function accountForPurpose(purpose: Purpose): number {
  return PURPOSE_ACCOUNTS[purpose];
}

export function derivationPathFor(role: KeyRole, account = 0): DerivationPath {
  const slot = ROLE_SLOTS[role];
  return {
    purpose: CIP1852_PURPOSE,
    coinType: ADA_COIN_TYPE,
    account,
    role: slot.role,
    index: slot.index,
  };
}

/** `1852'/1815'/0'/2/0` */
export function formatDerivationPath(path: DerivationPath): string {
  return `${path.purpose}'/${path.coinType}'/${path.account}'/${path.role}/${path.index}`;
}

/** `1852H/1815H/0H/2/0`, the form `cardano-address key child` takes. */
export function toToolPathSyntax(path: DerivationPath): string {
  return `${path.purpose}H/${path.coinType}H/${path.account}H/${path.role}/${path.index}`;
}

/**
 * Path segments as 32-bit child numbers, hardened segments offset by 2^31.
 */
export function toChildIndexes(path: DerivationPath): number[] {
  return [
    path.purpose + HARDENED_OFFSET,
    path.coinType + HARDENED_OFFSET,
    path.account + HARDENED_OFFSET,
    path.role,
    path.index,
  ];
}

function isChildNumber(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < HARDENED_OFFSET;
}

/**
 * Check a structurally typed path before it reaches a provider. Values built
 * by `derivationPathFor` always pass.
 */
export function validateDerivationPath(path: DerivationPath): Result<DerivationPath, InvalidPathError> {
  const rendered = formatDerivationPath(path);
  if (path.purpose !== CIP1852_PURPOSE || path.coinType !== ADA_COIN_TYPE) {
    return err(new InvalidPathError(rendered, `expected ${CIP1852_PURPOSE}'/${ADA_COIN_TYPE}' prefix`));
  }
  if (!isChildNumber(path.account)) {
    return err(new InvalidPathError(rendered, 'account must be an integer between 0 and 2^31-1'));
  }
  if (!Number.isInteger(path.role) || path.role < 0 || path.role > MAX_ROLE) {
    return err(new InvalidPathError(rendered, `role must be between 0 and ${MAX_ROLE}`));
  }
  if (!isChildNumber(path.index)) {
    return err(new InvalidPathError(rendered, 'index must be an integer between 0 and 2^31-1'));
  }
  return ok(path);
}
