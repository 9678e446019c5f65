import type { Result } from 'neverthrow';

import type { DerivationPath } from '../derivation/derivation-paths.js';
import type { WalletError } from '../errors.js';
import type { Network } from '../wallet-types.js';

export type ProviderKind = 'cardano-address' | 'simplified';

/** Root key produced from a recovery phrase, in the provider's own encoding. */
export interface RootKey {
  readonly encoded: string;
}

export interface KeyMaterial {
  readonly path: DerivationPath;
  readonly privateKey: string;
  readonly publicKey: string;
}

export type AddressRequest =
  | { kind: 'base'; paymentKey: string; stakingKey: string; network: Network }
  | { kind: 'enterprise'; paymentKey: string; network: Network }
  | { kind: 'reward'; stakingKey: string; network: Network };

/**
 * Source of recovery phrases, keys and addresses.
 *
 * Every method is a pure function of its inputs except `generateMnemonic`.
 * Which implementation is used is decided once at startup by
 * `selectKeyProvider`; the materializer only looks at `producesValidKeys`.
 */
export interface KeyProvider {
  readonly kind: ProviderKind;
  /** Whether keys and addresses are valid on a real Cardano network. */
  readonly producesValidKeys: boolean;

  generateMnemonic(): Result<string, WalletError>;
  rootKeyFromMnemonic(mnemonic: string): Result<RootKey, WalletError>;
  deriveKey(root: RootKey, path: DerivationPath): Result<KeyMaterial, WalletError>;
  encodeAddress(request: AddressRequest): Result<string, WalletError>;
  validateAddress(address: string, network: Network): boolean;
}
