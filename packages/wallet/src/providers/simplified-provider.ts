import { createHash, createHmac, pbkdf2Sync, randomBytes } from 'node:crypto';

import { entropyToMnemonic, mnemonicToSeedSync, validateMnemonic } from '@scure/bip39';
import { wordlist } from '@scure/bip39/wordlists/english';
import { err, ok, type Result } from 'neverthrow';

import {
  buildAddressPayload,
  decodeBech32,
  encodeBech32,
  isShelleyAddress,
  keyHash,
  type AddressPrefixes,
} from '../address/address-codec.js';
import { toChildIndexes, validateDerivationPath, type DerivationPath } from '../derivation/derivation-paths.js';
import { EntropyFailureError, InvalidKeyError, InvalidMnemonicError, type WalletError } from '../errors.js';
import type { Network } from '../wallet-types.js';

import type { AddressRequest, KeyMaterial, KeyProvider, RootKey } from './key-provider.js';

export const SIMPLIFIED_ROOT_SALT = 'spo-wallet-simplified-root';
export const SIMPLIFIED_ROOT_ITERATIONS = 100_000;

const ROOT_PREFIX = 'sim_root';
const PRIVATE_PREFIX = 'sim_sk';
const PUBLIC_PREFIX = 'sim_vk';
const MNEMONIC_ENTROPY_BYTES = 32;

export function simplifiedPrefixes(network: Network): AddressPrefixes {
  return network === 'mainnet'
    ? { address: 'addr_sim', stake: 'stake_sim' }
    : { address: 'addr_sim_test', stake: 'stake_sim_test' };
}

export interface SimplifiedKeyProviderOptions {
  /** Entropy source for new phrases. Defaults to `crypto.randomBytes`. */
  entropy?: (size: number) => Uint8Array;
}

/**
 * Local-testing provider.
 *
 * Recovery phrases are real BIP39 (English, 24 words). Everything after the
 * seed is an ad hoc HMAC-SHA512 chain that is NOT BIP32-Ed25519: keys cannot
 * sign Cardano transactions. Keys carry `sim_` prefixes and addresses use
 * `addr_sim`/`stake_sim`, which no network and no validator of the
 * `cardano-address` provider accepts.
 */
export class SimplifiedKeyProvider implements KeyProvider {
  readonly kind = 'simplified';
  readonly producesValidKeys = false;

  private readonly entropy: (size: number) => Uint8Array;

  constructor(options: SimplifiedKeyProviderOptions = {}) {
    this.entropy = options.entropy ?? ((size) => randomBytes(size));
  }

  generateMnemonic(): Result<string, WalletError> {
    let entropy: Uint8Array;
    try {
      entropy = this.entropy(MNEMONIC_ENTROPY_BYTES);
    } catch (error) {
      return err(new EntropyFailureError(error instanceof Error ? error.message : String(error)));
    }
    if (entropy.length !== MNEMONIC_ENTROPY_BYTES) {
      return err(
        new EntropyFailureError(`expected ${MNEMONIC_ENTROPY_BYTES} bytes of entropy, got ${entropy.length}`)
      );
    }
    return ok(entropyToMnemonic(entropy, wordlist));
  }

  rootKeyFromMnemonic(mnemonic: string): Result<RootKey, WalletError> {
    const phrase = normalizePhrase(mnemonic);
    if (!validateMnemonic(phrase, wordlist)) {
      return err(new InvalidMnemonicError('input', 'not a valid BIP39 English phrase'));
    }
    const seed = mnemonicToSeedSync(phrase);
    const root = pbkdf2Sync(seed, SIMPLIFIED_ROOT_SALT, SIMPLIFIED_ROOT_ITERATIONS, 64, 'sha512');
    return ok({ encoded: encodeBech32(ROOT_PREFIX, root) });
  }

  deriveKey(root: RootKey, path: DerivationPath): Result<KeyMaterial, WalletError> {
    const checked = validateDerivationPath(path);
    if (checked.isErr()) return err(checked.error);

    const decoded = decodeBech32(root.encoded);
    if (!decoded || decoded.prefix !== ROOT_PREFIX || decoded.bytes.length !== 64) {
      return err(new InvalidKeyError('root key', 'not produced by the simplified provider'));
    }

    let node: Buffer = Buffer.from(decoded.bytes);
    for (const child of toChildIndexes(path)) {
      const data = Buffer.alloc(36);
      node.copy(data, 0, 0, 32);
      data.writeUInt32BE(child, 32);
      node = createHmac('sha512', node.subarray(32)).update(data).digest();
    }

    const privateKey = node.subarray(0, 32);
    const publicKey = createHash('sha256').update(privateKey).digest();

    return ok({
      path,
      privateKey: encodeBech32(PRIVATE_PREFIX, privateKey),
      publicKey: encodeBech32(PUBLIC_PREFIX, publicKey),
    });
  }

  encodeAddress(request: AddressRequest): Result<string, WalletError> {
    const prefixes = simplifiedPrefixes(request.network);

    switch (request.kind) {
      case 'base': {
        const payment = this.publicKeyHash(request.paymentKey);
        if (payment.isErr()) return err(payment.error);
        const staking = this.publicKeyHash(request.stakingKey);
        if (staking.isErr()) return err(staking.error);
        return ok(encodeBech32(prefixes.address, buildAddressPayload('base', request.network, [payment.value, staking.value])));
      }
      case 'enterprise': {
        const payment = this.publicKeyHash(request.paymentKey);
        if (payment.isErr()) return err(payment.error);
        return ok(encodeBech32(prefixes.address, buildAddressPayload('enterprise', request.network, [payment.value])));
      }
      case 'reward': {
        const staking = this.publicKeyHash(request.stakingKey);
        if (staking.isErr()) return err(staking.error);
        return ok(encodeBech32(prefixes.stake, buildAddressPayload('reward', request.network, [staking.value])));
      }
    }
  }

  validateAddress(address: string, network: Network): boolean {
    return isShelleyAddress(address, network, simplifiedPrefixes(network));
  }

  private publicKeyHash(publicKey: string): Result<Uint8Array, WalletError> {
    const decoded = decodeBech32(publicKey);
    if (!decoded || decoded.prefix !== PUBLIC_PREFIX || decoded.bytes.length !== 32) {
      return err(new InvalidKeyError(publicKey, 'not a public key from the simplified provider'));
    }
    return ok(keyHash(decoded.bytes));
  }
}

function normalizePhrase(mnemonic: string): string {
  return mnemonic.trim().split(/\s+/).join(' ');
}
