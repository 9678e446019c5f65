import { blake2b } from '@noble/hashes/blake2b';
import { bech32 } from 'bech32';

import { networkTag, type Network } from '../wallet-types.js';

/** Shelley addresses exceed the 90 character BIP-173 limit. */
export const BECH32_LIMIT = 1023;

export const KEY_HASH_LENGTH = 28;

export type ShelleyAddressKind = 'base' | 'enterprise' | 'reward';

const HEADER_TYPES: Record<ShelleyAddressKind, number> = {
  base: 0x0,
  enterprise: 0x6,
  reward: 0xe,
};

const PAYLOAD_LENGTHS: Record<ShelleyAddressKind, number> = {
  base: 1 + 2 * KEY_HASH_LENGTH,
  enterprise: 1 + KEY_HASH_LENGTH,
  reward: 1 + KEY_HASH_LENGTH,
};

export interface AddressPrefixes {
  readonly address: string;
  readonly stake: string;
}

export function cardanoPrefixes(network: Network): AddressPrefixes {
  return network === 'mainnet' ? { address: 'addr', stake: 'stake' } : { address: 'addr_test', stake: 'stake_test' };
}

export interface DecodedBech32 {
  prefix: string;
  bytes: Uint8Array;
}

export function decodeBech32(text: string): DecodedBech32 | undefined {
  const decoded = bech32.decodeUnsafe(text, BECH32_LIMIT);
  if (!decoded) return undefined;
  const bytes = bech32.fromWordsUnsafe(decoded.words);
  if (!bytes) return undefined;
  return { prefix: decoded.prefix, bytes: Uint8Array.from(bytes) };
}

export function encodeBech32(prefix: string, bytes: Uint8Array): string {
  return bech32.encode(prefix, bech32.toWords(bytes), BECH32_LIMIT);
}

/** blake2b-224, the hash Cardano uses for key credentials and pool ids. */
export function keyHash(publicKey: Uint8Array): Uint8Array {
  return blake2b(publicKey, { dkLen: KEY_HASH_LENGTH });
}

export function addressHeader(kind: ShelleyAddressKind, network: Network): number {
  return (HEADER_TYPES[kind] << 4) | networkTag(network);
}

export function buildAddressPayload(kind: ShelleyAddressKind, network: Network, hashes: Uint8Array[]): Uint8Array {
  const payload = new Uint8Array(1 + hashes.length * KEY_HASH_LENGTH);
  payload[0] = addressHeader(kind, network);
  hashes.forEach((hash, position) => payload.set(hash, 1 + position * KEY_HASH_LENGTH));
  return payload;
}

/**
 * Structural check of a key-hash Shelley address: bech32 checksum, prefix,
 * header type, payload length and network nibble.
 */
export function isShelleyAddress(address: string, network: Network, prefixes: AddressPrefixes): boolean {
  const decoded = decodeBech32(address);
  if (!decoded) return false;

  const header = decoded.bytes[0];
  if (header === undefined || (header & 0x0f) !== networkTag(network)) return false;

  const allowed: ShelleyAddressKind[] =
    decoded.prefix === prefixes.address ? ['base', 'enterprise'] : decoded.prefix === prefixes.stake ? ['reward'] : [];

  return allowed.some(
    (kind) => header >> 4 === HEADER_TYPES[kind] && decoded.bytes.length === PAYLOAD_LENGTHS[kind]
  );
}
