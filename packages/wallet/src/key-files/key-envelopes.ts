import { err, ok, type Result } from 'neverthrow';

import { decodeBech32, keyHash } from '../address/address-codec.js';
import type { KeyRole } from '../derivation/derivation-paths.js';
import { InvalidKeyError } from '../errors.js';
import type { KeyMaterial } from '../providers/key-provider.js';

/** `cardano-cli` text envelope. */
export interface TextEnvelope {
  type: string;
  description: string;
  cborHex: string;
}

interface EnvelopeNames {
  signingType: string;
  verificationType: string;
  label: string;
}

const ENVELOPE_NAMES: Record<KeyRole, EnvelopeNames> = {
  payment: {
    signingType: 'PaymentExtendedSigningKeyShelley_ed25519_bip32',
    verificationType: 'PaymentExtendedVerificationKeyShelley_ed25519_bip32',
    label: 'Payment',
  },
  staking: {
    signingType: 'StakeExtendedSigningKeyShelley_ed25519_bip32',
    verificationType: 'StakeExtendedVerificationKeyShelley_ed25519_bip32',
    label: 'Stake',
  },
  'cc-cold': {
    signingType: 'ConstitutionalCommitteeColdExtendedSigningKey_ed25519_bip32',
    verificationType: 'ConstitutionalCommitteeColdExtendedVerificationKey_ed25519_bip32',
    label: 'Constitutional Committee Cold',
  },
  'cc-hot': {
    signingType: 'ConstitutionalCommitteeHotExtendedSigningKey_ed25519_bip32',
    verificationType: 'ConstitutionalCommitteeHotExtendedVerificationKey_ed25519_bip32',
    label: 'Constitutional Committee Hot',
  },
  drep: {
    signingType: 'DRepExtendedSigningKey_ed25519_bip32',
    verificationType: 'DRepExtendedVerificationKey_ed25519_bip32',
    label: 'Delegate Representative',
  },
  'ms-payment': {
    signingType: 'PaymentExtendedSigningKeyShelley_ed25519_bip32',
    verificationType: 'PaymentExtendedVerificationKeyShelley_ed25519_bip32',
    label: 'Multisig Payment',
  },
  'ms-staking': {
    signingType: 'StakeExtendedSigningKeyShelley_ed25519_bip32',
    verificationType: 'StakeExtendedVerificationKeyShelley_ed25519_bip32',
    label: 'Multisig Stake',
  },
  'ms-drep': {
    signingType: 'DRepExtendedSigningKey_ed25519_bip32',
    verificationType: 'DRepExtendedVerificationKey_ed25519_bip32',
    label: 'Multisig Delegate Representative',
  },
};

// CBOR byte-string headers for 128 and 64 byte payloads, and the fixed
// prefixes of the two certificates written in complete mode.
const CBOR_BYTES_128 = '5880';
const CBOR_BYTES_64 = '5840';
const CBOR_BYTES_28 = '581c';
const STAKE_REGISTRATION_PREFIX = '82008200';
const STAKE_DELEGATION_PREFIX = '83028200';

export interface ExtendedKeyPair {
  /** 64-byte extended private scalar. */
  privateKey: Uint8Array;
  /** 32-byte Ed25519 public key. */
  publicKey: Uint8Array;
  chainCode: Uint8Array;
}

/**
 * Split `cardano-address` bech32 keys (`*_xsk` 96 bytes, `*_xvk` 64 bytes)
 * into their parts.
 */
export function decodeExtendedKeyPair(material: KeyMaterial, role: KeyRole): Result<ExtendedKeyPair, InvalidKeyError> {
  const xsk = decodeBech32(material.privateKey);
  const xvk = decodeBech32(material.publicKey);
  if (!xsk || xsk.bytes.length !== 96) {
    return err(new InvalidKeyError(`${role} signing key`, 'expected a 96-byte extended private key'));
  }
  if (!xvk || xvk.bytes.length !== 64) {
    return err(new InvalidKeyError(`${role} verification key`, 'expected a 64-byte extended public key'));
  }
  return ok({
    privateKey: xsk.bytes.subarray(0, 64),
    publicKey: xvk.bytes.subarray(0, 32),
    chainCode: xvk.bytes.subarray(32, 64),
  });
}

function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

export function signingKeyEnvelope(role: KeyRole, pair: ExtendedKeyPair): TextEnvelope {
  const names = ENVELOPE_NAMES[role];
  return {
    type: names.signingType,
    description: `${names.label} Signing Key`,
    cborHex: CBOR_BYTES_128 + toHex(pair.privateKey) + toHex(pair.publicKey) + toHex(pair.chainCode),
  };
}

export function verificationKeyEnvelope(role: KeyRole, pair: ExtendedKeyPair): TextEnvelope {
  const names = ENVELOPE_NAMES[role];
  return {
    type: names.verificationType,
    description: `${names.label} Verification Key`,
    cborHex: CBOR_BYTES_64 + toHex(pair.publicKey) + toHex(pair.chainCode),
  };
}

/** Hex blake2b-224 of the public key: the key credential, or the pool id for a cold key. */
export function credentialHex(pair: ExtendedKeyPair): string {
  return toHex(keyHash(pair.publicKey));
}

export function stakeRegistrationCertificate(stakeCredential: string): TextEnvelope {
  return {
    type: 'CertificateShelley',
    description: 'Stake Address Registration Certificate',
    cborHex: STAKE_REGISTRATION_PREFIX + CBOR_BYTES_28 + stakeCredential,
  };
}

export function stakeDelegationCertificate(stakeCredential: string, poolId: string): TextEnvelope {
  return {
    type: 'CertificateShelley',
    description: 'Stake Address Delegation Certificate',
    cborHex: STAKE_DELEGATION_PREFIX + CBOR_BYTES_28 + stakeCredential + CBOR_BYTES_28 + poolId,
  };
}

export function serializeEnvelope(envelope: TextEnvelope): string {
  return JSON.stringify(envelope, undefined, 4) + '\n';
}
