import { validateMnemonic } from '@scure/bip39';
import { wordlist } from '@scure/bip39/wordlists/english';
import { beforeAll, describe, expect, it } from 'vitest';

import { derivationPathFor } from '../../derivation/derivation-paths.js';
import { FakeCardanoAddress } from '../../test-support/fake-cardano-address.js';
import { CardanoAddressKeyProvider } from '../cardano-address-provider.js';
import type { KeyMaterial, RootKey } from '../key-provider.js';
import { SimplifiedKeyProvider } from '../simplified-provider.js';

const PHRASE =
  'abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon ' +
  'abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon abandon art';

describe('SimplifiedKeyProvider', () => {
  const provider = new SimplifiedKeyProvider();
  let root: RootKey;
  let payment: KeyMaterial;
  let staking: KeyMaterial;

  beforeAll(() => {
    root = provider.rootKeyFromMnemonic(PHRASE)._unsafeUnwrap();
    payment = provider.deriveKey(root, derivationPathFor('payment'))._unsafeUnwrap();
    staking = provider.deriveKey(root, derivationPathFor('staking'))._unsafeUnwrap();
  });

  it('describes itself as a non-production provider', () => {
    expect(provider.kind).toBe('simplified');
    expect(provider.producesValidKeys).toBe(false);
  });

  it('generates a valid 24-word BIP39 phrase', () => {
    const phrase = provider.generateMnemonic()._unsafeUnwrap();

    expect(phrase.split(' ')).toHaveLength(24);
    expect(validateMnemonic(phrase, wordlist)).toBe(true);
  });

  it('builds the phrase from the injected entropy', () => {
    const zeros = new SimplifiedKeyProvider({ entropy: (size) => new Uint8Array(size) });

    expect(zeros.generateMnemonic()._unsafeUnwrap()).toBe(PHRASE);
  });

  it('reports an entropy source failure', () => {
    const broken = new SimplifiedKeyProvider({
      entropy: () => {
        throw new Error('entropy pool exhausted');
      },
    });

    const result = broken.generateMnemonic();
    expect(result._unsafeUnwrapErr().code).toBe('ENTROPY_FAILURE');
    expect(result._unsafeUnwrapErr().message).toBe(
      'Could not gather entropy for a recovery phrase: entropy pool exhausted'
    );
  });

  it('reports short entropy', () => {
    const short = new SimplifiedKeyProvider({ entropy: () => new Uint8Array(16) });

    expect(short.generateMnemonic()._unsafeUnwrapErr().code).toBe('ENTROPY_FAILURE');
  });

  it('rejects a phrase that is not BIP39', () => {
    const result = provider.rootKeyFromMnemonic('not a real recovery phrase');

    expect(result._unsafeUnwrapErr().code).toBe('INVALID_MNEMONIC');
  });

  it('derives the same key twice for the same phrase and path', () => {
    const again = provider.rootKeyFromMnemonic(PHRASE).andThen((r) => provider.deriveKey(r, derivationPathFor('payment')));

    expect(again._unsafeUnwrap()).toEqual(payment);
  });

  it('derives different keys for different paths', () => {
    expect(payment.privateKey).not.toBe(staking.privateKey);
    expect(payment.publicKey).not.toBe(staking.publicKey);

    const rewardsPayment = provider.deriveKey(root, derivationPathFor('payment', 1))._unsafeUnwrap();
    expect(rewardsPayment.publicKey).not.toBe(payment.publicKey);
  });

  it('marks keys with simulated prefixes', () => {
    expect(payment.privateKey.startsWith('sim_sk1')).toBe(true);
    expect(payment.publicKey.startsWith('sim_vk1')).toBe(true);
  });

  it('rejects an invalid path', () => {
    const result = provider.deriveKey(root, { ...derivationPathFor('payment'), role: 11 });

    expect(result._unsafeUnwrapErr().code).toBe('INVALID_PATH');
  });

  it('rejects a root key it did not produce', () => {
    const result = provider.deriveKey({ encoded: 'root_xsk1qqqqqq' }, derivationPathFor('payment'));

    expect(result._unsafeUnwrapErr().code).toBe('INVALID_KEY');
  });

  it('encodes deterministic addresses with simulated prefixes', () => {
    const request = { kind: 'base', paymentKey: payment.publicKey, stakingKey: staking.publicKey, network: 'testnet' } as const;
    const base = provider.encodeAddress(request)._unsafeUnwrap();

    expect(base.startsWith('addr_sim_test1')).toBe(true);
    expect(provider.encodeAddress(request)._unsafeUnwrap()).toBe(base);

    const reward = provider.encodeAddress({ kind: 'reward', stakingKey: staking.publicKey, network: 'mainnet' });
    expect(reward._unsafeUnwrap().startsWith('stake_sim1')).toBe(true);
  });

  it('validates its own addresses per network', () => {
    const base = provider
      .encodeAddress({ kind: 'base', paymentKey: payment.publicKey, stakingKey: staking.publicKey, network: 'preprod' })
      ._unsafeUnwrap();

    expect(provider.validateAddress(base, 'preprod')).toBe(true);
    expect(provider.validateAddress(base, 'mainnet')).toBe(false);
    const tampered = `${base.slice(0, -1)}${base.endsWith('q') ? 'p' : 'q'}`;
    expect(provider.validateAddress(tampered, 'preprod')).toBe(false);
  });

  it('produces addresses the cardano-address provider never accepts', () => {
    const real = new CardanoAddressKeyProvider({ runner: new FakeCardanoAddress(), command: 'cardano-address' });
    const base = provider
      .encodeAddress({ kind: 'base', paymentKey: payment.publicKey, stakingKey: staking.publicKey, network: 'mainnet' })
      ._unsafeUnwrap();

    expect(real.validateAddress(base, 'mainnet')).toBe(false);
  });
});
