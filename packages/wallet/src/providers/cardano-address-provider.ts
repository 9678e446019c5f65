import { validateMnemonic } from '@scure/bip39';
import { wordlist } from '@scure/bip39/wordlists/english';
import { err, ok, type Result } from 'neverthrow';

import { cardanoPrefixes, decodeBech32, isShelleyAddress } from '../address/address-codec.js';
import { toToolPathSyntax, validateDerivationPath, type DerivationPath } from '../derivation/derivation-paths.js';
import { InvalidMnemonicError, ToolOutputInvalidError, type WalletError } from '../errors.js';
import type { ToolRunner } from '../tools/tool-runner.js';
import { networkTag, type Network } from '../wallet-types.js';

import type { AddressRequest, KeyMaterial, KeyProvider, RootKey } from './key-provider.js';

const TOOL = 'cardano-address';

export const ROOT_KEY_PATTERN = /^root_xsk1[02-9ac-hj-np-z]+$/;
export const EXTENDED_PRIVATE_KEY_PATTERN = /^[a-z]+(?:_[a-z]+)*_xsk1[02-9ac-hj-np-z]+$/;
export const EXTENDED_PUBLIC_KEY_PATTERN = /^[a-z]+(?:_[a-z]+)*_xvk1[02-9ac-hj-np-z]+$/;

/** Byte lengths of `cardano-address` extended keys: key plus chain code. */
export const EXTENDED_PRIVATE_KEY_BYTES = 96;
export const EXTENDED_PUBLIC_KEY_BYTES = 64;

export interface CardanoAddressKeyProviderOptions {
  runner: ToolRunner;
  /** Resolved path of the `cardano-address` executable. */
  command: string;
  timeoutMs?: number | undefined;
}

/**
 * Provider backed by the official `cardano-address` binary.
 *
 * Every output is treated as untrusted: it must be a single line, match the
 * expected bech32 prefix and decode to the expected length. Secrets travel
 * on stdin only, never as arguments.
 */
export class CardanoAddressKeyProvider implements KeyProvider {
  readonly kind = 'cardano-address';
  readonly producesValidKeys = true;

  private readonly runner: ToolRunner;
  private readonly command: string;
  private readonly timeoutMs: number | undefined;

  constructor(options: CardanoAddressKeyProviderOptions) {
    this.runner = options.runner;
    this.command = options.command;
    this.timeoutMs = options.timeoutMs;
  }

  generateMnemonic(): Result<string, WalletError> {
    const args = ['recovery-phrase', 'generate', '--size', '24'];
    return this.invoke(args).andThen((output) => {
      const phrase = output.split(/\s+/).join(' ');
      if (phrase.split(' ').length !== 24 || !validateMnemonic(phrase, wordlist)) {
        return err(new ToolOutputInvalidError(TOOL, args, 'a 24-word BIP39 phrase'));
      }
      return ok(phrase);
    });
  }

  rootKeyFromMnemonic(mnemonic: string): Result<RootKey, WalletError> {
    const phrase = mnemonic.trim().split(/\s+/).join(' ');
    if (!validateMnemonic(phrase, wordlist)) {
      return err(new InvalidMnemonicError('input', 'not a valid BIP39 English phrase'));
    }

    const args = ['key', 'from-recovery-phrase', 'Shelley'];
    return this.invokeSingleLine(args, phrase).andThen((line) => {
      if (!ROOT_KEY_PATTERN.test(line) || !hasDecodedLength(line, EXTENDED_PRIVATE_KEY_BYTES)) {
        return err(new ToolOutputInvalidError(TOOL, args, 'a root_xsk1 key'));
      }
      return ok({ encoded: line });
    });
  }

  deriveKey(root: RootKey, path: DerivationPath): Result<KeyMaterial, WalletError> {
    const checked = validateDerivationPath(path);
    if (checked.isErr()) return err(checked.error);

    const childArgs = ['key', 'child', toToolPathSyntax(path)];
    const publicArgs = ['key', 'public', '--with-chain-code'];

    return this.invokeSingleLine(childArgs, root.encoded)
      .andThen((privateKey) =>
        EXTENDED_PRIVATE_KEY_PATTERN.test(privateKey) && hasDecodedLength(privateKey, EXTENDED_PRIVATE_KEY_BYTES)
          ? ok(privateKey)
          : err(new ToolOutputInvalidError(TOOL, childArgs, 'an extended private key (*_xsk1)'))
      )
      .andThen((privateKey) =>
        this.invokeSingleLine(publicArgs, privateKey).andThen((publicKey) =>
          EXTENDED_PUBLIC_KEY_PATTERN.test(publicKey) && hasDecodedLength(publicKey, EXTENDED_PUBLIC_KEY_BYTES)
            ? ok({ path, privateKey, publicKey })
            : err(new ToolOutputInvalidError(TOOL, publicArgs, 'an extended public key (*_xvk1)'))
        )
      );
  }

  encodeAddress(request: AddressRequest): Result<string, WalletError> {
    const tag = String(networkTag(request.network));

    switch (request.kind) {
      case 'enterprise':
        return this.paymentAddress(request.paymentKey, tag, request.network);
      case 'base':
        return this.paymentAddress(request.paymentKey, tag, request.network).andThen((paymentAddress) =>
          this.checkedAddress(['address', 'delegation', request.stakingKey], paymentAddress, request.network)
        );
      case 'reward':
        return this.checkedAddress(['address', 'stake', '--network-tag', tag], request.stakingKey, request.network);
    }
  }

  validateAddress(address: string, network: Network): boolean {
    return isShelleyAddress(address, network, cardanoPrefixes(network));
  }

  private paymentAddress(paymentKey: string, tag: string, network: Network): Result<string, WalletError> {
    return this.checkedAddress(['address', 'payment', '--network-tag', tag], paymentKey, network);
  }

  private checkedAddress(args: string[], input: string, network: Network): Result<string, WalletError> {
    return this.invokeSingleLine(args, input).andThen((address) =>
      this.validateAddress(address, network)
        ? ok(address)
        : err(new ToolOutputInvalidError(TOOL, args, `a ${network} Shelley address`))
    );
  }

  private invoke(args: string[], input?: string): Result<string, WalletError> {
    return this.runner
      .run(this.command, args, { input, timeoutMs: this.timeoutMs })
      .map((output) => output.stdout.trim());
  }

  private invokeSingleLine(args: string[], input: string): Result<string, WalletError> {
    return this.invoke(args, input).andThen((output) =>
      output.length > 0 && !/\s/.test(output) ? ok(output) : err(new ToolOutputInvalidError(TOOL, args, 'a single line'))
    );
  }
}

function hasDecodedLength(text: string, length: number): boolean {
  const decoded = decodeBech32(text);
  return decoded !== undefined && decoded.bytes.length === length;
}
