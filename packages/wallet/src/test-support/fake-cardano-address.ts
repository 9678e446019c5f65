import { createHash } from 'node:crypto';

import { entropyToMnemonic } from '@scure/bip39';
import { wordlist } from '@scure/bip39/wordlists/english';
import { err, ok, type Result } from 'neverthrow';

import {
  buildAddressPayload,
  cardanoPrefixes,
  decodeBech32,
  encodeBech32,
  keyHash,
  KEY_HASH_LENGTH,
} from '../address/address-codec.js';
import { ToolUnavailableError } from '../errors.js';
import type { ToolOutput, ToolRunner, ToolRunOptions } from '../tools/tool-runner.js';
import type { Network } from '../wallet-types.js';

export interface RecordedCall {
  command: string;
  args: string[];
  input?: string | undefined;
}

export interface FakeCardanoAddressOptions {
  version?: string;
  /** Rewrite stdout of a call; used to simulate misbehaving binaries. */
  tamper?: (args: readonly string[], stdout: string) => string;
  /** Fail matching calls with a non-zero exit. */
  failWhen?: (args: readonly string[]) => boolean;
}

const ROLE_PREFIXES: Record<string, string> = {
  '0': 'addr',
  '2': 'stake',
  '3': 'drep',
  '4': 'addr_shared',
  '5': 'stake_shared',
  '6': 'drep_shared',
};

function digest(algorithm: 'sha256' | 'sha512', ...parts: string[]): Buffer {
  const hash = createHash(algorithm);
  for (const part of parts) hash.update(part);
  return hash.digest();
}

/**
 * In-process stand-in for the `cardano-address` binary. Output shapes
 * (prefixes, lengths, address headers) match the real tool; the key math
 * is plain hashing.
 */
export class FakeCardanoAddress implements ToolRunner {
  readonly calls: RecordedCall[] = [];
  private readonly options: FakeCardanoAddressOptions;

  constructor(options: FakeCardanoAddressOptions = {}) {
    this.options = options;
  }

  run(command: string, args: readonly string[], options: ToolRunOptions = {}): Result<ToolOutput, ToolUnavailableError> {
    this.calls.push({ command, args: [...args], input: options.input });

    if (this.options.failWhen?.(args)) {
      return err(new ToolUnavailableError('cardano-address', 'exited with status 1: simulated failure', {
        args,
        exitCode: 1,
        stderr: 'simulated failure',
      }));
    }

    const stdout = this.respond(args, (options.input ?? '').trim());
    if (stdout === undefined) {
      return err(new ToolUnavailableError('cardano-address', `exited with status 1: unknown command ${args.join(' ')}`, {
        args,
        exitCode: 1,
      }));
    }

    const output = this.options.tamper ? this.options.tamper(args, stdout) : stdout;
    return ok({ stdout: `${output}\n`, stderr: '' });
  }

  private respond(args: readonly string[], input: string): string | undefined {
    const [group, action, ...rest] = args;

    if (group === '--version') {
      return `${this.options.version ?? '3.12.0'} @ 0000000`;
    }
    if (group === 'recovery-phrase' && action === 'generate') {
      return entropyToMnemonic(digest('sha256', 'fake-entropy'), wordlist);
    }
    if (group === 'key' && action === 'from-recovery-phrase') {
      return encodeBech32('root_xsk', Buffer.concat([digest('sha512', input), digest('sha256', input)]));
    }
    if (group === 'key' && action === 'child') {
      const path = rest[0] ?? '';
      const role = path.split('/')[3] ?? '0';
      const prefix = ROLE_PREFIXES[role] ?? 'addr';
      return encodeBech32(`${prefix}_xsk`, Buffer.concat([digest('sha512', input, path), digest('sha256', input, path)]));
    }
    if (group === 'key' && action === 'public') {
      const xsk = decodeBech32(input);
      if (!xsk) return undefined;
      const prefix = xsk.prefix.replace(/_xsk$/, '_xvk');
      const publicKey = createHash('sha256').update(xsk.bytes.subarray(0, 64)).digest();
      return encodeBech32(prefix, Buffer.concat([publicKey, xsk.bytes.subarray(64, 96)]));
    }
    if (group === 'address') {
      return this.address(action, rest, input);
    }
    return undefined;
  }

  private address(action: string | undefined, rest: string[], input: string): string | undefined {
    if (action === 'delegation') {
      const stake = decodeBech32(rest[0] ?? '');
      const payment = decodeBech32(input);
      if (!stake || !payment) return undefined;
      const tag = (payment.bytes[0] ?? 0) & 0x0f;
      const paymentHash = payment.bytes.subarray(1, 1 + KEY_HASH_LENGTH);
      return encodeBech32(
        payment.prefix,
        buildAddressPayload('base', networkFor(tag), [paymentHash, keyHash(stake.bytes.subarray(0, 32))])
      );
    }

    const key = decodeBech32(input);
    if (!key) return undefined;
    const network = networkFor(Number(rest[rest.indexOf('--network-tag') + 1]));
    const prefixes = cardanoPrefixes(network);
    const hash = keyHash(key.bytes.subarray(0, 32));

    if (action === 'payment') {
      return encodeBech32(prefixes.address, buildAddressPayload('enterprise', network, [hash]));
    }
    if (action === 'stake') {
      return encodeBech32(prefixes.stake, buildAddressPayload('reward', network, [hash]));
    }
    return undefined;
  }
}

function networkFor(tag: number): Network {
  return tag === 1 ? 'mainnet' : 'testnet';
}
