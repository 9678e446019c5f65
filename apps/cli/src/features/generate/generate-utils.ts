// Pure utility functions for the generate command

import path from 'node:path';

import {
  normalizeTicker,
  standardFileNames,
  type GenerationResult,
  type Network,
  type Purpose,
  type WalletMode,
} from '@spo-wallet/wallet';
import { err, ok, type Result } from 'neverthrow';
import type { z } from 'zod';

import { InvalidArgumentsError } from '../shared/cli-error.js';
import { formatFileMode } from '../shared/file-display.js';
import type { GenerateCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Generate command options validated by Zod at CLI boundary
 */
export type GenerateCommandOptions = z.infer<typeof GenerateCommandOptionsSchema>;

/**
 * Generate handler parameters.
 */
export interface GenerateHandlerParams {
  /** Normalized (uppercase) pool ticker */
  ticker: string;

  purpose: Purpose;

  network: Network;

  mode: WalletMode;

  /** Replace an existing purpose directory. The shared phrase is kept. */
  force: boolean;

  /** Skip the Cardano tools and use the simplified provider */
  simple: boolean;

  /** Allow switching to the simplified provider when the tools fail */
  allowFallback: boolean;
}

/**
 * Build generate parameters from validated CLI flags.
 */
export function buildGenerateParamsFromFlags(options: GenerateCommandOptions): Result<GenerateHandlerParams, Error> {
  if (options.ticker === undefined) {
    return err(new InvalidArgumentsError('--ticker is required'));
  }

  const ticker = normalizeTicker(options.ticker);
  if (ticker.isErr()) {
    return err(ticker.error);
  }

  return ok({
    ticker: ticker.value,
    purpose: options.purpose ?? 'pledge',
    network: options.network,
    mode: options.complete ? 'complete' : 'standard',
    force: options.force ?? false,
    simple: options.simple ?? false,
    allowFallback: options.fallback,
  });
}

export const SECURITY_WARNING = [
  'This command writes private keys and a recovery phrase to disk.',
  '',
  '  • Run it on a trusted, offline machine when you can',
  '  • Store the recovery phrase somewhere safe',
  '  • Never share signing keys',
  '  • Keep encrypted backups (spo-wallet export, spo-wallet secure)',
].join('\n');

/**
 * File listing for the text output; secrets are flagged.
 */
export function formatGeneratedFiles(result: GenerationResult): string {
  return result.files
    .map((file) => {
      const line = `${formatFileMode(file.mode)}  ${path.relative(result.walletDir, file.path)}`;
      return file.sensitive ? `${line} (SENSITIVE)` : line;
    })
    .join('\n');
}

/**
 * What the operator does next with a freshly generated wallet.
 */
export function formatNextSteps(result: GenerationResult): string {
  const names = standardFileNames(result.ticker, result.purpose);
  return [
    '1. Import the 24-word recovery phrase into a Cardano wallet (single-address mode)',
    `2. Send a small test amount to the address in ${names.baseAddress}`,
    '3. Give your stake pool operator:',
    `     ${names.baseAddress}`,
    `     ${names.rewardAddress}`,
    `     ${names.stakingSigningKey}`,
    `     ${names.stakingVerificationKey}`,
    result.purpose === 'pledge'
      ? '4. Keep the balance above the declared pledge'
      : '4. Check the rewards address after each epoch',
  ].join('\n');
}
