import { err, ok, type Result } from 'neverthrow';

import { InvalidTickerError } from './errors.js';

export const PURPOSES = ['pledge', 'rewards'] as const;
export type Purpose = (typeof PURPOSES)[number];

export const NETWORKS = ['mainnet', 'testnet', 'preview', 'preprod'] as const;
export type Network = (typeof NETWORKS)[number];

export const WALLET_MODES = ['standard', 'complete'] as const;
export type WalletMode = (typeof WALLET_MODES)[number];

/** Network tag used in address headers and by `cardano-address --network-tag`. */
export function networkTag(network: Network): 0 | 1 {
  return network === 'mainnet' ? 1 : 0;
}

const TICKER_PATTERN = /^[A-Z0-9]+$/;

/**
 * Uppercase and validate a pool ticker. Only ASCII letters and digits are
 * accepted since the ticker becomes part of directory and file names.
 */
export function normalizeTicker(raw: string): Result<string, InvalidTickerError> {
  const ticker = raw.trim().toUpperCase();
  if (ticker.length === 0) {
    return err(new InvalidTickerError(raw, 'ticker is empty'));
  }
  if (!TICKER_PATTERN.test(ticker)) {
    return err(new InvalidTickerError(raw, 'only letters A-Z and digits 0-9 are allowed'));
  }
  return ok(ticker);
}
