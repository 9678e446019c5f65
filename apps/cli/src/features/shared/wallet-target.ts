import { normalizeTicker, purposeDirectory, type Purpose, type WalletError } from '@spo-wallet/wallet';
import type { Result } from 'neverthrow';

export interface WalletTarget {
  ticker: string;
  purpose: Purpose;
  walletDir: string;
}

/**
 * Resolve `--ticker`/`--purpose` to the purpose directory under the root.
 */
export function resolveWalletTarget(rootDir: string, ticker: string, purpose: Purpose): Result<WalletTarget, WalletError> {
  return normalizeTicker(ticker).map((normalized) => ({
    ticker: normalized,
    purpose,
    walletDir: purposeDirectory(rootDir, normalized, purpose),
  }));
}
