import * as p from '@clack/prompts';
import { normalizeTicker, type Purpose } from '@spo-wallet/wallet';

import { ExitCodes } from './exit-codes.js';

/**
 * Reusable prompt helpers for the CLI.
 */

/**
 * Check if the operation was cancelled by the user.
 */
export function isCancelled<T>(value: T | symbol): value is symbol {
  return p.isCancel(value);
}

/**
 * Handle cancellation by showing a message and exiting.
 */
export function handleCancellation(message = 'Operation cancelled'): never {
  p.cancel(message);
  process.exit(ExitCodes.CANCELLED);
}

/**
 * Prompt for the pool ticker. Validation mirrors the wallet's own rule so a
 * bad ticker is caught before anything else is asked.
 */
export async function promptTicker(): Promise<string> {
  const ticker = await p.text({
    message: 'Pool ticker:',
    placeholder: 'MYPOOL',
    validate: (value) => {
      const normalized = normalizeTicker(value ?? '');
      if (normalized.isErr()) return 'Use letters A-Z and digits 0-9 only';
    },
  });

  if (isCancelled(ticker)) {
    handleCancellation();
  }

  return ticker;
}

/**
 * Prompt for wallet purpose (pledge or rewards).
 */
export async function promptPurpose(): Promise<Purpose> {
  const purpose = await p.select({
    message: 'Which wallet?',
    options: [
      { value: 'pledge' as const, label: 'Pledge', hint: 'holds the declared pledge' },
      { value: 'rewards' as const, label: 'Rewards', hint: 'receives pool rewards' },
    ],
  });

  if (isCancelled(purpose)) {
    handleCancellation();
  }

  return purpose;
}

/**
 * Prompt for a password without echoing it.
 */
export async function promptPassword(message: string): Promise<string> {
  const password = await p.password({
    message,
    validate: (value) => {
      if (!value) return 'Please enter a password';
    },
  });

  if (isCancelled(password)) {
    handleCancellation();
  }

  return password;
}

/**
 * Prompt for confirmation.
 */
export async function promptConfirm(message: string, initialValue = true): Promise<boolean> {
  const confirmed = await p.confirm({
    message,
    initialValue,
  });

  if (isCancelled(confirmed)) {
    handleCancellation();
  }

  return confirmed;
}
