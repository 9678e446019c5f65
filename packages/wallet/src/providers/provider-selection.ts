import { getLogger } from '@spo-wallet/logger';
import { err, ok, type Result } from 'neverthrow';

import { ToolUnavailableError, type WalletError } from '../errors.js';
import type { ToolProbeReport } from '../tools/tool-probe.js';
import type { ToolRunner } from '../tools/tool-runner.js';
import type { WalletMode } from '../wallet-types.js';

import { CardanoAddressKeyProvider } from './cardano-address-provider.js';
import type { KeyProvider } from './key-provider.js';
import { SimplifiedKeyProvider } from './simplified-provider.js';

const logger = getLogger('provider-selection');

export interface ProviderSelectionOptions {
  /** Caller asked for the simplified provider outright. */
  simple: boolean;
  mode: WalletMode;
  allowFallback: boolean;
  probe: ToolProbeReport;
  runner: ToolRunner;
  timeoutMs?: number | undefined;
}

export interface ProviderSelection {
  provider: KeyProvider;
  /** Set when the simplified provider was chosen because the tools were not usable. */
  fallbackReason?: WalletError | undefined;
}

/**
 * Choose the key provider once, from a tool probe taken at startup.
 *
 * Falling back to the simplified provider is only allowed in standard mode
 * with fallback enabled; complete mode needs real keys.
 */
export function selectKeyProvider(options: ProviderSelectionOptions): Result<ProviderSelection, WalletError> {
  if (options.simple) {
    return ok({ provider: new SimplifiedKeyProvider() });
  }

  const status = options.probe['cardano-address'];
  if (status.usable && status.command) {
    return ok({
      provider: new CardanoAddressKeyProvider({
        runner: options.runner,
        command: status.command,
        timeoutMs: options.timeoutMs,
      }),
    });
  }

  const reason = status.error ?? new ToolUnavailableError('cardano-address', 'probe did not succeed');
  if (options.mode === 'complete' || !options.allowFallback) {
    return err(reason);
  }

  logger.warn({ tool: status.tool, reason: reason.message }, 'Falling back to the simplified key provider');
  return ok({ provider: new SimplifiedKeyProvider(), fallbackReason: reason });
}

/**
 * Whether a failure raised during generation may be retried with the
 * simplified provider.
 */
export function canFallBack(error: WalletError, mode: WalletMode, allowFallback: boolean): boolean {
  return allowFallback && mode === 'standard' && error instanceof ToolUnavailableError;
}
