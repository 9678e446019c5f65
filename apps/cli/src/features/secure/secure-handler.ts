import { getLogger } from '@spo-wallet/logger';
import { secureWallet, type SecureWalletResult } from '@spo-wallet/vault';
import type { Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';
import type { WalletTarget } from '../shared/wallet-target.js';

export interface SecureHandlerParams extends WalletTarget {
  password: string;
}

export type { SecureWalletResult };

const logger = getLogger('SecureHandler');

export interface SecureHandlerOptions {
  kdfIterations?: number | undefined;
}

/**
 * Secure handler: replaces every signing key and recovery phrase in a
 * purpose directory with its password-encrypted `.enc` counterpart.
 */
export class SecureHandler implements CommandHandler<SecureHandlerParams, SecureWalletResult> {
  constructor(private readonly options: SecureHandlerOptions = {}) {}

  async execute(params: SecureHandlerParams): Promise<Result<SecureWalletResult, Error>> {
    logger.info({ ticker: params.ticker, purpose: params.purpose }, 'Securing wallet');
    return secureWallet(params.walletDir, params.password, { iterations: this.options.kdfIterations });
  }

  destroy(): void {
    // No resources to cleanup
  }
}
