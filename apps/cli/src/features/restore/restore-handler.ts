import { getLogger } from '@spo-wallet/logger';
import { restoreWallet, type RestoreWalletResult } from '@spo-wallet/vault';
import type { Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';
import type { WalletTarget } from '../shared/wallet-target.js';

export interface RestoreHandlerParams extends WalletTarget {
  password: string;
}

export type { RestoreWalletResult };

const logger = getLogger('RestoreHandler');

/**
 * Restore handler: turns the `.enc` files of a secured wallet back into
 * plaintext.
 */
export class RestoreHandler implements CommandHandler<RestoreHandlerParams, RestoreWalletResult> {
  async execute(params: RestoreHandlerParams): Promise<Result<RestoreWalletResult, Error>> {
    logger.info({ ticker: params.ticker, purpose: params.purpose }, 'Restoring wallet');
    return restoreWallet(params.walletDir, params.password);
  }

  destroy(): void {
    // No resources to cleanup
  }
}
