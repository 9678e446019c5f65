import { getLogger } from '@spo-wallet/logger';
import { listSecuredFiles, viewFile } from '@spo-wallet/vault';
import type { Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';
import type { WalletTarget } from '../shared/wallet-target.js';

import { originalNameOf, securedPathFor } from './view-utils.js';

const logger = getLogger('ViewHandler');

export type ViewHandlerParams = WalletTarget &
  ({ action: 'list' } | { action: 'show'; file: string; password: string });

export type ViewResult =
  | { action: 'list'; walletDir: string; files: string[] }
  | { action: 'show'; walletDir: string; file: string; content: string };

/**
 * View handler: lists the secured files of a wallet, or decrypts one of
 * them into memory.
 */
export class ViewHandler implements CommandHandler<ViewHandlerParams, ViewResult> {
  async execute(params: ViewHandlerParams): Promise<Result<ViewResult, Error>> {
    if (params.action === 'list') {
      return listSecuredFiles(params.walletDir).map((files): ViewResult => ({
        action: 'list',
        walletDir: params.walletDir,
        files,
      }));
    }

    logger.info({ ticker: params.ticker, purpose: params.purpose, file: params.file }, 'Viewing secured file');
    return viewFile(securedPathFor(params.walletDir, params.file), params.password).map((content): ViewResult => ({
      action: 'show',
      walletDir: params.walletDir,
      file: originalNameOf(params.file),
      content,
    }));
  }

  destroy(): void {
    // No resources to cleanup
  }
}
