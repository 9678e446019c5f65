import { getLogger } from '@spo-wallet/logger';
import { exportWallet, type ExportResult } from '@spo-wallet/vault';
import type { Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';

import type { ExportHandlerParams } from './export-utils.js';

// Re-export for convenience
export type { ExportHandlerParams, ExportResult };

const logger = getLogger('ExportHandler');

export interface ExportHandlerOptions {
  /** PBKDF2 iterations for the key file; the vault default when unset */
  kdfIterations?: number | undefined;
}

/**
 * Export handler: seals the wallet's export file set into an encrypted
 * bundle plus a password-wrapped key file.
 */
export class ExportHandler implements CommandHandler<ExportHandlerParams, ExportResult> {
  constructor(private readonly options: ExportHandlerOptions = {}) {}

  async execute(params: ExportHandlerParams): Promise<Result<ExportResult, Error>> {
    logger.info({ ticker: params.ticker, purpose: params.purpose, walletDir: params.walletDir }, 'Starting export');

    return exportWallet({
      walletDir: params.walletDir,
      ticker: params.ticker,
      purpose: params.purpose,
      password: params.password,
      outputDir: params.outputDir,
      iterations: this.options.kdfIterations,
    });
  }

  destroy(): void {
    // No resources to cleanup
  }
}
