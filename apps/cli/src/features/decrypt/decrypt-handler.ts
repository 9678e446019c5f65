import { getLogger } from '@spo-wallet/logger';
import { decryptBundle, type DecryptResult } from '@spo-wallet/vault';
import type { Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';

import type { DecryptHandlerParams } from './decrypt-utils.js';

export type { DecryptHandlerParams, DecryptResult };

const logger = getLogger('DecryptHandler');

/**
 * Decrypt handler: recovers the files of an export into an empty directory.
 */
export class DecryptHandler implements CommandHandler<DecryptHandlerParams, DecryptResult> {
  async execute(params: DecryptHandlerParams): Promise<Result<DecryptResult, Error>> {
    logger.info({ bundlePath: params.bundlePath, outputDir: params.outputDir }, 'Starting decrypt');

    return decryptBundle({
      bundlePath: params.bundlePath,
      keyPath: params.keyPath,
      password: params.password,
      outputDir: params.outputDir,
    });
  }

  destroy(): void {
    // No resources to cleanup
  }
}
