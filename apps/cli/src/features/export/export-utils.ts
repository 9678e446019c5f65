// Pure utility functions for the export command

import path from 'node:path';

import type { Result } from 'neverthrow';
import type { z } from 'zod';

import type { ExportCommandOptionsSchema } from '../shared/schemas.js';
import { resolveWalletTarget, type WalletTarget } from '../shared/wallet-target.js';

/**
 * Export command options validated by Zod at CLI boundary
 */
export type ExportCommandOptions = z.infer<typeof ExportCommandOptionsSchema>;

/**
 * Export handler parameters.
 */
export interface ExportHandlerParams extends WalletTarget {
  password: string;

  /** Where the bundle and key file go; defaults to the ticker's `exports/` directory */
  outputDir?: string | undefined;
}

/**
 * Build export parameters from validated CLI flags and a resolved password.
 */
export function buildExportParamsFromFlags(
  options: ExportCommandOptions,
  rootDir: string,
  password: string
): Result<ExportHandlerParams, Error> {
  return resolveWalletTarget(rootDir, options.ticker, options.purpose).map((target) => ({
    ...target,
    password,
    outputDir: options.outputDir === undefined ? undefined : path.resolve(options.outputDir),
  }));
}
