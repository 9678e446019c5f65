import path from 'node:path';

import type { z } from 'zod';

import type { DecryptCommandOptionsSchema } from '../shared/schemas.js';

export type DecryptCommandOptions = z.infer<typeof DecryptCommandOptionsSchema>;

export interface DecryptHandlerParams {
  bundlePath: string;
  keyPath: string;
  outputDir: string;
  password: string;
}

/**
 * Resolve the bundle, key and output paths against the working directory.
 */
export function buildDecryptParamsFromFlags(options: DecryptCommandOptions, password: string): DecryptHandlerParams {
  return {
    bundlePath: path.resolve(options.bundle),
    keyPath: path.resolve(options.key),
    outputDir: path.resolve(options.outputDir),
    password,
  };
}
