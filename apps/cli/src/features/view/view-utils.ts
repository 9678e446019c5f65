import path from 'node:path';

import { ENCRYPTED_SUFFIX } from '@spo-wallet/wallet';
import type { z } from 'zod';

import type { ViewCommandOptionsSchema } from '../shared/schemas.js';

export type ViewCommandOptions = z.infer<typeof ViewCommandOptionsSchema>;

/**
 * `--file` accepts the original name or the `.enc` name.
 */
export function securedPathFor(walletDir: string, file: string): string {
  const name = file.endsWith(ENCRYPTED_SUFFIX) ? file : `${file}${ENCRYPTED_SUFFIX}`;
  return path.join(walletDir, name);
}

export function originalNameOf(file: string): string {
  return file.endsWith(ENCRYPTED_SUFFIX) ? file.slice(0, -ENCRYPTED_SUFFIX.length) : file;
}
