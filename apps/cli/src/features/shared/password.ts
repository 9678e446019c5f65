import { getEnvPassword } from '@spo-wallet/env';
import { registerSecret } from '@spo-wallet/logger';
import { err, ok, type Result } from 'neverthrow';

import { InvalidArgumentsError } from './cli-error.js';
import { promptPassword } from './prompts.js';

export interface PasswordSource {
  /** Value of `--password`, if given. */
  flag?: string | undefined;
  isJsonMode: boolean;
  /** Encrypting: ask twice and require both answers to match. */
  confirm: boolean;
}

/**
 * Resolve the password for an encrypt or decrypt command.
 *
 * Order: `--password`, then `SPO_WALLET_PASSWORD`, then a hidden prompt.
 * JSON mode never prompts.
 */
export async function resolvePassword(source: PasswordSource): Promise<Result<string, Error>> {
  const password = await readPassword(source);
  if (password.isOk()) {
    registerSecret(password.value);
  }
  return password;
}

async function readPassword(source: PasswordSource): Promise<Result<string, Error>> {
  if (source.flag !== undefined && source.flag.length > 0) {
    return ok(source.flag);
  }

  const fromEnv = getEnvPassword();
  if (fromEnv !== undefined) {
    return ok(fromEnv);
  }

  if (source.isJsonMode) {
    return err(new InvalidArgumentsError('A password is required: pass --password or set SPO_WALLET_PASSWORD'));
  }

  const password = await promptPassword(source.confirm ? 'Choose a password:' : 'Password:');
  if (!source.confirm) {
    return ok(password);
  }

  const repeated = await promptPassword('Repeat the password:');
  if (repeated !== password) {
    return err(new InvalidArgumentsError('Passwords do not match'));
  }
  return ok(password);
}
