import { pbkdf2Sync, randomBytes } from 'node:crypto';

export const KDF_NAME = 'pbkdf2-sha256';
export const KEY_LENGTH = 32;
export const SALT_LENGTH = 16;
export const MIN_KDF_ITERATIONS = 100_000;
export const DEFAULT_KDF_ITERATIONS = 210_000;

export interface PasswordKey {
  key: Buffer;
  salt: Buffer;
  iterations: number;
}

/**
 * PBKDF2-SHA256 of the password. A fresh random salt is drawn unless one is
 * given; iteration counts below the minimum are raised to it.
 */
export function derivePasswordKey(
  password: string,
  options: { salt?: Buffer | undefined; iterations?: number | undefined } = {}
): PasswordKey {
  const salt = options.salt ?? randomBytes(SALT_LENGTH);
  const iterations = Math.max(options.iterations ?? DEFAULT_KDF_ITERATIONS, MIN_KDF_ITERATIONS);
  const key = pbkdf2Sync(password.normalize('NFKC'), salt, iterations, KEY_LENGTH, 'sha256');
  return { key, salt, iterations };
}
