import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

import { err, ok, type Result } from 'neverthrow';

const ALGORITHM = 'aes-256-gcm';
export const IV_LENGTH = 12;
export const TAG_LENGTH = 16;

export interface SealedBox {
  iv: Buffer;
  tag: Buffer;
  ciphertext: Buffer;
}

/** AES-256-GCM with a random IV. `aad` is authenticated but not encrypted. */
export function seal(key: Buffer, plaintext: Uint8Array, aad?: Uint8Array): SealedBox {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: TAG_LENGTH });
  if (aad) cipher.setAAD(aad);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return { iv, tag: cipher.getAuthTag(), ciphertext };
}

/**
 * Decrypt and authenticate. Any failure, including a wrong key, comes back
 * as an error; callers decide whether that means a bad password or a
 * damaged file.
 */
export function open(key: Buffer, box: SealedBox, aad?: Uint8Array): Result<Buffer, Error> {
  if (box.iv.length !== IV_LENGTH || box.tag.length !== TAG_LENGTH) {
    return err(new Error('invalid IV or authentication tag length'));
  }
  try {
    const decipher = createDecipheriv(ALGORITHM, key, box.iv, { authTagLength: TAG_LENGTH });
    decipher.setAuthTag(box.tag);
    if (aad) decipher.setAAD(aad);
    return ok(Buffer.concat([decipher.update(box.ciphertext), decipher.final()]));
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}
