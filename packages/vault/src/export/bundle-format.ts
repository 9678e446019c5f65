import { CorruptArchiveError } from '@spo-wallet/wallet';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { IV_LENGTH, TAG_LENGTH, type SealedBox } from '../crypto/aead.js';
import { KDF_NAME, MIN_KDF_ITERATIONS } from '../crypto/password-key.js';

export const BUNDLE_MAGIC = Buffer.from('SPOB', 'ascii');
export const BUNDLE_VERSION = 1;
export const KEY_FILE_VERSION = 1;

/** Magic and version; authenticated as associated data. */
export const BUNDLE_HEADER = Buffer.concat([BUNDLE_MAGIC, Buffer.from([BUNDLE_VERSION])]);

export const KeyFileSchema = z.object({
  version: z.literal(KEY_FILE_VERSION),
  kdf: z.literal(KDF_NAME),
  iterations: z.number().int().min(MIN_KDF_ITERATIONS),
  salt: z.base64(),
  iv: z.base64(),
  tag: z.base64(),
  wrappedKey: z.base64(),
});

export type KeyFile = z.infer<typeof KeyFileSchema>;

export function encodeBundle(box: SealedBox): Buffer {
  return Buffer.concat([BUNDLE_HEADER, box.iv, box.tag, box.ciphertext]);
}

export function decodeBundle(data: Buffer, source: string): Result<SealedBox, CorruptArchiveError> {
  const bodyStart = BUNDLE_HEADER.length;
  if (data.length < bodyStart + IV_LENGTH + TAG_LENGTH) {
    return err(new CorruptArchiveError(source, 'file is too short to be a bundle'));
  }
  if (!data.subarray(0, BUNDLE_MAGIC.length).equals(BUNDLE_MAGIC)) {
    return err(new CorruptArchiveError(source, 'not a wallet bundle'));
  }
  const version = data[BUNDLE_MAGIC.length];
  if (version !== BUNDLE_VERSION) {
    return err(new CorruptArchiveError(source, `unsupported bundle version ${String(version)}`));
  }

  const ivEnd = bodyStart + IV_LENGTH;
  const tagEnd = ivEnd + TAG_LENGTH;
  return ok({
    iv: data.subarray(bodyStart, ivEnd),
    tag: data.subarray(ivEnd, tagEnd),
    ciphertext: data.subarray(tagEnd),
  });
}

export function serializeKeyFile(keyFile: KeyFile): string {
  return JSON.stringify(keyFile, undefined, 2) + '\n';
}

export function parseKeyFile(text: string, source: string): Result<KeyFile, CorruptArchiveError> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return err(new CorruptArchiveError(source, 'key file is not JSON'));
  }

  const parsed = KeyFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || 'key file'}: ${issue.message}` : 'invalid key file';
    return err(new CorruptArchiveError(source, `key file rejected (${where})`));
  }
  if (
    Buffer.from(parsed.data.iv, 'base64').length !== IV_LENGTH ||
    Buffer.from(parsed.data.tag, 'base64').length !== TAG_LENGTH
  ) {
    return err(new CorruptArchiveError(source, 'key file has an invalid IV or tag length'));
  }
  return ok(parsed.data);
}
