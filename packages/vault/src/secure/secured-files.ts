import { readdirSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';

import { getLogger } from '@spo-wallet/logger';
import {
  AlreadyExistsError,
  CorruptArchiveError,
  discardPath,
  ENCRYPTED_SUFFIX,
  fileModeFor,
  FILE_MODES,
  fromFsError,
  isErrnoCode,
  isSensitiveFileName,
  MissingSourceFilesError,
  readFileIfExists,
  readRequiredFile,
  removeFile,
  writeFileAtomically,
  writeNewFile,
  WrongPasswordError,
  type WalletError,
} from '@spo-wallet/wallet';
import { err, ok, type Result } from 'neverthrow';

import { IV_LENGTH, open, seal, TAG_LENGTH } from '../crypto/aead.js';
import { derivePasswordKey, MIN_KDF_ITERATIONS, SALT_LENGTH } from '../crypto/password-key.js';

const logger = getLogger('secured-files');

const SECURED_MAGIC = Buffer.from('SPOS', 'ascii');
const SECURED_VERSION = 1;
// magic, version, salt, u32 iteration count
const HEADER_LENGTH = SECURED_MAGIC.length + 1 + SALT_LENGTH + 4;

export interface SecureOptions {
  iterations?: number | undefined;
}

export interface SecuredFile {
  sourcePath: string;
  encryptedPath: string;
}

export interface SecureWalletResult {
  walletDir: string;
  files: SecuredFile[];
}

export interface RestoreWalletResult {
  walletDir: string;
  files: { path: string; mode: number }[];
}

/**
 * `SPOS | version | salt | iterations | iv | tag | ciphertext`. The header up
 * to the iteration count is authenticated with the ciphertext.
 */
export function encryptSecuredContent(content: Uint8Array, password: string, options: SecureOptions = {}): Buffer {
  const passwordKey = derivePasswordKey(password, { iterations: options.iterations });
  const iterations = Buffer.alloc(4);
  iterations.writeUInt32BE(passwordKey.iterations);
  const header = Buffer.concat([SECURED_MAGIC, Buffer.from([SECURED_VERSION]), passwordKey.salt, iterations]);
  const box = seal(passwordKey.key, content, header);
  return Buffer.concat([header, box.iv, box.tag, box.ciphertext]);
}

export function decryptSecuredContent(data: Buffer, password: string, source: string): Result<Buffer, WalletError> {
  if (data.length < HEADER_LENGTH + IV_LENGTH + TAG_LENGTH) {
    return err(new CorruptArchiveError(source, 'file is too short to be a secured file'));
  }
  if (!data.subarray(0, SECURED_MAGIC.length).equals(SECURED_MAGIC)) {
    return err(new CorruptArchiveError(source, 'not a secured wallet file'));
  }
  const version = data[SECURED_MAGIC.length];
  if (version !== SECURED_VERSION) {
    return err(new CorruptArchiveError(source, `unsupported secured file version ${String(version)}`));
  }

  const saltStart = SECURED_MAGIC.length + 1;
  const salt = data.subarray(saltStart, saltStart + SALT_LENGTH);
  const iterations = data.readUInt32BE(saltStart + SALT_LENGTH);
  if (iterations < MIN_KDF_ITERATIONS) {
    return err(new CorruptArchiveError(source, `iteration count ${iterations} is below ${MIN_KDF_ITERATIONS}`));
  }

  const ivEnd = HEADER_LENGTH + IV_LENGTH;
  const tagEnd = ivEnd + TAG_LENGTH;
  const passwordKey = derivePasswordKey(password, { salt, iterations });
  const plaintext = open(
    passwordKey.key,
    { iv: data.subarray(HEADER_LENGTH, ivEnd), tag: data.subarray(ivEnd, tagEnd), ciphertext: data.subarray(tagEnd) },
    data.subarray(0, HEADER_LENGTH)
  );
  return plaintext.mapErr(() => new WrongPasswordError(source));
}

function securedPathFor(path: string): string {
  return `${path}${ENCRYPTED_SUFFIX}`;
}

function ensureAbsent(path: string): Result<void, WalletError> {
  return readFileIfExists(path).andThen((existing) =>
    existing === undefined ? ok(undefined) : err(new AlreadyExistsError(path))
  );
}

/**
 * Encrypt one file to `path.enc` and remove the plaintext. Refuses to
 * replace an existing `.enc`.
 */
export function secureFile(
  path: string,
  password: string,
  options: SecureOptions = {}
): Result<SecuredFile, WalletError> {
  const encryptedPath = securedPathFor(path);
  const absent = ensureAbsent(encryptedPath);
  if (absent.isErr()) return err(absent.error);

  const content = readRequiredFile(path);
  if (content.isErr()) return err(content.error);

  const written = writeFileAtomically({
    path: encryptedPath,
    content: encryptSecuredContent(content.value, password, options),
    mode: FILE_MODES.secret,
  });
  if (written.isErr()) return err(written.error);

  const removed = removeFile(path);
  if (removed.isErr()) return err(removed.error);

  logger.info({ file: basename(path) }, 'File secured');
  return ok({ sourcePath: path, encryptedPath });
}

function listDirectory(walletDir: string): Result<string[], WalletError> {
  try {
    return ok(readdirSync(walletDir).sort());
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      return err(new MissingSourceFilesError(dirname(walletDir), [basename(walletDir)]));
    }
    return err(fromFsError(error, walletDir, 'list'));
  }
}

/** Original names of the secured files in a wallet directory. */
export function listSecuredFiles(walletDir: string): Result<string[], WalletError> {
  return listDirectory(walletDir).map((names) =>
    names.filter((name) => name.endsWith(ENCRYPTED_SUFFIX)).map((name) => name.slice(0, -ENCRYPTED_SUFFIX.length))
  );
}

/**
 * Encrypt every signing key and recovery phrase in a wallet directory.
 * All ciphertexts are written before any plaintext is removed; if one
 * write fails the ones already written are discarded.
 */
export function secureWallet(
  walletDir: string,
  password: string,
  options: SecureOptions = {}
): Result<SecureWalletResult, WalletError> {
  const names = listDirectory(walletDir);
  if (names.isErr()) return err(names.error);

  const sensitive = names.value.filter((name) => !name.endsWith(ENCRYPTED_SUFFIX) && isSensitiveFileName(name));
  if (sensitive.length === 0) {
    return err(new MissingSourceFilesError(walletDir, ['*.skey', '*_skey', '*.mnemonic.txt']));
  }

  const planned = sensitive.map((name) => {
    const sourcePath = join(walletDir, name);
    return { sourcePath, encryptedPath: securedPathFor(sourcePath) };
  });
  for (const file of planned) {
    const absent = ensureAbsent(file.encryptedPath);
    if (absent.isErr()) return err(absent.error);
  }

  const written: SecuredFile[] = [];
  for (const file of planned) {
    const content = readRequiredFile(file.sourcePath);
    const result = content.andThen((plaintext) =>
      writeNewFile({
        path: file.encryptedPath,
        content: encryptSecuredContent(plaintext, password, options),
        mode: FILE_MODES.secret,
      })
    );
    if (result.isErr()) {
      for (const done of written) discardPath(done.encryptedPath);
      return err(result.error);
    }
    written.push(file);
  }

  for (const file of written) {
    const removed = removeFile(file.sourcePath);
    if (removed.isErr()) return err(removed.error);
  }

  logger.info({ walletDir, fileCount: written.length }, 'Wallet secured');
  return ok({ walletDir, files: written });
}

/** Decrypt a secured file into memory. Nothing is written to disk. */
export function viewFile(encryptedPath: string, password: string): Result<string, WalletError> {
  return readRequiredFile(encryptedPath)
    .andThen((data) => decryptSecuredContent(data, password, encryptedPath))
    .map((plaintext) => plaintext.toString('utf8'));
}

/**
 * Turn every `.enc` file back into its plaintext. Every file is decrypted
 * in memory first, so a wrong password restores nothing.
 */
export function restoreWallet(walletDir: string, password: string): Result<RestoreWalletResult, WalletError> {
  const secured = listSecuredFiles(walletDir);
  if (secured.isErr()) return err(secured.error);
  if (secured.value.length === 0) {
    return err(new MissingSourceFilesError(walletDir, [`*${ENCRYPTED_SUFFIX}`]));
  }

  const decrypted: { name: string; path: string; encryptedPath: string; content: Buffer }[] = [];
  for (const name of secured.value) {
    const path = join(walletDir, name);
    const encryptedPath = securedPathFor(path);

    const absent = ensureAbsent(path);
    if (absent.isErr()) return err(absent.error);

    const content = readRequiredFile(encryptedPath).andThen((data) =>
      decryptSecuredContent(data, password, encryptedPath)
    );
    if (content.isErr()) return err(content.error);
    decrypted.push({ name, path, encryptedPath, content: content.value });
  }

  const restored: { path: string; mode: number }[] = [];
  for (const file of decrypted) {
    const mode = fileModeFor(file.name);
    const written = writeNewFile({ path: file.path, content: file.content, mode });
    if (written.isErr()) {
      for (const done of restored) discardPath(done.path);
      return err(written.error);
    }
    restored.push({ path: file.path, mode });
  }

  for (const file of decrypted) {
    const removed = removeFile(file.encryptedPath);
    if (removed.isErr()) return err(removed.error);
  }

  logger.info({ walletDir, fileCount: restored.length }, 'Wallet restored');
  return ok({ walletDir, files: restored });
}
