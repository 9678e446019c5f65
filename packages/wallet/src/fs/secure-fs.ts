/**
 * Synchronous file helpers that keep permissions explicit and report
 * failures as wallet errors.
 */

import { randomBytes } from 'node:crypto';
import { chmodSync, mkdirSync, readdirSync, readFileSync, renameSync, rmSync, unlinkSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';

import { getLogger } from '@spo-wallet/logger';
import { err, ok, type Result } from 'neverthrow';

import { fromFsError, isErrnoCode, MissingSourceFilesError, type WalletError } from '../errors.js';

const logger = getLogger('secure-fs');

export interface FileWrite {
  path: string;
  content: string | Uint8Array;
  mode: number;
}

/**
 * Run a throwing `node:fs` call and map its failure to a `WalletError`.
 */
export function tryFs<T>(path: string, operation: string, fn: () => T): Result<T, WalletError> {
  try {
    return ok(fn());
  } catch (error) {
    return err(fromFsError(error, path, operation));
  }
}

/** `undefined` when the file does not exist; any other failure is an error. */
export function readFileIfExists(path: string): Result<Buffer | undefined, WalletError> {
  return tryFs(path, 'read', () => {
    try {
      return readFileSync(path);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return undefined;
      throw error;
    }
  });
}

/** False for a missing directory or one without entries. */
export function isNonEmptyDirectory(path: string): Result<boolean, WalletError> {
  return tryFs(path, 'read directory', () => {
    try {
      return readdirSync(path).length > 0;
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return false;
      throw error;
    }
  });
}

/** Like `readFileIfExists`, but a missing file is `MissingSourceFiles`. */
export function readRequiredFile(path: string): Result<Buffer, WalletError> {
  return readFileIfExists(path).andThen((content) =>
    content === undefined ? err(new MissingSourceFilesError(dirname(path), [basename(path)])) : ok(content)
  );
}

export function ensureDirectory(path: string, mode: number): Result<void, WalletError> {
  return tryFs(path, 'create directory', () => {
    mkdirSync(path, { recursive: true, mode });
  });
}

/**
 * Create a new file with the given mode. Fails with `AlreadyExists` rather
 * than overwrite. The chmod afterwards undoes whatever the umask removed.
 */
export function writeNewFile(file: FileWrite): Result<void, WalletError> {
  return tryFs(file.path, 'write', () => {
    writeFileSync(file.path, file.content, { mode: file.mode, flag: 'wx' });
    chmodSync(file.path, file.mode);
  });
}

/**
 * Write through a temporary sibling and rename into place, so readers see
 * either the old file or the complete new one.
 */
export function writeFileAtomically(file: FileWrite): Result<void, WalletError> {
  const tempPath = join(dirname(file.path), `.${basename(file.path)}.${randomBytes(4).toString('hex')}.tmp`);
  const written = writeNewFile({ ...file, path: tempPath }).andThen(() =>
    tryFs(file.path, 'replace', () => renameSync(tempPath, file.path))
  );
  if (written.isErr()) {
    discardPath(tempPath);
  }
  return written;
}

export function removeFile(path: string): Result<void, WalletError> {
  return tryFs(path, 'remove', () => unlinkSync(path));
}

export function removePath(path: string): Result<void, WalletError> {
  return tryFs(path, 'remove', () => rmSync(path, { recursive: true, force: true }));
}

/**
 * Cleanup on a failure path. The original error is the one reported, so a
 * failed removal is only logged.
 */
export function discardPath(path: string): void {
  const removed = removePath(path);
  if (removed.isErr()) {
    logger.warn({ path, error: removed.error }, 'Could not remove leftover path');
  }
}
