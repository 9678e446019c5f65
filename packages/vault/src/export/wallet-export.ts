import { randomBytes } from 'node:crypto';
import { dirname, join } from 'node:path';

import { getLogger } from '@spo-wallet/logger';
import {
  AlreadyExistsError,
  COMPLETE_MODE_MARKER,
  completeFileNames,
  CorruptArchiveError,
  discardPath,
  ensureDirectory,
  EXPORTS_DIR_NAME,
  exportFileNames,
  FILE_MODES,
  fileModeFor,
  isNonEmptyDirectory,
  MissingSourceFilesError,
  readFileIfExists,
  readRequiredFile,
  standardFileNames,
  writeFileAtomically,
  writeNewFile,
  WrongPasswordError,
  type Purpose,
  type WalletError,
  type WalletMode,
} from '@spo-wallet/wallet';
import { err, ok, type Result } from 'neverthrow';

import { buildManifest, packArchive, unpackArchive, type ArchiveFile } from '../archive/wallet-archive.js';
import { open, seal } from '../crypto/aead.js';
import { derivePasswordKey, KDF_NAME, KEY_LENGTH } from '../crypto/password-key.js';

import {
  BUNDLE_HEADER,
  decodeBundle,
  encodeBundle,
  KEY_FILE_VERSION,
  parseKeyFile,
  serializeKeyFile,
} from './bundle-format.js';

const logger = getLogger('wallet-export');

export interface ExportWalletRequest {
  walletDir: string;
  ticker: string;
  purpose: Purpose;
  password: string;
  /** Defaults to `exports/` beside the purpose directory. */
  outputDir?: string | undefined;
  iterations?: number | undefined;
}

export interface ExportResult {
  bundlePath: string;
  keyPath: string;
  mode: WalletMode;
  files: string[];
}

export interface DecryptBundleRequest {
  bundlePath: string;
  keyPath: string;
  password: string;
  outputDir: string;
}

export interface RestoredFile {
  path: string;
  mode: number;
}

export interface DecryptResult {
  outputDir: string;
  ticker: string;
  purpose: Purpose;
  createdAt: string;
  files: RestoredFile[];
}

/**
 * File names an export carries. The recovery phrase is never part of an
 * export; complete-mode wallets add their key envelopes, addresses,
 * credentials and certificates.
 */
export function exportFileSet(ticker: string, purpose: Purpose, mode: WalletMode): string[] {
  const names = standardFileNames(ticker, purpose);
  const standard = [names.baseAddress, names.rewardAddress, names.stakingSigningKey, names.stakingVerificationKey];
  return mode === 'complete' ? [...standard, ...completeFileNames()] : standard;
}

export function detectWalletMode(walletDir: string): Result<WalletMode, WalletError> {
  return readFileIfExists(join(walletDir, COMPLETE_MODE_MARKER)).map((marker) =>
    marker === undefined ? 'standard' : 'complete'
  );
}

function collectFiles(walletDir: string, names: readonly string[]): Result<ArchiveFile[], WalletError> {
  const files: ArchiveFile[] = [];
  const missing: string[] = [];

  for (const name of names) {
    const content = readFileIfExists(join(walletDir, name));
    if (content.isErr()) return err(content.error);
    if (content.value === undefined) {
      missing.push(name);
      continue;
    }
    files.push({ name, mode: fileModeFor(name), content: content.value });
  }

  if (missing.length > 0) {
    return err(new MissingSourceFilesError(walletDir, missing));
  }
  return ok(files);
}

/**
 * Pack a wallet into an encrypted bundle plus a password-protected key file.
 *
 * The bundle is sealed with a random data key; only the key file depends on
 * the password, so both are needed to recover anything.
 */
export function exportWallet(request: ExportWalletRequest): Result<ExportResult, WalletError> {
  const { walletDir, ticker, purpose } = request;

  const mode = detectWalletMode(walletDir);
  if (mode.isErr()) return err(mode.error);

  const files = collectFiles(walletDir, exportFileSet(ticker, purpose, mode.value));
  if (files.isErr()) return err(files.error);

  const archive = packArchive(buildManifest(ticker, purpose, files.value));
  const dataKey = randomBytes(KEY_LENGTH);
  const bundle = encodeBundle(seal(dataKey, archive, BUNDLE_HEADER));

  const passwordKey = derivePasswordKey(request.password, { iterations: request.iterations });
  const wrapped = seal(passwordKey.key, dataKey);
  const keyFile = serializeKeyFile({
    version: KEY_FILE_VERSION,
    kdf: KDF_NAME,
    iterations: passwordKey.iterations,
    salt: passwordKey.salt.toString('base64'),
    iv: wrapped.iv.toString('base64'),
    tag: wrapped.tag.toString('base64'),
    wrappedKey: wrapped.ciphertext.toString('base64'),
  });
  dataKey.fill(0);

  const outputDir = request.outputDir ?? join(dirname(walletDir), EXPORTS_DIR_NAME);
  const prepared = ensureDirectory(outputDir, FILE_MODES.directory);
  if (prepared.isErr()) return err(prepared.error);

  const names = exportFileNames(ticker, purpose);
  const bundlePath = join(outputDir, names.bundle);
  const keyPath = join(outputDir, names.key);

  const bundleWritten = writeFileAtomically({ path: bundlePath, content: bundle, mode: FILE_MODES.secret });
  if (bundleWritten.isErr()) return err(bundleWritten.error);

  const keyWritten = writeFileAtomically({ path: keyPath, content: keyFile, mode: FILE_MODES.secret });
  if (keyWritten.isErr()) {
    discardPath(bundlePath);
    return err(keyWritten.error);
  }

  logger.info({ ticker, purpose, mode: mode.value, bundlePath, fileCount: files.value.length }, 'Wallet exported');

  return ok({
    bundlePath,
    keyPath,
    mode: mode.value,
    files: files.value.map((file) => file.name),
  });
}

/**
 * Recover the files of an export. Everything is decrypted and checked in
 * memory before the first file is written.
 */
export function decryptBundle(request: DecryptBundleRequest): Result<DecryptResult, WalletError> {
  const { bundlePath, keyPath, outputDir } = request;

  const keyText = readRequiredFile(keyPath);
  if (keyText.isErr()) return err(keyText.error);
  const keyFile = parseKeyFile(keyText.value.toString('utf8'), keyPath);
  if (keyFile.isErr()) return err(keyFile.error);

  const passwordKey = derivePasswordKey(request.password, {
    salt: Buffer.from(keyFile.value.salt, 'base64'),
    iterations: keyFile.value.iterations,
  });
  const dataKey = open(passwordKey.key, {
    iv: Buffer.from(keyFile.value.iv, 'base64'),
    tag: Buffer.from(keyFile.value.tag, 'base64'),
    ciphertext: Buffer.from(keyFile.value.wrappedKey, 'base64'),
  });
  if (dataKey.isErr()) return err(new WrongPasswordError(keyPath));
  if (dataKey.value.length !== KEY_LENGTH) {
    return err(
      new CorruptArchiveError(keyPath, `wrapped key is ${dataKey.value.length} bytes, expected ${KEY_LENGTH}`)
    );
  }

  const bundleData = readRequiredFile(bundlePath);
  if (bundleData.isErr()) return err(bundleData.error);
  const box = decodeBundle(bundleData.value, bundlePath);
  if (box.isErr()) return err(box.error);

  const archive = open(dataKey.value, box.value, BUNDLE_HEADER);
  dataKey.value.fill(0);
  if (archive.isErr()) {
    return err(new CorruptArchiveError(bundlePath, 'authentication failed (modified, or sealed for another key file)'));
  }

  const unpacked = unpackArchive(archive.value, bundlePath);
  if (unpacked.isErr()) return err(unpacked.error);

  const occupied = isNonEmptyDirectory(outputDir);
  if (occupied.isErr()) return err(occupied.error);
  if (occupied.value) return err(new AlreadyExistsError(outputDir));

  const prepared = ensureDirectory(outputDir, FILE_MODES.directory);
  if (prepared.isErr()) return err(prepared.error);

  const restored: RestoredFile[] = [];
  for (const file of unpacked.value.files) {
    const path = join(outputDir, file.name);
    const written = writeNewFile({ path, content: file.content, mode: file.mode });
    if (written.isErr()) {
      for (const done of restored) discardPath(done.path);
      return err(written.error);
    }
    restored.push({ path, mode: file.mode });
  }

  const { manifest } = unpacked.value;
  logger.info(
    { ticker: manifest.ticker, purpose: manifest.purpose, outputDir, fileCount: restored.length },
    'Bundle decrypted'
  );

  return ok({
    outputDir,
    ticker: manifest.ticker,
    purpose: manifest.purpose,
    createdAt: manifest.createdAt,
    files: restored,
  });
}
