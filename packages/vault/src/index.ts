export { open, seal, IV_LENGTH, TAG_LENGTH, type SealedBox } from './crypto/aead.js';
export {
  DEFAULT_KDF_ITERATIONS,
  derivePasswordKey,
  KDF_NAME,
  MIN_KDF_ITERATIONS,
  type PasswordKey,
} from './crypto/password-key.js';
export * from './archive/wallet-archive.js';
export * from './export/bundle-format.js';
export * from './export/wallet-export.js';
export * from './secure/secured-files.js';
