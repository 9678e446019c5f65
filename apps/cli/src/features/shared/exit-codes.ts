import { WalletError, type WalletErrorCode } from '@spo-wallet/wallet';

import { InvalidArgumentsError } from './cli-error.js';

/**
 * Semantic exit codes for the CLI.
 * Each wallet failure class gets its own code so scripts can branch on it.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments, options or ticker */
  INVALID_ARGS: 2,

  /** Wallet, output directory or encrypted file already present */
  ALREADY_EXISTS: 3,

  /** Wallet or expected source files not found */
  NOT_FOUND: 4,

  /** Password did not open the encrypted material */
  WRONG_PASSWORD: 5,

  /** Bundle, key file or secured file failed integrity checks */
  CORRUPT_ARCHIVE: 6,

  /** Permission denied */
  PERMISSION_DENIED: 7,

  /** Derived addresses did not survive cross-verification */
  ADDRESS_MISMATCH: 8,

  /** Cardano tool missing, failing or too old */
  TOOL_UNAVAILABLE: 9,

  /** No entropy for a recovery phrase */
  ENTROPY_FAILURE: 10,

  /** Unusable derivation path, recovery phrase or key material */
  INVALID_INPUT: 11,

  /** Operation cancelled by user (128 + SIGINT) */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

const WALLET_EXIT_CODES: Record<WalletErrorCode, ExitCode> = {
  INVALID_TICKER: ExitCodes.INVALID_ARGS,
  ALREADY_EXISTS: ExitCodes.ALREADY_EXISTS,
  MISSING_SOURCE_FILES: ExitCodes.NOT_FOUND,
  WRONG_PASSWORD: ExitCodes.WRONG_PASSWORD,
  CORRUPT_ARCHIVE: ExitCodes.CORRUPT_ARCHIVE,
  PERMISSION_DENIED: ExitCodes.PERMISSION_DENIED,
  ADDRESS_MISMATCH: ExitCodes.ADDRESS_MISMATCH,
  TOOL_UNAVAILABLE: ExitCodes.TOOL_UNAVAILABLE,
  TOOL_VERSION_MISMATCH: ExitCodes.TOOL_UNAVAILABLE,
  ENTROPY_FAILURE: ExitCodes.ENTROPY_FAILURE,
  INVALID_PATH: ExitCodes.INVALID_INPUT,
  INVALID_MNEMONIC: ExitCodes.INVALID_INPUT,
  INVALID_KEY: ExitCodes.INVALID_INPUT,
  IO_ERROR: ExitCodes.GENERAL_ERROR,
};

/**
 * Pick the exit code for an error coming out of a handler.
 */
export function exitCodeForError(error: Error): ExitCode {
  if (error instanceof WalletError) {
    return WALLET_EXIT_CODES[error.code];
  }
  if (error instanceof InvalidArgumentsError) {
    return ExitCodes.INVALID_ARGS;
  }
  return ExitCodes.GENERAL_ERROR;
}
