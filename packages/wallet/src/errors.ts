export type WalletErrorCode =
  | 'INVALID_TICKER'
  | 'ALREADY_EXISTS'
  | 'TOOL_UNAVAILABLE'
  | 'TOOL_VERSION_MISMATCH'
  | 'ENTROPY_FAILURE'
  | 'INVALID_PATH'
  | 'INVALID_MNEMONIC'
  | 'INVALID_KEY'
  | 'ADDRESS_MISMATCH'
  | 'WRONG_PASSWORD'
  | 'CORRUPT_ARCHIVE'
  | 'MISSING_SOURCE_FILES'
  | 'PERMISSION_DENIED'
  | 'IO_ERROR';

/**
 * Base class for every failure the wallet and vault packages report.
 *
 * Operations never throw these; they come back as the error side of a
 * neverthrow `Result`. `details` always names the ticker, purpose, role or
 * file involved so the CLI can show the operator what to look at.
 */
export abstract class WalletError extends Error {
  public readonly code: WalletErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(message: string, code: WalletErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class InvalidTickerError extends WalletError {
  constructor(ticker: string, reason: string) {
    super(`Invalid ticker "${ticker}": ${reason}`, 'INVALID_TICKER', { ticker });
  }
}

export class AlreadyExistsError extends WalletError {
  constructor(path: string, details?: Record<string, unknown>) {
    super(`${path} already exists`, 'ALREADY_EXISTS', { path, ...details });
  }
}

export interface ToolFailureDetails {
  args?: readonly string[] | undefined;
  exitCode?: number | null | undefined;
  stderr?: string | undefined;
}

export class ToolUnavailableError extends WalletError {
  public readonly tool: string;

  constructor(tool: string, reason: string, details?: ToolFailureDetails) {
    super(`${tool} unavailable: ${reason}`, 'TOOL_UNAVAILABLE', {
      tool,
      ...(details?.args ? { args: [...details.args] } : {}),
      ...(details?.exitCode !== undefined ? { exitCode: details.exitCode } : {}),
      ...(details?.stderr ? { stderr: details.stderr } : {}),
    });
    this.tool = tool;
  }
}

/**
 * The tool ran and exited 0 but printed something that is not what the
 * command produces. Treated as unavailability for fallback purposes.
 */
export class ToolOutputInvalidError extends ToolUnavailableError {
  constructor(tool: string, args: readonly string[], expected: string) {
    super(tool, `unexpected output from "${args.join(' ')}" (expected ${expected})`, { args });
  }
}

export class ToolVersionMismatchError extends WalletError {
  constructor(tool: string, found: string, required: string) {
    super(`${tool} ${found} is older than the supported minimum ${required}`, 'TOOL_VERSION_MISMATCH', {
      tool,
      found,
      required,
    });
  }
}

export class EntropyFailureError extends WalletError {
  constructor(reason: string) {
    super(`Could not gather entropy for a recovery phrase: ${reason}`, 'ENTROPY_FAILURE');
  }
}

export class InvalidPathError extends WalletError {
  constructor(path: string, reason: string) {
    super(`Invalid derivation path "${path}": ${reason}`, 'INVALID_PATH', { path });
  }
}

export class InvalidMnemonicError extends WalletError {
  constructor(source: string, reason: string) {
    super(`Recovery phrase in ${source} is not usable: ${reason}`, 'INVALID_MNEMONIC', { source });
  }
}

export class InvalidKeyError extends WalletError {
  constructor(label: string, reason: string) {
    super(`Key material for ${label} is not usable: ${reason}`, 'INVALID_KEY', { key: label });
  }
}

export class AddressMismatchError extends WalletError {
  constructor(ticker: string, purpose: string, addressKind: string, reason: string) {
    super(`${addressKind} address verification failed for ${ticker}/${purpose}: ${reason}`, 'ADDRESS_MISMATCH', {
      ticker,
      purpose,
      addressKind,
    });
  }
}

export class WrongPasswordError extends WalletError {
  constructor(file: string) {
    super(`Wrong password for ${file}`, 'WRONG_PASSWORD', { file });
  }
}

export class CorruptArchiveError extends WalletError {
  constructor(file: string, reason: string) {
    super(`${file} is corrupt: ${reason}`, 'CORRUPT_ARCHIVE', { file });
  }
}

export class MissingSourceFilesError extends WalletError {
  constructor(directory: string, missing: readonly string[]) {
    super(`Missing files in ${directory}: ${missing.join(', ')}`, 'MISSING_SOURCE_FILES', {
      directory,
      missing: [...missing],
    });
  }
}

export class PermissionDeniedError extends WalletError {
  constructor(path: string, operation: string) {
    super(`Permission denied while trying to ${operation} ${path}`, 'PERMISSION_DENIED', { path, operation });
  }
}

export class WalletIoError extends WalletError {
  constructor(path: string, operation: string, reason: string) {
    super(`Failed to ${operation} ${path}: ${reason}`, 'IO_ERROR', { path, operation });
  }
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map a thrown `node:fs` error to the wallet taxonomy.
 */
export function fromFsError(error: unknown, path: string, operation: string): WalletError {
  const code = errnoCode(error);
  if (code === 'EACCES' || code === 'EPERM') {
    return new PermissionDeniedError(path, operation);
  }
  if (code === 'EEXIST') {
    return new AlreadyExistsError(path);
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new WalletIoError(path, operation, reason);
}

export function isErrnoCode(error: unknown, code: string): boolean {
  return errnoCode(error) === code;
}
