import { isDevelopment } from '@spo-wallet/env';
import { WalletError } from '@spo-wallet/wallet';

import type { ExitCode } from './exit-codes.js';

export interface CLIResponseMetadata {
  [key: string]: unknown;

  /** Command execution duration in milliseconds */
  duration_ms?: number | undefined;

  /** CLI version */
  version?: string | undefined;
}

export interface CLIErrorBody {
  /** Machine-readable error code */
  code: string;

  /** Human-readable error message */
  message: string;

  /** Ticker, purpose, file or tool the failure is about */
  details?: unknown;

  /** Stack trace (development only) */
  stack?: string | undefined;
}

/**
 * Standardized CLI response format.
 * Used for both JSON output and internal tracking.
 */
export interface CLIResponse<T = unknown> {
  /** Whether the command executed successfully */
  success: boolean;

  /** Command that was executed */
  command: string;

  /** ISO 8601 timestamp of when the response was generated */
  timestamp: string;

  /** Response data (only present on success) */
  data?: T;

  /** Error information (only present on failure) */
  error?: CLIErrorBody | undefined;

  /** Additional metadata about the execution */
  metadata?: CLIResponseMetadata | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, metadata?: CLIResponseMetadata): CLIResponse<T> {
  const response: CLIResponse<T> = {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };

  if (metadata) {
    response.metadata = metadata;
  }

  return response;
}

export function createErrorResponse(
  command: string,
  error: Error,
  code: string,
  details?: unknown
): CLIResponse<never> {
  const errorObj: CLIErrorBody = {
    code,
    message: error.message,
  };

  if (details !== undefined) {
    errorObj.details = details;
  }

  if (isDevelopment() && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}

/**
 * Map exit code to error code string.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  const codes: Record<number, string> = {
    1: 'GENERAL_ERROR',
    2: 'INVALID_ARGS',
    3: 'ALREADY_EXISTS',
    4: 'NOT_FOUND',
    5: 'WRONG_PASSWORD',
    6: 'CORRUPT_ARCHIVE',
    7: 'PERMISSION_DENIED',
    8: 'ADDRESS_MISMATCH',
    9: 'TOOL_UNAVAILABLE',
    10: 'ENTROPY_FAILURE',
    11: 'INVALID_INPUT',
    130: 'CANCELLED',
  };
  return codes[exitCode] ?? 'UNKNOWN_ERROR';
}

/**
 * Error code reported in JSON envelopes: the wallet's own code when there is
 * one (`WRONG_PASSWORD`, `TOOL_VERSION_MISMATCH`, ...), otherwise the code of
 * the exit status.
 */
export function errorCodeFor(error: Error, exitCode: ExitCode): string {
  return error instanceof WalletError ? error.code : exitCodeToErrorCode(exitCode);
}
