import * as p from '@clack/prompts';
import { isDevelopment } from '@spo-wallet/env';
import { getLogger } from '@spo-wallet/logger';
import { WalletError } from '@spo-wallet/wallet';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, errorCodeFor, type CLIResponseMetadata } from './cli-response.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';

const logger = getLogger('OutputManager');

export type OutputFormat = 'json' | 'text';

/**
 * Tips shown after error messages, keyed by exit code.
 */
const ERROR_TIPS: Partial<Record<ExitCode, string>> = {
  [ExitCodes.INVALID_ARGS]: 'Check your command arguments and try again.\nRun with --help for usage information.',
  [ExitCodes.ALREADY_EXISTS]: 'Nothing was changed. Use --force to regenerate, or pick an empty output directory.',
  [ExitCodes.NOT_FOUND]: 'Generate the wallet first, or check the ticker and purpose.',
  [ExitCodes.WRONG_PASSWORD]: 'The password does not open this file. Nothing was written.',
  [ExitCodes.CORRUPT_ARCHIVE]: 'The file was modified or does not belong with its key file.',
  [ExitCodes.TOOL_UNAVAILABLE]:
    'Install cardano-address 3.12.0 or newer in ~/.cardano_spo_cli/tools or on PATH.\n' +
    'Run "spo-wallet tools" to see what was found.',
  [ExitCodes.ADDRESS_MISMATCH]: 'No files were written for this purpose. Check the Cardano tool installation.',
};

/**
 * OutputManager handles formatting and displaying CLI output.
 * Supports both human-readable text output and machine-readable JSON.
 */
export class OutputManager {
  private startTime: number = Date.now();

  constructor(private format: OutputFormat = 'text') {}

  /**
   * Check if output is in JSON mode.
   */
  isJsonMode(): boolean {
    return this.format === 'json';
  }

  /**
   * Check if output is in text mode.
   */
  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Output a success response.
   */
  json<T>(command: string, data: T, metadata?: CLIResponseMetadata): void {
    if (this.format === 'json') {
      const duration_ms = Date.now() - this.startTime;
      const response = createSuccessResponse(command, data, {
        duration_ms,
        ...metadata,
      });
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  /**
   * Output an error response and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const errorCode = errorCodeFor(error, exitCode);
    const details = error instanceof WalletError ? error.details : undefined;
    const response = createErrorResponse(command, error, errorCode, details);

    if (this.format === 'json') {
      // In JSON mode, write to stdout (not stderr) so callers can parse the response
      console.log(JSON.stringify(response, undefined, 2));
    } else {
      this.displayTextError(error, exitCode);
    }

    process.exit(exitCode);
  }

  /**
   * Display an intro message (only in text mode).
   */
  intro(message: string): void {
    if (this.format === 'text') {
      p.intro(pc.bgCyan(pc.black(` ${message} `)));
    }
  }

  /**
   * Display an outro message (only in text mode).
   */
  outro(message: string): void {
    if (this.format === 'text') {
      p.outro(message);
    }
  }

  /**
   * Display a note (only in text mode).
   */
  note(message: string, title?: string): void {
    if (this.format === 'text') {
      p.note(message, title);
    }
  }

  log(message: string): void {
    if (this.format === 'text') {
      p.log.message(message, { spacing: 0 });
    }
  }

  info(message: string): void {
    if (this.format === 'text') {
      p.log.info(message);
    }
  }

  success(message: string): void {
    if (this.format === 'text') {
      p.log.success(message);
    }
  }

  /**
   * Display a warning (only in text mode).
   */
  warn(message: string): void {
    if (this.format === 'text') {
      p.log.warn(pc.yellow(message));
    } else {
      // In JSON mode, warnings go to the log file as structured entries
      logger.warn(message);
    }
  }

  private displayTextError(error: Error, exitCode: ExitCode): void {
    p.log.error(`${pc.red('Error')}: ${error.message}`);

    const tip = ERROR_TIPS[exitCode];
    if (tip) {
      p.note(tip, 'Tip');
    }

    if (isDevelopment() && error.stack) {
      logger.debug(`Stack trace:\n${error.stack}`);
    }
  }
}
