import path from 'node:path';

import { getConfigWarnings, getConfiguredLogLevel, getLogDirectory } from '@spo-wallet/env';
import { ConsoleSink, FileSink, getLogger, initLogger, type LogLevel, type Sink } from '@spo-wallet/logger';
import pc from 'picocolors';

export const LOG_FILE_NAME = 'spo-wallet.log';

export interface CliLoggingOptions {
  verbose: boolean;
  /** Overrides the configured log directory; tests point this at a tmp dir. */
  logDirectory?: string | undefined;
}

export interface CliLogging {
  level: LogLevel;
  logFile?: string | undefined;
  console: boolean;
}

/**
 * Install the CLI's sinks.
 *
 * Everything at or above the level goes to the 0600 log file. The console
 * sink (stderr) is added only for --verbose or an explicit
 * SPO_WALLET_LOG_LEVEL, so normal output and --json stay clean.
 */
export function configureCliLogging(options: CliLoggingOptions): CliLogging {
  const configuredLevel = getConfiguredLogLevel();
  const level: LogLevel = configuredLevel ?? (options.verbose ? 'debug' : 'info');
  const withConsole = options.verbose || configuredLevel !== undefined;

  const sinks: Sink[] = [];
  let logFile: string | undefined = path.join(options.logDirectory ?? getLogDirectory(), LOG_FILE_NAME);
  let fileSinkError: unknown;
  try {
    sinks.push(new FileSink({ path: logFile }));
  } catch (error) {
    fileSinkError = error;
    logFile = undefined;
  }
  if (withConsole || logFile === undefined) {
    sinks.push(new ConsoleSink({ color: pc.isColorSupported }));
  }

  initLogger({ level, sinks });

  const logger = getLogger('cli');
  if (fileSinkError !== undefined) {
    logger.warn({ error: fileSinkError }, 'Log file unavailable; logging to stderr only');
  }
  for (const warning of getConfigWarnings()) {
    logger.warn({ variable: warning.variable }, warning.message);
  }

  return { level, logFile, console: withConsole || logFile === undefined };
}
