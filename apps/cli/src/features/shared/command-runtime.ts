import { getToolTimeoutMs, getToolsDirectory, getWalletRootDirectory } from '@spo-wallet/env';
import { flushLoggers, getLogger } from '@spo-wallet/logger';
import { SpawnToolRunner, type ToolRunner, type ToolSearchOptions } from '@spo-wallet/wallet';

import { configureCliLogging } from './logging.js';

const logger = getLogger('command-runtime');

/**
 * What a wallet command needs from its environment, resolved once per run.
 * Handlers receive the pieces they use, so tests build them by hand.
 */
export interface WalletEnvironment {
  rootDir: string;
  runner: ToolRunner;
  toolSearch: ToolSearchOptions;
  timeoutMs: number;
}

/**
 * Configures logging and resolves configuration for one CLI invocation.
 *
 * - `environment`: root directory, tool runner and tool search path
 * - `dispose()`: flush the log sinks. Idempotent.
 */
export class CommandContext {
  readonly environment: WalletEnvironment;
  private disposed = false;

  constructor(options: { verbose: boolean }) {
    configureCliLogging({ verbose: options.verbose });

    const timeoutMs = getToolTimeoutMs();
    this.environment = {
      rootDir: getWalletRootDirectory(),
      runner: new SpawnToolRunner({ timeoutMs }),
      toolSearch: { toolsDir: getToolsDirectory() },
      timeoutMs,
    };
    logger.debug({ rootDir: this.environment.rootDir, toolsDir: this.environment.toolSearch.toolsDir }, 'Resolved paths');
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    flushLoggers();
  }
}

/**
 * Run a CLI command with a context whose log sinks are flushed afterwards.
 *
 * Does NOT catch fn errors: they propagate to the outer catch in each
 * command. `OutputManager.error` exits the process; the entry point flushes
 * on `exit`.
 */
export async function runCommand(
  options: { verbose: boolean },
  fn: (ctx: CommandContext) => Promise<void>
): Promise<void> {
  const ctx = new CommandContext(options);
  try {
    await fn(ctx);
  } finally {
    ctx.dispose();
  }
}
