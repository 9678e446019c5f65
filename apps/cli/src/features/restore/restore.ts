import type { Command } from 'commander';

import { toError } from '../shared/cli-error.js';
import { parseCommandOptions, unwrapResult } from '../shared/command-execution.js';
import { runCommand } from '../shared/command-runtime.js';
import { exitCodeForError } from '../shared/exit-codes.js';
import { describeFiles, formatFileLines } from '../shared/file-display.js';
import { OutputManager } from '../shared/output.js';
import { resolvePassword } from '../shared/password.js';
import { RestoreCommandOptionsSchema } from '../shared/schemas.js';
import { resolveWalletTarget } from '../shared/wallet-target.js';

import { RestoreHandler, type RestoreWalletResult } from './restore-handler.js';

/**
 * Register the restore command.
 */
export function registerRestoreCommand(program: Command): void {
  program
    .command('restore')
    .description('Decrypt the secured files of a wallet back to plaintext')
    .option('-t, --ticker <ticker>', 'Pool ticker')
    .option('-p, --purpose <purpose>', 'Wallet purpose: pledge or rewards')
    .option('--password <password>', 'Password (prefer SPO_WALLET_PASSWORD or the prompt)')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log to stderr')
    .action(async (rawOptions: unknown) => {
      await executeRestoreCommand(rawOptions);
    });
}

async function executeRestoreCommand(rawOptions: unknown): Promise<void> {
  const options = parseCommandOptions('restore', RestoreCommandOptionsSchema, rawOptions);
  const output: OutputManager = new OutputManager(options.json ? 'json' : 'text');

  try {
    await runCommand({ verbose: options.verbose ?? false }, async (ctx) => {
      const handler = new RestoreHandler();

      try {
        output.intro('spo-wallet restore');
        const target = unwrapResult(resolveWalletTarget(ctx.environment.rootDir, options.ticker, options.purpose));
        const password = unwrapResult(
          await resolvePassword({ flag: options.password, isJsonMode: output.isJsonMode(), confirm: false })
        );

        const result = await handler.execute({ ...target, password });
        if (result.isErr()) {
          output.error('restore', result.error, exitCodeForError(result.error));
          return;
        }

        handleRestoreSuccess(output, result.value);
      } finally {
        handler.destroy();
      }
    });
  } catch (error) {
    const failure = toError(error);
    output.error('restore', failure, exitCodeForError(failure));
  }
}

function handleRestoreSuccess(output: OutputManager, result: RestoreWalletResult): void {
  if (output.isTextMode()) {
    output.success(`Restored ${result.files.length} files in ${result.walletDir}`);
    output.log(formatFileLines(result.walletDir, result.files));
    output.outro('Wallet restored');
  }

  output.json('restore', { walletDir: result.walletDir, files: describeFiles(result.files) });
}
