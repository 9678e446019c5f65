import type { Command } from 'commander';

import { toError } from '../shared/cli-error.js';
import { parseCommandOptions, unwrapResult } from '../shared/command-execution.js';
import { runCommand } from '../shared/command-runtime.js';
import { exitCodeForError } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { resolvePassword } from '../shared/password.js';
import { ViewCommandOptionsSchema } from '../shared/schemas.js';
import { resolveWalletTarget } from '../shared/wallet-target.js';

import { ViewHandler, type ViewHandlerParams, type ViewResult } from './view-handler.js';

/**
 * Register the view command.
 */
export function registerViewCommand(program: Command): void {
  program
    .command('view')
    .description('List the secured files of a wallet, or print one decrypted')
    .option('-t, --ticker <ticker>', 'Pool ticker')
    .option('-p, --purpose <purpose>', 'Wallet purpose: pledge or rewards')
    .option('--file <name>', 'Secured file to decrypt, e.g. MYPOOL-pledge.staking_skey')
    .option('--password <password>', 'Password (prefer SPO_WALLET_PASSWORD or the prompt)')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log to stderr')
    .addHelpText(
      'after',
      `
Examples:
  $ spo-wallet view -t MYPOOL -p pledge
  $ spo-wallet view -t MYPOOL -p pledge --file MYPOOL-pledge.mnemonic.txt

The decrypted content is printed only; nothing is written to disk.
`
    )
    .action(async (rawOptions: unknown) => {
      await executeViewCommand(rawOptions);
    });
}

async function executeViewCommand(rawOptions: unknown): Promise<void> {
  const options = parseCommandOptions('view', ViewCommandOptionsSchema, rawOptions);
  const output: OutputManager = new OutputManager(options.json ? 'json' : 'text');

  try {
    await runCommand({ verbose: options.verbose ?? false }, async (ctx) => {
      const handler = new ViewHandler();

      try {
        const target = unwrapResult(resolveWalletTarget(ctx.environment.rootDir, options.ticker, options.purpose));
        let params: ViewHandlerParams;
        if (options.file === undefined) {
          params = { ...target, action: 'list' };
        } else {
          const password = unwrapResult(
            await resolvePassword({ flag: options.password, isJsonMode: output.isJsonMode(), confirm: false })
          );
          params = { ...target, action: 'show', file: options.file, password };
        }

        const result = await handler.execute(params);
        if (result.isErr()) {
          output.error('view', result.error, exitCodeForError(result.error));
          return;
        }

        handleViewSuccess(output, result.value);
      } finally {
        handler.destroy();
      }
    });
  } catch (error) {
    const failure = toError(error);
    output.error('view', failure, exitCodeForError(failure));
  }
}

function handleViewSuccess(output: OutputManager, result: ViewResult): void {
  if (output.isTextMode()) {
    if (result.action === 'list') {
      if (result.files.length === 0) {
        output.info(`No secured files in ${result.walletDir}`);
      } else {
        output.note(result.files.join('\n'), `Secured files in ${result.walletDir}`);
      }
    } else {
      output.note(result.content.trimEnd(), result.file);
    }
  }

  output.json('view', result);
}
