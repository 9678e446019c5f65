import path from 'node:path';

import type { Command } from 'commander';

import { toError } from '../shared/cli-error.js';
import { parseCommandOptions, unwrapResult } from '../shared/command-execution.js';
import { runCommand } from '../shared/command-runtime.js';
import { exitCodeForError } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { resolvePassword } from '../shared/password.js';
import { SecureCommandOptionsSchema } from '../shared/schemas.js';
import { resolveWalletTarget } from '../shared/wallet-target.js';

import { SecureHandler, type SecureWalletResult } from './secure-handler.js';

interface SecureCommandResult {
  walletDir: string;
  files: { source: string; encrypted: string }[];
}

/**
 * Register the secure command.
 */
export function registerSecureCommand(program: Command): void {
  program
    .command('secure')
    .description('Encrypt the signing keys and recovery phrase of a wallet in place')
    .option('-t, --ticker <ticker>', 'Pool ticker')
    .option('-p, --purpose <purpose>', 'Wallet purpose: pledge or rewards')
    .option('--password <password>', 'Password (prefer SPO_WALLET_PASSWORD or the prompt)')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log to stderr')
    .action(async (rawOptions: unknown) => {
      await executeSecureCommand(rawOptions);
    });
}

async function executeSecureCommand(rawOptions: unknown): Promise<void> {
  const options = parseCommandOptions('secure', SecureCommandOptionsSchema, rawOptions);
  const output: OutputManager = new OutputManager(options.json ? 'json' : 'text');

  try {
    await runCommand({ verbose: options.verbose ?? false }, async (ctx) => {
      const handler = new SecureHandler();

      try {
        output.intro('spo-wallet secure');
        const target = unwrapResult(resolveWalletTarget(ctx.environment.rootDir, options.ticker, options.purpose));
        const password = unwrapResult(
          await resolvePassword({ flag: options.password, isJsonMode: output.isJsonMode(), confirm: true })
        );

        const result = await handler.execute({ ...target, password });
        if (result.isErr()) {
          output.error('secure', result.error, exitCodeForError(result.error));
          return;
        }

        handleSecureSuccess(output, result.value);
      } finally {
        handler.destroy();
      }
    });
  } catch (error) {
    const failure = toError(error);
    output.error('secure', failure, exitCodeForError(failure));
  }
}

function handleSecureSuccess(output: OutputManager, result: SecureWalletResult): void {
  if (output.isTextMode()) {
    output.success(`Encrypted ${result.files.length} files in ${result.walletDir}`);
    output.log(result.files.map((file) => path.basename(file.encryptedPath)).join('\n'));
    output.warn('The plaintext files were removed. Without the password they cannot be recovered.');
    output.outro('Wallet secured');
  }

  const data: SecureCommandResult = {
    walletDir: result.walletDir,
    files: result.files.map((file) => ({ source: file.sourcePath, encrypted: file.encryptedPath })),
  };
  output.json('secure', data);
}
