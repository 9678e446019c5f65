import type { Command } from 'commander';

import { toError } from '../shared/cli-error.js';
import { parseCommandOptions, unwrapResult } from '../shared/command-execution.js';
import { runCommand } from '../shared/command-runtime.js';
import { exitCodeForError } from '../shared/exit-codes.js';
import { describeFiles, formatFileLines, type DisplayedFile } from '../shared/file-display.js';
import { OutputManager } from '../shared/output.js';
import { resolvePassword } from '../shared/password.js';
import { DecryptCommandOptionsSchema } from '../shared/schemas.js';

import { DecryptHandler, type DecryptResult } from './decrypt-handler.js';
import { buildDecryptParamsFromFlags } from './decrypt-utils.js';

/**
 * Decrypt command result data (JSON mode).
 */
interface DecryptCommandResult {
  ticker: string;
  purpose: string;
  createdAt: string;
  outputDir: string;
  files: DisplayedFile[];
}

/**
 * Register the decrypt command.
 */
export function registerDecryptCommand(program: Command): void {
  program
    .command('decrypt')
    .description('Recover the files of an export bundle')
    .option('--bundle <path>', 'Encrypted bundle (*.bundle.enc)')
    .option('--key <path>', 'Key file (*.key) that came with the bundle')
    .option('--output-dir <dir>', 'Empty or missing directory to write the files into')
    .option('--password <password>', 'Export password (prefer SPO_WALLET_PASSWORD or the prompt)')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log to stderr')
    .addHelpText(
      'after',
      `
Examples:
  $ spo-wallet decrypt --bundle MYPOOL-pledge-export.bundle.enc --key MYPOOL-pledge-export.key --output-dir ./pledge
`
    )
    .action(async (rawOptions: unknown) => {
      await executeDecryptCommand(rawOptions);
    });
}

/**
 * Execute the decrypt command.
 */
async function executeDecryptCommand(rawOptions: unknown): Promise<void> {
  const options = parseCommandOptions('decrypt', DecryptCommandOptionsSchema, rawOptions);
  const output: OutputManager = new OutputManager(options.json ? 'json' : 'text');

  try {
    await runCommand({ verbose: options.verbose ?? false }, async () => {
      const handler = new DecryptHandler();

      try {
        output.intro('spo-wallet decrypt');
        const password = unwrapResult(
          await resolvePassword({ flag: options.password, isJsonMode: output.isJsonMode(), confirm: false })
        );
        const result = await handler.execute(buildDecryptParamsFromFlags(options, password));

        if (result.isErr()) {
          output.error('decrypt', result.error, exitCodeForError(result.error));
          return;
        }

        handleDecryptSuccess(output, result.value);
      } finally {
        handler.destroy();
      }
    });
  } catch (error) {
    const failure = toError(error);
    output.error('decrypt', failure, exitCodeForError(failure));
  }
}

function handleDecryptSuccess(output: OutputManager, result: DecryptResult): void {
  if (output.isTextMode()) {
    output.success(`Recovered ${result.ticker}-${result.purpose} (exported ${result.createdAt}) into ${result.outputDir}`);
    output.log(formatFileLines(result.outputDir, result.files));
    output.outro('Decrypt complete');
  }

  const data: DecryptCommandResult = {
    ticker: result.ticker,
    purpose: result.purpose,
    createdAt: result.createdAt,
    outputDir: result.outputDir,
    files: describeFiles(result.files),
  };
  output.json('decrypt', data);
}
