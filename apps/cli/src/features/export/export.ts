import type { Command } from 'commander';

import { toError } from '../shared/cli-error.js';
import { parseCommandOptions, unwrapResult } from '../shared/command-execution.js';
import { runCommand } from '../shared/command-runtime.js';
import { exitCodeForError } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { resolvePassword } from '../shared/password.js';
import { ExportCommandOptionsSchema } from '../shared/schemas.js';

import { ExportHandler, type ExportResult } from './export-handler.js';
import { buildExportParamsFromFlags } from './export-utils.js';

/**
 * Export command result data (JSON mode).
 */
interface ExportCommandResult {
  ticker: string;
  purpose: string;
  mode: string;
  bundlePath: string;
  keyPath: string;
  files: string[];
}

/**
 * Register the export command.
 */
export function registerExportCommand(program: Command): void {
  program
    .command('export')
    .description('Seal a wallet into an encrypted bundle and key file for the pool operator')
    .option('-t, --ticker <ticker>', 'Pool ticker')
    .option('-p, --purpose <purpose>', 'Wallet purpose: pledge or rewards')
    .option('--output-dir <dir>', 'Where to write the bundle and key file (default: the ticker exports directory)')
    .option('--password <password>', 'Export password (prefer SPO_WALLET_PASSWORD or the prompt)')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log to stderr')
    .addHelpText(
      'after',
      `
Examples:
  $ spo-wallet export --ticker MYPOOL --purpose pledge
  $ SPO_WALLET_PASSWORD=... spo-wallet export -t MYPOOL -p rewards --output-dir ./handoff --json

Notes:
  - The recovery phrase is never part of an export.
  - Send the bundle and the key file through different channels.
`
    )
    .action(async (rawOptions: unknown) => {
      await executeExportCommand(rawOptions);
    });
}

/**
 * Execute the export command.
 */
async function executeExportCommand(rawOptions: unknown): Promise<void> {
  const options = parseCommandOptions('export', ExportCommandOptionsSchema, rawOptions);
  const output: OutputManager = new OutputManager(options.json ? 'json' : 'text');

  try {
    await runCommand({ verbose: options.verbose ?? false }, async (ctx) => {
      const handler = new ExportHandler();

      try {
        output.intro('spo-wallet export');
        const password = unwrapResult(
          await resolvePassword({ flag: options.password, isJsonMode: output.isJsonMode(), confirm: true })
        );
        const params = unwrapResult(buildExportParamsFromFlags(options, ctx.environment.rootDir, password));

        output.info(`Exporting ${params.ticker}-${params.purpose}...`);
        const result = await handler.execute(params);

        if (result.isErr()) {
          output.error('export', result.error, exitCodeForError(result.error));
          return;
        }

        handleExportSuccess(output, params.ticker, params.purpose, result.value);
      } finally {
        handler.destroy();
      }
    });
  } catch (error) {
    const failure = toError(error);
    output.error('export', failure, exitCodeForError(failure));
  }
}

function handleExportSuccess(output: OutputManager, ticker: string, purpose: string, result: ExportResult): void {
  if (output.isTextMode()) {
    output.success(`Exported ${result.files.length} files (${result.mode} wallet)`);
    output.note([`Bundle:   ${result.bundlePath}`, `Key file: ${result.keyPath}`].join('\n'), 'Export');
    output.warn('Send the bundle and the key file separately, and share the password out of band.');
    output.outro('Export complete');
  }

  const data: ExportCommandResult = {
    ticker,
    purpose,
    mode: result.mode,
    bundlePath: result.bundlePath,
    keyPath: result.keyPath,
    files: result.files,
  };
  output.json('export', data);
}
