import type { Command } from 'commander';

import { toError } from '../shared/cli-error.js';
import { parseCommandOptions, resolveCommandParams, unwrapResult } from '../shared/command-execution.js';
import { runCommand } from '../shared/command-runtime.js';
import { exitCodeForError } from '../shared/exit-codes.js';
import { formatFileMode } from '../shared/file-display.js';
import { OutputManager } from '../shared/output.js';
import { handleCancellation, promptConfirm } from '../shared/prompts.js';
import { GenerateCommandOptionsSchema } from '../shared/schemas.js';

import { GenerateHandler, type GenerateResult } from './generate-handler.js';
import { promptForGenerateParams } from './generate-prompts.js';
import {
  buildGenerateParamsFromFlags,
  formatGeneratedFiles,
  formatNextSteps,
  SECURITY_WARNING,
  type GenerateCommandOptions,
} from './generate-utils.js';

/**
 * Generate command result data (JSON mode).
 */
interface GenerateCommandResult {
  ticker: string;
  purpose: string;
  network: string;
  mode: string;
  provider: string;
  fallbackReason?: string | undefined;
  walletDir: string;
  sharedMnemonicPath: string;
  mnemonicCreated: boolean;
  baseAddress: string;
  rewardAddress: string;
  paymentAddress?: string | undefined;
  derivationPaths: Record<string, string | undefined>;
  files: { path: string; mode: string; sensitive: boolean }[];
}

/**
 * Register the generate command.
 */
export function registerGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('Generate a pledge or rewards wallet for a stake pool')
    .option('-t, --ticker <ticker>', 'Pool ticker (letters and digits)')
    .option('-p, --purpose <purpose>', 'Wallet purpose: pledge or rewards (default: pledge)')
    .option('-n, --network <network>', 'Network: mainnet, testnet, preview or preprod', 'mainnet')
    .option('--complete', 'Also write cardano-cli key files, credentials and certificates')
    .option('-f, --force', 'Replace the existing wallet for this purpose (the recovery phrase is kept)')
    .option('-s, --simple', 'Use the simplified derivation instead of cardano-address')
    .option('--no-fallback', 'Fail instead of switching to the simplified derivation when cardano-address is unusable')
    .option('-y, --yes', 'Skip the security warning and confirmations')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log to stderr')
    .action(async (rawOptions: unknown) => {
      await executeGenerateCommand(rawOptions);
    });
}

/**
 * Execute the generate command.
 */
async function executeGenerateCommand(rawOptions: unknown): Promise<void> {
  const options = parseCommandOptions('generate', GenerateCommandOptionsSchema, rawOptions);
  const output: OutputManager = new OutputManager(options.json ? 'json' : 'text');
  const isInteractive = !options.json && !options.yes;

  try {
    await runCommand({ verbose: options.verbose ?? false }, async (ctx) => {
      const handler = new GenerateHandler(ctx.environment);

      try {
        const params = await resolveCommandParams({
          isInteractive,
          output,
          commandName: 'generate',
          promptFn: async () => {
            output.note(SECURITY_WARNING, 'Security warning');
            return promptForGenerateParams(options);
          },
          buildFromFlags: () => unwrapResult(buildGenerateParamsFromFlags(options)),
          confirmMessage: 'Do you want to continue?',
          cancelMessage: 'Operation cancelled',
        });

        if (isInteractive && !params.force) {
          const exists = unwrapResult(handler.walletExists(params.ticker, params.purpose));
          if (exists) {
            const regenerate = await promptConfirm(
              `Wallet ${params.ticker}-${params.purpose} already exists. Regenerate it? The recovery phrase is kept.`,
              false
            );
            if (!regenerate) {
              handleCancellation('Existing wallet left unchanged');
            }
            params.force = true;
          }
        }

        output.info(`Generating ${params.ticker}-${params.purpose} wallet (${params.network}, ${params.mode})...`);
        const result = await handler.execute(params);

        if (result.isErr()) {
          output.error('generate', result.error, exitCodeForError(result.error));
          return;
        }

        handleGenerateSuccess(output, options, result.value);
      } finally {
        handler.destroy();
      }
    });
  } catch (error) {
    const failure = toError(error);
    output.error('generate', failure, exitCodeForError(failure));
  }
}

function handleGenerateSuccess(output: OutputManager, options: GenerateCommandOptions, result: GenerateResult): void {
  if (result.fallbackReason) {
    output.warn(
      `Used the simplified derivation because cardano-address was not usable (${result.fallbackReason}). ` +
        'Its keys and addresses are not valid on a Cardano network.'
    );
  }

  if (output.isTextMode()) {
    output.success(`Files generated in ${result.walletDir}`);
    output.log(formatGeneratedFiles(result));
    const addresses = [`Base address:   ${result.baseAddress}`, `Reward address: ${result.rewardAddress}`];
    if (result.paymentAddress) {
      addresses.push(`Payment address: ${result.paymentAddress}`);
    }
    output.note(addresses.join('\n'), 'Addresses');
    if (result.mnemonicCreated) {
      output.info(`New recovery phrase for ${result.ticker} written to ${result.sharedMnemonicPath}`);
    }
    if (!options.yes) {
      output.note(formatNextSteps(result), 'Next steps');
    }
    output.outro('Wallet ready');
  }

  const data: GenerateCommandResult = {
    ticker: result.ticker,
    purpose: result.purpose,
    network: result.network,
    mode: result.mode,
    provider: result.provider,
    fallbackReason: result.fallbackReason,
    walletDir: result.walletDir,
    sharedMnemonicPath: result.sharedMnemonicPath,
    mnemonicCreated: result.mnemonicCreated,
    baseAddress: result.baseAddress,
    rewardAddress: result.rewardAddress,
    paymentAddress: result.paymentAddress,
    derivationPaths: result.derivationPaths,
    files: result.files.map((file) => ({ path: file.path, mode: formatFileMode(file.mode), sensitive: file.sensitive })),
  };
  output.json('generate', data);
}
