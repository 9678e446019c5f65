import type { Command } from 'commander';
import pc from 'picocolors';

import { toError } from '../shared/cli-error.js';
import { parseCommandOptions } from '../shared/command-execution.js';
import { runCommand } from '../shared/command-runtime.js';
import { exitCodeForError } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { ToolsCommandOptionsSchema } from '../shared/schemas.js';

import { ToolsHandler, type ToolsResult } from './tools-handler.js';
import { describeGenerationSupport, formatToolRow } from './tools-utils.js';

/**
 * Register the tools command.
 */
export function registerToolsCommand(program: Command): void {
  program
    .command('tools')
    .description('Show which Cardano tools were found and whether they are usable')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log to stderr')
    .action(async (rawOptions: unknown) => {
      await executeToolsCommand(rawOptions);
    });
}

async function executeToolsCommand(rawOptions: unknown): Promise<void> {
  const options = parseCommandOptions('tools', ToolsCommandOptionsSchema, rawOptions);
  const output: OutputManager = new OutputManager(options.json ? 'json' : 'text');

  try {
    await runCommand({ verbose: options.verbose ?? false }, async (ctx) => {
      const handler = new ToolsHandler(ctx.environment);

      try {
        const result = await handler.execute();
        if (result.isErr()) {
          output.error('tools', result.error, exitCodeForError(result.error));
          return;
        }

        handleToolsSuccess(output, result.value);
      } finally {
        handler.destroy();
      }
    });
  } catch (error) {
    const failure = toError(error);
    output.error('tools', failure, exitCodeForError(failure));
  }
}

function handleToolsSuccess(output: OutputManager, result: ToolsResult): void {
  if (output.isTextMode()) {
    const lines = result.tools.map((row) => `${row.usable ? pc.green('✓') : pc.red('✗')} ${formatToolRow(row)}`);
    output.note(lines.join('\n'), result.toolsDir ? `Tools (searched ${result.toolsDir} and PATH)` : 'Tools');
    output.info(describeGenerationSupport(result.tools));
  }

  output.json('tools', result);
}
