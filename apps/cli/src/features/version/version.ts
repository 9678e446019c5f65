import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Command } from 'commander';

import { toError } from '../shared/cli-error.js';
import { parseCommandOptions } from '../shared/command-execution.js';
import { runCommand } from '../shared/command-runtime.js';
import { exitCodeForError } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { VersionCommandOptionsSchema } from '../shared/schemas.js';

import { VersionHandler } from './version-handler.js';
import { CLI_PACKAGE_NAME, findPackageVersion, formatVersion, UNKNOWN_VERSION, type VersionInfo } from './version-utils.js';

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

/**
 * Package version for `--version`; no git lookup.
 */
export function getCliVersion(): string {
  return findPackageVersion(moduleDir, CLI_PACKAGE_NAME) ?? UNKNOWN_VERSION;
}

/**
 * Register the version command.
 */
export function registerVersionCommand(program: Command): void {
  program
    .command('version')
    .description('Show the version, with the git commit when run from a checkout')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeVersionCommand(rawOptions);
    });
}

async function executeVersionCommand(rawOptions: unknown): Promise<void> {
  const options = parseCommandOptions('version', VersionCommandOptionsSchema, rawOptions);
  const output: OutputManager = new OutputManager(options.json ? 'json' : 'text');

  try {
    await runCommand({ verbose: false }, async (ctx) => {
      const handler = new VersionHandler({ runner: ctx.environment.runner, moduleDir });

      try {
        const result = await handler.execute();
        if (result.isErr()) {
          output.error('version', result.error, exitCodeForError(result.error));
          return;
        }

        handleVersionSuccess(output, result.value);
      } finally {
        handler.destroy();
      }
    });
  } catch (error) {
    const failure = toError(error);
    output.error('version', failure, exitCodeForError(failure));
  }
}

function handleVersionSuccess(output: OutputManager, info: VersionInfo): void {
  if (output.isTextMode()) {
    output.log(`spo-wallet v${formatVersion(info)}`);
    if (info.commit) {
      output.log(`Commit: ${info.commit}`);
    }
    if (info.dirty) {
      output.warn('Built from a working tree with uncommitted changes');
    }
  }

  output.json('version', { ...info, display: formatVersion(info) });
}
