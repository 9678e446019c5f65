#!/usr/bin/env node
import { flushLoggers, getLogger } from '@spo-wallet/logger';
import { Command } from 'commander';

import { registerDecryptCommand } from './features/decrypt/decrypt.js';
import { registerExportCommand } from './features/export/export.js';
import { registerGenerateCommand } from './features/generate/generate.js';
import { registerRestoreCommand } from './features/restore/restore.js';
import { registerSecureCommand } from './features/secure/secure.js';
import { registerToolsCommand } from './features/tools/tools.js';
import { getCliVersion, registerVersionCommand } from './features/version/version.js';
import { registerViewCommand } from './features/view/view.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('spo-wallet')
    .description('Generate, export and protect Cardano stake pool pledge and rewards wallets')
    .version(getCliVersion());

  // Wallet lifecycle
  registerGenerateCommand(program);
  registerExportCommand(program);
  registerDecryptCommand(program);

  // Encryption at rest
  registerSecureCommand(program);
  registerViewCommand(program);
  registerRestoreCommand(program);

  registerToolsCommand(program);
  registerVersionCommand(program);

  await program.parseAsync();
}

// Buffered sinks are written out however the process ends
process.on('exit', () => {
  flushLoggers();
});

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  logger.error(`Uncaught Exception: ${error.message}`);
  logger.error(`Stack: ${error.stack}`);
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  process.exit(1);
});
