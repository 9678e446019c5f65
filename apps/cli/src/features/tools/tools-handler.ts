import { probeTools } from '@spo-wallet/wallet';
import { ok, type Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';
import type { WalletEnvironment } from '../shared/command-runtime.js';

import { toToolRows, type ToolRow } from './tools-utils.js';

export interface ToolsResult {
  toolsDir?: string | undefined;
  tools: ToolRow[];
}

/**
 * Tools handler: probes the Cardano binaries the way generate does.
 */
export class ToolsHandler implements CommandHandler<void, ToolsResult> {
  constructor(private readonly environment: WalletEnvironment) {}

  async execute(): Promise<Result<ToolsResult, Error>> {
    const report = probeTools(this.environment.runner, this.environment.toolSearch);
    return ok({ toolsDir: this.environment.toolSearch.toolsDir, tools: toToolRows(report) });
  }

  destroy(): void {
    // No resources to cleanup
  }
}
