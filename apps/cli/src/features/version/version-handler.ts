import type { ToolRunner } from '@spo-wallet/wallet';
import { ok, type Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';

import { CLI_PACKAGE_NAME, findPackageVersion, readGitInfo, UNKNOWN_VERSION, type VersionInfo } from './version-utils.js';

export interface VersionHandlerOptions {
  runner: ToolRunner;
  /** Directory of the running module; package.json and git are looked up from here. */
  moduleDir: string;
}

/**
 * Version handler. Git problems only drop the commit from the result.
 */
export class VersionHandler implements CommandHandler<void, VersionInfo> {
  constructor(private readonly options: VersionHandlerOptions) {}

  async execute(): Promise<Result<VersionInfo, Error>> {
    const version = findPackageVersion(this.options.moduleDir) ?? UNKNOWN_VERSION;
    const git = readGitInfo(this.options.runner, this.options.moduleDir);
    return ok({ name: CLI_PACKAGE_NAME, version, commit: git?.commit, dirty: git?.dirty ?? false });
  }

  destroy(): void {
    // No resources to cleanup
  }
}
