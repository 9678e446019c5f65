import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

import { getLogger } from '@spo-wallet/logger';
import type { ToolRunner } from '@spo-wallet/wallet';
import { z } from 'zod';

const logger = getLogger('version');

export const CLI_PACKAGE_NAME = '@spo-wallet/cli';
export const UNKNOWN_VERSION = '0.0.0';

const GIT_TIMEOUT_MS = 5_000;

const PackageManifestSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
});

export interface GitInfo {
  commit: string;
  dirty: boolean;
}

export interface VersionInfo {
  name: string;
  version: string;
  commit?: string | undefined;
  dirty: boolean;
}

function readManifest(manifestPath: string): z.infer<typeof PackageManifestSchema> | undefined {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(manifestPath, 'utf8'));
  } catch (error) {
    logger.debug({ manifestPath, error: String(error) }, 'Unreadable package.json');
    return undefined;
  }
  const parsed = PackageManifestSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Walk up from `startDir` to the package.json named `packageName`. Works
 * from the sources and from the bundled `dist/` alike.
 */
export function findPackageVersion(startDir: string, packageName = CLI_PACKAGE_NAME): string | undefined {
  let directory = path.resolve(startDir);
  for (;;) {
    const manifestPath = path.join(directory, 'package.json');
    if (existsSync(manifestPath)) {
      const manifest = readManifest(manifestPath);
      if (manifest?.name === packageName && manifest.version) {
        return manifest.version;
      }
    }
    const parent = path.dirname(directory);
    if (parent === directory) return undefined;
    directory = parent;
  }
}

/**
 * Short commit hash and working-tree state of the checkout around `cwd`.
 * `undefined` outside a checkout or without git.
 */
export function readGitInfo(runner: ToolRunner, cwd: string): GitInfo | undefined {
  const head = runner.run('git', ['rev-parse', '--short', 'HEAD'], { cwd, timeoutMs: GIT_TIMEOUT_MS });
  if (head.isErr()) {
    logger.debug({ cwd, error: head.error.message }, 'No git commit available');
    return undefined;
  }
  const commit = head.value.stdout.trim();
  if (commit.length === 0) return undefined;

  const status = runner.run('git', ['status', '--porcelain'], { cwd, timeoutMs: GIT_TIMEOUT_MS });
  if (status.isErr()) {
    logger.debug({ cwd, error: status.error.message }, 'Could not read git status');
    return { commit, dirty: false };
  }
  return { commit, dirty: status.value.stdout.trim().length > 0 };
}

/**
 * `1.2.3`, `1.2.3+abc1234` or `1.2.3+abc1234.dirty` (semver build metadata).
 */
export function formatVersion(info: VersionInfo): string {
  if (!info.commit) return info.version;
  return `${info.version}+${info.commit}${info.dirty ? '.dirty' : ''}`;
}
