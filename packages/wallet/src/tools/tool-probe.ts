import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, join } from 'node:path';

import { getLogger } from '@spo-wallet/logger';

import { ToolUnavailableError, ToolVersionMismatchError, type WalletError } from '../errors.js';

import type { ToolRunner } from './tool-runner.js';

const logger = getLogger('tool-probe');

export const CARDANO_TOOLS = ['cardano-address', 'cardano-cli', 'bech32'] as const;
export type CardanoTool = (typeof CARDANO_TOOLS)[number];

export const MINIMUM_TOOL_VERSIONS: Partial<Record<CardanoTool, string>> = {
  'cardano-address': '3.12.0',
  'cardano-cli': '8.0.0',
};

export const PROBE_TIMEOUT_MS = 5_000;

export interface ToolStatus {
  tool: CardanoTool;
  /** Resolved executable path, when one was found. */
  command?: string | undefined;
  version?: string | undefined;
  usable: boolean;
  error?: WalletError | undefined;
}

export type ToolProbeReport = Record<CardanoTool, ToolStatus>;

export interface ToolSearchOptions {
  toolsDir?: string | undefined;
  /** PATH-style list; defaults to `process.env.PATH`. */
  searchPath?: string | undefined;
}

function isExecutableFile(candidate: string): boolean {
  try {
    if (!statSync(candidate).isFile()) return false;
    accessSync(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find a tool binary. Lookup order: the tools directory, its `bin/`
 * subdirectory, then every PATH entry.
 */
export function locateTool(tool: CardanoTool, options: ToolSearchOptions = {}): string | undefined {
  const directories: string[] = [];
  if (options.toolsDir) {
    directories.push(options.toolsDir, join(options.toolsDir, 'bin'));
  }
  const searchPath = options.searchPath ?? process.env['PATH'] ?? '';
  directories.push(...searchPath.split(delimiter).filter((entry) => entry.length > 0));

  for (const directory of directories) {
    const candidate = join(directory, tool);
    if (isExecutableFile(candidate)) return candidate;
  }
  return undefined;
}

const VERSION_PATTERN = /(\d+)\.(\d+)\.(\d+)/;

export function parseToolVersion(output: string): string | undefined {
  const match = VERSION_PATTERN.exec(output);
  return match ? `${match[1]}.${match[2]}.${match[3]}` : undefined;
}

/** Negative when `a < b`, zero when equal, positive when `a > b`. */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map(Number);
  const right = b.split('.').map(Number);
  for (let position = 0; position < 3; position++) {
    const difference = (left[position] ?? 0) - (right[position] ?? 0);
    if (difference !== 0) return difference;
  }
  return 0;
}

export function probeTool(runner: ToolRunner, tool: CardanoTool, options: ToolSearchOptions = {}): ToolStatus {
  const command = locateTool(tool, options);
  if (!command) {
    return {
      tool,
      usable: false,
      error: new ToolUnavailableError(tool, 'not found in the tools directory or on PATH'),
    };
  }

  const result = runner.run(command, ['--version'], { timeoutMs: PROBE_TIMEOUT_MS });
  if (result.isErr()) {
    return { tool, command, usable: false, error: result.error };
  }

  const version = parseToolVersion(`${result.value.stdout}\n${result.value.stderr}`);
  if (!version) {
    return {
      tool,
      command,
      usable: false,
      error: new ToolUnavailableError(tool, 'could not read a version from --version output'),
    };
  }

  const minimum = MINIMUM_TOOL_VERSIONS[tool];
  if (minimum && compareVersions(version, minimum) < 0) {
    return { tool, command, version, usable: false, error: new ToolVersionMismatchError(tool, version, minimum) };
  }

  return { tool, command, version, usable: true };
}

/**
 * Probe every known tool once. Missing optional tools are reported, not
 * treated as failures; callers decide what they need.
 */
export function probeTools(runner: ToolRunner, options: ToolSearchOptions = {}): ToolProbeReport {
  const report: ToolProbeReport = {
    'cardano-address': probeTool(runner, 'cardano-address', options),
    'cardano-cli': probeTool(runner, 'cardano-cli', options),
    bech32: probeTool(runner, 'bech32', options),
  };

  for (const status of Object.values(report)) {
    logger.debug(
      { tool: status.tool, command: status.command, version: status.version, usable: status.usable },
      'Tool probe'
    );
  }

  return report;
}
