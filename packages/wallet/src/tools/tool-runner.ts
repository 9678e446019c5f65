import { spawnSync, type SpawnSyncOptionsWithStringEncoding, type SpawnSyncReturns } from 'node:child_process';
import { basename } from 'node:path';

import { getLogger } from '@spo-wallet/logger';
import { err, ok, type Result } from 'neverthrow';

import { ToolUnavailableError } from '../errors.js';

const logger = getLogger('tool-runner');

export const DEFAULT_TOOL_TIMEOUT_MS = 10_000;

/** Spawn errors worth a single retry: the binary exists but the OS could not start it right now. */
const TRANSIENT_SPAWN_ERRORS = new Set(['EAGAIN', 'EMFILE', 'ENFILE', 'ENOMEM', 'EBUSY', 'ETXTBSY']);

export interface ToolRunOptions {
  /** Written to the child's stdin. */
  input?: string | undefined;
  timeoutMs?: number | undefined;
  cwd?: string | undefined;
}

export interface ToolOutput {
  stdout: string;
  stderr: string;
}

/**
 * Synchronous subprocess boundary. Implementations never throw: a missing
 * binary, timeout or non-zero exit comes back as `ToolUnavailableError`.
 */
export interface ToolRunner {
  run(command: string, args: readonly string[], options?: ToolRunOptions): Result<ToolOutput, ToolUnavailableError>;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnSyncOptionsWithStringEncoding
) => SpawnSyncReturns<string>;

export interface SpawnToolRunnerOptions {
  timeoutMs?: number | undefined;
  spawn?: SpawnFunction | undefined;
}

function spawnErrorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export class SpawnToolRunner implements ToolRunner {
  private readonly timeoutMs: number;
  private readonly spawn: SpawnFunction;

  constructor(options: SpawnToolRunnerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.spawn = options.spawn ?? spawnSync;
  }

  run(command: string, args: readonly string[], options: ToolRunOptions = {}): Result<ToolOutput, ToolUnavailableError> {
    const tool = basename(command);
    const timeout = options.timeoutMs ?? this.timeoutMs;
    const spawnOptions: SpawnSyncOptionsWithStringEncoding = {
      encoding: 'utf8',
      input: options.input,
      cwd: options.cwd,
      timeout,
      killSignal: 'SIGKILL',
      stdio: ['pipe', 'pipe', 'pipe'],
      windowsHide: true,
    };

    let result = this.spawn(command, args, spawnOptions);
    if (result.error) {
      const code = spawnErrorCode(result.error);
      if (code !== undefined && TRANSIENT_SPAWN_ERRORS.has(code)) {
        logger.warn({ tool, code }, 'Transient spawn failure, retrying once');
        result = this.spawn(command, args, spawnOptions);
      }
    }

    if (result.error) {
      const code = spawnErrorCode(result.error);
      if (code === 'ETIMEDOUT') {
        return err(new ToolUnavailableError(tool, `timed out after ${timeout}ms`, { args }));
      }
      if (code === 'ENOENT') {
        return err(new ToolUnavailableError(tool, `not found at ${command}`, { args }));
      }
      return err(new ToolUnavailableError(tool, `failed to start: ${result.error.message}`, { args }));
    }

    if (result.status !== 0) {
      const stderr = (result.stderr ?? '').trim();
      const reason =
        result.status === null ? `killed by ${result.signal ?? 'signal'}` : `exited with status ${result.status}`;
      logger.debug({ tool, args: [...args], status: result.status }, 'Tool invocation failed');
      return err(new ToolUnavailableError(tool, stderr ? `${reason}: ${stderr}` : reason, {
        args,
        exitCode: result.status,
        stderr,
      }));
    }

    return ok({ stdout: result.stdout ?? '', stderr: result.stderr ?? '' });
  }
}
