import type { SpawnSyncReturns } from 'node:child_process';

import { describe, expect, it, vi } from 'vitest';

import { SpawnToolRunner, type SpawnFunction } from '../tool-runner.js';

function spawnResult(overrides: Partial<SpawnSyncReturns<string>>): SpawnSyncReturns<string> {
  return {
    pid: 4242,
    output: [],
    stdout: '',
    stderr: '',
    status: 0,
    signal: null,
    ...overrides,
  };
}

function errnoError(code: string): Error {
  return Object.assign(new Error(`spawnSync ${code}`), { code });
}

describe('SpawnToolRunner', () => {
  it('returns stdout and stderr of a successful run', () => {
    const spawn = vi.fn<SpawnFunction>().mockReturnValue(spawnResult({ stdout: 'root_xsk1abc\n', stderr: 'note\n' }));
    const runner = new SpawnToolRunner({ spawn });

    const result = runner.run('/opt/tools/cardano-address', ['key', 'from-recovery-phrase', 'Shelley'], {
      input: 'phrase',
    });

    expect(result._unsafeUnwrap()).toEqual({ stdout: 'root_xsk1abc\n', stderr: 'note\n' });
    expect(spawn).toHaveBeenCalledTimes(1);
    const [, args, options] = spawn.mock.calls[0] ?? [];
    expect(args).toEqual(['key', 'from-recovery-phrase', 'Shelley']);
    expect(options).toMatchObject({ encoding: 'utf8', input: 'phrase', timeout: 10_000, killSignal: 'SIGKILL' });
  });

  it('uses the per-call timeout over the runner default', () => {
    const spawn = vi.fn<SpawnFunction>().mockReturnValue(spawnResult({}));
    const runner = new SpawnToolRunner({ spawn, timeoutMs: 2_000 });

    runner.run('cardano-address', ['--version'], { timeoutMs: 500 });
    runner.run('cardano-address', ['--version']);

    expect(spawn.mock.calls[0]?.[2].timeout).toBe(500);
    expect(spawn.mock.calls[1]?.[2].timeout).toBe(2_000);
  });

  it('retries a transient spawn failure once', () => {
    const spawn = vi
      .fn<SpawnFunction>()
      .mockReturnValueOnce(spawnResult({ error: errnoError('EAGAIN'), status: null }))
      .mockReturnValueOnce(spawnResult({ stdout: '3.12.0\n' }));
    const runner = new SpawnToolRunner({ spawn });

    const result = runner.run('/opt/tools/cardano-address', ['--version']);

    expect(result._unsafeUnwrap().stdout).toBe('3.12.0\n');
    expect(spawn).toHaveBeenCalledTimes(2);
  });

  it('gives up after the single retry', () => {
    const spawn = vi.fn<SpawnFunction>().mockReturnValue(spawnResult({ error: errnoError('EMFILE'), status: null }));
    const runner = new SpawnToolRunner({ spawn });

    const error = runner.run('/opt/tools/cardano-address', ['--version'])._unsafeUnwrapErr();

    expect(spawn).toHaveBeenCalledTimes(2);
    expect(error.message).toBe('cardano-address unavailable: failed to start: spawnSync EMFILE');
  });

  it('does not retry a missing binary', () => {
    const spawn = vi.fn<SpawnFunction>().mockReturnValue(spawnResult({ error: errnoError('ENOENT'), status: null }));
    const runner = new SpawnToolRunner({ spawn });

    const error = runner.run('/opt/tools/cardano-address', ['--version'])._unsafeUnwrapErr();

    expect(spawn).toHaveBeenCalledTimes(1);
    expect(error.code).toBe('TOOL_UNAVAILABLE');
    expect(error.tool).toBe('cardano-address');
    expect(error.message).toBe('cardano-address unavailable: not found at /opt/tools/cardano-address');
  });

  it('reports a timeout', () => {
    const spawn = vi
      .fn<SpawnFunction>()
      .mockReturnValue(spawnResult({ error: errnoError('ETIMEDOUT'), status: null, signal: 'SIGKILL' }));
    const runner = new SpawnToolRunner({ spawn, timeoutMs: 750 });

    const error = runner.run('/usr/bin/cardano-cli', ['version'])._unsafeUnwrapErr();

    expect(error.message).toBe('cardano-cli unavailable: timed out after 750ms');
  });

  it('reports a non-zero exit with stderr', () => {
    const spawn = vi.fn<SpawnFunction>().mockReturnValue(spawnResult({ status: 2, stderr: 'Invalid path\n' }));
    const runner = new SpawnToolRunner({ spawn });

    const error = runner.run('cardano-address', ['key', 'child', 'bogus'])._unsafeUnwrapErr();

    expect(error.message).toBe('cardano-address unavailable: exited with status 2: Invalid path');
    expect(error.details).toEqual({
      tool: 'cardano-address',
      args: ['key', 'child', 'bogus'],
      exitCode: 2,
      stderr: 'Invalid path',
    });
  });

  it('reports a process killed by a signal', () => {
    const spawn = vi.fn<SpawnFunction>().mockReturnValue(spawnResult({ status: null, signal: 'SIGSEGV' }));
    const runner = new SpawnToolRunner({ spawn });

    const error = runner.run('cardano-address', ['--version'])._unsafeUnwrapErr();

    expect(error.message).toBe('cardano-address unavailable: killed by SIGSEGV');
  });
});
