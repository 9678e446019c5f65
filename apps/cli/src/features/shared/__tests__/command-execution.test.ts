import { err, ok } from 'neverthrow';
import type { MockInstance } from 'vitest';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { isJsonRequested, parseCommandOptions, resolveCommandParams, unwrapResult } from '../command-execution.js';
import { OutputManager } from '../output.js';
import { handleCancellation, promptConfirm } from '../prompts.js';
import { WalletTargetSchema } from '../schemas.js';

vi.mock('../prompts.js', () => ({
  handleCancellation: vi.fn(() => {
    throw new Error('cancelled');
  }),
  promptConfirm: vi.fn(),
}));

vi.mock('@clack/prompts', () => ({
  intro: vi.fn(),
  note: vi.fn(),
  log: { error: vi.fn() },
}));

describe('command-execution', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {
      // Mock implementation
    });
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  describe('unwrapResult', () => {
    it('returns the value or throws the error', () => {
      expect(unwrapResult(ok(42))).toBe(42);
      expect(() => unwrapResult(err(new Error('nope')))).toThrow('nope');
    });
  });

  describe('isJsonRequested', () => {
    it('looks for json: true only', () => {
      expect(isJsonRequested({ json: true })).toBe(true);
      expect(isJsonRequested({ json: 'yes' })).toBe(false);
      expect(isJsonRequested(undefined)).toBe(false);
    });
  });

  describe('parseCommandOptions', () => {
    it('returns the parsed options', () => {
      expect(parseCommandOptions('export', WalletTargetSchema, { ticker: 'TESTPOOL', purpose: 'rewards' })).toEqual({
        ticker: 'TESTPOOL',
        purpose: 'rewards',
      });
    });

    it('exits with INVALID_ARGS and a JSON envelope when --json was given', () => {
      expect(() => parseCommandOptions('export', WalletTargetSchema, { purpose: 'pledge', json: true })).toThrow(
        'process.exit called'
      );

      expect(processExitSpy).toHaveBeenCalledWith(2);
      const printed: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
      expect(printed).toMatchObject({
        success: false,
        command: 'export',
        error: { code: 'INVALID_ARGS', message: '--ticker is required' },
      });
    });
  });

  describe('resolveCommandParams', () => {
    const output = new OutputManager('text');

    it('builds from flags when not interactive', async () => {
      const promptFn = vi.fn();

      const params = await resolveCommandParams({
        isInteractive: false,
        output,
        commandName: 'generate',
        promptFn,
        buildFromFlags: () => ({ ticker: 'TESTPOOL' }),
        confirmMessage: 'Continue?',
        cancelMessage: 'Cancelled',
      });

      expect(params).toEqual({ ticker: 'TESTPOOL' });
      expect(promptFn).not.toHaveBeenCalled();
    });

    it('prompts and stops when the confirmation is declined', async () => {
      vi.mocked(promptConfirm).mockResolvedValueOnce(false);

      await expect(
        resolveCommandParams({
          isInteractive: true,
          output,
          commandName: 'generate',
          promptFn: () => Promise.resolve({ ticker: 'TESTPOOL' }),
          buildFromFlags: () => ({ ticker: 'UNUSED' }),
          confirmMessage: 'Do you want to continue?',
          cancelMessage: 'Operation cancelled',
        })
      ).rejects.toThrow('cancelled');

      expect(promptConfirm).toHaveBeenCalledWith('Do you want to continue?', true);
      expect(handleCancellation).toHaveBeenCalledWith('Operation cancelled');
    });
  });
});
