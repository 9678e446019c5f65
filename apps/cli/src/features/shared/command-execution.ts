import type { Result } from 'neverthrow';
import type { z } from 'zod';

import { ExitCodes } from './exit-codes.js';
import { OutputManager } from './output.js';
import { handleCancellation, promptConfirm } from './prompts.js';

/**
 * Command handler interface.
 */
export interface CommandHandler<TParams, TResult> {
  execute(params: TParams): Promise<Result<TResult, Error>>;
  destroy(): void;
}

/**
 * Convert Result to value or throw error.
 */
export function unwrapResult<T>(result: Result<T, Error>): T {
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

/**
 * Check for --json before validation so even option errors come out as JSON.
 */
export function isJsonRequested(rawOptions: unknown): boolean {
  return typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;
}

/**
 * Validate raw commander options at the CLI boundary. Exits with
 * INVALID_ARGS on the first issue.
 */
export function parseCommandOptions<TSchema extends z.ZodType>(
  command: string,
  schema: TSchema,
  rawOptions: unknown
): z.output<TSchema> {
  const validationResult = schema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output: OutputManager = new OutputManager(isJsonRequested(rawOptions) ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    output.error(command, new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }
  return validationResult.data;
}

/**
 * Resolve command parameters (interactive mode vs flag mode).
 */
export async function resolveCommandParams<TParams>(config: {
  buildFromFlags: () => TParams;
  cancelMessage: string;
  commandName: string;
  confirmMessage: string;
  isInteractive: boolean;
  output: OutputManager;
  promptFn: () => Promise<TParams>;
}): Promise<TParams> {
  if (config.isInteractive) {
    config.output.intro(`spo-wallet ${config.commandName}`);
    const params = await config.promptFn();
    const shouldProceed = await promptConfirm(config.confirmMessage, true);
    if (!shouldProceed) {
      handleCancellation(config.cancelMessage);
    }
    return params;
  }
  return config.buildFromFlags();
}
