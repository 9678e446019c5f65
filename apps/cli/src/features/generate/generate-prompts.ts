import { normalizeTicker } from '@spo-wallet/wallet';

import { unwrapResult } from '../shared/command-execution.js';
import { promptPurpose, promptTicker } from '../shared/prompts.js';

import type { GenerateCommandOptions, GenerateHandlerParams } from './generate-utils.js';

/**
 * Ask for whatever the flags left out. Network, mode and provider flags are
 * taken as given.
 */
export async function promptForGenerateParams(options: GenerateCommandOptions): Promise<GenerateHandlerParams> {
  const ticker = unwrapResult(normalizeTicker(options.ticker ?? (await promptTicker())));
  const purpose = options.purpose ?? (await promptPurpose());

  return {
    ticker,
    purpose,
    network: options.network,
    mode: options.complete ? 'complete' : 'standard',
    force: options.force ?? false,
    simple: options.simple ?? false,
    allowFallback: options.fallback,
  };
}
