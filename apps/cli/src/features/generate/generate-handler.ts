import { getLogger } from '@spo-wallet/logger';
import {
  canFallBack,
  probeTools,
  selectKeyProvider,
  SimplifiedKeyProvider,
  WalletMaterializer,
  type GenerationResult,
  type KeyProvider,
  type Purpose,
  type WalletError,
} from '@spo-wallet/wallet';
import { err, ok, type Result } from 'neverthrow';

import type { CommandHandler } from '../shared/command-execution.js';
import type { WalletEnvironment } from '../shared/command-runtime.js';

import type { GenerateHandlerParams } from './generate-utils.js';

export type { GenerateHandlerParams };

const logger = getLogger('GenerateHandler');

/**
 * Result of the generate operation.
 */
export interface GenerateResult extends GenerationResult {
  /** Why the simplified provider was used instead of cardano-address, when it was. */
  fallbackReason?: string | undefined;
}

/**
 * Generate handler: probes the tools, picks the key provider and runs the
 * materializer. In standard mode a tool failure during generation is
 * retried once with the simplified provider when fallback is allowed.
 */
export class GenerateHandler implements CommandHandler<GenerateHandlerParams, GenerateResult> {
  constructor(private readonly environment: WalletEnvironment) {}

  /**
   * Whether the purpose directory already holds a wallet. Used to ask
   * before regenerating.
   */
  walletExists(ticker: string, purpose: Purpose): Result<boolean, WalletError> {
    return this.materializerFor(new SimplifiedKeyProvider())
      .locate(ticker, purpose)
      .map((location) => location.exists);
  }

  async execute(params: GenerateHandlerParams): Promise<Result<GenerateResult, Error>> {
    const { ticker, purpose, network, mode, force } = params;
    logger.info({ ticker, purpose, network, mode, force, simple: params.simple }, 'Starting wallet generation');

    const probe = probeTools(this.environment.runner, this.environment.toolSearch);
    const selection = selectKeyProvider({
      simple: params.simple,
      mode,
      allowFallback: params.allowFallback,
      probe,
      runner: this.environment.runner,
      timeoutMs: this.environment.timeoutMs,
    });
    if (selection.isErr()) {
      return err(selection.error);
    }

    const request = { ticker, purpose, network, mode, force };
    const first = this.materializerFor(selection.value.provider).generate(request);
    if (first.isOk()) {
      return ok({ ...first.value, fallbackReason: selection.value.fallbackReason?.message });
    }

    if (selection.value.provider.kind === 'simplified' || !canFallBack(first.error, mode, params.allowFallback)) {
      return err(first.error);
    }

    logger.warn(
      { ticker, purpose, tool: first.error.details?.['tool'], reason: first.error.message },
      'cardano-address failed during generation, retrying with the simplified provider'
    );
    const retried = this.materializerFor(new SimplifiedKeyProvider()).generate(request);
    if (retried.isErr()) {
      return err(retried.error);
    }
    return ok({ ...retried.value, fallbackReason: first.error.message });
  }

  destroy(): void {
    // Nothing held between runs
  }

  private materializerFor(provider: KeyProvider): WalletMaterializer {
    return new WalletMaterializer({ rootDir: this.environment.rootDir, provider });
  }
}
