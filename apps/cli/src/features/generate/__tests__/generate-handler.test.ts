import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { sharedMnemonicPath } from '@spo-wallet/wallet';
import { FakeCardanoAddress } from '@spo-wallet/wallet/testing';
import tmp from 'tmp';
import { describe, expect, it } from 'vitest';

import type { WalletEnvironment } from '../../shared/command-runtime.js';
import { GenerateHandler, type GenerateHandlerParams } from '../generate-handler.js';

function toolsDirWithCardanoAddress(): string {
  const toolsDir = tmp.dirSync({ unsafeCleanup: true }).name;
  writeFileSync(join(toolsDir, 'cardano-address'), '#!/bin/sh\n', { mode: 0o755 });
  return toolsDir;
}

function environment(runner: FakeCardanoAddress, withTools: boolean): WalletEnvironment {
  return {
    rootDir: tmp.dirSync({ unsafeCleanup: true }).name,
    runner,
    toolSearch: {
      toolsDir: withTools ? toolsDirWithCardanoAddress() : tmp.dirSync({ unsafeCleanup: true }).name,
      searchPath: '',
    },
    timeoutMs: 10_000,
  };
}

const params: GenerateHandlerParams = {
  ticker: 'TESTPOOL',
  purpose: 'pledge',
  network: 'mainnet',
  mode: 'standard',
  force: false,
  simple: false,
  allowFallback: true,
};

const failDerivation = (args: readonly string[]): boolean => args[0] === 'key' && args[1] === 'child';

describe('GenerateHandler', () => {
  it('uses cardano-address when the probe finds it', async () => {
    const runner = new FakeCardanoAddress();
    const handler = new GenerateHandler(environment(runner, true));

    const result = (await handler.execute(params))._unsafeUnwrap();

    expect(result.provider).toBe('cardano-address');
    expect(result.fallbackReason).toBeUndefined();
    expect(result.baseAddress.startsWith('addr1')).toBe(true);
    expect(result.rewardAddress.startsWith('stake1')).toBe(true);
    expect(runner.calls[0]?.args).toEqual(['--version']);
  });

  it('falls back to the simplified provider when cardano-address is missing', async () => {
    const handler = new GenerateHandler(environment(new FakeCardanoAddress(), false));

    const result = (await handler.execute(params))._unsafeUnwrap();

    expect(result.provider).toBe('simplified');
    expect(result.fallbackReason).toBe('cardano-address unavailable: not found in the tools directory or on PATH');
    expect(result.baseAddress.startsWith('addr_sim1')).toBe(true);
  });

  it('fails without touching disk when fallback is disabled', async () => {
    const env = environment(new FakeCardanoAddress(), false);
    const handler = new GenerateHandler(env);

    const result = await handler.execute({ ...params, allowFallback: false });

    expect(result._unsafeUnwrapErr().message).toBe(
      'cardano-address unavailable: not found in the tools directory or on PATH'
    );
    expect(existsSync(join(env.rootDir, '.CSPO_TESTPOOL'))).toBe(false);
  });

  it('retries with the simplified provider when the tool fails mid-generation', async () => {
    const env = environment(new FakeCardanoAddress({ failWhen: failDerivation }), true);
    const handler = new GenerateHandler(env);

    const result = (await handler.execute(params))._unsafeUnwrap();

    expect(result.provider).toBe('simplified');
    expect(result.fallbackReason).toBe('cardano-address unavailable: exited with status 1: simulated failure');
    // The phrase was created by the first attempt and reused by the retry.
    expect(result.mnemonicCreated).toBe(false);
    expect(readFileSync(sharedMnemonicPath(env.rootDir, 'TESTPOOL'), 'utf8').trim().split(' ')).toHaveLength(24);
  });

  it('does not fall back in complete mode', async () => {
    const env = environment(new FakeCardanoAddress({ failWhen: failDerivation }), true);
    const handler = new GenerateHandler(env);

    const result = await handler.execute({ ...params, mode: 'complete' });

    const error = result._unsafeUnwrapErr();
    expect(error.message).toBe('cardano-address unavailable: exited with status 1: simulated failure');
    expect(existsSync(join(env.rootDir, '.CSPO_TESTPOOL', 'pledge'))).toBe(false);
  });

  it('uses the simplified provider when asked, even with the tools present', async () => {
    const handler = new GenerateHandler(environment(new FakeCardanoAddress(), true));

    const result = (await handler.execute({ ...params, simple: true }))._unsafeUnwrap();

    expect(result.provider).toBe('simplified');
    expect(result.fallbackReason).toBeUndefined();
  });

  it('reports whether the wallet already exists', async () => {
    const handler = new GenerateHandler(environment(new FakeCardanoAddress(), false));

    expect(handler.walletExists('testpool', 'pledge')._unsafeUnwrap()).toBe(false);
    (await handler.execute(params))._unsafeUnwrap();
    expect(handler.walletExists('testpool', 'pledge')._unsafeUnwrap()).toBe(true);
    expect(handler.walletExists('testpool', 'rewards')._unsafeUnwrap()).toBe(false);
  });

  it('refuses to overwrite an existing wallet without force', async () => {
    const handler = new GenerateHandler(environment(new FakeCardanoAddress(), false));
    const first = (await handler.execute(params))._unsafeUnwrap();

    const second = await handler.execute(params);

    expect(second._unsafeUnwrapErr().message).toBe(`${first.walletDir} already exists`);
  });
});
