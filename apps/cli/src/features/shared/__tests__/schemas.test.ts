import { describe, expect, it } from 'vitest';

import {
  DecryptCommandOptionsSchema,
  ExportCommandOptionsSchema,
  GenerateCommandOptionsSchema,
  ViewCommandOptionsSchema,
} from '../schemas.js';

function firstIssue(result: { success: boolean; error?: { issues: { message: string }[] } | undefined }) {
  return result.error?.issues[0]?.message;
}

describe('GenerateCommandOptionsSchema', () => {
  it('defaults the network and keeps the fallback on', () => {
    const parsed = GenerateCommandOptionsSchema.parse({ ticker: 'TESTPOOL' });

    expect(parsed).toEqual({ ticker: 'TESTPOOL', network: 'mainnet', fallback: true });
  });

  it('reads --no-fallback as fallback: false', () => {
    expect(GenerateCommandOptionsSchema.parse({ fallback: false }).fallback).toBe(false);
  });

  it('rejects an unknown network', () => {
    const result = GenerateCommandOptionsSchema.safeParse({ network: 'sanchonet' });

    expect(firstIssue(result)).toBe('--network must be one of mainnet, testnet, preview, preprod');
  });

  it('rejects --complete with --simple', () => {
    const result = GenerateCommandOptionsSchema.safeParse({ ticker: 'TESTPOOL', complete: true, simple: true });

    expect(firstIssue(result)).toBe('--complete needs the Cardano tools and cannot be combined with --simple');
  });
});

describe('wallet target options', () => {
  it('require a ticker and a purpose', () => {
    expect(firstIssue(ExportCommandOptionsSchema.safeParse({ purpose: 'pledge' }))).toBe('--ticker is required');
    expect(firstIssue(ExportCommandOptionsSchema.safeParse({ ticker: 'TESTPOOL' }))).toBe(
      '--purpose is required (pledge or rewards)'
    );
  });

  it('accept a file name but not a path for view', () => {
    const target = { ticker: 'TESTPOOL', purpose: 'pledge' };

    expect(ViewCommandOptionsSchema.parse({ ...target, file: 'TESTPOOL-pledge.staking_skey' }).file).toBe(
      'TESTPOOL-pledge.staking_skey'
    );
    expect(firstIssue(ViewCommandOptionsSchema.safeParse({ ...target, file: '../other/key.skey' }))).toBe(
      '--file takes a file name inside the wallet directory, not a path'
    );
  });
});

describe('DecryptCommandOptionsSchema', () => {
  it('names the first missing path option', () => {
    expect(firstIssue(DecryptCommandOptionsSchema.safeParse({ bundle: 'a.bundle.enc', outputDir: 'out' }))).toBe(
      '--key is required'
    );
  });
});
