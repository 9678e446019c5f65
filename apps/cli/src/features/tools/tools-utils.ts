import { CARDANO_TOOLS, MINIMUM_TOOL_VERSIONS, type CardanoTool, type ToolProbeReport } from '@spo-wallet/wallet';

export interface ToolRow {
  tool: CardanoTool;
  usable: boolean;
  version?: string | undefined;
  minimumVersion?: string | undefined;
  path?: string | undefined;
  error?: string | undefined;
  /** Modes that cannot run without this tool. */
  neededFor: string[];
}

const NEEDED_FOR: Record<CardanoTool, string[]> = {
  'cardano-address': ['standard', 'complete'],
  'cardano-cli': ['complete'],
  bech32: [],
};

const TOOL_COLUMN_WIDTH = 17;

export function toToolRows(report: ToolProbeReport): ToolRow[] {
  return CARDANO_TOOLS.map((tool) => {
    const status = report[tool];
    return {
      tool,
      usable: status.usable,
      version: status.version,
      minimumVersion: MINIMUM_TOOL_VERSIONS[tool],
      path: status.command,
      error: status.error?.message,
      neededFor: NEEDED_FOR[tool],
    };
  });
}

export function formatToolRow(row: ToolRow): string {
  const name = row.tool.padEnd(TOOL_COLUMN_WIDTH);
  if (row.usable) {
    return `${name}${row.version ?? 'unknown'}  ${row.path ?? ''}`.trimEnd();
  }
  return `${name}${row.error ?? 'not usable'}`;
}

/**
 * What generate will do given the probe, in one sentence.
 */
export function describeGenerationSupport(rows: readonly ToolRow[]): string {
  const usable = new Set(rows.filter((row) => row.usable).map((row) => row.tool));
  if (usable.has('cardano-address') && usable.has('cardano-cli')) {
    return 'Standard and complete wallets can be generated.';
  }
  if (usable.has('cardano-address')) {
    return 'Standard wallets can be generated; complete mode needs cardano-cli.';
  }
  return 'cardano-address is not usable: generate will fall back to the simplified derivation.';
}
