import { homedir } from 'node:os';
import path from 'node:path';

import { z } from 'zod';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

const envSchema = z.object({
  SPO_WALLET_HOME: z.string().optional(),
  SPO_WALLET_TOOLS_DIR: z.string().optional(),
  SPO_WALLET_TOOL_TIMEOUT_MS: z.coerce.number().int().positive().max(600_000).default(10_000),
  SPO_WALLET_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  SPO_WALLET_PASSWORD: z.string().optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
});

type ValidatedEnv = z.infer<typeof envSchema>;

export type ConfigLogLevel = (typeof LOG_LEVELS)[number];

export interface ConfigWarning {
  variable: string;
  message: string;
}

let validatedEnv: ValidatedEnv | undefined;
const warnings: ConfigWarning[] = [];

/**
 * Validates environment variables on first access and caches the result.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
      throw new Error(`Environment validation failed:\n${errors}`);
    }
    validatedEnv = result.data;
  }
  return validatedEnv;
}

/**
 * Drop the cached environment. Tests call this after changing `process.env`.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
  warnings.length = 0;
}

/**
 * Warnings collected while resolving overrides (blank values that were ignored).
 * The CLI logs these once its logger is configured.
 */
export function getConfigWarnings(): readonly ConfigWarning[] {
  return warnings;
}

function resolveOverride(variable: string, value: string | undefined, fallback: string): string {
  if (value === undefined) return fallback;

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    if (!warnings.some((w) => w.variable === variable)) {
      warnings.push({ variable, message: `${variable} is empty; falling back to ${fallback}` });
    }
    return fallback;
  }

  return path.resolve(trimmed);
}

/**
 * Root under which `.CSPO_{TICKER}` wallet directories are created.
 *
 * Priority:
 * 1. SPO_WALLET_HOME (if set and not blank)
 * 2. the user's home directory
 */
export function getWalletRootDirectory(): string {
  const env = validateEnv();
  return resolveOverride('SPO_WALLET_HOME', env.SPO_WALLET_HOME, homedir());
}

/**
 * Directory searched for the Cardano binaries before PATH.
 * Defaults to `{root}/.cardano_spo_cli/tools`.
 */
export function getToolsDirectory(): string {
  const env = validateEnv();
  const fallback = path.join(getWalletRootDirectory(), '.cardano_spo_cli', 'tools');
  return resolveOverride('SPO_WALLET_TOOLS_DIR', env.SPO_WALLET_TOOLS_DIR, fallback);
}

/** Directory for the CLI's own log file. */
export function getLogDirectory(): string {
  return path.join(getWalletRootDirectory(), '.spo-wallet', 'logs');
}

export function getToolTimeoutMs(): number {
  return validateEnv().SPO_WALLET_TOOL_TIMEOUT_MS;
}

export function getConfiguredLogLevel(): ConfigLogLevel | undefined {
  return validateEnv().SPO_WALLET_LOG_LEVEL;
}

/**
 * Password supplied through the environment, if any. Blank values count as unset.
 */
export function getEnvPassword(): string | undefined {
  const value = validateEnv().SPO_WALLET_PASSWORD;
  return value !== undefined && value.length > 0 ? value : undefined;
}

export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  return validateEnv().NODE_ENV;
}

export function isDevelopment(): boolean {
  return getNodeEnv() === 'development';
}
