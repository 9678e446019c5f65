import { NETWORKS, PURPOSES } from '@spo-wallet/wallet';
import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

export const PasswordFlagSchema = z.object({
  password: z.string().optional(),
});

const PurposeSchema = z.enum(PURPOSES, { error: '--purpose must be pledge or rewards' });

/**
 * `--ticker` and `--purpose`, both required.
 */
export const WalletTargetSchema = z.object({
  ticker: z.string({ error: '--ticker is required' }).min(1, '--ticker is required'),
  purpose: z.enum(PURPOSES, { error: '--purpose is required (pledge or rewards)' }),
});

/**
 * Generate command options. Ticker and purpose stay optional here: when
 * neither is given the command asks for them.
 */
export const GenerateCommandOptionsSchema = z
  .object({
    ticker: z.string().min(1, '--ticker must not be empty').optional(),
    purpose: PurposeSchema.optional(),
    network: z.enum(NETWORKS, { error: `--network must be one of ${NETWORKS.join(', ')}` }).default('mainnet'),
    complete: z.boolean().optional(),
    force: z.boolean().optional(),
    simple: z.boolean().optional(),
    fallback: z.boolean().default(true),
    yes: z.boolean().optional(),
  })
  .extend(JsonFlagSchema.shape)
  .extend(VerboseFlagSchema.shape)
  .superRefine((data, ctx) => {
    if (data.complete && data.simple) {
      ctx.addIssue({
        code: 'custom',
        message: '--complete needs the Cardano tools and cannot be combined with --simple',
      });
    }
  });

/**
 * Export command options
 */
export const ExportCommandOptionsSchema = WalletTargetSchema.extend({
  outputDir: z.string().min(1).optional(),
})
  .extend(PasswordFlagSchema.shape)
  .extend(JsonFlagSchema.shape)
  .extend(VerboseFlagSchema.shape);

/**
 * Decrypt command options
 */
export const DecryptCommandOptionsSchema = z
  .object({
    bundle: z.string({ error: '--bundle is required' }).min(1, '--bundle is required'),
    key: z.string({ error: '--key is required' }).min(1, '--key is required'),
    outputDir: z.string({ error: '--output-dir is required' }).min(1, '--output-dir is required'),
  })
  .extend(PasswordFlagSchema.shape)
  .extend(JsonFlagSchema.shape)
  .extend(VerboseFlagSchema.shape);

/**
 * Secure and restore command options
 */
export const SecureCommandOptionsSchema = WalletTargetSchema.extend(PasswordFlagSchema.shape)
  .extend(JsonFlagSchema.shape)
  .extend(VerboseFlagSchema.shape);

export const RestoreCommandOptionsSchema = SecureCommandOptionsSchema;

/**
 * View command options. Without `--file` the command lists secured files
 * and needs no password.
 */
export const ViewCommandOptionsSchema = SecureCommandOptionsSchema.extend({
  file: z
    .string()
    .min(1)
    .refine((name) => !name.includes('/') && !name.includes('\\'), {
      message: '--file takes a file name inside the wallet directory, not a path',
    })
    .optional(),
});

/**
 * Tools and version command options
 */
export const ToolsCommandOptionsSchema = JsonFlagSchema.extend(VerboseFlagSchema.shape);

export const VersionCommandOptionsSchema = JsonFlagSchema;
