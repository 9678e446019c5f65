import { createHash } from 'node:crypto';
import { gunzipSync, gzipSync } from 'node:zlib';

import { CorruptArchiveError, PURPOSES } from '@spo-wallet/wallet';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

export const ARCHIVE_VERSION = 1;

const FileNameSchema = z
  .string()
  .min(1)
  .regex(/^[^/\\]+$/, 'must be a plain file name')
  .refine((name) => name !== '.' && name !== '..', 'must be a plain file name');

export const ArchiveEntrySchema = z.object({
  name: FileNameSchema,
  mode: z.number().int().min(0).max(0o777),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  content: z.base64(),
});

export const ArchiveManifestSchema = z.object({
  version: z.literal(ARCHIVE_VERSION),
  ticker: z.string().min(1),
  purpose: z.enum(PURPOSES),
  createdAt: z.iso.datetime(),
  files: z.array(ArchiveEntrySchema).min(1),
});

export type ArchiveEntry = z.infer<typeof ArchiveEntrySchema>;
export type ArchiveManifest = z.infer<typeof ArchiveManifestSchema>;

export interface ArchiveFile {
  name: string;
  mode: number;
  content: Buffer;
}

export function sha256Hex(content: Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

export function buildManifest(
  ticker: string,
  purpose: ArchiveManifest['purpose'],
  files: readonly ArchiveFile[],
  createdAt = new Date()
): ArchiveManifest {
  return {
    version: ARCHIVE_VERSION,
    ticker,
    purpose,
    createdAt: createdAt.toISOString(),
    files: files.map((file) => ({
      name: file.name,
      mode: file.mode,
      sha256: sha256Hex(file.content),
      content: file.content.toString('base64'),
    })),
  };
}

/** gzip'd JSON. */
export function packArchive(manifest: ArchiveManifest): Buffer {
  return gzipSync(Buffer.from(JSON.stringify(manifest), 'utf8'));
}

/**
 * Inflate, parse and check every entry's digest. `source` names the file
 * the archive came from, for error messages.
 */
export function unpackArchive(
  archive: Buffer,
  source: string
): Result<{ manifest: ArchiveManifest; files: ArchiveFile[] }, CorruptArchiveError> {
  let json: unknown;
  try {
    json = JSON.parse(gunzipSync(archive).toString('utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new CorruptArchiveError(source, `archive does not inflate to JSON (${reason})`));
  }

  const parsed = ArchiveManifestSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || 'manifest'}: ${issue.message}` : 'invalid manifest';
    return err(new CorruptArchiveError(source, `manifest rejected (${where})`));
  }

  const names = new Set<string>();
  const files: ArchiveFile[] = [];
  for (const entry of parsed.data.files) {
    if (names.has(entry.name)) {
      return err(new CorruptArchiveError(source, `duplicate entry ${entry.name}`));
    }
    names.add(entry.name);

    const content = Buffer.from(entry.content, 'base64');
    if (sha256Hex(content) !== entry.sha256) {
      return err(new CorruptArchiveError(source, `checksum mismatch for ${entry.name}`));
    }
    files.push({ name: entry.name, mode: entry.mode, content });
  }

  return ok({ manifest: parsed.data, files });
}
