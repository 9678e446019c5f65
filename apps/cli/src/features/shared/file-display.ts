import path from 'node:path';

/**
 * Format a permission mode the way `ls`/`chmod` users read it, e.g. `0600`.
 */
export function formatFileMode(mode: number): string {
  return `0${(mode & 0o777).toString(8).padStart(3, '0')}`;
}

export interface DisplayedFile {
  path: string;
  mode: string;
}

export function describeFiles(files: readonly { path: string; mode: number }[]): DisplayedFile[] {
  return files.map((file) => ({ path: file.path, mode: formatFileMode(file.mode) }));
}

/**
 * One line per file, relative to `baseDir`, with its mode.
 */
export function formatFileLines(baseDir: string, files: readonly { path: string; mode: number }[]): string {
  return files.map((file) => `${formatFileMode(file.mode)}  ${path.relative(baseDir, file.path)}`).join('\n');
}
