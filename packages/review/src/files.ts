/**
 * Selection of the changed files worth sending to the review API
 */

import type { ChangedFile, ReviewableFile } from './types.js';

/**
 * Extensions reviewed when review.yml does not list its own
 */
export const DEFAULT_EXTENSIONS: readonly string[] = [
  '.py',
  '.js',
  '.jsx',
  '.ts',
  '.tsx',
  '.java',
  '.cs',
  '.c',
  '.cpp',
  '.h',
  '.hpp',
  '.go',
  '.rb',
  '.php',
  '.html',
  '.css',
  '.kt',
  '.swift',
  '.scala',
  '.rs',
  '.sh',
  '.dart',
  '.sql',
];

/**
 * Check a filename against an extension list (case-insensitive)
 */
export function hasReviewableExtension(filename: string, extensions: readonly string[]): boolean {
  const lower = filename.toLowerCase();
  return extensions.some(ext => lower.endsWith(ext.toLowerCase()));
}

/**
 * Keep files that still exist, carry a patch and match an extension.
 * Binary and very large files come back from GitHub without a patch.
 */
export function filterReviewableFiles(
  files: ChangedFile[],
  extensions: readonly string[],
): ReviewableFile[] {
  return files.filter(
    (file): file is ReviewableFile =>
      file.status !== 'removed' &&
      typeof file.patch === 'string' &&
      file.patch.length > 0 &&
      hasReviewableExtension(file.filename, extensions),
  );
}
