/**
 * Unified diff helpers for GitHub file patches
 */

const HUNK_HEADER = /^@@ -\d+(?:,\d+)? \+(\d+)(?:,\d+)? @@/;

/**
 * GitHub file patches carry no `---`/`+++` file headers, so every `+` line is
 * content, including code that itself starts with `++`.
 */
function isAddedLine(patchLine: string): boolean {
  return patchLine.startsWith('+');
}

/**
 * Walk a patch, calling `visit` with every right-side line and its line number.
 * Deleted lines don't advance the right-side counter.
 */
function walkRightSide(patch: string, visit: (patchLine: string, lineNumber: number) => void): void {
  let currentLine = 0;

  for (const patchLine of patch.split('\n')) {
    const hunkMatch = patchLine.match(HUNK_HEADER);
    if (hunkMatch) {
      currentLine = parseInt(hunkMatch[1], 10);
      continue;
    }

    if (isAddedLine(patchLine) || patchLine.startsWith(' ')) {
      visit(patchLine, currentLine);
      currentLine++;
    }
  }
}

/**
 * Keep only the added lines of a patch, prefix included
 */
export function extractAddedLines(patch: string): string {
  return patch
    .split('\n')
    .filter(isAddedLine)
    .join('\n');
}

/**
 * Find the line a review comment belongs to.
 *
 * The review API points at code by quoting it, so the anchor is the LAST added
 * line containing the quoted snippet. Returns the right-side line number, or
 * null when no added line matches.
 */
export function findAnchorLine(patch: string, snippet: string): number | null {
  const needle = snippet.trim();
  if (!needle) return null;

  let anchor: number | null = null;
  walkRightSide(patch, (patchLine, lineNumber) => {
    if (isAddedLine(patchLine) && patchLine.includes(needle)) {
      anchor = lineNumber;
    }
  });
  return anchor;
}

/**
 * Cap a patch at `maxChars`, cutting on a line boundary when possible
 */
export function truncatePatch(patch: string, maxChars: number): string {
  if (patch.length <= maxChars) return patch;

  const cut = patch.slice(0, maxChars);
  const lastNewline = cut.lastIndexOf('\n');
  const kept = lastNewline > 0 ? cut.slice(0, lastNewline) : cut;
  return `${kept}\n... (diff truncated)`;
}
