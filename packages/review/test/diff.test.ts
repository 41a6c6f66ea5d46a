/**
 * Tests for diff.ts patch helpers
 */

import { describe, it, expect } from 'vitest';
import { extractAddedLines, findAnchorLine, truncatePatch } from '../src/diff.js';

describe('extractAddedLines', () => {
  it('keeps added lines with their prefix', () => {
    const patch = `@@ -1,3 +1,3 @@
 keep
-old
+new
+another`;

    expect(extractAddedLines(patch)).toBe('+new\n+another');
  });

  it('keeps added code that starts with ++', () => {
    const patch = '@@ -0,0 +1,3 @@\n+int i = 0;\n+++i;\n+return i;';
    expect(extractAddedLines(patch)).toBe('+int i = 0;\n+++i;\n+return i;');
  });

  it('returns an empty string for a deletion-only patch', () => {
    expect(extractAddedLines('@@ -1,2 +0,0 @@\n-a\n-b')).toBe('');
  });
});

describe('findAnchorLine', () => {
  const patch = `@@ -10,3 +10,5 @@
 function total(items) {
+  let sum = 0;
-  return 0;
+  for (const item of items) sum += item.price;
+  return sum;
 }`;

  it('returns the right-side line of the added line containing the snippet', () => {
    expect(findAnchorLine(patch, 'let sum = 0;')).toBe(11);
    expect(findAnchorLine(patch, 'return sum;')).toBe(13);
  });

  it('ignores surrounding whitespace in the snippet', () => {
    expect(findAnchorLine(patch, '   return sum;  ')).toBe(13);
  });

  it('picks the last matching added line', () => {
    expect(findAnchorLine(patch, 'sum')).toBe(13);
  });

  it('does not anchor on context or deleted lines', () => {
    expect(findAnchorLine(patch, 'function total')).toBeNull();
    expect(findAnchorLine(patch, 'return 0;')).toBeNull();
  });

  it('counts added lines that start with ++', () => {
    const increment = '@@ -0,0 +1,3 @@\n+int i = 0;\n+++i;\n+return i;';
    expect(findAnchorLine(increment, '++i;')).toBe(2);
    expect(findAnchorLine(increment, 'return i;')).toBe(3);
  });

  it('returns null for an empty snippet', () => {
    expect(findAnchorLine(patch, '  ')).toBeNull();
  });

  it('returns null when nothing matches', () => {
    expect(findAnchorLine(patch, 'console.log')).toBeNull();
  });
});

describe('truncatePatch', () => {
  it('returns short patches unchanged', () => {
    expect(truncatePatch('+a\n+b', 100)).toBe('+a\n+b');
  });

  it('cuts on the last line boundary within the limit', () => {
    expect(truncatePatch('+aaaa\n+bbbb\n+cccc', 9)).toBe('+aaaa\n... (diff truncated)');
  });

  it('cuts mid-line when the first line is already too long', () => {
    expect(truncatePatch('+abcdefgh', 4)).toBe('+abc\n... (diff truncated)');
  });
});
