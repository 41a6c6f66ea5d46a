/**
 * Markdown rendering of the review summary
 */

import { COMMENT_MARKER } from './github-api.js';
import type { FileReviewResult } from './types.js';

export interface RenderOptions {
  /** Line comments are posted on the diff; when false they are listed in the body */
  inline?: boolean;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Body of one file's section
 */
export function renderFileSection(
  result: FileReviewResult,
  { inline = true }: RenderOptions = {},
): string {
  const { feedback } = result;

  switch (feedback.kind) {
    case 'approved':
      return `✅ ${feedback.message}`;
    case 'summary':
      return feedback.text;
    case 'comments': {
      const parts: string[] = [];
      if (feedback.summary) parts.push(feedback.summary);
      if (result.lineComments.length > 0 && inline) {
        parts.push(`${plural(result.lineComments.length, 'inline comment')} on the diff.`);
      } else if (result.lineComments.length > 0) {
        const list = result.lineComments.map(c => `- line ${c.line}: ${c.body}`).join('\n');
        parts.push(`Comments on the diff:\n${list}`);
      }
      if (result.unanchored.length > 0) {
        const list = result.unanchored
          .map(c => (c.line.trim() ? `- \`${c.line.trim()}\`: ${c.body}` : `- ${c.body}`))
          .join('\n');
        parts.push(`Not attached to a diff line:\n${list}`);
      }
      return parts.join('\n\n');
    }
  }
}

/**
 * Full review body: marker, title, counts, then one section per file
 */
export function renderReviewBody(
  title: string,
  results: FileReviewResult[],
  options: RenderOptions = {},
): string {
  const withoutFindings = results.filter(r => r.feedback.kind === 'approved').length;
  const withFeedback = results.length - withoutFindings;
  const sections = results.map(r => `### \`${r.filename}\`\n\n${renderFileSection(r, options)}`);

  return [
    `${COMMENT_MARKER}\n## ${title}`,
    `Reviewed ${plural(results.length, 'file')}: ${withFeedback} with feedback, ${withoutFindings} without findings.`,
    ...sections,
  ].join('\n\n');
}
