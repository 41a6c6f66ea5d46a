/**
 * Prompt building for the review API
 */

/**
 * Answer the review API gives when a diff has nothing worth flagging
 */
export const APPROVAL_MESSAGE = 'Everything looks good.';

/**
 * Review criteria sent with every diff unless review.yml overrides them
 */
export const DEFAULT_RULES = `1. Code Quality: clear naming conventions, no magic numbers, functions carry a comment explaining their purpose.
2. Performance: no unnecessary iterations, no string concatenation inside loops.
3. Security: input is validated, no hard-coded secrets such as API keys, passwords or tokens.
4. Maintainability: no dead or commented-out code, consistent exception handling, no duplicated logic.
5. Code Style: consistent indentation and brace style.`;

/**
 * Build the text sent in `chat` format for a single file
 */
export function buildReviewPrompt(filename: string, diff: string, rules: string): string {
  return `Please review the code changes provided in the diff below based on the following criteria:

${rules.trim()}

If the code meets the criteria and has no critical issues, respond with: '${APPROVAL_MESSAGE}'
Otherwise respond ONLY with a JSON object of this shape:
{"summary": "<at most two sentences on the key areas needing improvement>", "comments": [{"line": "<exact text of the added line the comment is about>", "body": "<the review comment>"}]}

Keep the comments brief, like a human reviewer would.

File: ${filename}

\`\`\`diff
${diff}
\`\`\``;
}
