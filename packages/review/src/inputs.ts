/**
 * Validation of the environment-supplied action inputs.
 *
 * Runs before any network call: a run with a missing credential or a
 * malformed repository / PR number fails here and nowhere else.
 */

import { z } from 'zod';
import { InputError } from './errors/index.js';
import type { ReviewInputs } from './types.js';

/** Inputs the invoking workflow must supply */
export const REQUIRED_INPUTS = [
  'GITHUB_TOKEN',
  'CUSTOM_SERVICE_COOKIE',
  'GITHUB_REPOSITORY',
  'PR_NUMBER',
] as const;

export type RequiredInputName = (typeof REQUIRED_INPUTS)[number];

/**
 * Raw input values, as read from action inputs or the environment
 */
export type RawInputs = Partial<Record<RequiredInputName | 'GITHUB_SHA', string>>;

const required = () => z.string({ required_error: 'is required' }).trim().min(1, 'is required');

const inputsSchema = z.object({
  GITHUB_TOKEN: required(),
  CUSTOM_SERVICE_COOKIE: required(),
  GITHUB_REPOSITORY: required().regex(/^[\w.-]+\/[\w.-]+$/, 'must have the form owner/repo'),
  PR_NUMBER: required().regex(/^[1-9]\d*$/, 'must be a positive integer'),
  GITHUB_SHA: z.string().trim().optional(),
});

/**
 * Validate raw inputs, reporting every problem at once.
 * Only the first problem of each input is reported.
 */
export function validateInputs(raw: RawInputs): ReviewInputs {
  const result = inputsSchema.safeParse(raw);

  if (!result.success) {
    const problems = new Map<string, string>();
    for (const issue of result.error.issues) {
      const field = String(issue.path[0]);
      if (!problems.has(field)) problems.set(field, issue.message);
    }
    const lines = [...problems].map(([field, message]) => `  - ${field} ${message}`);
    throw new InputError(`Invalid action inputs:\n${lines.join('\n')}`, [...problems.keys()]);
  }

  const { data } = result;
  const [owner, repo] = data.GITHUB_REPOSITORY.split('/');

  return {
    githubToken: data.GITHUB_TOKEN,
    serviceCookie: data.CUSTOM_SERVICE_COOKIE,
    owner,
    repo,
    pullNumber: parseInt(data.PR_NUMBER, 10),
    headSha: data.GITHUB_SHA || undefined,
  };
}
