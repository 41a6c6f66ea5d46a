/**
 * GitHub API helpers using @octokit/rest
 */

import { Octokit } from '@octokit/rest';
import { GitHubApiError, ReviewErrorCode, getErrorMessage } from './errors/index.js';
import type { ChangedFile, LineComment, PullRequestInfo, PullRequestRef } from './types.js';
import type { Logger } from './logger.js';

export type { Octokit };

/**
 * Hidden marker identifying the summary comment this action owns
 */
export const COMMENT_MARKER = '<!-- pr-critic-review -->';

/**
 * Create an Octokit instance from a token.
 * `fetch` replaces the transport (tests pass an in-process fake).
 */
export function createOctokit(token: string, opts: { fetch?: typeof fetch } = {}): Octokit {
  return new Octokit({
    auth: token,
    ...(opts.fetch ? { request: { fetch: opts.fetch } } : {}),
  });
}

function getStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

/**
 * Turn an Octokit failure into a GitHubApiError naming what was being done
 */
export function toGitHubApiError(error: unknown, operation: string): GitHubApiError {
  const status = getStatus(error);
  const message = getErrorMessage(error);

  if (status === 401) {
    return new GitHubApiError(
      `GitHub rejected the token while ${operation} (401): ${message}`,
      ReviewErrorCode.AUTH_FAILED,
      status,
    );
  }
  if (status === 403 || status === 429) {
    return new GitHubApiError(
      `GitHub denied ${operation} (${status}, permission or rate limit): ${message}`,
      ReviewErrorCode.AUTH_FAILED,
      status,
    );
  }
  return new GitHubApiError(
    `GitHub API error while ${operation}${status ? ` (${status})` : ''}: ${message}`,
    ReviewErrorCode.GITHUB_API_FAILED,
    status,
  );
}

/**
 * Fetch the pull request; fails with PR_NOT_FOUND when it does not exist.
 */
export async function getPullRequest(
  octokit: Octokit,
  pr: PullRequestRef,
): Promise<PullRequestInfo> {
  try {
    const { data } = await octokit.pulls.get({
      owner: pr.owner,
      repo: pr.repo,
      pull_number: pr.pullNumber,
    });
    return { number: data.number, title: data.title, state: data.state, headSha: data.head.sha };
  } catch (error) {
    if (getStatus(error) === 404) {
      throw new GitHubApiError(
        `Pull request #${pr.pullNumber} not found in ${pr.owner}/${pr.repo}`,
        ReviewErrorCode.PR_NOT_FOUND,
        404,
      );
    }
    throw toGitHubApiError(error, `fetching pull request #${pr.pullNumber}`);
  }
}

/**
 * List every file changed in the PR, following pagination
 */
export async function listChangedFiles(
  octokit: Octokit,
  pr: PullRequestRef,
): Promise<ChangedFile[]> {
  try {
    const files = await octokit.paginate(octokit.pulls.listFiles, {
      owner: pr.owner,
      repo: pr.repo,
      pull_number: pr.pullNumber,
      per_page: 100,
    });
    return files.map(file => ({
      filename: file.filename,
      status: file.status,
      ...(file.patch !== undefined ? { patch: file.patch } : {}),
    }));
  } catch (error) {
    throw toGitHubApiError(error, 'listing changed files');
  }
}

/**
 * Post a review with line-specific comments.
 * If GitHub refuses the inline comments (422: a line is not part of the diff)
 * the review is retried once with `fallbackBody`, which should carry the
 * comment texts; any other failure is fatal.
 */
export async function postPRReview(
  octokit: Octokit,
  pr: PullRequestRef,
  headSha: string,
  comments: LineComment[],
  body: string,
  logger: Logger,
  fallbackBody: string = body,
): Promise<{ url: string; inlineComments: number }> {
  logger.info(`Creating review with ${comments.length} line comments`);

  const base = {
    owner: pr.owner,
    repo: pr.repo,
    pull_number: pr.pullNumber,
    commit_id: headSha,
    event: 'COMMENT' as const,
    body,
  };

  try {
    const { data } = await octokit.pulls.createReview({
      ...base,
      comments: comments.map(c => ({
        path: c.path,
        line: c.line,
        side: 'RIGHT',
        body: c.body,
      })),
    });
    logger.info('Review posted successfully');
    return { url: data.html_url, inlineComments: comments.length };
  } catch (error) {
    if (getStatus(error) !== 422 || comments.length === 0) {
      throw toGitHubApiError(error, 'posting the review');
    }
    logger.warning(`Failed to post line comments: ${getErrorMessage(error)}`);
    logger.info('Retrying as body-only review');
  }

  try {
    const { data } = await octokit.pulls.createReview({ ...base, body: fallbackBody });
    logger.info('Body-only review posted successfully');
    return { url: data.html_url, inlineComments: 0 };
  } catch (error) {
    throw toGitHubApiError(error, 'posting the body-only review');
  }
}

/**
 * Find the summary comment left by an earlier run
 */
async function findExistingComment(
  octokit: Octokit,
  pr: PullRequestRef,
): Promise<{ id: number } | null> {
  const comments = await octokit.paginate(octokit.issues.listComments, {
    owner: pr.owner,
    repo: pr.repo,
    issue_number: pr.pullNumber,
    per_page: 100,
  });

  const existing = comments.find(comment => comment.body?.includes(COMMENT_MARKER));
  return existing ? { id: existing.id } : null;
}

/**
 * Post the review summary as a PR conversation comment, updating the one
 * from an earlier run instead of adding another.
 */
export async function upsertSummaryComment(
  octokit: Octokit,
  pr: PullRequestRef,
  body: string,
  logger: Logger,
): Promise<{ url: string }> {
  try {
    const existing = await findExistingComment(octokit, pr);

    if (existing) {
      logger.info(`Updating existing comment ${existing.id}`);
      const { data } = await octokit.issues.updateComment({
        owner: pr.owner,
        repo: pr.repo,
        comment_id: existing.id,
        body,
      });
      return { url: data.html_url };
    }

    logger.info('Creating new comment');
    const { data } = await octokit.issues.createComment({
      owner: pr.owner,
      repo: pr.repo,
      issue_number: pr.pullNumber,
      body,
    });
    return { url: data.html_url };
  } catch (error) {
    throw toGitHubApiError(error, 'posting the summary comment');
  }
}
