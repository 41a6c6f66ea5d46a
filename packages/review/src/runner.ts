/**
 * The review run: resolve the PR, review each eligible file, post once.
 *
 * Feedback for every file is collected before anything is posted, so a
 * failure half-way (review API down, bad cookie) leaves the PR untouched.
 */

import type { ReviewConfig } from './config.js';
import { extractAddedLines, findAnchorLine, truncatePatch } from './diff.js';
import { filterReviewableFiles } from './files.js';
import {
  getPullRequest,
  listChangedFiles,
  postPRReview,
  upsertSummaryComment,
  type Octokit,
} from './github-api.js';
import { consoleLogger, type Logger } from './logger.js';
import { renderReviewBody } from './review-body.js';
import type {
  FileReviewResult,
  LineComment,
  ReviewableFile,
  ReviewClient,
  ReviewComment,
  ReviewFeedback,
  ReviewInputs,
  ReviewOutcome,
} from './types.js';

export interface ReviewRunnerDeps {
  octokit: Octokit;
  reviewClient: ReviewClient;
  logger?: Logger;
}

/**
 * Diff text sent for a file, per the review settings.
 * Empty when the file has nothing left to review (e.g. only deletions with addedLinesOnly).
 */
export function prepareDiff(patch: string, settings: ReviewConfig['review']): string {
  const diff = settings.addedLinesOnly ? extractAddedLines(patch) : patch;
  return diff.trim() ? truncatePatch(diff, settings.maxPatchChars) : '';
}

/**
 * Anchor the API's comments on the file's diff
 */
export function buildFileResult(file: ReviewableFile, feedback: ReviewFeedback): FileReviewResult {
  const lineComments: LineComment[] = [];
  const unanchored: ReviewComment[] = [];

  if (feedback.kind === 'comments') {
    for (const comment of feedback.comments) {
      const line = findAnchorLine(file.patch, comment.line);
      if (line === null) {
        unanchored.push(comment);
      } else {
        lineComments.push({ path: file.filename, line, body: comment.body });
      }
    }
  }

  return { filename: file.filename, feedback, lineComments, unanchored };
}

/**
 * Run a complete review of one pull request
 */
export async function runReview(
  inputs: ReviewInputs,
  config: ReviewConfig,
  deps: ReviewRunnerDeps,
): Promise<ReviewOutcome> {
  const { octokit, reviewClient } = deps;
  const logger = deps.logger ?? consoleLogger;
  const pr = { owner: inputs.owner, repo: inputs.repo, pullNumber: inputs.pullNumber };

  const info = await getPullRequest(octokit, pr);
  const headSha = inputs.headSha ?? info.headSha;
  if (inputs.headSha && inputs.headSha !== info.headSha) {
    logger.warning(
      `GITHUB_SHA ${inputs.headSha.slice(0, 7)} is not the PR head ${info.headSha.slice(0, 7)}; anchoring comments to GITHUB_SHA`,
    );
  }
  logger.info(`Reviewing PR #${info.number} (${info.state}): ${info.title}`);

  const changedFiles = await listChangedFiles(octokit, pr);
  logger.info(`Found ${changedFiles.length} changed files in PR`);

  const files = filterReviewableFiles(changedFiles, config.review.extensions);
  logger.info(`${files.length} files eligible for review`);

  if (files.length === 0) {
    logger.info('No relevant files to analyze.');
    return { status: 'skipped', filesReviewed: 0, inlineComments: 0 };
  }

  const results: FileReviewResult[] = [];
  for (const file of files) {
    const diff = prepareDiff(file.patch, config.review);
    if (!diff) {
      logger.info(`No added lines found for ${file.filename}.`);
      continue;
    }

    logger.info(`Analyzing ${file.filename}...`);
    const feedback = await reviewClient.review({
      filename: file.filename,
      diff,
      rules: config.review.rules,
    });
    logger.info(`${file.filename}: ${feedback.kind}`);
    results.push(buildFileResult(file, feedback));
  }

  if (results.length === 0) {
    logger.info('No relevant changes to analyze.');
    return { status: 'skipped', filesReviewed: 0, inlineComments: 0 };
  }

  const body = renderReviewBody(config.review.title, results);
  const lineComments = results.flatMap(r => r.lineComments);
  const unanchoredCount = results.reduce((sum, r) => sum + r.unanchored.length, 0);
  if (unanchoredCount > 0) {
    logger.info(`${unanchoredCount} comments matched no added line and go in the review body`);
  }

  if (lineComments.length > 0) {
    const fallbackBody = renderReviewBody(config.review.title, results, { inline: false });
    const posted = await postPRReview(
      octokit,
      pr,
      headSha,
      lineComments,
      body,
      logger,
      fallbackBody,
    );
    return {
      status: 'posted',
      filesReviewed: results.length,
      inlineComments: posted.inlineComments,
      reviewUrl: posted.url,
    };
  }

  const posted = await upsertSummaryComment(octokit, pr, body, logger);
  return {
    status: 'posted',
    filesReviewed: results.length,
    inlineComments: 0,
    reviewUrl: posted.url,
  };
}
