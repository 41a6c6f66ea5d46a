/**
 * @pr-critic/review — pull request review against the internal review API
 *
 * Used by the GitHub Action (@pr-critic/action) to fetch a PR's diff,
 * get feedback per file and post it back as a review.
 */

// Types
export type {
  PullRequestRef,
  PullRequestInfo,
  ReviewInputs,
  ChangedFile,
  ReviewableFile,
  ReviewComment,
  ReviewFeedback,
  ReviewRequest,
  ReviewClient,
  LineComment,
  FileReviewResult,
  ReviewOutcome,
} from './types.js';

// Run
export { runReview, prepareDiff, buildFileResult, type ReviewRunnerDeps } from './runner.js';

// Inputs and config
export { validateInputs, REQUIRED_INPUTS, type RawInputs } from './inputs.js';
export {
  loadConfig,
  defaultConfig,
  resolveConfigPath,
  resolveReviewApiUrl,
  DEFAULT_REVIEW_API_URL,
  DEFAULT_REVIEW_TITLE,
  type ReviewConfig,
  type ReviewRequestFormat,
} from './config.js';

// Review API
export {
  ReviewApiClient,
  type ReviewApiClientOptions,
  type ReviewApiUsageTotals,
} from './review-api.js';
export { parseReviewResponse, parseChatContent, isApproval } from './review-response.js';
export { buildReviewPrompt, DEFAULT_RULES, APPROVAL_MESSAGE } from './prompt.js';

// GitHub
export {
  createOctokit,
  getPullRequest,
  listChangedFiles,
  postPRReview,
  upsertSummaryComment,
  COMMENT_MARKER,
  type Octokit,
} from './github-api.js';

// Diff and files
export { extractAddedLines, findAnchorLine, truncatePatch } from './diff.js';
export { filterReviewableFiles, hasReviewableExtension, DEFAULT_EXTENSIONS } from './files.js';
export { renderReviewBody, renderFileSection } from './review-body.js';

// Logger
export { consoleLogger, type Logger } from './logger.js';

// Errors
export {
  PrCriticError,
  InputError,
  ConfigError,
  ReviewApiError,
  GitHubApiError,
  ReviewErrorCode,
  isPrCriticError,
  getErrorMessage,
  getErrorStack,
} from './errors/index.js';

// Test harness
export {
  silentLogger,
  createRecordingLogger,
  createFakeFetch,
  createMockReviewClient,
  jsonResponse,
  type FakeRoute,
  type RecordedRequest,
} from './test-helpers.js';
