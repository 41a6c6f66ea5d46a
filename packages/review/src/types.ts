/**
 * Shared types for the review package
 */

/**
 * Identity of the pull request under review
 */
export interface PullRequestRef {
  owner: string;
  repo: string;
  pullNumber: number;
}

/**
 * Pull request metadata as reported by the GitHub API
 */
export interface PullRequestInfo {
  number: number;
  title: string;
  state: string;
  headSha: string;
}

/**
 * Validated action inputs
 */
export interface ReviewInputs extends PullRequestRef {
  githubToken: string;
  serviceCookie: string;
  /** PR head commit; resolved from the GitHub API when absent */
  headSha?: string;
}

/**
 * A file touched by the pull request
 */
export interface ChangedFile {
  filename: string;
  status: string;
  patch?: string;
}

/**
 * A changed file that carries a patch to review
 */
export interface ReviewableFile extends ChangedFile {
  patch: string;
}

/**
 * A comment suggested by the review API.
 * `line` is a snippet of an added line in the diff, not a line number.
 */
export interface ReviewComment {
  line: string;
  body: string;
}

/**
 * Normalised answer of the review API for one file
 */
export type ReviewFeedback =
  | { kind: 'approved'; message: string }
  | { kind: 'summary'; text: string }
  | { kind: 'comments'; comments: ReviewComment[]; summary?: string };

/**
 * One review API call
 */
export interface ReviewRequest {
  filename: string;
  diff: string;
  rules: string;
}

/**
 * Anything that can turn a diff into feedback
 */
export interface ReviewClient {
  review(request: ReviewRequest): Promise<ReviewFeedback>;
}

/**
 * Line comment for PR review, anchored on the right side of the diff
 */
export interface LineComment {
  path: string;
  line: number;
  body: string;
}

/**
 * Feedback for one file after anchoring its comments
 */
export interface FileReviewResult {
  filename: string;
  feedback: ReviewFeedback;
  lineComments: LineComment[];
  /** Comments whose snippet matched no added line */
  unanchored: ReviewComment[];
}

/**
 * What a run did
 */
export interface ReviewOutcome {
  status: 'posted' | 'skipped';
  filesReviewed: number;
  inlineComments: number;
  reviewUrl?: string;
}
