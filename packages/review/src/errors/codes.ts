/**
 * Error codes for review failures.
 * Used to tell failure classes apart without string matching.
 */
export enum ReviewErrorCode {
  // Inputs and configuration
  INVALID_INPUT = 'INVALID_INPUT',
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Credentials rejected by GitHub or the review API
  AUTH_FAILED = 'AUTH_FAILED',

  // GitHub
  PR_NOT_FOUND = 'PR_NOT_FOUND',
  GITHUB_API_FAILED = 'GITHUB_API_FAILED',

  // Review API
  REVIEW_API_FAILED = 'REVIEW_API_FAILED',
  UNEXPECTED_RESPONSE = 'UNEXPECTED_RESPONSE',
}
