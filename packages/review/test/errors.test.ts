import { describe, it, expect } from 'vitest';
import {
  PrCriticError,
  InputError,
  ReviewApiError,
  GitHubApiError,
  ReviewErrorCode,
  isPrCriticError,
  getErrorMessage,
} from '../src/errors/index.js';

describe('ReviewApiError.fromStatus', () => {
  it('marks 5xx and 429 as retryable', () => {
    expect(ReviewApiError.fromStatus(502, 'bad gateway').retryable).toBe(true);
    expect(ReviewApiError.fromStatus(429, 'slow down').retryable).toBe(true);
    expect(ReviewApiError.fromStatus(404, 'no route').retryable).toBe(false);
  });

  it('classifies 403 as a rejected cookie', () => {
    const error = ReviewApiError.fromStatus(403, ' forbidden ');
    expect(error.code).toBe(ReviewErrorCode.AUTH_FAILED);
    expect(error.message).toBe('Review API rejected the service cookie (403): forbidden');
  });

  it('caps the body excerpt at 500 characters', () => {
    const error = ReviewApiError.fromStatus(500, 'x'.repeat(600));
    expect(error.message).toBe(`Review API error (500): ${'x'.repeat(500)}`);
  });
});

describe('PrCriticError', () => {
  it('serializes code, retryable flag and context', () => {
    const error = new GitHubApiError('gone', ReviewErrorCode.PR_NOT_FOUND, 404);
    expect(error.toJSON()).toEqual({
      error: 'gone',
      code: ReviewErrorCode.PR_NOT_FOUND,
      retryable: false,
      context: { status: 404 },
    });
  });

  it('keeps subclass names and the base type', () => {
    const error = new InputError('bad', ['PR_NUMBER']);
    expect(error.name).toBe('InputError');
    expect(error).toBeInstanceOf(PrCriticError);
    expect(isPrCriticError(error)).toBe(true);
    expect(isPrCriticError(new Error('plain'))).toBe(false);
  });
});

describe('getErrorMessage', () => {
  it('handles non-Error values', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('text')).toBe('text');
  });
});
