/**
 * Instance-based client for the internal review API.
 *
 * - Cookie authentication (the service sits behind an SSO session)
 * - Per-call timeout via AbortSignal
 * - Optional bounded retries with exponential backoff; off by default
 * - Per-instance token usage tracking for OpenAI-style answers
 */

import { ReviewApiError, getErrorMessage, isPrCriticError } from './errors/index.js';
import { buildReviewPrompt, APPROVAL_MESSAGE } from './prompt.js';
import { parseReviewResponse, readUsage } from './review-response.js';
import type { ReviewRequestFormat } from './config.js';
import type { Logger } from './logger.js';
import type { ReviewClient, ReviewFeedback, ReviewRequest } from './types.js';

/** Default timeout per review call (2 minutes) */
const DEFAULT_TIMEOUT_MS = 120_000;

export interface ReviewApiClientOptions {
  url: string;
  /** Value of the Cookie header, as copied from an authenticated session */
  cookie: string;
  format?: ReviewRequestFormat;
  model?: string;
  timeoutMs?: number;
  /** Extra attempts for network errors, timeouts, 429 and 5xx */
  maxRetries?: number;
  /** Delay before the first retry; doubles on every further attempt */
  retryDelayMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

export interface ReviewApiUsageTotals {
  requests: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Review client backed by the internal, OpenAI-compatible review service.
 */
export class ReviewApiClient implements ReviewClient {
  private readonly url: string;
  private readonly cookie: string;
  private readonly format: ReviewRequestFormat;
  private readonly model?: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger?: Logger;

  private usage: ReviewApiUsageTotals = {
    requests: 0,
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
  };

  constructor(opts: ReviewApiClientOptions) {
    this.url = opts.url;
    this.cookie = opts.cookie;
    this.format = opts.format ?? 'chat';
    this.model = opts.model;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = opts.maxRetries ?? 0;
    this.retryDelayMs = opts.retryDelayMs ?? 1_000;
    this.fetchImpl = opts.fetch ?? fetch;
    this.logger = opts.logger;
  }

  async review(request: ReviewRequest): Promise<ReviewFeedback> {
    const payload = this.buildPayload(request);
    this.logger?.debug(`Review API payload for ${request.filename}: ${JSON.stringify(payload)}`);

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.send(payload);
      } catch (error) {
        const retryable = isPrCriticError(error) && error.retryable;
        if (!retryable || attempt >= this.maxRetries) {
          throw error;
        }
        const delay = this.retryDelayMs * 2 ** attempt;
        this.logger?.warning(
          `Review API attempt ${attempt + 1}/${this.maxRetries + 1} failed: ${getErrorMessage(error)}. Retrying in ${delay}ms`,
        );
        await sleep(delay);
      }
    }
  }

  /**
   * Request body for the configured format
   */
  buildPayload(request: ReviewRequest): Record<string, unknown> {
    if (this.format === 'diff') {
      return { diff: request.diff, rules: request.rules };
    }

    return {
      ...(this.model ? { model: this.model } : {}),
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: buildReviewPrompt(request.filename, request.diff, request.rules) },
          ],
        },
      ],
    };
  }

  private async send(payload: Record<string, unknown>): Promise<ReviewFeedback> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          Cookie: this.cookie,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new ReviewApiError(`Failed to reach review API: ${getErrorMessage(error)}`, {
        retryable: true,
      });
    }

    this.usage.requests++;
    this.logger?.info(`Review API responded with ${response.status}`);

    // 204 is how the service says it has nothing to add
    if (response.status === 204) {
      return { kind: 'approved', message: APPROVAL_MESSAGE };
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new ReviewApiError(`Failed to read review API response: ${getErrorMessage(error)}`, {
        retryable: true,
      });
    }
    if (!response.ok) {
      throw ReviewApiError.fromStatus(response.status, text);
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw new ReviewApiError(`Review API returned invalid JSON: ${text.slice(0, 200)}`);
    }

    this.trackUsage(data);
    return parseReviewResponse(data);
  }

  private trackUsage(data: unknown): void {
    const usage = readUsage(data);
    if (!usage) return;

    this.usage.promptTokens += usage.prompt_tokens;
    this.usage.completionTokens += usage.completion_tokens;
    this.usage.totalTokens += usage.total_tokens;
    this.logger?.info(`Review API tokens: ${usage.prompt_tokens} in, ${usage.completion_tokens} out`);
  }

  getUsage(): ReviewApiUsageTotals {
    return { ...this.usage };
  }
}
