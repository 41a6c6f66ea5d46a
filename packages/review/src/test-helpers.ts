/**
 * Test harness for the review run.
 *
 * Provides an in-process fetch for Octokit and the review API client,
 * plus a scripted ReviewClient, so tests never touch the network.
 */

import type { Logger } from './logger.js';
import type { ReviewClient, ReviewFeedback, ReviewRequest } from './types.js';

/**
 * A no-op logger for tests. Swallows all output.
 */
export const silentLogger: Logger = {
  info: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * A logger that keeps every line, for asserting on log output
 */
export function createRecordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: message => lines.push(`info: ${message}`),
    warning: message => lines.push(`warning: ${message}`),
    error: message => lines.push(`error: ${message}`),
    debug: message => lines.push(`debug: ${message}`),
  };
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

/**
 * Route key: `METHOD path`, where path is a pathname (`/repos/o/r/pulls/1`)
 * or a full origin plus pathname (`https://review.test/api`).
 */
export type FakeRoute = (request: RecordedRequest) => Response | Promise<Response>;

/**
 * JSON response as GitHub and the review API send it
 */
export function jsonResponse(status: number, body?: unknown): Response {
  if (status === 204 || body === undefined) {
    return new Response(null, { status });
  }
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8' },
  });
}

function readHeaders(init: RequestInit | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}

function readBody(init: RequestInit | undefined): unknown {
  if (typeof init?.body !== 'string') return undefined;
  try {
    return JSON.parse(init.body);
  } catch {
    return init.body;
  }
}

/**
 * Fetch stand-in answering from a route table. Unrouted requests get a 404
 * so a missing route shows up as a test failure rather than a hang.
 */
export function createFakeFetch(
  routes: Record<string, FakeRoute>,
): typeof fetch & { calls: RecordedRequest[] } {
  const calls: RecordedRequest[] = [];

  const fakeFetch = async (input: string | URL | Request, init?: RequestInit) => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const request: RecordedRequest = {
      method: (init?.method ?? 'GET').toUpperCase(),
      url: url.href,
      headers: readHeaders(init),
      body: readBody(init),
    };
    calls.push(request);

    const route =
      routes[`${request.method} ${url.origin}${url.pathname}`] ??
      routes[`${request.method} ${url.pathname}`];
    if (!route) {
      return jsonResponse(404, { message: `No route for ${request.method} ${url.pathname}` });
    }
    return route(request);
  };

  return Object.assign(fakeFetch, { calls });
}

/**
 * Create a review client that returns predefined feedback.
 *
 * @param responses - Queue of answers; an Error entry is thrown instead. When exhausted, answers "approved".
 */
export function createMockReviewClient(
  responses: (ReviewFeedback | Error)[] = [],
): ReviewClient & { calls: ReviewRequest[] } {
  const queue = [...responses];
  const calls: ReviewRequest[] = [];

  return {
    calls,
    async review(request: ReviewRequest): Promise<ReviewFeedback> {
      calls.push(request);
      const next = queue.shift();
      if (next instanceof Error) throw next;
      return next ?? { kind: 'approved', message: 'Everything looks good.' };
    },
  };
}
