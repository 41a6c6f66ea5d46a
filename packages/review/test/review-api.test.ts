import { describe, it, expect } from 'vitest';
import { ReviewApiClient, type ReviewApiClientOptions } from '../src/review-api.js';
import { ReviewApiError, ReviewErrorCode } from '../src/errors/index.js';
import {
  createFakeFetch,
  createRecordingLogger,
  jsonResponse,
  silentLogger,
  type FakeRoute,
} from '../src/test-helpers.js';
import type { ReviewRequest } from '../src/types.js';

const API_URL = 'https://review.test/api/chat';

const request: ReviewRequest = {
  filename: 'src/app.ts',
  diff: '@@ -0,0 +1 @@\n+let total = 0;',
  rules: 'Prefer const.',
};

function createClient(
  route: FakeRoute,
  overrides: Pick<ReviewApiClientOptions, 'maxRetries' | 'format' | 'model'> = {},
) {
  const fetch = createFakeFetch({ [`POST ${API_URL}`]: route });
  const client = new ReviewApiClient({
    url: API_URL,
    cookie: 'session=test-secret',
    fetch,
    logger: silentLogger,
    retryDelayMs: 0,
    ...overrides,
  });
  return { client, fetch };
}

async function captureError(promise: Promise<unknown>): Promise<ReviewApiError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ReviewApiError) return error;
    throw error;
  }
  throw new Error('expected the review call to fail');
}

describe('ReviewApiClient', () => {
  it('sends the service cookie and a chat payload', async () => {
    const { client, fetch } = createClient(() =>
      jsonResponse(200, { message: 'Everything looks good.' }),
    );

    await client.review(request);

    expect(fetch.calls).toHaveLength(1);
    const [call] = fetch.calls;
    expect(call.method).toBe('POST');
    expect(call.headers.cookie).toBe('session=test-secret');
    expect(call.headers['content-type']).toBe('application/json');
    expect(call.body).toEqual(client.buildPayload(request));
  });

  it('builds an OpenAI-style message carrying the prompt', () => {
    const { client } = createClient(() => jsonResponse(204), { model: 'review-model' });
    const payload = client.buildPayload(request);

    expect(payload.model).toBe('review-model');
    expect(payload.messages).toEqual([
      {
        role: 'user',
        content: [{ type: 'text', text: expect.stringContaining('File: src/app.ts') }],
      },
    ]);
  });

  it('omits the model when none is configured', () => {
    const { client } = createClient(() => jsonResponse(204));
    expect(client.buildPayload(request)).not.toHaveProperty('model');
  });

  it('sends a bare diff payload in diff format', async () => {
    const { client, fetch } = createClient(() => jsonResponse(200, { comments: [] }), {
      format: 'diff',
    });

    await client.review(request);

    expect(fetch.calls[0].body).toEqual({
      diff: '@@ -0,0 +1 @@\n+let total = 0;',
      rules: 'Prefer const.',
    });
  });

  it('treats 204 as approval', async () => {
    const { client } = createClient(() => jsonResponse(204));
    await expect(client.review(request)).resolves.toEqual({
      kind: 'approved',
      message: 'Everything looks good.',
    });
  });

  it('returns comments from the answer', async () => {
    const { client } = createClient(() =>
      jsonResponse(200, { comments: [{ line: 'let total = 0;', body: 'Use const.' }] }),
    );
    await expect(client.review(request)).resolves.toEqual({
      kind: 'comments',
      comments: [{ line: 'let total = 0;', body: 'Use const.' }],
    });
  });

  it('fails on a 500 without retrying by default', async () => {
    const { client, fetch } = createClient(() => new Response('upstream down', { status: 500 }));

    const error = await captureError(client.review(request));

    expect(error.message).toBe('Review API error (500): upstream down');
    expect(error.code).toBe(ReviewErrorCode.REVIEW_API_FAILED);
    expect(error.status).toBe(500);
    expect(error.retryable).toBe(true);
    expect(fetch.calls).toHaveLength(1);
  });

  it('reports a rejected cookie as AUTH_FAILED', async () => {
    const { client } = createClient(() => new Response('login required', { status: 401 }));

    const error = await captureError(client.review(request));

    expect(error.code).toBe(ReviewErrorCode.AUTH_FAILED);
    expect(error.message).toBe('Review API rejected the service cookie (401): login required');
  });

  it('retries retryable failures up to maxRetries', async () => {
    let attempts = 0;
    const { client, fetch } = createClient(
      () => {
        attempts++;
        return attempts < 3
          ? new Response('busy', { status: 503 })
          : jsonResponse(200, { message: 'Everything looks good.' });
      },
      { maxRetries: 2 },
    );

    await expect(client.review(request)).resolves.toEqual({
      kind: 'approved',
      message: 'Everything looks good.',
    });
    expect(fetch.calls).toHaveLength(3);
  });

  it('gives up after maxRetries', async () => {
    const { client, fetch } = createClient(() => new Response('busy', { status: 429 }), {
      maxRetries: 1,
    });

    const error = await captureError(client.review(request));

    expect(error.status).toBe(429);
    expect(fetch.calls).toHaveLength(2);
  });

  it('does not retry a 400', async () => {
    const { client, fetch } = createClient(() => new Response('bad payload', { status: 400 }), {
      maxRetries: 3,
    });

    const error = await captureError(client.review(request));

    expect(error.retryable).toBe(false);
    expect(fetch.calls).toHaveLength(1);
  });

  it('wraps network failures as retryable', async () => {
    const { client } = createClient(() => {
      throw new TypeError('fetch failed');
    });

    const error = await captureError(client.review(request));

    expect(error.message).toBe('Failed to reach review API: fetch failed');
    expect(error.retryable).toBe(true);
  });

  it('wraps a body that breaks off mid-read as retryable', async () => {
    const { client } = createClient(
      () =>
        new Response(
          new ReadableStream({
            start(controller) {
              controller.error(new Error('connection reset'));
            },
          }),
          { status: 200 },
        ),
    );

    const error = await captureError(client.review(request));

    expect(error).toBeInstanceOf(ReviewApiError);
    expect(error.message).toMatch(/^Failed to read review API response: /);
    expect(error.retryable).toBe(true);
  });

  it('rejects a body that is not JSON', async () => {
    const { client } = createClient(() => new Response('<html>login</html>', { status: 200 }));

    const error = await captureError(client.review(request));

    expect(error.message).toBe('Review API returned invalid JSON: <html>login</html>');
  });

  it('accumulates token usage from chat completions', async () => {
    const { client } = createClient(() =>
      jsonResponse(200, {
        choices: [{ message: { content: 'Everything looks good.' } }],
        usage: { prompt_tokens: 100, completion_tokens: 5, total_tokens: 105 },
      }),
    );

    await client.review(request);
    await client.review(request);

    expect(client.getUsage()).toEqual({
      requests: 2,
      promptTokens: 200,
      completionTokens: 10,
      totalTokens: 210,
    });
  });

  it('logs the status of every answer', async () => {
    const logger = createRecordingLogger();
    const fetch = createFakeFetch({ [`POST ${API_URL}`]: () => jsonResponse(204) });
    const client = new ReviewApiClient({ url: API_URL, cookie: 'c=1', fetch, logger });

    await client.review(request);

    expect(logger.lines).toContain('info: Review API responded with 204');
  });
});
