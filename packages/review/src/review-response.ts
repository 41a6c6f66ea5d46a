/**
 * Normalisation of review API answers.
 *
 * The service has answered in several shapes over time: a bare
 * `{comments}` list, an OpenAI-style `{choices}` completion, or a
 * `{message}` string. All of them are folded into a ReviewFeedback.
 */

import { z } from 'zod';
import { ReviewApiError, ReviewErrorCode } from './errors/index.js';
import { APPROVAL_MESSAGE } from './prompt.js';
import type { ReviewComment, ReviewFeedback } from './types.js';

const commentSchema = z.object({
  line: z.string(),
  body: z.string().min(1),
});

const commentsPayloadSchema = z.object({
  comments: z.array(commentSchema),
  summary: z.string().optional(),
});

/** JSON the model writes inside a chat completion */
const chatAnswerSchema = z
  .object({
    summary: z.string().optional(),
    comments: z.array(commentSchema).optional(),
  })
  .refine(answer => answer.summary !== undefined || answer.comments !== undefined);

const usageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number(),
});

const chatPayloadSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
  usage: usageSchema.optional(),
});

const messagePayloadSchema = z.object({
  message: z.string(),
});

export type ReviewApiUsage = z.infer<typeof usageSchema>;

/**
 * Whether a free-text answer is the "nothing to flag" answer
 */
export function isApproval(text: string): boolean {
  return /^\W*everything looks good\W*$/i.test(text.trim());
}

/**
 * Extract JSON content from an answer that may be wrapped in a markdown code block.
 * Returns the trimmed content of the first block, or the whole answer if there is none.
 */
export function extractJSONFromCodeBlock(content: string): string {
  const codeBlockMatch = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  return (codeBlockMatch ? codeBlockMatch[1] : content).trim();
}

function fromComments(comments: ReviewComment[], summary?: string): ReviewFeedback {
  if (comments.length > 0) {
    return summary ? { kind: 'comments', comments, summary } : { kind: 'comments', comments };
  }
  if (summary && !isApproval(summary)) {
    return { kind: 'summary', text: summary };
  }
  return { kind: 'approved', message: APPROVAL_MESSAGE };
}

function fromText(text: string): ReviewFeedback {
  return isApproval(text)
    ? { kind: 'approved', message: APPROVAL_MESSAGE }
    : { kind: 'summary', text: text.trim() };
}

function tryParseJSON(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Interpret the text of a chat completion
 */
export function parseChatContent(content: string): ReviewFeedback {
  if (!content.trim()) {
    throw new ReviewApiError('Review API returned an empty answer', {
      code: ReviewErrorCode.UNEXPECTED_RESPONSE,
    });
  }

  const answer = chatAnswerSchema.safeParse(tryParseJSON(extractJSONFromCodeBlock(content)));
  if (answer.success) {
    return fromComments(answer.data.comments ?? [], answer.data.summary);
  }

  return fromText(content);
}

/**
 * Interpret a decoded JSON body from the review API
 */
export function parseReviewResponse(data: unknown): ReviewFeedback {
  const commentsPayload = commentsPayloadSchema.safeParse(data);
  if (commentsPayload.success) {
    return fromComments(commentsPayload.data.comments, commentsPayload.data.summary);
  }

  const chatPayload = chatPayloadSchema.safeParse(data);
  if (chatPayload.success) {
    return parseChatContent(chatPayload.data.choices[0].message.content ?? '');
  }

  const messagePayload = messagePayloadSchema.safeParse(data);
  if (messagePayload.success) {
    return fromText(messagePayload.data.message);
  }

  throw new ReviewApiError(
    `Unexpected response format from review API: ${String(JSON.stringify(data)).slice(0, 200)}`,
    { code: ReviewErrorCode.UNEXPECTED_RESPONSE },
  );
}

/**
 * Read the token usage block of an OpenAI-style answer, if any
 */
export function readUsage(data: unknown): ReviewApiUsage | undefined {
  const parsed = chatPayloadSchema.safeParse(data);
  return parsed.success ? parsed.data.usage : undefined;
}
