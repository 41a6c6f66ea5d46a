/**
 * Config module for .pr-critic/review.yml parsing.
 *
 * Owns the config format, validation, and loading.
 * Sensible defaults when no config file exists.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from './errors/index.js';
import { DEFAULT_EXTENSIONS } from './files.js';
import { DEFAULT_RULES } from './prompt.js';

/**
 * Endpoint used when neither REVIEW_API_URL nor review.yml names one
 */
export const DEFAULT_REVIEW_API_URL =
  'https://www.dex.inside.philips.com/philips-ai-chat/chat/api/user/SendImageMessage';

export const DEFAULT_REVIEW_TITLE = 'Automated Code Review';

// ---------------------------------------------------------------------------
// Config Schema
// ---------------------------------------------------------------------------

const apiConfigSchema = z
  .object({
    url: z.string().url().optional(),
    /** chat: OpenAI-compatible messages; diff: bare {diff, rules} payload */
    format: z.enum(['chat', 'diff']).default('chat'),
    model: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().default(120_000),
    maxRetries: z.number().int().min(0).max(5).default(0),
    retryDelayMs: z.number().int().min(0).default(1_000),
  })
  .default({});

const reviewSectionSchema = z
  .object({
    title: z.string().min(1).default(DEFAULT_REVIEW_TITLE),
    extensions: z.array(z.string().min(1)).min(1).default([...DEFAULT_EXTENSIONS]),
    addedLinesOnly: z.boolean().default(false),
    maxPatchChars: z.number().int().positive().default(20_000),
    rules: z.string().min(1).default(DEFAULT_RULES),
  })
  .default({});

const reviewConfigSchema = z.object({
  api: apiConfigSchema,
  review: reviewSectionSchema,
});

export type ReviewConfig = z.infer<typeof reviewConfigSchema>;
export type ReviewRequestFormat = ReviewConfig['api']['format'];

// ---------------------------------------------------------------------------
// Config Loading
// ---------------------------------------------------------------------------

const CONFIG_FILENAME = 'review.yml';
const CONFIG_DIR = '.pr-critic';

/**
 * Resolve the config file path from a root directory.
 */
export function resolveConfigPath(rootDir: string): string {
  return path.join(rootDir, CONFIG_DIR, CONFIG_FILENAME);
}

/**
 * Config used when no review.yml exists
 */
export function defaultConfig(): ReviewConfig {
  return reviewConfigSchema.parse({});
}

/**
 * Interpolate environment variables in strings.
 * Supports ${VAR_NAME} syntax.
 */
function interpolateEnvVars(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(/\$\{(\w+)\}/g, (_, varName: string) => env[varName] ?? '');
}

/**
 * Deep-interpolate environment variables in an object.
 */
function interpolateConfig(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map(item => interpolateConfig(item, env));
  }
  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = interpolateConfig(value, env);
    }
    return result;
  }
  return obj;
}

/**
 * Load and parse review.yml.
 *
 * @param rootDir - checked-out repository, searched for .pr-critic/review.yml
 * @param explicitPath - path given through CONFIG_PATH; must exist when set
 */
export function loadConfig(
  rootDir: string,
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): ReviewConfig {
  const configPath = explicitPath ? path.resolve(rootDir, explicitPath) : resolveConfigPath(rootDir);

  if (!fs.existsSync(configPath)) {
    if (explicitPath) {
      throw new ConfigError(`Config file not found: ${configPath}`, { path: configPath });
    }
    return defaultConfig();
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: configPath },
    );
  }

  if (!parsed || typeof parsed !== 'object') {
    return defaultConfig();
  }

  const result = reviewConfigSchema.safeParse(interpolateConfig(parsed, env));
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config in ${configPath}:\n${issues}`, { path: configPath });
  }

  return result.data;
}

/**
 * Resolve the review API endpoint: explicit override, then review.yml, then the default.
 */
export function resolveReviewApiUrl(config: ReviewConfig, override?: string): string {
  if (override && override.trim()) return override.trim();
  return config.api.url ?? DEFAULT_REVIEW_API_URL;
}
