/**
 * PR Critic GitHub Action
 *
 * Orchestrates:
 * 1. Reading and validating inputs (fails before any network call)
 * 2. Loading .pr-critic/review.yml from the checked-out workspace
 * 3. Running the review against the PR
 * 4. Publishing outputs, or failing the step
 */

import * as core from '@actions/core';
import {
  createOctokit,
  getErrorMessage,
  getErrorStack,
  loadConfig,
  resolveReviewApiUrl,
  runReview,
  ReviewApiClient,
  validateInputs,
} from '@pr-critic/review';
import { readActionInputs } from './inputs.js';
import { actionsLogger } from './logger.js';

/**
 * Main action logic
 */
export async function run(): Promise<void> {
  try {
    const raw = readActionInputs();
    const inputs = validateInputs(raw);
    core.setSecret(inputs.serviceCookie);
    core.info(`Repository: ${inputs.owner}/${inputs.repo}, PR #${inputs.pullNumber}`);

    const workspace = process.env.GITHUB_WORKSPACE || process.cwd();
    const config = loadConfig(workspace, raw.CONFIG_PATH);
    const apiUrl = resolveReviewApiUrl(config, raw.REVIEW_API_URL);
    core.info(`Review API: ${apiUrl} (${config.api.format} format)`);

    const reviewClient = new ReviewApiClient({
      url: apiUrl,
      cookie: inputs.serviceCookie,
      format: config.api.format,
      model: config.api.model,
      timeoutMs: config.api.timeoutMs,
      maxRetries: config.api.maxRetries,
      retryDelayMs: config.api.retryDelayMs,
      logger: actionsLogger,
    });

    const outcome = await runReview(inputs, config, {
      octokit: createOctokit(inputs.githubToken),
      reviewClient,
      logger: actionsLogger,
    });

    const usage = reviewClient.getUsage();
    if (usage.totalTokens > 0) {
      core.info(`Token usage: ${usage.totalTokens} tokens over ${usage.requests} requests`);
    }

    core.setOutput('files_reviewed', outcome.filesReviewed);
    core.setOutput('inline_comments', outcome.inlineComments);
    core.setOutput('review_url', outcome.reviewUrl ?? '');

    if (outcome.status === 'skipped') {
      core.info('Nothing to review, skipping');
    } else {
      core.info(`Review posted: ${outcome.reviewUrl ?? ''}`);
    }
  } catch (error) {
    const stack = getErrorStack(error);
    if (stack) core.debug(stack);
    core.setFailed(getErrorMessage(error));
  }
}
