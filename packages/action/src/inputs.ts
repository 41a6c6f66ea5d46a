/**
 * Action inputs, read from `with:` inputs or the step environment
 */

import * as core from '@actions/core';
import * as github from '@actions/github';
import { REQUIRED_INPUTS, type RawInputs } from '@pr-critic/review';

export interface ActionInputs extends RawInputs {
  REVIEW_API_URL?: string;
  CONFIG_PATH?: string;
}

function readInput(name: string): string | undefined {
  const value = core.getInput(name) || process.env[name];
  return value ? value : undefined;
}

/**
 * Head SHA of the triggering pull_request event, if any
 */
function eventHeadSha(): string | undefined {
  const head: unknown = github.context.payload.pull_request?.head;
  if (typeof head === 'object' && head !== null && 'sha' in head && typeof head.sha === 'string') {
    return head.sha;
  }
  return undefined;
}

/**
 * Collect raw inputs. Validation happens in the review package.
 * PR_NUMBER and GITHUB_SHA fall back to the pull_request event payload.
 */
export function readActionInputs(): ActionInputs {
  const inputs: ActionInputs = {};
  for (const name of REQUIRED_INPUTS) {
    inputs[name] = readInput(name);
  }

  const eventNumber = github.context.payload.pull_request?.number;
  if (!inputs.PR_NUMBER && typeof eventNumber === 'number') {
    inputs.PR_NUMBER = String(eventNumber);
  }

  inputs.GITHUB_SHA = eventHeadSha() ?? readInput('GITHUB_SHA');
  inputs.REVIEW_API_URL = readInput('REVIEW_API_URL');
  inputs.CONFIG_PATH = readInput('CONFIG_PATH');
  return inputs;
}
