import * as core from '@actions/core';
import type { Logger } from '@pr-critic/review';

/**
 * Logger backed by the workflow log
 */
export const actionsLogger: Logger = {
  info: message => core.info(message),
  warning: message => core.warning(message),
  error: message => core.error(message),
  debug: message => core.debug(message),
};
