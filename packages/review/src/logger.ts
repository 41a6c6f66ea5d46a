/**
 * Logger seam for the review run.
 * The action routes it to @actions/core; anything else can use consoleLogger.
 */
export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Console logger used when the host supplies none.
 * Debug lines only show up with PR_CRITIC_DEBUG set.
 */
export const consoleLogger: Logger = {
  info: (message: string) => console.log(`[pr-critic] ${message}`),
  warning: (message: string) => console.warn(`[pr-critic] warning: ${message}`),
  error: (message: string) => console.error(`[pr-critic] error: ${message}`),
  debug: (message: string) => {
    if (process.env.PR_CRITIC_DEBUG) console.debug(`[pr-critic] debug: ${message}`);
  },
};
