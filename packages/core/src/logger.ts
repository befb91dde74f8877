/**
 * Logger contract shared by the gate and its callers. The gate only reports
 * stage progress, at debug level.
 */

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
}

/**
 * Silent logger (for tests or library use)
 */
export const silentLogger: Logger = {
  debug: () => {},
};
