/**
 * Floor Elements - Logging Utility
 *
 * Configurable logging with levels that can be disabled in production.
 * Placement traces go through here instead of bare console calls.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4
}

let currentLevel: LogLevel = LogLevel.WARN;

/**
 * Shape shared by the root logger and its scoped children
 */
export interface ScopedLogger {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
}

/**
 * Logger with configurable levels.
 * Default level is WARN - only warnings and errors are shown.
 * Set to DEBUG during development to see seed branches and every placement.
 */
export const Logger = {
  /**
   * Set the current log level
   */
  setLevel: (level: LogLevel): void => {
    currentLevel = level;
  },

  /**
   * Get the current log level
   */
  getLevel: (): LogLevel => currentLevel,

  /**
   * Debug-level logging for algorithm tracing
   * Use for: branch seeds, target counts, individual placements
   */
  debug: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.DEBUG) {
      console.log(`[DEBUG] ${msg}`, ...args);
    }
  },

  /**
   * Info-level logging for major steps
   * Use for: generation start/end per floor
   */
  info: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.INFO) {
      console.log(`[INFO] ${msg}`, ...args);
    }
  },

  /**
   * Warning-level logging for unexpected but non-fatal conditions
   * Use for: dropped elements, stale cache reads
   */
  warn: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.WARN) {
      console.warn(`[WARN] ${msg}`, ...args);
    }
  },

  /**
   * Error-level logging for failures
   */
  error: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.ERROR) {
      console.error(`[ERROR] ${msg}`, ...args);
    }
  },

  /**
   * Returns a logger that tags every message with `[scope]`.
   * Shares the global level.
   */
  scoped: (scope: string): ScopedLogger => ({
    debug: (msg, ...args) => Logger.debug(`[${scope}] ${msg}`, ...args),
    info: (msg, ...args) => Logger.info(`[${scope}] ${msg}`, ...args),
    warn: (msg, ...args) => Logger.warn(`[${scope}] ${msg}`, ...args),
    error: (msg, ...args) => Logger.error(`[${scope}] ${msg}`, ...args)
  })
};

/**
 * Convenience function to enable debug logging during development
 */
export function enableDebugLogging(): void {
  Logger.setLevel(LogLevel.DEBUG);
}

/**
 * Convenience function to disable all logging (production mode)
 */
export function disableLogging(): void {
  Logger.setLevel(LogLevel.NONE);
}
