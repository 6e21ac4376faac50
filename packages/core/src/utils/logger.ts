/**
 * @fileoverview Centralized debug logging utility for runstat.
 * Provides consistent logging with conditional execution based on debug flags.
 */

declare global {
  // eslint-disable-next-line no-var
  var __RUNSTAT_DEBUG: boolean | undefined;
}

/**
 * Simple logger that only outputs when debug mode is enabled.
 * Debug mode is activated via:
 * - globalThis.__RUNSTAT_DEBUG = true
 * - process.env.RUNSTAT_DEBUG = 'true'
 */
export class Logger {
  private readonly enabled: boolean;
  private readonly prefix: string;

  constructor(prefix: string, forceEnable = false) {
    this.prefix = prefix;
    this.enabled = forceEnable || this.isDebugMode();
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Log a message if debug mode is enabled.
   * Arguments are passed directly to console.log after the prefix.
   */
  log(...args: unknown[]): void {
    if (this.enabled) {
      console.log(`[${this.prefix}]`, ...args);
    }
  }

  private isDebugMode(): boolean {
    return Boolean(
      globalThis.__RUNSTAT_DEBUG ||
      (typeof process !== 'undefined' && process?.env?.RUNSTAT_DEBUG)
    );
  }
}

/**
 * Create a logger instance with a given prefix.
 */
export function createLogger(prefix: string, forceEnable = false): Logger {
  return new Logger(prefix, forceEnable);
}
