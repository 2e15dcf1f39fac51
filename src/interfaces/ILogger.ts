/**
 * @fileoverview Interface for logging abstraction.
 * 
 * Mirrors the public API of `ComponentLogger` to allow dependency injection
 * of logging in components that need testability without coupling to the
 * concrete Logger/ComponentLogger implementation.
 * 
 * @module interfaces/ILogger
 */

/**
 * Interface for a component-scoped logger.
 * 
 * Provides standard log-level methods for structured diagnostics.
 * Implementations may write to stderr or to test stubs.
 * 
 * @example
 * ```typescript
 * class StatusStore {
 *   constructor(private readonly log: ILogger) {}
 *   
 *   save(): void {
 *     this.log.debug('Saved status', { path: '/work/t1/.valrun-status.json' });
 *   }
 * }
 * ```
 */
export interface ILogger {
  /**
   * Log at debug level.
   * Only emitted if debug logging is enabled for the component.
   * 
   * @param message - Log message
   * @param data - Optional structured data or Error
   */
  debug(message: string, data?: unknown): void;

  /** Log at info level. */
  info(message: string, data?: unknown): void;

  /** Log at warn level. */
  warn(message: string, data?: unknown): void;

  /** Log at error level. */
  error(message: string, data?: unknown): void;

  /**
   * Check if debug logging is enabled.
   * Useful to skip expensive data formatting when debug is off.
   */
  isDebugEnabled(): boolean;
}
