/**
 * Error Handler
 *
 * Converts thrown values to user-facing messages and wraps async
 * functions with structured error handling.
 */

import {
  RoffError,
  InvalidMacroNameError,
  InvalidSectionError,
  PageSpecError,
  OutputError,
  ConfigurationError,
} from './roff-error.js';

export type WrapResult<T> = { data: T; error?: undefined } | { data?: undefined; error: RoffError };

export class ErrorHandler {
  /**
   * Convert any thrown value to a one-line user-facing message.
   */
  static toUserMessage(err: unknown): string {
    if (
      err instanceof PageSpecError ||
      err instanceof InvalidMacroNameError ||
      err instanceof InvalidSectionError
    ) {
      return err.message;
    }
    if (err instanceof OutputError) {
      const file = typeof err.context?.path === 'string' ? err.context.path : 'output file';
      return `Could not update ${file}. Check the path and permissions.`;
    }
    if (err instanceof ConfigurationError) {
      return `${err.message}. Run \`roffsmith config reset\` to restore defaults.`;
    }
    if (err instanceof RoffError) {
      return `${err.message} (${err.code})`;
    }
    if (err instanceof Error) {
      return err.message;
    }
    return 'An unexpected error occurred.';
  }

  /**
   * Wrap an async function with structured error handling.
   * Never throws: failures are returned as { error }.
   */
  static async wrap<T>(
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<WrapResult<T>> {
    try {
      const data = await fn();
      return { data };
    } catch (err) {
      if (err instanceof RoffError) {
        // Attach additional context if provided, keeping the subclass
        if (context && !err.context) {
          const wrapped: RoffError = Object.assign(
            Object.create(Object.getPrototypeOf(err)),
            err,
            // message and stack are not enumerable on Error
            { context, message: err.message, stack: err.stack }
          );
          return { error: wrapped };
        }
        return { error: err };
      }
      // Wrap generic errors in RoffError
      const wrapped = new RoffError(
        err instanceof Error ? err.message : String(err),
        'UNKNOWN_ERROR',
        context
      );
      return { error: wrapped };
    }
  }
}
