/**
 * Barrel export for typed error hierarchy and error handler.
 */

export {
  RoffError,
  InvalidMacroNameError,
  InvalidSectionError,
  PageSpecError,
  OutputError,
  ConfigurationError,
} from './roff-error.js';

export { ErrorHandler } from './error-handler.js';
export type { WrapResult } from './error-handler.js';
