/**
 * Typed error hierarchy
 *
 * Structured error classes with machine-readable codes and optional context.
 */

export class RoffError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RoffError';
    // Maintain proper prototype chain for instanceof checks in transpiled JS
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown by `RoffDocument.control` for an empty or non-alphanumeric macro name. */
export class InvalidMacroNameError extends RoffError {
  constructor(
    public readonly macro: string,
    context?: Record<string, unknown>
  ) {
    super(
      macro === ''
        ? 'Macro name must not be empty'
        : `Invalid macro name "${macro}": only letters and digits are allowed`,
      'INVALID_MACRO',
      context
    );
    this.name = 'InvalidMacroNameError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidSectionError extends RoffError {
  constructor(
    public readonly section: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid manual section "${section}": must start with a digit from 1 to 8`,
      'INVALID_SECTION',
      context
    );
    this.name = 'InvalidSectionError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PageSpecError extends RoffError {
  constructor(
    message: string,
    public readonly issues: readonly string[],
    context?: Record<string, unknown>
  ) {
    super(message, 'PAGE_SPEC_ERROR', context);
    this.name = 'PageSpecError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class OutputError extends RoffError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'OUTPUT_ERROR', context);
    this.name = 'OutputError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends RoffError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
