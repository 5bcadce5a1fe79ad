/**
 * Error types and codes for the service wizard.
 * Every error raised by the wizard extends WizardError.
 */

/**
 * Base error class for all wizard errors.
 */
export class WizardError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'WizardError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Bad user input. Handled at the prompt boundary, never reaches the CLI.
 */
export class ValidationError extends WizardError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Input could not be collected (attempts exhausted, stdin closed).
 */
export class InputAbortedError extends WizardError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'InputAbortedError';
  }
}

/**
 * A template root, subtree or fragment is missing from the install.
 */
export class MissingTemplateError extends WizardError {
  constructor(templatePath: string, details?: Record<string, unknown>) {
    super(ErrorCodes.MISSING_TEMPLATE, `Template not found: ${templatePath}`, {
      path: templatePath,
      ...details,
    });
    this.name = 'MissingTemplateError';
  }
}

/**
 * The output directory already exists.
 */
export class OutputExistsError extends WizardError {
  constructor(outputPath: string) {
    super(
      ErrorCodes.OUTPUT_EXISTS,
      `Output directory already exists: ${outputPath}. Choose another name or remove it first.`,
      { path: outputPath }
    );
    this.name = 'OutputExistsError';
  }
}

/**
 * A feature name outside the toggle set or absent from the manifest.
 */
export class UnknownFeatureError extends WizardError {
  constructor(name: string, known: readonly string[]) {
    super(ErrorCodes.UNKNOWN_FEATURE, `Unknown feature: ${name}. Known features: ${known.join(', ')}`, {
      feature: name,
      known: [...known],
    });
    this.name = 'UnknownFeatureError';
  }
}

/**
 * A feature was applied before a feature it requires.
 */
export class FeatureDependencyError extends WizardError {
  constructor(feature: string, missing: readonly string[]) {
    super(
      ErrorCodes.FEATURE_DEPENDENCY,
      `Feature "${feature}" requires ${missing.map((m) => `"${m}"`).join(', ')} to be applied first`,
      { feature, missing: [...missing] }
    );
    this.name = 'FeatureDependencyError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends WizardError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (parse errors, unreadable files).
 */
export class SystemError extends WizardError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * A rendered path would leave the output root.
 */
export class SecurityError extends WizardError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SecurityError';
  }
}

export const ErrorCodes = {
  // Input validation (V001-V006)
  REQUIRED: 'V001',
  INVALID_IDENTIFIER: 'V002',
  RESERVED_NAME: 'V003',
  NAME_CONFLICT: 'V004',
  INVALID_YES_NO: 'V005',
  INVALID_VALUE: 'V006',

  // Input collection (I001-I002)
  ATTEMPTS_EXHAUSTED: 'I001',
  INPUT_CLOSED: 'I002',

  // Generation (G001-G004)
  MISSING_TEMPLATE: 'G001',
  OUTPUT_EXISTS: 'G002',
  UNKNOWN_FEATURE: 'G003',
  FEATURE_DEPENDENCY: 'G004',

  // Configuration and system (S001-S003)
  PARSE_ERROR: 'S001',
  INVALID_SCHEMA: 'S002',
  CONFIG_LOAD_ERROR: 'S003',

  // Security
  PATH_TRAVERSAL: 'SEC001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
