/**
 * Answer validators. Each returns the normalized value or throws ValidationError.
 */
import { ValidationError, ErrorCodes } from '../../utils/errors.js';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const PYTHON_KEYWORDS = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break',
  'class', 'continue', 'def', 'del', 'elif', 'else', 'except', 'finally', 'for',
  'from', 'global', 'if', 'import', 'in', 'is', 'lambda', 'nonlocal', 'not',
  'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);

// Module names a generated project cannot shadow
const RESERVED_MODULES = new Set(['django', 'test', 'rest_framework']);

/**
 * A Python module name usable as a Django project or app name.
 * `reserved` holds top-level names the template set writes into the output root.
 */
export function validateIdentifier(raw: string, label: string, reserved: readonly string[] = []): string {
  const value = raw.trim();
  if (value.length === 0) {
    throw new ValidationError(ErrorCodes.REQUIRED, `${label} is required`);
  }
  if (/[\\/]/.test(value)) {
    throw new ValidationError(ErrorCodes.INVALID_IDENTIFIER, `${label} must not contain path separators`, { value });
  }
  if (/^[0-9]/.test(value)) {
    throw new ValidationError(ErrorCodes.INVALID_IDENTIFIER, `${label} must not start with a digit`, { value });
  }
  if (!IDENTIFIER_PATTERN.test(value)) {
    throw new ValidationError(
      ErrorCodes.INVALID_IDENTIFIER,
      `${label} may only contain letters, digits and underscores`,
      { value }
    );
  }
  if (PYTHON_KEYWORDS.has(value) || RESERVED_MODULES.has(value)) {
    throw new ValidationError(ErrorCodes.RESERVED_NAME, `${label} "${value}" is a reserved name`, { value });
  }
  if (reserved.includes(value)) {
    throw new ValidationError(
      ErrorCodes.RESERVED_NAME,
      `${label} "${value}" clashes with a generated file or directory`,
      { value }
    );
  }
  return value;
}

/**
 * The app lives inside the project directory next to the settings package,
 * so the two names must differ.
 */
export function validateAppName(raw: string, projectName: string, reserved: readonly string[] = []): string {
  const value = validateIdentifier(raw, 'App name', reserved);
  if (value === projectName) {
    throw new ValidationError(
      ErrorCodes.NAME_CONFLICT,
      `App name must differ from the service name "${projectName}"`,
      { value }
    );
  }
  return value;
}

export function parseYesNo(raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'y':
    case 'yes':
      return true;
    case 'n':
    case 'no':
      return false;
    default:
      throw new ValidationError(ErrorCodes.INVALID_YES_NO, 'Please answer y(es) or n(o)', { value: raw });
  }
}

/**
 * Free text that ends up inside double-quoted strings in the generated code.
 */
export function validateText(raw: string, label: string): string {
  const value = raw.trim();
  if (value.length === 0) {
    throw new ValidationError(ErrorCodes.REQUIRED, `${label} is required`);
  }
  if (/["\\]/.test(value) || /[\u0000-\u001f]/.test(value)) {
    throw new ValidationError(
      ErrorCodes.INVALID_VALUE,
      `${label} must not contain double quotes, backslashes or control characters`,
      { value }
    );
  }
  return value;
}

/**
 * Registry host, optionally with a port (e.g., "hub.docker.com", "registry.local:5000").
 */
export function validateRegistryDomain(raw: string): string {
  const value = raw.trim();
  if (value.length === 0) {
    throw new ValidationError(ErrorCodes.REQUIRED, 'Registry domain is required');
  }
  if (!/^[A-Za-z0-9]([A-Za-z0-9-]*[A-Za-z0-9])?(\.[A-Za-z0-9]([A-Za-z0-9-]*[A-Za-z0-9])?)*(:[0-9]{1,5})?$/.test(value)) {
    throw new ValidationError(ErrorCodes.INVALID_VALUE, `Invalid registry domain: ${value}`, { value });
  }
  return value;
}

/**
 * Registry namespace: lowercase, with single separators between alphanumerics.
 */
export function validateRegistryFolder(raw: string): string {
  const value = raw.trim();
  if (value.length === 0) {
    throw new ValidationError(ErrorCodes.REQUIRED, 'Registry folder is required');
  }
  if (!/^[a-z0-9]+([._-][a-z0-9]+)*$/.test(value)) {
    throw new ValidationError(
      ErrorCodes.INVALID_VALUE,
      'Registry folder may only contain lowercase letters, digits and single . _ - separators',
      { value }
    );
  }
  return value;
}
