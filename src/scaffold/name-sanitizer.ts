/**
 * Project name sanitization.
 *
 * Turns arbitrary user input into a canonical name that is safe as a single
 * path segment on POSIX and Windows: lowercase, `[a-z0-9_-]` only, no
 * consecutive hyphens, alphanumeric at both ends, never a Windows device name.
 * Invalid characters are replaced rather than rejected.
 */

import { ValidationError } from '../core/errors.js';

export const DEFAULT_MAX_NAME_LENGTH = 50;
export const DEFAULT_MIN_NAME_LENGTH = 1;

export const CANONICAL_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

/** DOS device names Windows refuses as file or folder names */
export const RESERVED_NAME_PATTERN = /^(con|prn|aux|nul|com[0-9]|lpt[0-9])$/;

export interface SanitizeOptions {
  maxLength?: number;
  minLength?: number;
}

export type NameValidation =
  | { valid: true; name: string }
  | { valid: false; error: ValidationError };

export function sanitizeProjectName(raw: string, options: SanitizeOptions = {}): string {
  const maxLength = options.maxLength ?? DEFAULT_MAX_NAME_LENGTH;
  const minLength = options.minLength ?? DEFAULT_MIN_NAME_LENGTH;

  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Project name cannot be empty', 'EMPTY_NAME');
  }
  if (trimmed.length > maxLength) {
    throw new ValidationError(
      `Project name too long (${trimmed.length} characters, max ${maxLength})`,
      'TOO_LONG',
    );
  }

  const name = trimmed
    .toLowerCase()
    .replace(/\s+/g, '-')
    .replace(/[^a-z0-9_-]/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^[-_]+|[-_]+$/g, '');

  if (name.length === 0) {
    throw new ValidationError(
      `Project name "${trimmed}" has no letters or numbers left after sanitizing`,
      'EMPTY_AFTER_SANITIZE',
    );
  }
  if (name.length < minLength) {
    throw new ValidationError(
      `Project name too short ("${name}", min ${minLength} characters)`,
      'TOO_SHORT',
    );
  }
  if (!CANONICAL_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `Project name must start with a letter or number, got "${name}"`,
      'INVALID_START',
    );
  }
  if (RESERVED_NAME_PATTERN.test(name)) {
    throw new ValidationError(`Project name "${name}" is reserved on Windows`, 'RESERVED_NAME');
  }

  return name;
}

/**
 * Non-throwing variant for callers that re-prompt on bad input.
 */
export function validateProjectName(raw: string, options: SanitizeOptions = {}): NameValidation {
  try {
    return { valid: true, name: sanitizeProjectName(raw, options) };
  } catch (err) {
    if (err instanceof ValidationError) {
      return { valid: false, error: err };
    }
    throw err;
  }
}
