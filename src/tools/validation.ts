/**
 * Tool argument validation
 * Validates tool arguments using Zod schemas
 */

import type { ZodType, ZodTypeDef } from 'zod';

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationIssue[] };

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Validate tool arguments against schema
 */
export function validateToolArgs<T>(schema: ZodType<T, ZodTypeDef, unknown>, args: unknown): ValidationResult<T> {
  const result = schema.safeParse(args);
  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map(err => ({
      path: err.path.join('.'),
      message: err.message,
    })),
  };
}

/**
 * Format validation errors for user
 */
export function formatValidationErrors(errors: ValidationIssue[]): string {
  if (errors.length === 0) {
    return 'No validation errors';
  }

  const formatted = errors.map(err => (err.path ? `${err.path}: ${err.message}` : err.message));

  return `Validation errors:\n${formatted.join('\n')}`;
}
