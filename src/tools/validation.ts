/**
 * Tool argument validation
 * Runs tool arguments through their zod schema and flattens the issues
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';

export interface ValidationIssue {
  /** Dotted path into the arguments, '' for the root */
  path: string;
  message: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; issues: ValidationIssue[] };

function issuesOf(error: ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

export function validateToolArgs<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  args: unknown
): ValidationResult<T> {
  const parsed = schema.safeParse(args);
  return parsed.success
    ? { success: true, data: parsed.data }
    : { success: false, issues: issuesOf(parsed.error) };
}

/**
 * One line per issue, prefixed with its path
 */
export function formatValidationErrors(issues: readonly ValidationIssue[]): string {
  if (issues.length === 0) {
    return 'No validation errors';
  }

  const lines = issues.map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message));
  return `Validation errors:\n${lines.join('\n')}`;
}
