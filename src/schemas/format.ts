import type { ZodError } from 'zod';

export function validationIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Human-readable summary of a failed parse, e.g.
 * `version: can't be blank; stream: streaming is currently unsupported for Replicate`.
 */
export function formatValidationError(error: ZodError): string {
  return validationIssues(error).join('; ');
}
