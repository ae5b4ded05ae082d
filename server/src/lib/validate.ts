import { z } from 'zod';

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; issues: z.ZodIssue[] };

/**
 * Validates an unknown value against a Zod schema.
 */
export function validate<T extends z.ZodType>(
  schema: T,
  value: unknown,
): ValidationResult<z.infer<T>> {
  const result = schema.safeParse(value);
  if (!result.success) {
    return { success: false, issues: result.error.issues };
  }
  return { success: true, data: result.data };
}

export function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
