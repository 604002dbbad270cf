import { z } from 'zod';

export type PayloadParseResult<T> =
  | { success: true; data: T }
  | { success: false; message: string };

/**
 * Formats the first issue as `field: reason`, or just the reason when the
 * issue concerns the payload as a whole.
 */
export const describeIssue = (error: z.ZodError): string => {
  const issue = error.issues[0];
  if (!issue) {
    return 'Invalid request';
  }
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return `unknown field: ${issue.keys.join(', ')}`;
  }
  const field = issue.path.join('.');
  return field ? `${field}: ${issue.message}` : issue.message;
};

export const parseWith = <S extends z.ZodTypeAny>(schema: S, raw: unknown): PayloadParseResult<z.output<S>> => {
  const result = schema.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, message: describeIssue(result.error) };
};
