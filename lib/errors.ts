import type { z } from 'zod';

export type WorkoutParserErrorCode = 'INVALID_TEMPLATE' | 'INVALID_FORMAT_RESPONSE';

export type WorkoutParserIssue = {
  path: string;
  message: string;
};

export class WorkoutParserError extends Error {
  readonly code: WorkoutParserErrorCode;
  readonly issues: WorkoutParserIssue[];

  constructor(code: WorkoutParserErrorCode, message: string, options?: { issues?: WorkoutParserIssue[]; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'WorkoutParserError';
    this.code = code;
    this.issues = options?.issues ?? [];
  }
}

export function isWorkoutParserError(value: unknown): value is WorkoutParserError {
  return value instanceof WorkoutParserError;
}

function formatIssuePath(path: Array<string | number>): string {
  return path.length ? path.join('.') : '(root)';
}

export function fromZodError(code: WorkoutParserErrorCode, summary: string, error: z.ZodError): WorkoutParserError {
  const issues = error.issues.map((issue) => ({ path: formatIssuePath(issue.path), message: issue.message }));
  const detail = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
  return new WorkoutParserError(code, detail ? `${summary} ${detail}` : summary, { issues, cause: error });
}
