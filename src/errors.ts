import type { ZodError } from 'zod';

/**
 * Raised when an externally supplied record (a data file entry, a serialized
 * analysis) fails validation. Lookups never raise: absence is `null`.
 */
export class RecordValidationError extends Error {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid ${source}: ${issues.join('; ')}`);
    this.name = 'RecordValidationError';
    this.source = source;
    this.issues = issues;
  }

  static fromZod(source: string, error: ZodError): RecordValidationError {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return new RecordValidationError(source, issues);
  }
}
