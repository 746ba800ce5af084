import type { ZodError } from 'zod';

export type EvaluationStage = 'summarizer' | 'extractor' | 'persist-qualifications' | 'scorer';

export type ValidationIssue = {
  path?: string;
  message: string;
};

export class AppError extends Error {
  public readonly code: string;

  public readonly status: number;

  constructor(code: string, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class ValidationError extends AppError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super('validation_error', 400, message);
    this.issues = issues;
  }

  static fromZod(message: string, error: ZodError): ValidationError {
    return new ValidationError(
      message,
      error.issues.map((issue) => ({
        path: issue.path.join('.') || undefined,
        message: issue.message,
      })),
    );
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Missing caller identity.') {
    super('unauthorized', 401, message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Not authorized to view this job.') {
    super('forbidden', 403, message);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Job not found') {
    super('not_found', 404, message);
  }
}

export class ResumeUnavailableError extends AppError {
  constructor(message = 'No resume_text supplied and no base resume stored for this user.') {
    super('resume_unavailable', 422, message);
  }
}

// Leaf failures raised by the language-model collaborators.
export class SummarizationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('summarization_failed', 502, message, options);
  }
}

export class ExtractionError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('extraction_failed', 502, message, options);
  }
}

export class ScoringError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('scoring_failed', 502, message, options);
  }
}

export class EvaluationError extends AppError {
  public readonly stage: EvaluationStage;

  constructor(stage: EvaluationStage, cause: unknown) {
    super('evaluation_failed', 500, `${stage} failed: ${describeError(cause)}`, { cause });
    this.stage = stage;
  }
}

/**
 * Raised when a job row is missing or no longer writable at commit time.
 * Only ever logged; never reported to a caller.
 */
export class PersistenceUnavailableError extends AppError {
  public readonly jobId: string;

  constructor(jobId: string, operation: string) {
    super('persistence_unavailable', 500, `Job ${jobId} could not be written during ${operation}.`);
    this.jobId = jobId;
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (typeof error === 'string' && error) {
    return error;
  }

  return 'Unknown error';
};
