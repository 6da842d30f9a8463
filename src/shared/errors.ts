/**
 * Orchestration errors returned synchronously to facade callers.
 */

import { ZodError } from 'zod';

export type VisualizationErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_TARGET'
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'ALREADY_IN_PROGRESS'
  | 'INVALID_STATE'
  | 'INVALID_TRANSITION'
  | 'RETRY_LIMIT_EXCEEDED';

export class VisualizationError extends Error {
  public readonly code: VisualizationErrorCode;
  public readonly httpStatus: number;

  constructor(code: VisualizationErrorCode, message: string, httpStatus: number) {
    super(message);
    this.name = 'VisualizationError';
    this.code = code;
    this.httpStatus = httpStatus;
  }
}

export class ValidationError extends VisualizationError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION_ERROR', message, 400);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static fromZod(error: ZodError): ValidationError {
    const issues = error.issues.map((issue) =>
      issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    return new ValidationError(issues.join('; '), issues);
  }
}

export class InvalidTargetError extends VisualizationError {
  constructor(message: string) {
    super('INVALID_TARGET', message, 422);
    this.name = 'InvalidTargetError';
  }
}

export class NotFoundError extends VisualizationError {
  constructor(entity: string, id: string) {
    super('NOT_FOUND', `${entity} ${id} not found`, 404);
    this.name = 'NotFoundError';
  }
}

export class ForbiddenError extends VisualizationError {
  constructor(message = 'Only the job owner or an administrator may do this') {
    super('FORBIDDEN', message, 403);
    this.name = 'ForbiddenError';
  }
}

export class AlreadyInProgressError extends VisualizationError {
  public readonly existingJobId: string | null;

  constructor(message: string, existingJobId: string | null = null) {
    super('ALREADY_IN_PROGRESS', message, 409);
    this.name = 'AlreadyInProgressError';
    this.existingJobId = existingJobId;
  }
}

export class InvalidStateError extends VisualizationError {
  constructor(message: string) {
    super('INVALID_STATE', message, 409);
    this.name = 'InvalidStateError';
  }
}

export class InvalidTransitionError extends VisualizationError {
  constructor(from: string, to: string) {
    super('INVALID_TRANSITION', `Illegal job status transition ${from} -> ${to}`, 409);
    this.name = 'InvalidTransitionError';
  }
}

export class RetryLimitExceededError extends VisualizationError {
  constructor(jobId: string, limit: number) {
    super('RETRY_LIMIT_EXCEEDED', `Job ${jobId} reached the retry limit of ${limit}`, 409);
    this.name = 'RetryLimitExceededError';
  }
}
