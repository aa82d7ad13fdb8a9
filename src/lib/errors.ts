/**
 * Base error for everything the service surfaces to a caller.
 * `code` is the machine-readable value put in error responses.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class InvalidRepositoryReferenceError extends AppError {
  constructor(public readonly input: string) {
    super(`cannot parse owner/repository from '${input}'`, 'invalid_repository_reference', 400);
  }
}

export class RepositoryNotFoundError extends AppError {
  constructor(public readonly repository: string, cause?: unknown) {
    super(`repository ${repository} could not be loaded`, 'repository_not_found', 404);
    if (cause !== undefined) this.cause = cause;
  }
}

/** A run reached a terminal state other than `completed`, or produced nothing usable. */
export class AssessmentServiceError extends AppError {
  constructor(public readonly status: string, detail?: string) {
    super(detail ? `assessment run ended with status ${status}: ${detail}` : `assessment run ended with status ${status}`, 'assessment_service_error', 502);
  }
}

export class AssessmentServiceTimeoutError extends AppError {
  constructor(public readonly attempts: number, public readonly lastStatus: string) {
    super(`assessment run still ${lastStatus} after ${attempts} polls`, 'assessment_service_timeout', 504);
  }
}
