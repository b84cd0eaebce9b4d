/**
 * Error kinds raised by the course services.
 * They propagate to the caller unmodified; routes map them to HTTP responses.
 */

export class AppError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message?: string) {
    super(message ?? code);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

// Unknown mood label, missing or malformed answers
export class ValidationError extends AppError {
  constructor(code: string, message?: string) {
    super(400, code, message);
  }
}

export class NotFoundError extends AppError {
  constructor(code: string, message?: string) {
    super(404, code, message);
  }
}

// Submission into a closed session, closing twice
export class ConflictError extends AppError {
  constructor(code: string, message?: string) {
    super(409, code, message);
  }
}

// A stored invariant is broken (e.g. two current profiles). Never recovered locally.
export class DataIntegrityError extends AppError {
  constructor(code: string, message?: string) {
    super(500, code, message);
  }
}

// Postgres unique_violation (23505); the driver error may arrive wrapped in `cause`
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ('code' in error && error.code === '23505') return true;
  return isUniqueViolation(error.cause);
}
