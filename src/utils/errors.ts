/**
 * Application errors. Each carries the HTTP status and the error code the
 * error middleware renders into the response envelope.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Invalid authentication credentials') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class StorageError extends AppError {
  constructor(message: string = 'Could not save uploaded file') {
    super(message, 500, 'STORAGE_ERROR');
  }
}
