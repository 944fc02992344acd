import { HttpStatus } from '@nestjs/common';

export class ApiError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class BadRequestError extends ApiError {
  constructor(message = 'Bad request', details?: Record<string, unknown>) {
    super('BAD_REQUEST', message, HttpStatus.BAD_REQUEST, details);
  }
}

export class InsufficientPointsError extends ApiError {
  constructor(required: number, available: number) {
    super(
      'INSUFFICIENT_POINTS',
      `Insufficient points: ${required} required, ${available} available`,
      HttpStatus.BAD_REQUEST,
      { required, available },
    );
  }
}

export class NotFoundError extends ApiError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details);
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message = 'Unauthorized', details?: Record<string, unknown>) {
    super('UNAUTHORIZED', message, HttpStatus.UNAUTHORIZED, details);
  }
}

export class ForbiddenError extends ApiError {
  constructor(message = 'Forbidden', details?: Record<string, unknown>) {
    super('FORBIDDEN', message, HttpStatus.FORBIDDEN, details);
  }
}

export class ConflictError extends ApiError {
  constructor(message = 'Conflict', details?: Record<string, unknown>) {
    super('CONFLICT', message, HttpStatus.CONFLICT, details);
  }
}

export class InvalidInputError extends ApiError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
  }
}

export class ScrapeFailedError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SCRAPE_FAILED', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}

export class InternalError extends ApiError {
  constructor(message = 'Internal error', details?: Record<string, unknown>) {
    super('INTERNAL_ERROR', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}
