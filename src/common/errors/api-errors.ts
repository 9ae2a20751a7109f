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

export class InvalidInputError extends ApiError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, HttpStatus.UNPROCESSABLE_ENTITY, details);
    this.name = 'InvalidInputError';
  }
}
