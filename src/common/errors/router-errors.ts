// HTTP 어댑터 전용 에러 — 라우팅 코어는 예외를 던지지 않는다

import { HttpStatus } from '@nestjs/common';

export class RouterError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'RouterError';
  }
}

export class BadRequestError extends RouterError {
  constructor(message = 'Bad request', details?: Record<string, unknown>) {
    super('BAD_REQUEST', message, HttpStatus.BAD_REQUEST, details);
  }
}

export class InvalidInputError extends RouterError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 422, details);
  }
}
