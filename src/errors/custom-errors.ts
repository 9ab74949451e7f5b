import { ERROR_CODES } from '../configuration/constants.js';

export class BaseError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly timestamp: Date;

  constructor(message: string, code: string, isOperational = true) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }
}

/** Bad input from the command line, the environment or a caller */
export class ValidationError extends BaseError {
  constructor(
    message: string,
    public readonly fields?: Record<string, string[]>,
  ) {
    super(message, ERROR_CODES.VALIDATION_ERROR);
  }
}

export class InternalError extends BaseError {
  public override readonly cause?: Error;

  constructor(message = 'An internal error occurred', cause?: Error) {
    super(message, ERROR_CODES.INTERNAL_ERROR, false);
    if (cause) {
      this.cause = cause;
    }
  }
}
