import { isProduction } from '../configuration/environment.js';
import { log } from '../utilities/logger.js';
import { BaseError, ValidationError } from './custom-errors.js';

export function isOperationalError(error: Error): boolean {
  if (error instanceof BaseError) {
    return error.isOperational;
  }
  return false;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function handleError(error: Error): void {
  if (isOperationalError(error)) {
    log.error(error.message, {
      code: error instanceof BaseError ? error.code : undefined,
      ...(error instanceof ValidationError && error.fields ? { fields: error.fields } : {}),
    });
    return;
  }

  log.error('Unexpected error occurred', { name: error.name, message: error.message });

  if (!isProduction()) {
    console.error('Stack trace:', error.stack);
  }
}
