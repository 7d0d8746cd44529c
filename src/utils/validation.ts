import type { Request } from 'express';
import { validationResult, type ValidationError as RequestValidationError } from 'express-validator';
import { ValidationError, type FieldError } from './errors';

const toFieldError = (error: RequestValidationError): FieldError => ({
  field: error.type === 'field' ? error.path || error.location : 'unknown',
  message: String(error.msg)
});

/**
 * Throws a ValidationError carrying every failed express-validator check on the request.
 */
export const assertValid = (req: Request): void => {
  const result = validationResult(req);
  if (!result.isEmpty()) {
    throw new ValidationError('Validation failed', result.array().map(toFieldError));
  }
};
