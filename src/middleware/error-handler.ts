import { Request, Response, NextFunction } from 'express';
import mongoose from 'mongoose';
import { AppError, ValidationError, type FieldError } from '../utils/errors';
import type { ErrorResponse } from '../types/common.types';

const isMalformedJson = (err: unknown): boolean =>
  err instanceof SyntaxError && 'body' in err;

const send = (res: Response, body: ErrorResponse): void => {
  res.status(body.code).json(body);
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognizes error middleware by its four parameters
  next: NextFunction
): void => {
  if (err instanceof ValidationError) {
    send(res, {
      success: false,
      error: err.kind,
      message: err.message,
      code: err.statusCode,
      ...(err.errors.length > 0 ? { errors: err.errors } : {})
    });
    return;
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      console.error(`❌ [${req.method} ${req.originalUrl}] ${err.kind}:`, err.message, err.cause ?? '');
    }
    send(res, {
      success: false,
      error: err.kind,
      message: err.message,
      code: err.statusCode
    });
    return;
  }

  if (isMalformedJson(err)) {
    send(res, {
      success: false,
      error: 'VALIDATION_ERROR',
      message: 'Malformed JSON body',
      code: 400
    });
    return;
  }

  // Mongoose duplicate key error
  if (err instanceof mongoose.mongo.MongoServerError && err.code === 11000) {
    const field = Object.keys(err.keyPattern ?? {})[0] ?? 'value';
    send(res, {
      success: false,
      error: 'CONFLICT',
      message: `${field.charAt(0).toUpperCase() + field.slice(1)} already exists`,
      code: 409
    });
    return;
  }

  // Mongoose validation error
  if (err instanceof mongoose.Error.ValidationError) {
    const errors: FieldError[] = Object.values(err.errors).map((error) => ({
      field: error.path,
      message: error.message
    }));
    send(res, {
      success: false,
      error: 'VALIDATION_ERROR',
      message: 'Validation failed',
      code: 400,
      errors
    });
    return;
  }

  console.error(`❌ [${req.method} ${req.originalUrl}] Unhandled error:`, err);
  send(res, {
    success: false,
    error: 'INTERNAL_ERROR',
    message: 'Internal Server Error',
    code: 500
  });
};

export const notFoundHandler = (req: Request, res: Response): void => {
  send(res, {
    success: false,
    error: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
    code: 404
  });
};
