import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError } from '@/errors/app-error';
import { logger } from '@/lib/logger';

interface ErrorBody {
  success: false;
  error: string;
  details?: Array<{ field: string; message: string }>;
  stack?: string;
}

// body-parser marks malformed JSON with type 'entity.parse.failed'
const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';

export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  _next: NextFunction
): void => {
  let statusCode = 500;
  let message = 'Internal Server Error';
  let details: ErrorBody['details'];

  // Handle Zod validation errors
  if (error instanceof ZodError) {
    statusCode = 400;
    message = 'Validation Error';
    details = error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
  }
  // Handle custom app errors
  else if (error instanceof AppError) {
    statusCode = error.statusCode;
    message = error.kind === 'database' ? 'Internal server error' : error.message;
  }
  else if (isBodyParseError(error)) {
    statusCode = 400;
    message = 'Invalid JSON body';
  }

  const stack = error instanceof Error ? error.stack : undefined;

  // Log error
  const meta = {
    statusCode,
    stack,
    query: req.query,
    params: req.params,
  };
  if (statusCode >= 500) {
    logger.error(`${req.method} ${req.path} - ${error instanceof Error ? error.message : message}`, meta);
  } else {
    logger.warn(`${req.method} ${req.path} - ${message}`, meta);
  }

  // Send error response
  const body: ErrorBody = {
    success: false,
    error: message,
  };

  if (details) {
    body.details = details;
  }

  if (process.env.NODE_ENV === 'development' && stack) {
    body.stack = stack;
  }

  res.status(statusCode).json(body);
};
