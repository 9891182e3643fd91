// middleware/errorMiddleware.ts
import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import logger from '../utils/logger';
import AppError from '../utils/AppError';
import { CONSTANTS } from '../utils/constants';
import { formatZodIssues } from './validate';

export interface ErrorHandlerOptions {
  // Include err.stack in the response body (development only)
  exposeStack: boolean;
}

export const createErrorHandler = ({ exposeStack }: ErrorHandlerOptions): ErrorRequestHandler =>
  // Express only treats a middleware as an error handler when it declares all four arguments
  (err: unknown, req: Request, res: Response, next: NextFunction) => {
    // 1. Schema failures that slipped past the route validator
    if (err instanceof ZodError) {
      logger.warn(`⚠️ Validation Error [${req.method} ${req.url}]`);
      res.status(400).json({
        status: 'fail',
        code: CONSTANTS.ERROR_CODES.VALIDATION_ERROR,
        message: 'Invalid input data',
        errors: formatZodIssues(err)
      });
      return;
    }

    // 2. Log the Error
    // Anything that is not an AppError is unexpected and might be a bug
    if (err instanceof AppError) {
      logger.warn(`⚠️ Operational Error [${req.method} ${req.url}]: ${err.message}`);
    } else {
      logger.error({ err }, `🔥 Unexpected Error [${req.method} ${req.url}]`);
    }

    // 3. Send Response
    const error = err instanceof AppError
      ? err
      : new AppError(err instanceof Error && err.message ? err.message : 'Internal Server Error');

    res.status(error.statusCode).json({
      status: error.status,
      code: error.code,
      message: error.message,
      stack: exposeStack && err instanceof Error ? err.stack : undefined,
    });
  };
