// middleware/validate.ts
import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodTypeAny } from 'zod';
import logger from '../utils/logger';

export const formatZodIssues = (error: ZodError) =>
  error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message
  }));

/**
 * Validates { body, query, params } against a Zod schema before the controller runs.
 */
const validate = (schema: ZodTypeAny) => async (req: Request, res: Response, next: NextFunction) => {
  try {
    await schema.parseAsync({
      body: req.body,
      query: req.query,
      params: req.params,
    });

    return next();
  } catch (error) {
    if (error instanceof ZodError) {
      logger.warn(`🛡️ Validation Failed [${req.method} ${req.originalUrl}]: ${error.errors.map(e => e.message).join(', ')}`);

      return res.status(400).json({
        status: 'fail',
        message: 'Invalid input data',
        errors: formatZodIssues(error)
      });
    }
    return next(error);
  }
};

export default validate;
