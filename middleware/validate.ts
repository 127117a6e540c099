// middleware/validate.ts
import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodTypeAny } from 'zod';
import logger from '../utils/logger';

export const describeIssues = (error: ZodError): { field: string; message: string }[] =>
  error.errors.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));

/**
 * Validates `{ body, query, params }` of the request against a Zod schema.
 * Failures answer 400 with one entry per offending field.
 */
const validate = (schema: ZodTypeAny) => async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    await schema.parseAsync({
      body: req.body,
      query: req.query,
      params: req.params,
    });
    next();
  } catch (error: unknown) {
    if (error instanceof ZodError) {
      logger.warn(`🛡️ Validation Failed [${req.method} ${req.originalUrl}]: ${error.errors.map(e => e.message).join(', ')}`);

      res.status(400).json({
        status: 'fail',
        message: 'Invalid input data',
        errors: describeIssues(error),
      });
      return;
    }
    next(error);
  }
};

export default validate;
