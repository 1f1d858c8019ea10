import { Request, Response, NextFunction } from 'express';
import { z, ZodError } from 'zod';
import { AppError } from '../utils/errors';

/**
 * Validation target - where to find the data to validate
 */
export type ValidationTarget = 'body' | 'params' | 'query';

/**
 * Formats zod issues as comma-separated messages prefixed by the field path.
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.join('.')}" ` : '';
      return `${path}${issue.message}`;
    })
    .join(', ');
}

/**
 * Creates a middleware that validates request data against a Zod schema.
 * Parsed bodies replace `req.body`; Express 5 exposes `req.query` as a getter,
 * so parsed query and params values land in `res.locals` instead.
 */
export const validateRequest = (schema: z.ZodTypeAny, target: ValidationTarget = 'body') => {
  return (req: Request, res: Response, next: NextFunction) => {
    const dataToValidate: unknown = req[target];

    try {
      const value: unknown = schema.parse(dataToValidate);

      if (target === 'body') {
        req.body = value;
      } else {
        res.locals[target] = value;
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        throw new AppError(formatZodIssues(error), 400, 'VALIDATION_ERROR');
      }
      throw error;
    }
  };
};
