import { Request, Response, NextFunction } from 'express';
import { Schema } from 'joi';
import { logger } from '../utils/logger';

/**
 * Validates `req.body` against a Joi schema and replaces it with the
 * converted value (trimmed strings, coerced numbers).
 */
export const validate = (schema: Schema) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const { error, value } = schema.validate(req.body ?? {}, {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      const details = error.details.map((detail) => ({
        field: detail.path.join('.'),
        message: detail.message,
      }));

      logger.warn(`Validation error: ${details.map((detail) => detail.message).join(', ')}`, {
        path: req.path,
        method: req.method,
      });

      return res.status(400).json({
        error: 'Validation error',
        details,
      });
    }

    req.body = value;
    return next();
  };
};
