import { Request, Response, NextFunction } from 'express';
import { validationResult } from 'express-validator';
import { logger } from '../utils/logger';

/**
 * Answers 400 with the collected express-validator errors, if any.
 */
export const handleValidationErrors = (req: Request, res: Response, next: NextFunction) => {
  const errors = validationResult(req);

  if (!errors.isEmpty()) {
    const details = errors.array().map((error) => ({
      field: error.type === 'field' ? error.path : error.type,
      message: String(error.msg),
    }));

    logger.warn('Request validation error', {
      path: req.path,
      method: req.method,
      errors: details,
    });

    return res.status(400).json({
      error: 'Validation error',
      details,
    });
  }

  return next();
};
