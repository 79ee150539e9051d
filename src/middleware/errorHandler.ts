import type { Request, Response, NextFunction } from 'express';
import { DataValidationError } from '../utils/errors';
import logger from '../utils/logger';

const isBodyParseError = (err: Error): boolean =>
  err instanceof SyntaxError && 'body' in err;

// Must keep all four parameters so Express treats it as an error handler.
export const errorHandler = (err: Error, req: Request, res: Response, next: NextFunction) => {
  if (err instanceof DataValidationError || isBodyParseError(err)) {
    logger.warn('Request', err.message);
    return res.status(400).json({ success: false, message: err.message });
  }
  logger.error('Server', `${req.method} ${req.originalUrl} failed`, err.stack);
  res.status(500).json({ success: false, message: 'Something went wrong on the server.' });
};
