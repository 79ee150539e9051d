import type { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';

// Rejects request bodies that are not JSON before they reach a controller.
export const requireJson = (req: Request, res: Response, next: NextFunction) => {
  if (req.is('application/json')) {
    return next();
  }
  const contentType = req.get('Content-Type') ?? 'none';
  logger.warn('Request', `Invalid Content-Type: ${contentType}`);
  res.status(415).json({
    success: false,
    message: `Content-Type must be application/json, got ${contentType}`
  });
};

export const methodNotAllowed = (req: Request, res: Response) => {
  res.status(405).json({
    success: false,
    message: `Method ${req.method} is not allowed on ${req.originalUrl}`
  });
};

export const routeNotFound = (req: Request, res: Response) => {
  res.status(404).json({
    success: false,
    message: `No route for ${req.method} ${req.originalUrl}`
  });
};
