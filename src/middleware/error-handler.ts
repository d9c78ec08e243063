/**
 * Error Handler Middleware
 * Maps thrown errors to JSON responses
 */

import { Request, Response, NextFunction } from 'express';
import { RotatorError } from '../lib/errors';

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof RotatorError) {
    console.error(`❌ ${error.type} on ${req.method} ${req.path}:`, error.message);
    res.status(500).json({ success: false, error: error.message, type: error.type });
    return;
  }

  console.error('❌ Unhandled error:', error);
  res.status(500).json({ success: false, error: 'Internal server error' });
}
