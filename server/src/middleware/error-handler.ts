import { NextFunction, Request, Response } from 'express';
import { InvalidInputError, isPackingError } from '../errors/packing.errors';

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(err);
  }

  if (isPackingError(err)) {
    console.error(`[${err.name}] ${req.method} ${req.path}: ${err.message}`);
    return res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      ...(err instanceof InvalidInputError && err.details !== undefined ? { details: err.details } : {}),
    });
  }

  console.error('Error occurred:', err);
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof Error) {
    console.error(err.stack);
  }
  return res.status(500).json({
    error: 'Internal Server Error',
    message,
  });
}
