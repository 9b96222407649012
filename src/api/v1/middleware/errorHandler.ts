import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../utils/AppError';
import { sendResponse } from '../utils/response';

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  next: NextFunction
) => {
  if (err instanceof ZodError) {
    const message = err.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
    console.warn(`⚠️ [errorHandler] ${req.method} ${req.originalUrl} rejected: ${message}`);
    return sendResponse(res, 400, message, { code: 'VALIDATION' });
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      console.error(`Error: ${err.message}`);
      console.error(err.stack);
    } else {
      console.warn(`⚠️ [errorHandler] ${req.method} ${req.originalUrl} → ${err.statusCode} ${err.code}: ${err.message}`);
    }
    return sendResponse(res, err.statusCode, err.message, { code: err.code });
  }

  console.error(`Error: ${err.message}`);
  console.error(err.stack);
  sendResponse(res, 500, 'Internal Server Error', { code: 'INTERNAL' });
};
