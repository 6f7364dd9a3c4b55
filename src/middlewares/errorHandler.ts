import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { AppError, logger } from '../utils';
import { env } from '../config';

/**
 * Maps errors raised by third-party middleware onto AppError
 */
const toAppError = (err: Error): AppError | null => {
  if (err instanceof AppError) {
    return err;
  }

  if (err instanceof multer.MulterError) {
    return err.code === 'LIMIT_FILE_SIZE'
      ? AppError.payloadTooLarge(`Uploaded file is too large (field "${err.field ?? 'unknown'}")`)
      : AppError.badRequest(`Upload failed: ${err.message}`);
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    return AppError.badRequest('Malformed JSON body');
  }

  return null;
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const appError = toAppError(err);

  const statusCode = appError?.statusCode ?? 500;
  const message = appError?.message ?? 'Internal Server Error';
  const isOperational = appError?.isOperational ?? false;

  if (!isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error: ${message}`);
  }

  res.status(statusCode).json({
    success: false,
    error: message,
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
