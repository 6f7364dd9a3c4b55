/**
 * Custom application error class for operational errors
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Keep the subclass prototype so instanceof works for derived errors
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static badRequest(message: string): AppError {
    return new AppError(message, 400);
  }

  static notFound(message = 'Resource not found'): AppError {
    return new AppError(message, 404);
  }

  static payloadTooLarge(message = 'Payload too large'): AppError {
    return new AppError(message, 413);
  }

  static internal(message = 'Internal server error'): AppError {
    return new AppError(message, 500, false);
  }
}

/**
 * Invalid matching configuration (threshold outside [0, 1], bad substring
 * length). Raised before any matching happens.
 */
export class ReconciliationConfigError extends AppError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message, 400);
    this.field = field;
  }
}

export default AppError;
