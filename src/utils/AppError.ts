/**
 * Error codes raised by the ambient layers (configuration, inventory loading).
 * The matching core itself never throws.
 */
export type AppErrorCode = 'INVALID_INPUT' | 'NOT_FOUND' | 'INTERNAL';

/**
 * Custom application error class for operational errors
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly isOperational: boolean;

  constructor(message: string, code: AppErrorCode, isOperational = true) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.isOperational = isOperational;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly
    Object.setPrototypeOf(this, AppError.prototype);
  }

  static invalidInput(message: string): AppError {
    return new AppError(message, 'INVALID_INPUT');
  }

  static notFound(message = 'Resource not found'): AppError {
    return new AppError(message, 'NOT_FOUND');
  }

  static internal(message = 'Internal error'): AppError {
    return new AppError(message, 'INTERNAL', false);
  }
}

export default AppError;
