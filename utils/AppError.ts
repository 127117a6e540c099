// utils/AppError.ts

/**
 * Base class for errors the API and worker expect and know how to report.
 * Anything that is not an AppError is treated as a bug by the error middleware.
 */
class AppError extends Error {
  public readonly statusCode: number;
  public readonly status: 'fail' | 'error';
  public readonly errorCode?: string;
  public readonly isOperational = true;

  constructor(message: string, statusCode: number = 500, errorCode?: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.status = `${statusCode}`.startsWith('4') ? 'fail' : 'error';
    this.errorCode = errorCode;
    Error.captureStackTrace(this, new.target);
  }
}

export default AppError;
