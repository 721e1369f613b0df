export type AppErrorCode =
  | 'BAD_REQUEST'
  | 'INVALID_DOCX_STRUCTURE'
  | 'INVALID_FINDING'
  | 'INVALID_POLICY'
  | 'UNPROCESSABLE_ENTITY';

export class AppError extends Error {
  public statusCode: number;
  public isOperational: boolean;
  public code: AppErrorCode;

  constructor(message: string, statusCode: number, code: AppErrorCode) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;

    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string, code?: AppErrorCode): AppError {
    return new AppError(message, 400, code || 'BAD_REQUEST');
  }

  static invalidDocument(message: string): AppError {
    return new AppError(`Invalid DOCX structure: ${message}`, 400, 'INVALID_DOCX_STRUCTURE');
  }

  static unprocessable(message: string, code?: AppErrorCode): AppError {
    return new AppError(message, 422, code || 'UNPROCESSABLE_ENTITY');
  }
}
