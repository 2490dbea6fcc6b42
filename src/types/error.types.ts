/**
 * Error types and codes
 */

// Standard error codes
export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_DESIGN_RECORD = 'INVALID_DESIGN_RECORD',
  INVALID_FLOWER_RECORD = 'INVALID_FLOWER_RECORD',

  // Internal invariant violations (500)
  INVENTORY_UNDERFLOW = 'INVENTORY_UNDERFLOW',
  ALLOCATION_INVARIANT_VIOLATION = 'ALLOCATION_INVARIANT_VIOLATION',

  // Server errors (500)
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// Custom application error class
export class AppError extends Error {
  constructor(
    public code: ErrorCode | string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}
