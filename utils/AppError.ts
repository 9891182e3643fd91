// utils/AppError.ts
import { CONSTANTS, ErrorCode } from './constants';

/**
 * Base class for errors we raise on purpose.
 * Anything that is NOT an AppError reaching the error middleware is treated as a bug.
 */
class AppError extends Error {
  public readonly statusCode: number;
  public readonly status: 'fail' | 'error';
  public readonly code: ErrorCode;
  public readonly isOperational = true;

  constructor(message: string, statusCode = 500, code: ErrorCode = CONSTANTS.ERROR_CODES.INTERNAL_ERROR) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.status = statusCode >= 400 && statusCode < 500 ? 'fail' : 'error';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// --- Caller-side ---
export class InvalidInputError extends AppError {
  constructor(message: string) {
    super(message, 400, CONSTANTS.ERROR_CODES.VALIDATION_ERROR);
  }
}

// Location or city the provider cannot resolve
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, CONSTANTS.ERROR_CODES.NOT_FOUND);
  }
}

// --- Upstream ---
export class TransportError extends AppError {
  constructor(message: string) {
    super(message, 500, CONSTANTS.ERROR_CODES.PROVIDER_ERROR);
  }
}

export class ShapeError extends AppError {
  public readonly fields: string[];

  constructor(fields: string[]) {
    super(`Malformed provider payload: ${fields.join(', ')}`, 500, CONSTANTS.ERROR_CODES.PROVIDER_SHAPE_ERROR);
    this.fields = fields;
  }
}

// --- Persistence ---
export class StorageError extends AppError {
  constructor(message: string) {
    super(message, 500, CONSTANTS.ERROR_CODES.STORAGE_ERROR);
  }
}

export default AppError;
