/**
 * Base application error
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, code: string, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 400 Bad Request
 */
export class BadRequestError extends AppError {
  constructor(message = 'Bad request', code = 'BAD_REQUEST') {
    super(message, 400, code);
  }
}

/**
 * 404 Not Found
 */
export class NotFoundError extends AppError {
  constructor(message = 'Not found', code = 'NOT_FOUND') {
    super(message, 404, code);
  }
}

/**
 * 409 Conflict
 */
export class ConflictError extends AppError {
  constructor(message = 'Conflict', code = 'CONFLICT') {
    super(message, 409, code);
  }
}

/**
 * 422 Unprocessable Entity
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 422, 'VALIDATION_ERROR');
    this.details = details;
  }
}

/**
 * 503 Service Unavailable
 */
export class ServiceUnavailableError extends AppError {
  constructor(message = 'Service unavailable', code = 'SERVICE_UNAVAILABLE') {
    super(message, 503, code);
  }
}

/**
 * External API error (Replicate, Stability, etc.)
 */
export class ExternalApiError extends AppError {
  public readonly service: string;
  public readonly originalError?: Error;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service}: ${message}`, 502, 'EXTERNAL_API_ERROR');
    this.service = service;
    this.originalError = originalError;
  }
}

/**
 * Upload that is not a decodable image of an accepted type
 */
export class InvalidImageError extends AppError {
  constructor(message = 'Invalid image') {
    super(message, 422, 'INVALID_IMAGE');
  }
}

/**
 * Background removal left no opaque pixels to analyse
 */
export class EmptyForegroundError extends AppError {
  constructor(message = 'Foreground contains no opaque pixels') {
    super(message, 422, 'EMPTY_FOREGROUND');
  }
}

/**
 * A required background template or other asset is absent
 */
export class MissingAssetError extends AppError {
  public readonly asset: string;

  constructor(asset: string, message = `Asset not found: ${asset}`) {
    super(message, 404, 'MISSING_ASSET');
    this.asset = asset;
  }
}

/**
 * Invalid canvas geometry or provider setup. Not recoverable at runtime.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR', false);
  }
}
