import { describe, it, expect } from 'vitest';
import {
  AppError,
  BadRequestError,
  NotFoundError,
  ConflictError,
  ValidationError,
  ServiceUnavailableError,
  ExternalApiError,
  InvalidImageError,
  EmptyForegroundError,
  MissingAssetError,
  ConfigurationError,
} from './errors.js';

describe('errors', () => {
  describe('AppError', () => {
    it('should create error with all properties', () => {
      const error = new AppError('Test message', 400, 'TEST_CODE', true);

      expect(error.message).toBe('Test message');
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('TEST_CODE');
      expect(error.isOperational).toBe(true);
      expect(error.stack).toBeDefined();
    });

    it('should default isOperational to true', () => {
      const error = new AppError('Test', 500, 'TEST');
      expect(error.isOperational).toBe(true);
    });

    it('should be instance of Error', () => {
      const error = new AppError('Test', 500, 'TEST');
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AppError);
    });
  });

  describe('BadRequestError', () => {
    it('should create 400 error with default message', () => {
      const error = new BadRequestError();

      expect(error.statusCode).toBe(400);
      expect(error.message).toBe('Bad request');
      expect(error.code).toBe('BAD_REQUEST');
    });

    it('should accept custom code', () => {
      const error = new BadRequestError('Both images required', 'IMAGES_MISSING');
      expect(error.code).toBe('IMAGES_MISSING');
    });
  });

  describe('NotFoundError', () => {
    it('should create 404 error with default message', () => {
      const error = new NotFoundError();

      expect(error.statusCode).toBe(404);
      expect(error.message).toBe('Not found');
      expect(error.code).toBe('NOT_FOUND');
    });
  });

  describe('ConflictError', () => {
    it('should create 409 error with default message', () => {
      const error = new ConflictError();

      expect(error.statusCode).toBe(409);
      expect(error.code).toBe('CONFLICT');
    });
  });

  describe('ValidationError', () => {
    it('should include validation details', () => {
      const details = { field: 'sessionId', message: 'Invalid uuid' };
      const error = new ValidationError('Validation failed', details);

      expect(error.statusCode).toBe(422);
      expect(error.details).toEqual(details);
    });
  });

  describe('ServiceUnavailableError', () => {
    it('should create 503 error with default message', () => {
      const error = new ServiceUnavailableError();

      expect(error.statusCode).toBe(503);
      expect(error.message).toBe('Service unavailable');
    });
  });

  describe('ExternalApiError', () => {
    it('should prefix message with service name', () => {
      const error = new ExternalApiError('Replicate', 'Rate limited');

      expect(error.statusCode).toBe(502);
      expect(error.message).toBe('Replicate: Rate limited');
      expect(error.code).toBe('EXTERNAL_API_ERROR');
      expect(error.service).toBe('Replicate');
    });

    it('should include original error', () => {
      const originalError = new Error('Connection refused');
      const error = new ExternalApiError('S3', 'Upload failed', originalError);

      expect(error.originalError).toBe(originalError);
    });
  });

  describe('collage errors', () => {
    it('InvalidImageError is a 422', () => {
      const error = new InvalidImageError('Unsupported content type');

      expect(error.statusCode).toBe(422);
      expect(error.code).toBe('INVALID_IMAGE');
      expect(error.message).toBe('Unsupported content type');
    });

    it('EmptyForegroundError has a default message', () => {
      const error = new EmptyForegroundError();

      expect(error.statusCode).toBe(422);
      expect(error.code).toBe('EMPTY_FOREGROUND');
      expect(error.message).toBe('Foreground contains no opaque pixels');
    });

    it('MissingAssetError names the asset', () => {
      const error = new MissingAssetError('base_cream.png');

      expect(error.statusCode).toBe(404);
      expect(error.code).toBe('MISSING_ASSET');
      expect(error.asset).toBe('base_cream.png');
      expect(error.message).toBe('Asset not found: base_cream.png');
    });

    it('ConfigurationError is non-operational', () => {
      const error = new ConfigurationError('ratios must sum to 1');

      expect(error.statusCode).toBe(500);
      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.isOperational).toBe(false);
    });
  });
});
