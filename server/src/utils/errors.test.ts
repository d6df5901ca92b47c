import { Request, Response, NextFunction } from 'express';
import pino from 'pino';
import {
  AppError,
  ValidationError,
  NotFoundError,
  StoreUnavailableError,
  DeadlineExceededError,
  ConfigError,
  formatError,
  getErrorStatusCode,
  createErrorHandler,
} from './errors';

describe('Error classes', () => {
  describe('AppError', () => {
    it('should create error with status code', () => {
      const error = new AppError('Test error', 500);
      expect(error.message).toBe('Test error');
      expect(error.statusCode).toBe(500);
      expect(error.isOperational).toBe(true);
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe('ValidationError', () => {
    it('should create 400 error with optional field', () => {
      expect(new ValidationError('Invalid input').statusCode).toBe(400);
      expect(new ValidationError('Invalid input').field).toBeUndefined();
      expect(new ValidationError('Invalid input', 'service_status').field).toBe('service_status');
    });
  });

  describe('NotFoundError', () => {
    it('should create 404 error with resource name', () => {
      const error = new NotFoundError('Service "nginx"');
      expect(error.statusCode).toBe(404);
      expect(error.message).toBe('Service "nginx" not found');
      expect(error.resource).toBe('Service "nginx"');
    });
  });

  describe('StoreUnavailableError', () => {
    it('should create 503 error and keep the cause', () => {
      const cause = new TypeError('The database connection is not open');
      const error = new StoreUnavailableError(undefined, { cause });
      expect(error.statusCode).toBe(503);
      expect(error.message).toBe('Status store is unavailable');
      expect(error.cause).toBe(cause);
      expect(error).toBeInstanceOf(AppError);
    });
  });

  describe('DeadlineExceededError', () => {
    it('should create 504 error naming the operation', () => {
      const error = new DeadlineExceededError('Check cycle');
      expect(error.statusCode).toBe(504);
      expect(error.message).toBe('Check cycle exceeded its deadline');
    });
  });

  describe('ConfigError', () => {
    it('should prefix the message with the key', () => {
      const error = new ConfigError('PORT', 'must be an integer');
      expect(error.message).toBe('PORT: must be an integer');
      expect(error.key).toBe('PORT');
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).not.toBeInstanceOf(AppError);
    });
  });
});

describe('formatError', () => {
  it('should format ValidationError with field', () => {
    expect(formatError(new ValidationError('Invalid status', 'service_status'))).toEqual({
      error: 'Invalid status',
      field: 'service_status',
    });
  });

  it('should format ValidationError without field', () => {
    expect(formatError(new ValidationError('Invalid input'))).toEqual({ error: 'Invalid input' });
  });

  it('should format AppError', () => {
    expect(formatError(new StoreUnavailableError())).toEqual({ error: 'Status store is unavailable' });
  });

  it('should report malformed JSON without the parser message', () => {
    const error = Object.assign(new SyntaxError('Unexpected token } in JSON at position 9'), {
      status: 400,
      expose: true,
    });

    expect(formatError(error)).toEqual({ error: 'Invalid JSON payload' });
  });

  it('should report oversized bodies', () => {
    const error = Object.assign(new Error('request entity too large'), { status: 413, expose: true });

    expect(formatError(error)).toEqual({ error: 'Request body too large' });
  });

  it('should not leak raw error messages', () => {
    expect(formatError(new Error('SQLITE_CORRUPT at /var/lib/statuswatch.sqlite'))).toEqual({
      error: 'Internal server error',
    });
    expect(formatError('string error with internal details')).toEqual({ error: 'Internal server error' });
  });
});

describe('getErrorStatusCode', () => {
  it('should return AppError status code', () => {
    expect(getErrorStatusCode(new NotFoundError('Service'))).toBe(404);
    expect(getErrorStatusCode(new ValidationError('Invalid'))).toBe(400);
    expect(getErrorStatusCode(new StoreUnavailableError())).toBe(503);
    expect(getErrorStatusCode(new DeadlineExceededError('Check cycle'))).toBe(504);
  });

  it('should return the status of exposed client errors', () => {
    expect(getErrorStatusCode(Object.assign(new Error('too large'), { status: 413, expose: true }))).toBe(413);
  });

  it('should return 500 for everything else', () => {
    expect(getErrorStatusCode(new Error('Regular error'))).toBe(500);
    expect(getErrorStatusCode(Object.assign(new Error('hidden'), { status: 400, expose: false }))).toBe(500);
    expect(getErrorStatusCode('string error')).toBe(500);
  });
});

describe('createErrorHandler', () => {
  let mockReq: Partial<Request>;
  let mockRes: Partial<Response>;
  let mockNext: NextFunction;
  const logger = pino({ level: 'silent' });
  let logError: jest.SpyInstance;

  beforeEach(() => {
    mockReq = { method: 'GET', path: '/healthcheck' };
    mockRes = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn(),
    };
    mockNext = jest.fn();
    logError = jest.spyOn(logger, 'error').mockImplementation();
  });

  afterEach(() => {
    logError.mockRestore();
  });

  it('should handle client errors without logging', () => {
    const handler = createErrorHandler(logger);

    handler(new NotFoundError('Service "nginx"'), mockReq as Request, mockRes as Response, mockNext);

    expect(mockRes.status).toHaveBeenCalledWith(404);
    expect(mockRes.json).toHaveBeenCalledWith({ error: 'Service "nginx" not found' });
    expect(logError).not.toHaveBeenCalled();
  });

  it('should log server errors', () => {
    const handler = createErrorHandler(logger);
    const error = new StoreUnavailableError();

    handler(error, mockReq as Request, mockRes as Response, mockNext);

    expect(mockRes.status).toHaveBeenCalledWith(503);
    expect(mockRes.json).toHaveBeenCalledWith({ error: 'Status store is unavailable' });
    expect(logError).toHaveBeenCalledWith(
      { err: error, method: 'GET', path: '/healthcheck' },
      'request failed'
    );
  });
});
