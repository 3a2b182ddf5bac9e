import { AppError } from '../../src/utils/AppError';

describe('AppError', () => {
  describe('constructor', () => {
    it('should create an error with message and code', () => {
      const error = new AppError('Test error', 'INVALID_INPUT');

      expect(error.message).toBe('Test error');
      expect(error.code).toBe('INVALID_INPUT');
      expect(error.name).toBe('AppError');
      expect(error.isOperational).toBe(true);
    });

    it('should create a non-operational error', () => {
      const error = new AppError('Internal error', 'INTERNAL', false);

      expect(error.isOperational).toBe(false);
    });

    it('should be an instance of Error', () => {
      const error = new AppError('Test', 'NOT_FOUND');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AppError);
    });

    it('should capture stack trace', () => {
      const error = new AppError('Test', 'NOT_FOUND');

      expect(error.stack).toBeDefined();
    });
  });

  describe('static methods', () => {
    it('should create invalid input error', () => {
      const error = AppError.invalidInput('Bad column');

      expect(error.code).toBe('INVALID_INPUT');
      expect(error.message).toBe('Bad column');
      expect(error.isOperational).toBe(true);
    });

    it('should create not found error with default message', () => {
      const error = AppError.notFound();

      expect(error.code).toBe('NOT_FOUND');
      expect(error.message).toBe('Resource not found');
    });

    it('should create not found error with custom message', () => {
      const error = AppError.notFound('Inventory file not found: parts.csv');

      expect(error.message).toBe('Inventory file not found: parts.csv');
    });

    it('should create non-operational internal error', () => {
      const error = AppError.internal();

      expect(error.code).toBe('INTERNAL');
      expect(error.message).toBe('Internal error');
      expect(error.isOperational).toBe(false);
    });
  });
});
