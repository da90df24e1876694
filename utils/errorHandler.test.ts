/**
 * Error Handler Tests
 * Unit tests for error handling utilities
 */

import {
  extractErrorMessage,
  serializeError,
  getErrorDetails,
  formatErrorForLogging
} from './errorHandler';
import { InternalConsistencyError, ProcessingFailedError } from '../services/humanTime/errors';

describe('errorHandler', () => {
  describe('extractErrorMessage', () => {
    it('should return fallback for null/undefined', () => {
      expect(extractErrorMessage(null, 'fallback')).toBe('fallback');
      expect(extractErrorMessage(undefined, 'fallback')).toBe('fallback');
    });

    it('should return string as-is', () => {
      expect(extractErrorMessage('test error', 'fallback')).toBe('test error');
    });

    it('should extract message from Error object', () => {
      expect(extractErrorMessage(new Error('test error'), 'fallback')).toBe('test error');
    });

    it('should extract message, error or detail fields', () => {
      expect(extractErrorMessage({ message: 'from message' })).toBe('from message');
      expect(extractErrorMessage({ error: 'from error' })).toBe('from error');
      expect(extractErrorMessage({ detail: 'from detail' })).toBe('from detail');
    });

    it('should list object properties if no message field', () => {
      expect(extractErrorMessage({ code: 'ERR001', status: 'failed' })).toBe('code: ERR001, status: failed');
    });

    it('should use the default fallback for empty objects', () => {
      expect(extractErrorMessage({})).toBe('Unknown error occurred');
    });
  });

  describe('serializeError', () => {
    it('should return null for null/undefined', () => {
      expect(serializeError(null)).toBe(null);
      expect(serializeError(undefined)).toBe(null);
    });

    it('should serialize Error object', () => {
      const serialized = serializeError(new Error('test error'));
      expect(serialized).toHaveProperty('name', 'Error');
      expect(serialized).toHaveProperty('message', 'test error');
      expect(serialized).toHaveProperty('stack');
    });

    it('should keep the code and collected errors of parse errors', () => {
      const error = new ProcessingFailedError([{ kind: 'invalidTime', hour: 10, minute: 61 }]);
      expect(serializeError(error)).toMatchObject({
        name: 'ProcessingFailedError',
        message: 'Input was understood but could not be resolved: Invalid time: hour 10, minute 61',
        code: 'PROCESSING_FAILED',
        errors: [{ kind: 'invalidTime', hour: 10, minute: 61 }]
      });
    });

    it('should serialize object with enumerable properties', () => {
      const error = { code: 'ERR001', message: 'test' };
      expect(serializeError(error)).toEqual(error);
    });
  });

  describe('getErrorDetails', () => {
    it('should extract details from Error object', () => {
      const details = getErrorDetails(new InternalConsistencyError('unexpected Time shape "Num"'));
      expect(details.name).toBe('InternalConsistencyError');
      expect(details.message).toBe('Internal error: the parse tree had an unexpected shape (unexpected Time shape "Num")');
      expect(details.stack).toBeDefined();
    });

    it('should extract message from string', () => {
      expect(getErrorDetails('test error')).toEqual({ message: 'test error' });
    });
  });

  describe('formatErrorForLogging', () => {
    it('should format Error object for logging', () => {
      const formatted = formatErrorForLogging(new Error('test error'));
      expect(formatted.error).toHaveProperty('message', 'test error');
      expect(formatted.stack).toBeDefined();
    });

    it('should format string error for logging', () => {
      expect(formatErrorForLogging('test error')).toEqual({ error: 'test error' });
    });

    it('should extract message from unknown error', () => {
      expect(formatErrorForLogging({ message: 'test error' })).toEqual({ error: 'test error' });
    });
  });
});
