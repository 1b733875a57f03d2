/**
 * Domain Error Tests
 */

import {
  InputError,
  ValidationError,
  isDomainError,
  wrapError,
} from '../DomainError';

describe('DomainError', () => {
  describe('ValidationError', () => {
    it('should create validation error with issues', () => {
      const error = new ValidationError('Validation failed', [
        { field: 'message_id', message: 'Required' },
      ]);

      expect(error.issues).toHaveLength(1);
      expect(error.code).toBe('VALID_001');
      expect(error.isRetryable).toBe(false);
    });

    it('should create missing field error', () => {
      const error = ValidationError.missingField('message_id', 4);

      expect(error.message).toBe('Missing required field: message_id');
      expect(error.issues[0].field).toBe('message_id');
      expect(error.context.recordIndex).toBe(4);
    });

    it('should create invalid format error', () => {
      const error = ValidationError.invalidFormat('date', 'unix timestamp', 'yesterday');

      expect(error.code).toBe('VALID_002');
      expect(error.issues[0]).toEqual({
        field: 'date',
        message: 'Expected unix timestamp',
        value: 'yesterday',
      });
    });

    it('should create multiple issues error', () => {
      const error = ValidationError.multipleIssues([
        { field: '0.date', message: 'Required' },
        { field: '2.subject', message: 'Expected string' },
      ]);

      expect(error.issues).toHaveLength(2);
      expect(error.code).toBe('VALID_003');
      expect(error.message).toBe('Validation failed: 2 issue(s)');
    });
  });

  describe('InputError', () => {
    it('should create not found error', () => {
      const error = InputError.notFound('/tmp/inbox.json');

      expect(error.code).toBe('INPUT_001');
      expect(error.message).toBe('Envelope source not found: /tmp/inbox.json');
      expect(error.context.filePath).toBe('/tmp/inbox.json');
      expect(error.isRetryable).toBe(false);
    });

    it('should create unreadable error that can be retried', () => {
      const cause = new Error('EACCES');
      const error = InputError.unreadable('/tmp/inbox.json', cause);

      expect(error.code).toBe('INPUT_002');
      expect(error.isRetryable).toBe(true);
      expect(error.context.cause).toBe(cause);
    });
  });

  describe('Utilities', () => {
    it('isDomainError should identify domain errors', () => {
      expect(isDomainError(InputError.notFound('x'))).toBe(true);
      expect(isDomainError(new Error('test'))).toBe(false);
      expect(isDomainError(null)).toBe(false);
      expect(isDomainError('string')).toBe(false);
    });

    it('wrapError should pass through domain errors', () => {
      const original = ValidationError.missingField('date');

      expect(wrapError(original)).toBe(original);
    });

    it('wrapError should wrap regular errors', () => {
      const wrapped = wrapError(new Error('test error'));

      expect(isDomainError(wrapped)).toBe(true);
      expect(wrapped.message).toBe('test error');
      expect(wrapped.code).toBe('UNKNOWN');
    });

    it('wrapError should handle non-error values', () => {
      const wrapped = wrapError('string error', 'Default message');

      expect(wrapped.message).toBe('Default message');
      expect(wrapped.context.cause).toBeUndefined();
    });
  });

  describe('toJSON', () => {
    it('should serialize error to JSON', () => {
      const json = InputError.notFound('/tmp/inbox.json').toJSON();

      expect(json.name).toBe('InputError');
      expect(json.code).toBe('INPUT_001');
      expect(json.isRetryable).toBe(false);
      expect(typeof json.timestamp).toBe('string');
    });
  });

  describe('toUserMessage', () => {
    it('should prefix the message with the error code', () => {
      expect(ValidationError.missingField('date').toUserMessage()).toBe(
        'Error VALID_001: Missing required field: date'
      );
    });
  });
});
