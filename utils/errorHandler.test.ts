import { describeResponseBody, extractErrorMessage, serializeError } from './errorHandler';

describe('errorHandler', () => {
  describe('extractErrorMessage', () => {
    it('should return fallback for empty values', () => {
      expect(extractErrorMessage(null)).toBe('Unknown error occurred');
      expect(extractErrorMessage(undefined, 'nothing')).toBe('nothing');
    });

    it('should return strings as-is', () => {
      expect(extractErrorMessage('socket hang up')).toBe('socket hang up');
    });

    it('should use Error messages', () => {
      expect(extractErrorMessage(new Error('ECONNRESET'))).toBe('ECONNRESET');
    });

    it('should read message-like fields from plain objects', () => {
      expect(extractErrorMessage({ detail: 'Not Found' })).toBe('Not Found');
      expect(extractErrorMessage({ error: { code: 1 } })).toBe('{"code":1}');
    });

    it('should stringify objects without a message field', () => {
      expect(extractErrorMessage({ status: 500 })).toBe('{"status":500}');
    });
  });

  describe('serializeError', () => {
    it('should keep name and message of Error objects', () => {
      const serialized = serializeError(new TypeError('bad input'));
      expect(serialized).toMatchObject({ name: 'TypeError', message: 'bad input' });
    });

    it('should return null for empty values', () => {
      expect(serializeError(undefined)).toBeNull();
    });
  });

  describe('describeResponseBody', () => {
    it('should render JSON bodies', () => {
      expect(describeResponseBody({ message: 'Bad credentials' })).toBe('{"message":"Bad credentials"}');
    });

    it('should render text and buffers', () => {
      expect(describeResponseBody('oops')).toBe('oops');
      expect(describeResponseBody(Buffer.from('raw'))).toBe('raw');
    });

    it('should render nothing for a missing body', () => {
      expect(describeResponseBody(undefined)).toBe('');
    });
  });
});
