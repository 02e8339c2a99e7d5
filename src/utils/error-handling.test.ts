import { CheckoutError, CloneError, err, getErrorMessage, logError, ok } from './error-handling';

describe('error handling utilities', () => {
  describe('getErrorMessage', () => {
    it('should extract messages from errors, strings and message-like objects', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom');
      expect(getErrorMessage('plain')).toBe('plain');
      expect(getErrorMessage({ message: 'from object' })).toBe('from object');
      expect(getErrorMessage(42)).toBe('42');
    });
  });

  describe('logError', () => {
    it('should pass message, stack and context to the logger', () => {
      const logger = { error: jest.fn() };
      const error = new Error('disk full');

      logError(logger, 'Failed to save', error, { commit: 'abcdef1' });

      expect(logger.error).toHaveBeenCalledWith('Failed to save', {
        error: 'disk full',
        stack: error.stack,
        commit: 'abcdef1',
      });
    });
  });

  describe('error kinds', () => {
    it('should keep the partial workspace on clone errors', () => {
      const error = new CloneError('https://example.com/a/b.git', 'network unreachable', { path: '/tmp/repo_x' });

      expect(error.name).toBe('CloneError');
      expect(error.workspace).toEqual({ path: '/tmp/repo_x' });
      expect(error.message).toBe('Failed to clone https://example.com/a/b.git: network unreachable');
    });

    it('should name the commit on checkout errors', () => {
      const error = new CheckoutError('abcdef1234', 'conflict');

      expect(error.commitHash).toBe('abcdef1234');
      expect(error.message).toBe('Failed to check out abcdef1234: conflict');
    });
  });

  describe('Result helpers', () => {
    it('should build discriminated results', () => {
      expect(ok(3)).toEqual({ ok: true, value: 3 });
      const failure = err(new Error('nope'));
      expect(failure.ok).toBe(false);
      expect(failure.error.message).toBe('nope');
    });
  });
});
