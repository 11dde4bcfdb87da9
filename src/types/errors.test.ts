/**
 * Tests for error types
 */

import { ConfigurationError, NotificationError, TransportError } from './errors';

describe('Error Types', () => {
  describe('ConfigurationError', () => {
    it('should join all problems into the message', () => {
      const error = new ConfigurationError(['LAT is required', 'LON is required']);
      expect(error.message).toBe('Invalid configuration: LAT is required; LON is required');
    });

    it('should keep the problem list', () => {
      const error = new ConfigurationError(['LAT is required']);
      expect(error.problems).toEqual(['LAT is required']);
    });

    it('should have correct name', () => {
      expect(new ConfigurationError([]).name).toBe('ConfigurationError');
    });

    it('should be instance of Error', () => {
      expect(new ConfigurationError([])).toBeInstanceOf(Error);
    });
  });

  describe('TransportError', () => {
    it('should default status to null', () => {
      const error = new TransportError('socket hang up');
      expect(error.message).toBe('socket hang up');
      expect(error.status).toBeNull();
    });

    it('should carry the HTTP status', () => {
      expect(new TransportError('HTTP 503', 503).status).toBe(503);
    });

    it('should have correct name', () => {
      expect(new TransportError('x').name).toBe('TransportError');
    });
  });

  describe('NotificationError', () => {
    it('should name the recipient in the message', () => {
      const error = new NotificationError('1001', 'HTTP 400: Bad Request', 400);
      expect(error.message).toBe('Delivery to 1001 failed: HTTP 400: Bad Request');
      expect(error.recipient).toBe('1001');
      expect(error.status).toBe(400);
    });

    it('should be instance of TransportError', () => {
      const error = new NotificationError('1001', 'timeout');
      expect(error).toBeInstanceOf(TransportError);
      expect(error.name).toBe('NotificationError');
    });
  });
});
