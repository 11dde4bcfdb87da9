/**
 * Global error types for the heat-index alert job
 * Each fatal error class maps to a process exit code in boot/main
 */

/**
 * Required configuration is missing or cannot be parsed
 */
export class ConfigurationError extends Error {
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super('Invalid configuration: ' + problems.join('; '));
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

/**
 * HTTP call failed: network unreachable, non-2xx status or timeout
 */
export class TransportError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = 'TransportError';
    this.status = status;
  }
}

/**
 * Delivery to one notification recipient failed
 */
export class NotificationError extends TransportError {
  readonly recipient: string;

  constructor(recipient: string, message: string, status: number | null = null) {
    super('Delivery to ' + recipient + ' failed: ' + message, status);
    this.name = 'NotificationError';
    this.recipient = recipient;
  }
}
