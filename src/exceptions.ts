/**
 * Exception classes for the sensor link.
 */

export class SensorLinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SensorLinkError';
  }
}

export class AdapterUnavailableError extends SensorLinkError {
  constructor(message: string) {
    super(message);
    this.name = 'AdapterUnavailableError';
  }
}

export class ConnectFailureError extends SensorLinkError {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectFailureError';
  }
}

export class WriteFailureError extends SensorLinkError {
  constructor(message: string) {
    super(message);
    this.name = 'WriteFailureError';
  }
}

export class ConfigError extends SensorLinkError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Message of an unknown thrown value, or `fallback` when it carries none.
 */
export function describeError(error: unknown, fallback: string): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  if (typeof error === 'string' && error) {
    return error;
  }
  return fallback;
}
