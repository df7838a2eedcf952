/**
 * Error types for the limbic core and the service around it.
 */

export class ConfigurationError extends Error {
  readonly code = 'INVALID_CONFIG';

  constructor(message: string, public readonly field: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InputError extends Error {
  constructor(
    message: string,
    public readonly code: 'INVALID_SIGNAL' | 'NO_MAPPER',
  ) {
    super(message);
    this.name = 'InputError';
  }
}
