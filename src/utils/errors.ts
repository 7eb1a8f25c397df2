/**
 * Error kinds raised by the contribution core.
 */
export type ContributionErrorKind =
  | 'configuration'
  | 'unsupported_sensor'
  | 'invalid_value'
  | 'invalid_depth'
  | 'registration_expired'
  | 'network'
  | 'privacy_violation'
  | 'rejected';

/**
 * Base class for all contribution errors.
 */
export class ContributionError extends Error {
  constructor(
    message: string,
    public readonly kind: ContributionErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ContributionError';
  }
}

/**
 * Missing home location or invalid privacy/depth settings.
 */
export class ConfigurationError extends ContributionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'configuration', options);
    this.name = 'ConfigurationError';
  }
}

export class UnsupportedSensorError extends ContributionError {
  constructor(
    public readonly entityId: string,
    message: string
  ) {
    super(message, 'unsupported_sensor');
    this.name = 'UnsupportedSensorError';
  }
}

export class InvalidValueError extends ContributionError {
  constructor(
    public readonly entityId: string,
    message: string
  ) {
    super(message, 'invalid_value');
    this.name = 'InvalidValueError';
  }
}

export class InvalidDepthError extends ContributionError {
  constructor(
    public readonly depth: number,
    public readonly maxSupported: number
  ) {
    super(`Trixel depth ${depth} outside [0, ${maxSupported}]`, 'invalid_depth');
    this.name = 'InvalidDepthError';
  }
}

/**
 * The measurement service no longer knows our client id.
 */
export class RegistrationExpiredError extends ContributionError {
  constructor(message = 'Registration unknown or expired', options?: { cause?: unknown }) {
    super(message, 'registration_expired', options);
    this.name = 'RegistrationExpiredError';
  }
}

/**
 * Transport failure, timeout or unusable response.
 */
export class NetworkError extends ContributionError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'network', options);
    this.name = 'NetworkError';
  }
}

/**
 * Anonymity set at the reported trixel is smaller than K.
 */
export class PrivacyViolationError extends ContributionError {
  constructor(public readonly depth: number) {
    super(`Insufficient anonymity set at depth ${depth}`, 'privacy_violation');
    this.name = 'PrivacyViolationError';
  }
}

export class RejectedError extends ContributionError {
  constructor(message: string) {
    super(message, 'rejected');
    this.name = 'RejectedError';
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
