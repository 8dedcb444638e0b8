import { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

/**
 * Base error class for disk discovery.
 * Every error carries the device it concerns in its context where one is known.
 */
export class DiskError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly timestamp: number;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = 'DiskError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = Date.now();
    this.originalError = originalError;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Device name or path the error concerns, if any
   */
  get device(): string | undefined {
    return this.context?.device;
  }

  /**
   * Convert error to JSON format
   */
  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Invalid caller input or configuration
 */
export class ConfigurationError extends DiskError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * An identifier did not resolve to a whole-disk block device
 */
export class DeviceNotFoundError extends DiskError {
  constructor(identifier: string, reason: string, context?: ErrorContext) {
    super(`No block device matches ${identifier}: ${reason}`, ErrorCode.DEVICE_NOT_FOUND, ErrorSeverity.MEDIUM, {
      identifier,
      ...context,
    });
    this.name = 'DeviceNotFoundError';
  }
}

export class AttributeReadError extends DiskError {
  constructor(device: string, attribute: string, reason: string, originalError?: Error) {
    super(
      `Cannot read ${attribute} of ${device}: ${reason}`,
      ErrorCode.ATTRIBUTE_READ_ERROR,
      ErrorSeverity.MEDIUM,
      { device, attribute },
      originalError
    );
    this.name = 'AttributeReadError';
  }
}

/**
 * Raised when bytes reported for a free-text field are not valid in the
 * configured text encoding. Only ever stored on the affected field.
 */
export class TextDecodingError extends DiskError {
  constructor(device: string, attribute: string, encoding: string, originalError?: Error) {
    super(
      `Cannot decode ${attribute} of ${device} as ${encoding}`,
      ErrorCode.TEXT_DECODING_ERROR,
      ErrorSeverity.LOW,
      { device, attribute, encoding },
      originalError
    );
    this.name = 'TextDecodingError';
  }
}

export class SmartUnavailableError extends DiskError {
  constructor(device: string, reason: string, originalError?: Error) {
    super(
      `SMART data unavailable for ${device}: ${reason}`,
      ErrorCode.SMART_UNAVAILABLE,
      ErrorSeverity.MEDIUM,
      { device },
      originalError
    );
    this.name = 'SmartUnavailableError';
  }
}

export class SmartParseError extends DiskError {
  constructor(device: string, reason: string, originalError?: Error) {
    super(
      `Unexpected SMART report for ${device}: ${reason}`,
      ErrorCode.SMART_PARSE_ERROR,
      ErrorSeverity.MEDIUM,
      { device },
      originalError
    );
    this.name = 'SmartParseError';
  }
}

export class PartitionEnumerationError extends DiskError {
  constructor(device: string, reason: string, originalError?: Error) {
    super(
      `Cannot enumerate partitions of ${device}: ${reason}`,
      ErrorCode.PARTITION_ENUMERATION_ERROR,
      ErrorSeverity.MEDIUM,
      { device },
      originalError
    );
    this.name = 'PartitionEnumerationError';
  }
}

/**
 * Check if error is a DiskError
 */
export function isDiskError(error: unknown): error is DiskError {
  return error instanceof DiskError;
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Extract a human readable message from a thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';
