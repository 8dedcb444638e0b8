/**
 * Error codes and severities for block device discovery
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  VALIDATION_ERROR = 1001,
  CONFIGURATION_ERROR = 1002,

  // Device errors (2000-2999)
  DEVICE_NOT_FOUND = 2000,
  ATTRIBUTE_READ_ERROR = 2001,
  TEXT_DECODING_ERROR = 2002,

  // SMART errors (3000-3999)
  SMART_UNAVAILABLE = 3000,
  SMART_PARSE_ERROR = 3001,

  // Partition errors (4000-4999)
  PARTITION_ENUMERATION_ERROR = 4000,
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  device?: string;
  attribute?: string;
  [key: string]: unknown;
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  timestamp: number;
  stack?: string;
}
