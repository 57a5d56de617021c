/**
 * Error types and error codes for cratedoc
 * Groups failures by the stage that raised them
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  VALIDATION_ERROR = 1001,
  CONFIGURATION_ERROR = 1002,

  // Command errors (2000-2999)
  MISSING_ARGUMENT = 2000,
  MISSING_INDEX_TARGET = 2001,
  COMMAND_CANCELLED = 2002,

  // Workspace errors (3000-3999)
  WORKSPACE_ROOT_NOT_FOUND = 3000,
  LOCAL_READ_MISS = 3001,

  // Store errors (4000-4999)
  STORE_MISS = 4000,
  STORE_INDEX_ERROR = 4001,

  // Conversion errors (5000-5999)
  CONVERSION_ERROR = 5000,

  // Remote errors (6000-6999)
  REMOTE_STATUS_ERROR = 6000,
  TRANSPORT_ERROR = 6001,
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  originalError?: Error;
  timestamp: number;
  stack?: string;
}
