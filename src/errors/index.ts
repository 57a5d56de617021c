import { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

/**
 * Base error class for cratedoc
 * Extends native Error with additional metadata
 */
export class CrateDocError extends Error {
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
    this.name = 'CrateDocError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = Date.now();
    this.originalError = originalError;

    Error.captureStackTrace(this, this.constructor);
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
 * Configuration-related errors
 */
export class ConfigurationError extends CrateDocError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * Validation errors
 */
export class ValidationError extends CrateDocError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.VALIDATION_ERROR, ErrorSeverity.LOW, context, originalError);
    this.name = 'ValidationError';
  }
}

/**
 * The command was invoked without a crate name
 */
export class MissingArgumentError extends CrateDocError {
  constructor(message = 'missing crate name') {
    super(message, ErrorCode.MISSING_ARGUMENT, ErrorSeverity.LOW);
    this.name = 'MissingArgumentError';
  }
}

/**
 * `--index` was the last token
 */
export class MissingIndexTargetError extends CrateDocError {
  constructor() {
    super('no crate name provided to --index', ErrorCode.MISSING_INDEX_TARGET, ErrorSeverity.LOW);
    this.name = 'MissingIndexTargetError';
  }
}

/**
 * The caller abandoned the invocation before it was finalized
 */
export class CommandCancelledError extends CrateDocError {
  constructor(stage: string) {
    super(`command cancelled during ${stage}`, ErrorCode.COMMAND_CANCELLED, ErrorSeverity.LOW, {
      stage,
    });
    this.name = 'CommandCancelledError';
  }
}

export class WorkspaceRootNotFoundError extends CrateDocError {
  constructor(manifestFile = 'Cargo.toml') {
    super('no Cargo workspace root found', ErrorCode.WORKSPACE_ROOT_NOT_FOUND, ErrorSeverity.MEDIUM, {
      manifestFile,
    });
    this.name = 'WorkspaceRootNotFoundError';
  }
}

/**
 * Non-fatal: the local rustdoc page could not be read
 */
export class LocalReadMissError extends CrateDocError {
  constructor(path: string, originalError?: Error) {
    super(`no local docs at ${path}`, ErrorCode.LOCAL_READ_MISS, ErrorSeverity.LOW, { path }, originalError);
    this.name = 'LocalReadMissError';
  }
}

/**
 * Non-fatal: the store has no entry for the item
 */
export class StoreMissError extends CrateDocError {
  constructor(crateName: string, itemPath: string) {
    super(
      `no stored docs for ${itemPath ? `${crateName}::${itemPath}` : crateName}`,
      ErrorCode.STORE_MISS,
      ErrorSeverity.LOW,
      { crateName, itemPath }
    );
    this.name = 'StoreMissError';
  }
}

export class StoreIndexError extends CrateDocError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.STORE_INDEX_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'StoreIndexError';
  }
}

export class ConversionError extends CrateDocError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONVERSION_ERROR, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'ConversionError';
  }
}

/**
 * The remote host answered with a client-error status
 */
export class RemoteStatusError extends CrateDocError {
  public readonly status: number;
  public readonly snippet: string;

  constructor(status: number, snippet: string, url?: string) {
    super(`status error ${status}, response: ${JSON.stringify(snippet)}`, ErrorCode.REMOTE_STATUS_ERROR, ErrorSeverity.MEDIUM, {
      status,
      url,
    });
    this.name = 'RemoteStatusError';
    this.status = status;
    this.snippet = snippet;
  }
}

export class TransportError extends CrateDocError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.TRANSPORT_ERROR, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'TransportError';
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';
