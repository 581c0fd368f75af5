/**
 * Custom error classes for the work-order system
 * Provides a hierarchy of error types for store, task and input failures
 */

export enum ErrorCode {
  // Database errors
  DB_CONNECTION_FAILED = 'DB_001',
  DB_QUERY_FAILED = 'DB_002',
  DB_TRANSACTION_FAILED = 'DB_003',
  DB_SCHEMA_ERROR = 'DB_004',
  DB_CONSTRAINT_VIOLATION = 'DB_005',
  DB_INSERT_FAILED = 'DB_006',
  DB_UPDATE_FAILED = 'DB_007',
  DB_DELETE_FAILED = 'DB_008',

  // Task errors
  TASK_NOT_FOUND = 'TASK_001',
  TASK_INVALID_STATUS = 'TASK_002',

  // User errors
  USER_NOT_FOUND = 'USER_001',
  USER_DUPLICATE = 'USER_002',
  USER_INVALID_ROLE = 'USER_003',

  // Validation errors
  VALIDATION_FAILED = 'VAL_001',
  INVALID_INPUT = 'VAL_002',

  // System errors
  INTERNAL_ERROR = 'SYS_001',
  CONFIGURATION_ERROR = 'SYS_002',
  INITIALIZATION_ERROR = 'SYS_003',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface WorkOrderErrorOptions {
  code: ErrorCode;
  message: string;
  context?: ErrorContext;
  cause?: Error;
  isRetryable?: boolean;
  httpStatus?: number;
}

/**
 * Base error class for all work-order errors
 */
export class WorkOrderError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;
  public readonly isRetryable: boolean;
  public readonly httpStatus: number;
  public readonly timestamp: Date;

  constructor(options: WorkOrderErrorOptions) {
    super(options.message);
    this.name = this.constructor.name;
    this.code = options.code;
    this.context = options.context;
    this.cause = options.cause;
    this.isRetryable = options.isRetryable ?? false;
    this.httpStatus = options.httpStatus ?? 500;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      isRetryable: this.isRetryable,
      httpStatus: this.httpStatus,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

/**
 * Database-related errors
 */
export class DatabaseError extends WorkOrderError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DB_QUERY_FAILED,
    context?: ErrorContext,
    cause?: Error
  ) {
    super({
      code,
      message,
      context,
      cause,
      isRetryable: code === ErrorCode.DB_CONNECTION_FAILED,
      httpStatus: 503,
    });
  }
}

/**
 * Task-related errors
 */
export class TaskError extends WorkOrderError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.TASK_INVALID_STATUS,
    context?: ErrorContext
  ) {
    super({
      code,
      message,
      context,
      isRetryable: false,
      httpStatus: code === ErrorCode.TASK_NOT_FOUND ? 404 : 400,
    });
  }
}

/**
 * User/worker errors
 */
export class UserError extends WorkOrderError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.USER_NOT_FOUND,
    context?: ErrorContext
  ) {
    super({
      code,
      message,
      context,
      isRetryable: false,
      httpStatus:
        code === ErrorCode.USER_NOT_FOUND
          ? 404
          : code === ErrorCode.USER_DUPLICATE
            ? 409
            : 400,
    });
  }
}

/**
 * Validation errors
 */
export class ValidationError extends WorkOrderError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
    context?: ErrorContext
  ) {
    super({
      code,
      message,
      context,
      isRetryable: false,
      httpStatus: 400,
    });
  }
}

/**
 * System/Internal errors
 */
export class SystemError extends WorkOrderError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    context?: ErrorContext,
    cause?: Error
  ) {
    super({
      code,
      message,
      context,
      cause,
      isRetryable: false,
      httpStatus: 500,
    });
  }
}

/**
 * Safely extract an error message
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'An unknown error occurred';
}

/**
 * Wrap unknown errors in a WorkOrderError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR,
  context?: ErrorContext
): WorkOrderError {
  if (error instanceof WorkOrderError) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;
  const message = error instanceof Error ? error.message : defaultMessage;

  return new SystemError(message, code, context, cause);
}

export function isWorkOrderError(error: unknown): error is WorkOrderError {
  return error instanceof WorkOrderError;
}
