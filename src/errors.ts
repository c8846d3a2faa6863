/**
 * Custom Error Classes for Metadata Operations
 *
 * Tagged union errors; field-level problems travel as issue lists.
 */

import { ZodError, ZodIssue } from 'zod';
import { ERROR_CODES } from './constants/errors';

/**
 * Single validator finding
 */
export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * Base Metadata Error Class
 */
export abstract class BaseMetroError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * Configuration Error
 *
 * Raised when the mapper configuration fails schema validation.
 */
export class MetroConfigError extends BaseMetroError {
  readonly _tag = 'MetroConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;
  readonly zodError?: ZodError;

  constructor(message: string, configKey: string, zodError?: ZodError) {
    super(message, { configKey, zodError });
    this.configKey = configKey;
    this.zodError = zodError;
  }

  getValidationIssues(): ZodIssue[] {
    return this.zodError?.issues || [];
  }

  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * Record Validation Error
 *
 * Blocks a persistence action. The record is left untouched.
 */
export class MetroValidationError extends BaseMetroError {
  readonly _tag = 'MetroValidationError' as const;
  readonly code = ERROR_CODES.VALIDATION_ERROR;
  readonly issues: ValidationIssue[];
  readonly action: string;

  constructor(message: string, action: string, issues: ValidationIssue[]) {
    super(message, { action, issues });
    this.action = action;
    this.issues = issues;
  }

  getFormattedErrors(): string[] {
    return this.issues.map(issue => `${issue.field}: ${issue.message}`);
  }
}

/**
 * Path Resolution Error
 *
 * No explicit output path and none derivable from the source file.
 */
export class MetroPathResolutionError extends BaseMetroError {
  readonly _tag = 'MetroPathResolutionError' as const;
  readonly code = ERROR_CODES.PATH_RESOLUTION_ERROR;
  readonly target: string;

  constructor(message: string, target: string, context?: Record<string, unknown>) {
    super(message, { target, ...context });
    this.target = target;
  }
}

/**
 * File System Error
 */
export class MetroFileSystemError extends BaseMetroError {
  readonly _tag = 'MetroFileSystemError' as const;
  readonly code = ERROR_CODES.FILE_SYSTEM_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, context?: Record<string, unknown>) {
    super(message, { filePath, operation, ...context });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * Union type for all metadata errors
 */
export type MetroError =
  | MetroConfigError
  | MetroValidationError
  | MetroPathResolutionError
  | MetroFileSystemError;

/**
 * Error factory functions
 */
export const MetroErrorFactory = {
  configError(message: string, configKey: string, zodError?: ZodError): MetroConfigError {
    return new MetroConfigError(message, configKey, zodError);
  },

  validationError(message: string, action: string, issues: ValidationIssue[]): MetroValidationError {
    return new MetroValidationError(message, action, issues);
  },

  pathResolutionError(message: string, target: string, context?: Record<string, unknown>): MetroPathResolutionError {
    return new MetroPathResolutionError(message, target, context);
  },

  /**
   * Wrap an underlying I/O failure, keeping its message
   */
  fileSystemError(message: string, filePath: string, operation: string, cause?: unknown): MetroFileSystemError {
    const detail = cause instanceof Error ? cause.message : cause !== undefined ? String(cause) : undefined;
    return new MetroFileSystemError(
      detail ? `${message}: ${detail}` : message,
      filePath,
      operation,
      detail ? { cause: detail } : undefined
    );
  },
};
