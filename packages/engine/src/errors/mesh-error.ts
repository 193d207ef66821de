/**
 * MeshError - structured error with a code, category and context
 */

import { type ErrorCategory, type ErrorCode, getErrorCategory, getErrorInfo } from './error-codes.js';

/**
 * Options for creating a MeshError
 */
export interface MeshErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a MeshError
 */
export interface SerializedMeshError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedMeshError | { name: string; message: string; stack?: string };
}

/**
 * Base error for everything the sync engine reports.
 *
 * Command failures are returned to the caller as values carrying a MeshError;
 * only the process entry point decides whether an error is fatal.
 *
 * @example
 * ```typescript
 * const result = await engine.execute({ type: 'publish-owned', selector: { kind: 'one', id: 7 } });
 * if (!result.ok && MeshError.isCode(result.error, 'MESH_D400')) {
 *   console.log(result.error.format());
 * }
 * ```
 */
export class MeshError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: MeshErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'MeshError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Wrap an existing error with a MeshError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): MeshError {
    return new MeshError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  /**
   * Check if an error is a MeshError
   */
  static isMeshError(error: unknown): error is MeshError {
    return error instanceof MeshError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return MeshError.isMeshError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return MeshError.isMeshError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedMeshError {
    const result: SerializedMeshError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (MeshError.isMeshError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Field validation error detail
 */
export interface FieldValidationError {
  /** Field path (e.g., 'name' or 'records[0].name') */
  path: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Validation-specific error with field-level details
 */
export class ValidationError extends MeshError {
  /** Field-level validation errors */
  readonly errors: FieldValidationError[];

  constructor(errors: FieldValidationError[], context?: Record<string, unknown>) {
    const message = errors.map((e) => `${e.path}: ${e.message}`).join('; ');

    super({
      code: 'MESH_V100',
      message: `Validation failed: ${message}`,
      context: {
        ...context,
        fieldErrors: errors,
      },
    });

    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/**
 * A referenced record does not exist or is not owned by this node
 */
export class NotFoundError extends MeshError {
  /** The record id that was not found */
  readonly recordId: number;

  constructor(recordId: number, publisherId: string) {
    super({
      code: 'MESH_D400',
      message: `No record with id ${recordId} is owned by ${publisherId}`,
      context: { recordId, publisherId },
    });

    this.name = 'NotFoundError';
    this.recordId = recordId;
  }
}

/**
 * Storage error
 */
export class PersistenceError extends MeshError {
  constructor(
    code: 'MESH_S300' | 'MESH_S301',
    message: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super({ code, message, context, cause });
    this.name = 'PersistenceError';
  }
}

/**
 * Inbound payload could not be decoded
 */
export class DecodeError extends MeshError {
  constructor(
    code: 'MESH_C500' | 'MESH_C501',
    message: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super({ code, message, context, cause });
    this.name = 'DecodeError';
  }
}

/**
 * The gossip channel's inbound stream ended
 */
export class ChannelClosedError extends MeshError {
  constructor(message?: string, cause?: Error) {
    super({ code: 'MESH_C502', message, cause });
    this.name = 'ChannelClosedError';
  }
}

/**
 * Publishing to the gossip channel failed
 */
export class ChannelError extends MeshError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code: 'MESH_C503', message, context, cause });
    this.name = 'ChannelError';
  }
}

/**
 * A command reached an engine that is shutting down or stopped
 */
export class EngineStoppedError extends MeshError {
  constructor(state: string) {
    super({ code: 'MESH_C504', context: { state } });
    this.name = 'EngineStoppedError';
  }
}

/**
 * Configuration error
 */
export class ConfigError extends MeshError {
  /** Individual configuration issues */
  readonly issues: FieldValidationError[];

  constructor(issues: FieldValidationError[]) {
    super({
      code: 'MESH_F600',
      message: `Invalid node configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      context: { issues },
    });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Helper function to ensure errors are MeshErrors
 */
export function ensureMeshError(error: unknown, defaultCode: ErrorCode = 'MESH_X900'): MeshError {
  if (MeshError.isMeshError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return MeshError.wrap(error, defaultCode);
  }

  return new MeshError({
    code: defaultCode,
    message: String(error),
  });
}
