/**
 * @fileoverview Structured error handling with a stable error-code catalogue, formatted
 * messages, recovery hints and a Result type used at every component boundary.
 *
 * Key Features:
 * - ErrorCode enumeration covering connection, discovery, print, data, operation,
 *   status, platform, command, system, configuration and validation failures
 * - Catalogue of message templates, categories and recovery hints loaded from
 *   data/error-codes.json and validated with zod at module load
 * - AppError class carrying code, category, context, timestamp and the wrapped error
 * - Result<T> union with ok()/fail() constructors; a Result never holds both data
 *   and an error
 * - Converters from unknown throwables and Zod errors
 *
 * Propagation rule: a transport fault is turned into an ErrorInfo once, where the
 * transport is called. Anything downstream forwards that ErrorInfo as-is.
 */

import { z, ZodError } from 'zod';
import rawCatalog from '../data/error-codes.json';

// ============================================================================
// ERROR TYPES
// ============================================================================

export type ResultCategory =
  | 'connection'
  | 'discovery'
  | 'print'
  | 'data'
  | 'operation'
  | 'status'
  | 'platform'
  | 'command'
  | 'system'
  | 'configuration'
  | 'validation';

export enum ErrorCode {
  // Connection
  CONNECTION_ERROR = 'CONNECTION_ERROR',
  CONNECTION_TIMEOUT = 'CONNECTION_TIMEOUT',
  CONNECTION_LOST = 'CONNECTION_LOST',
  NOT_CONNECTED = 'NOT_CONNECTED',
  ALREADY_CONNECTED = 'ALREADY_CONNECTED',
  INVALID_DEVICE_ADDRESS = 'INVALID_DEVICE_ADDRESS',
  CONNECTION_RETRY_FAILED = 'CONNECTION_RETRY_FAILED',
  DISCONNECT_FAILED = 'DISCONNECT_FAILED',
  WRITE_FAILURE = 'WRITE_FAILURE',
  READ_FAILURE = 'READ_FAILURE',

  // Discovery
  DISCOVERY_ERROR = 'DISCOVERY_ERROR',
  DISCOVERY_TIMEOUT = 'DISCOVERY_TIMEOUT',
  NO_PERMISSION = 'NO_PERMISSION',
  RADIO_DISABLED = 'RADIO_DISABLED',
  NETWORK_ERROR = 'NETWORK_ERROR',
  NO_PRINTERS_FOUND = 'NO_PRINTERS_FOUND',

  // Print
  PRINT_ERROR = 'PRINT_ERROR',
  PRINT_TIMEOUT = 'PRINT_TIMEOUT',
  PRINTER_NOT_READY = 'PRINTER_NOT_READY',
  OUT_OF_PAPER = 'OUT_OF_PAPER',
  HEAD_OPEN = 'HEAD_OPEN',
  PRINTER_PAUSED = 'PRINTER_PAUSED',
  RIBBON_ERROR = 'RIBBON_ERROR',
  PRINT_RETRY_FAILED = 'PRINT_RETRY_FAILED',
  PRINT_DATA_INVALID_FORMAT = 'PRINT_DATA_INVALID_FORMAT',
  PRINT_DATA_TOO_LARGE = 'PRINT_DATA_TOO_LARGE',
  LANGUAGE_MISMATCH = 'LANGUAGE_MISMATCH',
  CALIBRATION_REQUIRED = 'CALIBRATION_REQUIRED',

  // Data
  INVALID_DATA = 'INVALID_DATA',
  EMPTY_DATA = 'EMPTY_DATA',
  ENCODING_ERROR = 'ENCODING_ERROR',

  // Operation
  OPERATION_TIMEOUT = 'OPERATION_TIMEOUT',
  OPERATION_CANCELLED = 'OPERATION_CANCELLED',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  OPERATION_ERROR = 'OPERATION_ERROR',
  RETRY_LIMIT_EXCEEDED = 'RETRY_LIMIT_EXCEEDED',

  // Status
  STATUS_CHECK_FAILED = 'STATUS_CHECK_FAILED',
  STATUS_TIMEOUT = 'STATUS_TIMEOUT',
  INVALID_STATUS_RESPONSE = 'INVALID_STATUS_RESPONSE',

  // Command
  COMMAND_ERROR = 'COMMAND_ERROR',
  COMMAND_TIMEOUT = 'COMMAND_TIMEOUT',

  // Platform
  PLATFORM_ERROR = 'PLATFORM_ERROR',
  NOT_IMPLEMENTED = 'NOT_IMPLEMENTED',

  // System
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Configuration / validation
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR'
}

/**
 * Catalogue entry describing one error code
 */
export interface ErrorCodeDefinition {
  readonly code: ErrorCode;
  readonly messageTemplate: string;
  readonly category: ResultCategory;
  readonly description: string;
  readonly recoveryHint?: string;
}

/**
 * Error payload carried by a failed Result
 */
export interface ErrorInfo {
  readonly code: string;
  readonly message: string;
  readonly category: ResultCategory;
  readonly recoveryHint?: string;
  readonly timestamp: Date;
  readonly errorNumber?: number;
  readonly cause?: unknown;
}

export interface ResultSuccess<T> {
  readonly success: true;
  readonly data: T;
}

export interface ResultFailure {
  readonly success: false;
  readonly error: ErrorInfo;
}

export type Result<T> = ResultSuccess<T> | ResultFailure;

// ============================================================================
// CATALOGUE
// ============================================================================

const ResultCategorySchema = z.enum([
  'connection',
  'discovery',
  'print',
  'data',
  'operation',
  'status',
  'platform',
  'command',
  'system',
  'configuration',
  'validation'
]);

const ErrorCatalogSchema = z.array(
  z.object({
    code: z.nativeEnum(ErrorCode),
    messageTemplate: z.string().min(1),
    category: ResultCategorySchema,
    description: z.string(),
    recoveryHint: z.string().optional()
  })
);

const catalog: ReadonlyMap<ErrorCode, ErrorCodeDefinition> = new Map(
  ErrorCatalogSchema.parse(rawCatalog).map((entry): [ErrorCode, ErrorCodeDefinition] => [entry.code, entry])
);

/**
 * Look up the catalogue entry for a code
 */
export function getErrorDefinition(code: ErrorCode): ErrorCodeDefinition {
  const definition = catalog.get(code);
  if (definition) {
    return definition;
  }
  return {
    code,
    messageTemplate: code,
    category: 'system',
    description: 'Uncatalogued error code'
  };
}

/**
 * Look up a catalogue entry by its string form
 */
export function findErrorDefinition(code: string): ErrorCodeDefinition | null {
  for (const definition of catalog.values()) {
    if (definition.code === code) {
      return definition;
    }
  }
  return null;
}

/**
 * Replace `{n}` placeholders with positional arguments. Placeholders without a
 * matching argument are left untouched.
 */
export function formatMessage(template: string, args?: ReadonlyArray<unknown>): string {
  if (!args || args.length === 0) {
    return template;
  }
  return template.replace(/\{(\d+)\}/g, (match, index: string) => {
    const position = Number.parseInt(index, 10);
    return position < args.length ? String(args[position]) : match;
  });
}

// ============================================================================
// CUSTOM ERROR CLASS
// ============================================================================

/**
 * Error class with a catalogued code and structured context
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ResultCategory;
  public readonly recoveryHint?: string;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: Date;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    const definition = getErrorDefinition(code);
    this.category = definition.category;
    this.recoveryHint = definition.recoveryHint;
    this.context = context;
    this.timestamp = new Date();
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  /**
   * Build an AppError from the catalogue template
   */
  public static fromCode(
    code: ErrorCode,
    args?: ReadonlyArray<unknown>,
    context?: Record<string, unknown>
  ): AppError {
    return new AppError(formatMessage(getErrorDefinition(code).messageTemplate, args), code, context);
  }

  /**
   * Convert to plain object for serialization
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      recoveryHint: this.recoveryHint,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      originalError: this.originalError ? {
        name: this.originalError.name,
        message: this.originalError.message,
        stack: this.originalError.stack
      } : undefined
    };
  }

  public toErrorInfo(): ErrorInfo {
    return {
      code: this.code,
      message: this.message,
      category: this.category,
      recoveryHint: this.recoveryHint,
      timestamp: this.timestamp,
      cause: this.originalError
    };
  }

  /**
   * Get user-friendly error message
   */
  public getUserMessage(): string {
    switch (this.code) {
      case ErrorCode.NOT_CONNECTED:
        return 'Please connect to a printer first';
      case ErrorCode.OUT_OF_PAPER:
        return 'The printer is out of media. Load labels and try again';
      case ErrorCode.HEAD_OPEN:
        return 'The print head is open. Close it and try again';
      case ErrorCode.PRINTER_PAUSED:
        return 'The printer is paused';
      case ErrorCode.CONNECTION_TIMEOUT:
      case ErrorCode.OPERATION_TIMEOUT:
      case ErrorCode.STATUS_TIMEOUT:
      case ErrorCode.PRINT_TIMEOUT:
        return 'Operation timed out. Please try again';
      case ErrorCode.OPERATION_CANCELLED:
        return 'Operation was cancelled';
      default:
        return this.message || 'An unexpected error occurred';
    }
  }
}

// ============================================================================
// RESULT CONSTRUCTORS
// ============================================================================

export function ok<T>(data: T): ResultSuccess<T> {
  return { success: true, data };
}

/**
 * Create a failed result from a catalogued code
 */
export function fail(
  code: ErrorCode,
  args?: ReadonlyArray<unknown>,
  extras?: { errorNumber?: number; cause?: unknown; message?: string }
): ResultFailure {
  const definition = getErrorDefinition(code);
  return {
    success: false,
    error: {
      code,
      message: extras?.message ?? formatMessage(definition.messageTemplate, args),
      category: definition.category,
      recoveryHint: definition.recoveryHint,
      timestamp: new Date(),
      errorNumber: extras?.errorNumber,
      cause: extras?.cause
    }
  };
}

/**
 * Forward an already-bridged error unchanged
 */
export function failWith(error: ErrorInfo): ResultFailure {
  return { success: false, error };
}

// ============================================================================
// ERROR FACTORIES
// ============================================================================

/**
 * Create error from Zod validation error
 */
export function fromZodError(error: ZodError, code: ErrorCode = ErrorCode.VALIDATION_ERROR): AppError {
  const issues = error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code
  }));

  const summary = issues.map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
  return new AppError(
    formatMessage(getErrorDefinition(code).messageTemplate, [summary]),
    code,
    { issues },
    error
  );
}

/**
 * Create timeout error
 */
export function timeoutError(operation: string, timeoutMs: number): AppError {
  return new AppError(
    `${operation} timed out after ${timeoutMs}ms`,
    ErrorCode.OPERATION_TIMEOUT,
    { operation, timeoutMs }
  );
}

// ============================================================================
// ERROR HANDLING UTILITIES
// ============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert unknown error to AppError
 */
export function toAppError(error: unknown, defaultCode: ErrorCode = ErrorCode.UNKNOWN_ERROR): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof ZodError) {
    return fromZodError(error);
  }

  if (error instanceof Error) {
    return new AppError(error.message, defaultCode, undefined, error);
  }

  if (typeof error === 'string') {
    return new AppError(error, defaultCode);
  }

  return new AppError('An unknown error occurred', defaultCode, { error });
}

/**
 * Bridge a thrown value into an ErrorInfo using the catalogue template of `code`
 */
export function errorFromUnknown(error: unknown, code: ErrorCode): ErrorInfo {
  if (isAppError(error)) {
    return error.toErrorInfo();
  }
  const detail = error instanceof Error ? error.message : String(error);
  const definition = getErrorDefinition(code);
  const hasPlaceholder = /\{0\}/.test(definition.messageTemplate);
  return {
    code,
    message: hasPlaceholder
      ? formatMessage(definition.messageTemplate, [detail])
      : `${definition.messageTemplate}: ${detail}`,
    category: definition.category,
    recoveryHint: definition.recoveryHint,
    timestamp: new Date(),
    cause: error
  };
}

/**
 * Convert an unknown throwable into a failed Result
 */
export function failFromUnknown(error: unknown, code: ErrorCode): ResultFailure {
  return failWith(errorFromUnknown(error, code));
}

/**
 * Execute function and capture any throw as a failed Result
 */
export async function withErrorHandling<T>(
  fn: () => Promise<T>,
  code: ErrorCode = ErrorCode.OPERATION_ERROR
): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    return failFromUnknown(error, code);
  }
}
