/**
 * @fileoverview Zod-based validation helpers used for configuration, caller-supplied
 * options and device records.
 *
 * - validate(schema, data): detailed success/failure with issue list
 * - parseWithDefault(schema, data, fallback): safe parse with fallback
 * - validateToResult(schema, data, code): the same, bridged into a Result
 * - formatValidationErrors(error): one line per issue
 */

import { z, ZodError } from 'zod';
import { AppError, ErrorCode, Result, fromZodError, ok, failWith } from './error.utils';

// ============================================================================
// VALIDATION RESULT TYPES
// ============================================================================

export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

export interface ValidationSuccess<T> {
  success: true;
  data: T;
}

export interface ValidationFailure {
  success: false;
  error: AppError;
  issues?: ValidationIssue[];
}

export type ValidationResult<T> = ValidationSuccess<T> | ValidationFailure;

/**
 * Any schema producing T, whatever input it accepts (defaults, transforms)
 */
export type OutputSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ============================================================================
// CORE VALIDATION FUNCTIONS
// ============================================================================

/**
 * Validate data against a schema with detailed error info
 */
export function validate<T>(
  schema: OutputSchema<T>,
  data: unknown,
  code: ErrorCode = ErrorCode.VALIDATION_ERROR
): ValidationResult<T> {
  const parsed = schema.safeParse(data);
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }
  return {
    success: false,
    error: fromZodError(parsed.error, code),
    issues: parsed.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code
    }))
  };
}

/**
 * Safe parse with default value
 */
export function parseWithDefault<T>(
  schema: OutputSchema<T>,
  data: unknown,
  defaultValue: T
): T {
  const result = schema.safeParse(data);
  return result.success ? result.data : defaultValue;
}

/**
 * Validate and bridge the outcome into a Result
 */
export function validateToResult<T>(
  schema: OutputSchema<T>,
  data: unknown,
  code: ErrorCode = ErrorCode.VALIDATION_ERROR
): Result<T> {
  const result = validate(schema, data, code);
  return result.success ? ok(result.data) : failWith(result.error.toErrorInfo());
}

// ============================================================================
// COMMON VALIDATION SCHEMAS
// ============================================================================

export const NonNegativeIntSchema = z.number()
  .int('Value must be an integer')
  .min(0, 'Value must be at least 0');

/**
 * Device address: an IPv4 host with optional port, or a colon/dash separated
 * hardware address used by radio transports
 */
export const DeviceAddressSchema = z.string()
  .trim()
  .min(1, 'Device address cannot be empty')
  .refine(
    address => !/\s/.test(address),
    'Device address cannot contain whitespace'
  );

// ============================================================================
// ERROR FORMATTING
// ============================================================================

/**
 * Format validation errors for display
 */
export function formatValidationErrors(error: ZodError): string {
  return error.issues
    .map(issue => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n');
}
