/**
 * Input Validation Utilities
 * Validates data before database operations
 */

export class ValidationError extends Error {
  constructor(
    message: string,
    public field?: string,
    public value?: unknown
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

// +1234567890 or 123-456-7890
const PHONE_PATTERN = /^(\+\d{7,15}|\d{3}-\d{3}-\d{4})$/;

/**
 * Validate email format
 */
export function validateEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

export function validatePhone(phone: string): boolean {
  return PHONE_PATTERN.test(phone);
}

/**
 * Validate required fields
 */
export function validateRequired<T extends object>(
  data: T,
  requiredFields: (keyof T)[]
): void {
  for (const field of requiredFields) {
    const value: unknown = data[field];
    if (value === undefined || value === null || value === '') {
      throw new ValidationError(
        `Missing required field: ${String(field)}`,
        String(field)
      );
    }
  }
}

export function validatePositiveNumber(value: number, fieldName: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ValidationError(
      `${fieldName} must be a positive number`,
      fieldName,
      value
    );
  }
}

export function validateNonNegativeNumber(value: number, fieldName: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ValidationError(
      `${fieldName} must be a non-negative number`,
      fieldName,
      value
    );
  }
}

export function validateInteger(value: number, fieldName: string): void {
  if (!Number.isInteger(value)) {
    throw new ValidationError(
      `${fieldName} must be an integer`,
      fieldName,
      value
    );
  }
}

export function validateStringLength(
  value: string,
  fieldName: string,
  min?: number,
  max?: number
): void {
  if (typeof value !== 'string') {
    throw new ValidationError(
      `${fieldName} must be a string`,
      fieldName,
      value
    );
  }

  if (min !== undefined && value.length < min) {
    throw new ValidationError(
      `${fieldName} must be at least ${min} characters`,
      fieldName,
      value
    );
  }

  if (max !== undefined && value.length > max) {
    throw new ValidationError(
      `${fieldName} must be at most ${max} characters`,
      fieldName,
      value
    );
  }
}

export function validateNonEmptyArray<T>(
  arr: T[],
  fieldName: string
): void {
  if (!Array.isArray(arr) || arr.length === 0) {
    throw new ValidationError(
      `${fieldName} must be a non-empty array`,
      fieldName,
      arr
    );
  }
}

/**
 * Run every check and collect the ValidationError messages.
 * Any other error is rethrown.
 */
export function collectValidationErrors(checks: Array<() => void>): string[] {
  const errors: string[] = [];

  for (const check of checks) {
    try {
      check();
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      errors.push(error.message);
    }
  }

  return errors;
}

/**
 * Sanitize string input
 */
export function sanitizeString(input: string): string {
  if (typeof input !== 'string') {
    return '';
  }

  return input
    .replace(/[\x00-\x1F\x7F]/g, '') // Remove control characters
    .trim()
    .replace(/\s+/g, ' '); // Normalize whitespace
}

export function normalizeEmail(email: string): string {
  return sanitizeString(email).toLowerCase();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
