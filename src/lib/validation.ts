/**
 * Input Validation Utilities
 *
 * Type-safe validation for configuration files and universe lists
 */

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a string field
 */
export function validateString(
  value: unknown,
  fieldName: string,
  options: { minLength?: number; maxLength?: number; pattern?: RegExp } = {}
): ValidationResult<string> {
  if (typeof value !== 'string') {
    return { valid: false, error: `${fieldName} must be a string` };
  }

  if (options.minLength !== undefined && value.length < options.minLength) {
    return { valid: false, error: `${fieldName} must be at least ${options.minLength} characters` };
  }

  if (options.maxLength !== undefined && value.length > options.maxLength) {
    return { valid: false, error: `${fieldName} must be at most ${options.maxLength} characters` };
  }

  if (options.pattern && !options.pattern.test(value)) {
    return { valid: false, error: `${fieldName} has invalid format` };
  }

  return { valid: true, value };
}

/**
 * Validate a number field
 */
export function validateNumber(
  value: unknown,
  fieldName: string,
  options: { min?: number; max?: number; integer?: boolean } = {}
): ValidationResult<number> {
  if (typeof value !== 'number' || isNaN(value)) {
    return { valid: false, error: `${fieldName} must be a valid number` };
  }

  if (options.integer && !Number.isInteger(value)) {
    return { valid: false, error: `${fieldName} must be an integer` };
  }

  if (options.min !== undefined && value < options.min) {
    return { valid: false, error: `${fieldName} must be at least ${options.min}` };
  }

  if (options.max !== undefined && value > options.max) {
    return { valid: false, error: `${fieldName} must be at most ${options.max}` };
  }

  return { valid: true, value };
}

export function validateBoolean(value: unknown, fieldName: string): ValidationResult<boolean> {
  if (typeof value !== 'boolean') {
    return { valid: false, error: `${fieldName} must be true or false` };
  }
  return { valid: true, value };
}

/**
 * Validate enum value
 */
export function validateEnum<T extends string>(
  value: unknown,
  fieldName: string,
  allowedValues: readonly T[]
): ValidationResult<T> {
  if (typeof value !== 'string') {
    return { valid: false, error: `${fieldName} must be a string` };
  }

  const match = allowedValues.find(allowed => allowed === value);
  if (match === undefined) {
    return {
      valid: false,
      error: `${fieldName} must be one of: ${allowedValues.join(', ')}`
    };
  }

  return { valid: true, value: match };
}

/**
 * Validate symbol (uppercase ticker; dots and dashes for share classes)
 */
export function validateSymbol(value: unknown): ValidationResult<string> {
  const stringResult = validateString(value, 'symbol', {
    minLength: 1,
    maxLength: 10,
    pattern: /^[A-Z0-9.-]+$/i,
  });

  if (!stringResult.valid) return stringResult;

  return { valid: true, value: stringResult.value.toUpperCase() };
}

/**
 * Validate every element of an array with the same validator
 */
export function validateArray<T>(
  value: unknown,
  fieldName: string,
  validateItem: (item: unknown, itemName: string) => ValidationResult<T>
): ValidationResult<T[]> {
  if (!Array.isArray(value)) {
    return { valid: false, error: `${fieldName} must be a list` };
  }

  const items: T[] = [];
  for (let i = 0; i < value.length; i++) {
    const result = validateItem(value[i], `${fieldName}[${i}]`);
    if (!result.valid) return result;
    items.push(result.value);
  }
  return { valid: true, value: items };
}
