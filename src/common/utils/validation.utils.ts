import { ValidationError } from 'class-validator';

export interface FieldError {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * Truncates a value for display in error messages
 */
export function truncateValue(value: unknown, maxLength = 100): unknown {
  if (typeof value === 'string' && value.length > maxLength) {
    return value.substring(0, maxLength) + '...';
  }
  return value;
}

/**
 * Flattens nested validation errors into a flat array of FieldError
 */
export function flattenValidationErrors(errors: ValidationError[], parentPath = ''): FieldError[] {
  const result: FieldError[] = [];

  for (const error of errors) {
    const fieldPath = parentPath ? `${parentPath}.${error.property}` : error.property;

    if (error.constraints) {
      const messages = Object.values(error.constraints);
      result.push({
        field: fieldPath,
        message: messages.join('; '),
        value: truncateValue(error.value),
      });
    }

    if (error.children && error.children.length > 0) {
      result.push(...flattenValidationErrors(error.children, fieldPath));
    }
  }

  return result;
}

/**
 * Validates UUID format
 */
export function isValidUUID(uuid: string): boolean {
  const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
  return uuidRegex.test(uuid);
}

/**
 * Trims and lowercases an email address
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Removes duplicate ids, keeping first-seen order
 */
export function uniqueIds(ids: string[]): string[] {
  return [...new Set(ids)];
}
