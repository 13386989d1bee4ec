import { ConflictException } from '@nestjs/common';
import { getUniqueViolation } from '@/database/database-errors';

export function fieldConflict(entity: string, field: string, value: unknown): ConflictException {
  return new ConflictException({
    message: `A ${entity} with this ${field} already exists`,
    error: 'Conflict',
    details: { field, value },
  });
}

/**
 * Rethrows a unique-constraint violation as a `ConflictException`, naming
 * the offending column when the driver reports it. Other errors pass
 * through untouched.
 */
export function toConflict(error: unknown, entity: string): unknown {
  const violation = getUniqueViolation(error);
  if (!violation) {
    return error;
  }
  return fieldConflict(entity, violation.column ?? 'value', violation.value);
}
