import { QueryFailedError } from 'typeorm';

export const PG_UNIQUE_VIOLATION = '23505';

interface PgErrorLike {
  message?: unknown;
  code?: unknown;
  constraint?: unknown;
  detail?: unknown;
}

export interface UniqueViolation {
  constraint?: string;
  column?: string;
  value?: string;
  message: string;
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Extracts the details of a unique-constraint violation raised by the
 * database, or returns null when `error` is anything else.
 */
export function getUniqueViolation(error: unknown): UniqueViolation | null {
  if (!(error instanceof QueryFailedError)) {
    return null;
  }

  const driverError: PgErrorLike = error.driverError;
  const message = error.message;
  const isUnique =
    driverError.code === PG_UNIQUE_VIOLATION ||
    message.includes('duplicate key') ||
    message.includes('unique constraint');

  if (!isUnique) {
    return null;
  }

  // "Key (slug)=(hello-world) already exists." Some drivers only put it in the message.
  const detail = asString(driverError.detail) ?? message;
  const keyMatch = /Key \(([^)]+)\)=\((.*)\) already exists/.exec(detail);
  const constraint =
    asString(driverError.constraint) ?? /unique constraint "([^"]+)"/.exec(message)?.[1];

  return {
    constraint,
    column: keyMatch?.[1],
    value: keyMatch?.[2],
    message,
  };
}

/**
 * True when `violation` was raised by the named unique index or on the given
 * column. Falls back to the message when the driver reports neither.
 */
export function isViolationOf(
  violation: UniqueViolation,
  indexName: string,
  column: string,
): boolean {
  if (violation.constraint === indexName || violation.column === column) {
    return true;
  }
  if (violation.constraint || violation.column) {
    return false;
  }
  return violation.message.includes(indexName);
}
