import { ConflictException } from '@nestjs/common';

/**
 * Raised when deleting a row that other rows still reference under a
 * RESTRICT rule.
 */
export class ReferentialViolationException extends ConflictException {
  constructor(entity: string, id: string, referencedBy: string) {
    super({
      message: `Cannot delete ${entity} ${id}: it is still referenced by ${referencedBy}`,
      error: 'Referential Violation',
      details: { entity, id, referencedBy },
    });
  }
}
