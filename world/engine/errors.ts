/**
 * Grid and store disagree about where an entity is.
 * This is a bug in the world, never an agent error: the engine halts on it.
 */
export class InvariantViolationError extends Error {
  readonly entityId: string | undefined;

  constructor(message: string, entityId?: string) {
    super(message);
    this.name = 'InvariantViolationError';
    this.entityId = entityId;
  }
}
