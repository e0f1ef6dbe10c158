import type { ValueObject } from './vos/ValueObject';

/**
 * Base class for entities.
 *
 * Entities are distinguished by their identity value object, not by their
 * attributes: two ledgers for the same user address are the same entity.
 */
export abstract class Entity<TId extends ValueObject<unknown>> {
  protected constructor(private readonly _id: TId) {}

  get id(): TId {
    return this._id;
  }

  equals(other: Entity<TId>): boolean {
    if (!(other instanceof Entity)) {
      return false;
    }
    return this._id.equals(other._id);
  }
}
