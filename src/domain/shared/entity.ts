/**
 * Base class for entities with identity
 */
export abstract class Entity<TId extends number | string> {
  protected readonly _id: TId;

  constructor(id: TId) {
    this._id = id;
  }

  get id(): TId {
    return this._id;
  }

  equals(other: Entity<TId> | null | undefined): boolean {
    if (other === null || other === undefined) {
      return false;
    }
    return other.constructor === this.constructor && this._id === other._id;
  }
}
