import { Entity } from './entity.js';

/**
 * Base class for aggregate roots
 * Collects domain events until the owning service publishes them
 */
export abstract class AggregateRoot<TId extends number | string, TEvent> extends Entity<TId> {
  private _domainEvents: TEvent[] = [];

  protected addDomainEvent(event: TEvent): void {
    this._domainEvents.push(event);
  }

  pullDomainEvents(): TEvent[] {
    const events = [...this._domainEvents];
    this._domainEvents = [];
    return events;
  }

  get domainEvents(): readonly TEvent[] {
    return [...this._domainEvents];
  }
}
