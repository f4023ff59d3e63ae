import { v4 as uuidv4 } from 'uuid';

/**
 * Base class for all domain events
 */
export class DomainEvent<TName extends string = string, TPayload = unknown> {
  readonly eventId: string;
  readonly eventName: TName;
  readonly occurredAt: Date;
  readonly payload: TPayload;

  constructor(eventName: TName, payload: TPayload, occurredAt: Date = new Date()) {
    this.eventId = uuidv4();
    this.eventName = eventName;
    this.occurredAt = occurredAt;
    this.payload = payload;
  }

  toJSON() {
    return {
      eventId: this.eventId,
      eventName: this.eventName,
      occurredAt: this.occurredAt.toISOString(),
      payload: this.payload,
    };
  }
}
