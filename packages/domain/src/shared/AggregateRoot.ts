import { Entity } from './Entity';
import type { DomainEvent } from './DomainEvent';
import type { AggregateId } from './vos/AggregateId';

/**
 * Base class for aggregate roots.
 *
 * State changes are captured as domain events. `apply` records the event as
 * uncommitted and routes it to the `on{EventType}` handler of the subclass,
 * so persistence adapters can write exactly what changed and the event bus
 * can publish the same facts afterwards.
 */
export abstract class AggregateRoot<TId extends AggregateId> extends Entity<TId> {
  private _uncommittedEvents: DomainEvent<TId>[] = [];
  private _version = 0;

  protected apply(event: DomainEvent<TId>): void {
    this._uncommittedEvents.push(event);
    this.applyEvent(event);
    this._version++;
  }

  /**
   * By convention, event handlers are named `on{EventType}`.
   * For example, TrustEventRecorded -> onTrustEventRecorded(event)
   */
  private applyEvent(event: DomainEvent<TId>): void {
    const handlerName = `on${event.eventType}`;
    const handler: unknown = Reflect.get(this, handlerName);

    if (typeof handler === 'function') {
      handler.call(this, event);
    } else {
      throw new Error(
        `No handler found for event type '${event.eventType}' on ${this.constructor.name}. ` +
          `Expected method: ${handlerName}`
      );
    }
  }

  getUncommittedEvents(): DomainEvent<TId>[] {
    return [...this._uncommittedEvents];
  }

  /**
   * Called after the repository has persisted the uncommitted events.
   */
  markEventsAsCommitted(): void {
    this._uncommittedEvents = [];
  }

  /**
   * Restore the aggregate version from a persisted snapshot.
   */
  protected restoreVersion(version: number): void {
    this._version = version;
  }

  get version(): number {
    return this._version;
  }

  /** Version as last loaded or saved, before any uncommitted events. */
  get persistedVersion(): number {
    return this._version - this._uncommittedEvents.length;
  }
}
