import { EventListener, LedgerEvent, PendingLedgerEvent } from '../../types/events';
import { createServiceLogger } from '../../observability';
import { UnitOfWork } from './request.journal';

const log = createServiceLogger('request-event-log');

/**
 * Ordered, append-only log of ledger events.
 *
 * Appends are part of the running operation: a failed operation removes its
 * events again, and subscribers only ever see events of committed operations,
 * in sequence order. Sequence numbers start at 1.
 */
export class RequestEventLog {
  private readonly events: LedgerEvent[] = [];
  private readonly listeners = new Set<EventListener>();

  constructor(private readonly unitOfWork: UnitOfWork) {}

  append(pending: PendingLedgerEvent): LedgerEvent {
    const event: LedgerEvent = { ...pending, sequence: this.events.length + 1 };
    Object.freeze(event.payload);
    Object.freeze(event);

    this.events.push(event);
    this.unitOfWork.record(() => {
      this.events.pop();
    });
    this.unitOfWork.afterCommit(() => this.deliver(event));

    return event;
  }

  /**
   * Events after the given sequence number. Outside an operation these are
   * all committed.
   */
  since(afterSequence = 0): LedgerEvent[] {
    return this.events.slice(Math.max(0, afterSequence));
  }

  get length(): number {
    return this.events.length;
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private deliver(event: LedgerEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        log.error(
          { err: error, eventType: event.eventType, sequence: event.sequence },
          'Event listener failed'
        );
      }
    }
  }
}
