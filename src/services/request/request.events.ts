import { eventBus } from '../../events/eventBus';
import { createServiceLogger } from '../../observability';
import { LedgerEvent } from '../../types/events';
import { RequestLedger } from './request.ledger';

const log = createServiceLogger('request-events');

let unsubscribe: (() => void) | undefined;
let inFlight: Promise<void> = Promise.resolve();

/**
 * Forward one committed ledger event to the event bus
 */
async function publishLedgerEvent(event: LedgerEvent): Promise<void> {
  try {
    await eventBus.publish(event);
  } catch (error) {
    log.error(
      { err: error, eventType: event.eventType, requestId: event.requestId, sequence: event.sequence },
      'Failed to publish ledger event'
    );
  }
}

/**
 * Publish every committed event of the ledger, in commit order
 */
export function registerRequestEventPublisher(ledger: RequestLedger): void {
  unregisterRequestEventPublisher();
  unsubscribe = ledger.subscribe((event) => {
    inFlight = inFlight.then(() => publishLedgerEvent(event));
  });
  log.info('Request event publisher registered');
}

export function unregisterRequestEventPublisher(): void {
  if (!unsubscribe) {
    return;
  }
  unsubscribe();
  unsubscribe = undefined;
  log.info('Request event publisher unregistered');
}

/**
 * Resolves once every event handed to the bus so far has been sent or logged
 */
export function flushRequestEvents(): Promise<void> {
  return inFlight;
}
