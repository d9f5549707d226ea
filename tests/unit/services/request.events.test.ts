/**
 * Request Event Publisher Unit Tests
 *
 * Tests forwarding of committed ledger events to the event bus.
 */

import { createLedgerContext } from '../../../src/context';
import { EventType } from '../../../src/types/events';
import { ManualClock, captureErrorCode } from '../../helpers';

// Mock eventBus
const mockPublish = jest.fn().mockResolvedValue(undefined);

jest.mock('../../../src/events/eventBus', () => ({
  eventBus: {
    get publish() {
      return mockPublish;
    },
  },
}));

describe('Request Event Publisher', () => {
  let events: typeof import('../../../src/services/request/request.events');

  beforeEach(async () => {
    jest.clearAllMocks();
    events = await import('../../../src/services/request/request.events');
  });

  afterEach(() => {
    events.unregisterRequestEventPublisher();
  });

  const newLedger = () => createLedgerContext({ clock: new ManualClock(), expiryPolicy: 'speculative' });

  it('should publish committed events in order', async () => {
    const { ledger } = newLedger();
    events.registerRequestEventPublisher(ledger);

    ledger.createRequest('alice', 'bob', 100);
    ledger.cancelRequest('alice', 0);
    await events.flushRequestEvents();

    expect(mockPublish).toHaveBeenCalledTimes(2);
    expect(mockPublish.mock.calls.map((call) => [call[0].eventType, call[0].sequence])).toEqual([
      [EventType.REQUEST_CREATED, 1],
      [EventType.REQUEST_CANCELLED, 2],
    ]);
  });

  it('should not publish events of a failed operation', async () => {
    const { ledger } = newLedger();
    events.registerRequestEventPublisher(ledger);

    captureErrorCode(() => ledger.createRequest('alice', 'bob', 0));
    await events.flushRequestEvents();

    expect(mockPublish).not.toHaveBeenCalled();
  });

  it('should keep publishing after a failed publish', async () => {
    const { ledger } = newLedger();
    events.registerRequestEventPublisher(ledger);
    mockPublish.mockRejectedValueOnce(new Error('Event bus not connected'));

    ledger.createRequest('alice', 'bob', 100);
    ledger.createRequest('alice', 'bob', 200);
    await events.flushRequestEvents();

    expect(mockPublish).toHaveBeenCalledTimes(2);
  });

  it('should stop publishing once unregistered', async () => {
    const { ledger } = newLedger();
    events.registerRequestEventPublisher(ledger);
    events.unregisterRequestEventPublisher();

    ledger.createRequest('alice', 'bob', 100);
    await events.flushRequestEvents();

    expect(mockPublish).not.toHaveBeenCalled();
  });

  it('should follow only the most recently registered ledger', async () => {
    const first = newLedger().ledger;
    const second = newLedger().ledger;
    events.registerRequestEventPublisher(first);
    events.registerRequestEventPublisher(second);

    first.createRequest('alice', 'bob', 100);
    second.createRequest('carol', 'bob', 50);
    await events.flushRequestEvents();

    expect(mockPublish).toHaveBeenCalledTimes(1);
    expect(mockPublish.mock.calls[0][0].payload.requester).toBe('carol');
  });
});
