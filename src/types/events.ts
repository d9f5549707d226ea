export enum EventType {
  REQUEST_CREATED = 'REQUEST_CREATED',
  REQUEST_PAID = 'REQUEST_PAID',
  REQUEST_CANCELLED = 'REQUEST_CANCELLED',
}

export enum RequestStatus {
  PENDING = 'PENDING',
  PAID = 'PAID',
  CANCELLED = 'CANCELLED',
  EXPIRED = 'EXPIRED',
}

/**
 * Fields shared by every ledger event.
 * `sequence` is the position in the ledger's event log; `timestamp` is the
 * ledger clock reading (unix seconds) when the event was appended.
 */
export interface BaseEvent {
  eventType: EventType;
  requestId: number;
  sequence: number;
  timestamp: number;
  payload: Record<string, unknown>;
}

export interface RequestCreatedEvent extends BaseEvent {
  eventType: EventType.REQUEST_CREATED;
  payload: {
    requester: string;
    payer: string;
    amount: number;
    deadline: number;
    description: string;
  };
}

export interface RequestPaidEvent extends BaseEvent {
  eventType: EventType.REQUEST_PAID;
  payload: {
    payer: string;
    amount: number;
    paidAt: number;
  };
}

export interface RequestCancelledEvent extends BaseEvent {
  eventType: EventType.REQUEST_CANCELLED;
  payload: {
    requester: string;
    cancelledAt: number;
  };
}

export type LedgerEvent = RequestCreatedEvent | RequestPaidEvent | RequestCancelledEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * Event as handed to the log before it has a sequence number
 */
export type PendingLedgerEvent = DistributiveOmit<LedgerEvent, 'sequence'>;

export type EventListener<T extends BaseEvent = LedgerEvent> = (event: T) => void;
