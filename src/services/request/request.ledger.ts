import { EventListener, EventType, LedgerEvent, RequestStatus } from '../../types/events';
import { ErrorCode } from '../../types/errors';
import { ApiError, isApiError } from '../../middlewares/errorHandler';
import {
  createServiceLogger,
  ledgerOperationsTotal,
  requestAmount,
  settledVolumeTotal,
} from '../../observability';
import { RequestEventLog } from './request.eventLog';
import { terminalStateError } from './request.state';
import { RequestStore } from './request.store';
import {
  Identity,
  LedgerEnvironment,
  PaymentRequestRecord,
  RecordChangeListener,
  isIdentity,
} from './request.types';

const log = createServiceLogger('request-ledger');

export type LedgerOperation = 'create' | 'pay' | 'cancel';

/**
 * Escrow ledger for payment requests.
 *
 * A requester asks a named payer for an amount; the payer settles it once,
 * before the optional deadline, and any over-payment is refunded. Each
 * mutating operation runs as one unit of work: it either completes with all
 * its effects (record, events, value movement) or fails leaving none of them.
 *
 * Payment follows effects-before-interactions: the request is marked PAID and
 * the event appended before any value leaves custody, so a recipient that
 * reenters the ledger during the transfer already sees the request as paid.
 */
export class RequestLedger {
  constructor(
    private readonly store: RequestStore,
    private readonly events: RequestEventLog,
    private readonly env: LedgerEnvironment
  ) {}

  static create(env: LedgerEnvironment): RequestLedger {
    return new RequestLedger(
      new RequestStore(env.unitOfWork),
      new RequestEventLog(env.unitOfWork),
      env
    );
  }

  /**
   * Rebuild a ledger around persisted records. The event log starts empty.
   */
  static restore(env: LedgerEnvironment, records: PaymentRequestRecord[]): RequestLedger {
    return new RequestLedger(
      RequestStore.fromRecords(env.unitOfWork, records),
      new RequestEventLog(env.unitOfWork),
      env
    );
  }

  // ============================================
  // Operations
  // ============================================

  createRequest(
    caller: Identity,
    payer: Identity,
    amount: number,
    deadline = 0,
    description = ''
  ): number {
    return this.execute('create', () => {
      this.assertCaller(caller);

      if (!isIdentity(payer) || (this.env.directory && !this.env.directory.exists(payer))) {
        throw ApiError.invalidPayer(`Payer '${payer}' is not a valid identity`);
      }
      if (!Number.isSafeInteger(amount) || amount <= 0) {
        throw ApiError.invalidAmount();
      }
      if (!Number.isSafeInteger(deadline) || deadline < 0) {
        throw ApiError.validationError('Invalid deadline', {
          deadline: ['Deadline must be a non-negative integer of unix seconds'],
        });
      }

      const now = this.env.clock.now();
      if (deadline !== 0 && deadline <= now) {
        throw ApiError.requestExpired(`Deadline ${deadline} is not after the current time ${now}`);
      }

      const record = this.store.insert({ requester: caller, payer, amount, deadline, description });

      this.events.append({
        eventType: EventType.REQUEST_CREATED,
        requestId: record.id,
        timestamp: now,
        payload: { requester: caller, payer, amount, deadline, description },
      });

      this.env.unitOfWork.afterCommit(() => {
        requestAmount.observe(amount);
        log.info(
          { requestId: record.id, requester: caller, payer, amount, deadline },
          'Payment request created'
        );
      });

      return record.id;
    });
  }

  payRequest(caller: Identity, requestId: number, suppliedValue: number): void {
    this.execute('pay', () => {
      this.assertCaller(caller);

      const request = this.requireRequest(requestId);

      if (caller !== request.payer) {
        throw ApiError.notRequestParty(`Only the payer of request ${requestId} can pay it`);
      }
      if (request.status !== RequestStatus.PENDING) {
        throw terminalStateError(request.status, requestId);
      }

      const now = this.env.clock.now();
      if (request.deadline !== 0 && now > request.deadline) {
        this.store.setStatus(requestId, RequestStatus.EXPIRED, {
          journaled: this.env.expiryPolicy === 'speculative',
        });
        log.info(
          { requestId, deadline: request.deadline, now, policy: this.env.expiryPolicy },
          'Payment attempted after deadline'
        );
        throw ApiError.requestExpired(`Request ${requestId} expired at ${request.deadline}`);
      }

      if (!Number.isSafeInteger(suppliedValue) || suppliedValue < 0) {
        throw ApiError.validationError('Invalid payment value', {
          value: ['Value must be a non-negative integer'],
        });
      }

      if (suppliedValue < request.amount) {
        throw ApiError.insufficientPayment(request.amount, suppliedValue);
      }

      if (!this.env.funds.receive(caller, suppliedValue)) {
        throw ApiError.paymentFailed(`Could not collect ${suppliedValue} from ${caller}`);
      }

      // Effects before interactions
      this.store.setStatus(requestId, RequestStatus.PAID, { paidAt: now });
      this.events.append({
        eventType: EventType.REQUEST_PAID,
        requestId,
        timestamp: now,
        payload: { payer: caller, amount: request.amount, paidAt: now },
      });

      if (!this.env.funds.transfer(request.requester, request.amount)) {
        throw ApiError.paymentFailed(`Transfer to requester of request ${requestId} failed`);
      }

      const excess = suppliedValue - request.amount;
      if (excess > 0 && !this.env.funds.transfer(caller, excess)) {
        throw ApiError.paymentFailed(`Refund of ${excess} for request ${requestId} failed`);
      }

      this.env.unitOfWork.afterCommit(() => {
        settledVolumeTotal.inc(request.amount);
        log.info(
          { requestId, payer: caller, requester: request.requester, amount: request.amount, refunded: excess },
          'Payment request settled'
        );
      });
    });
  }

  cancelRequest(caller: Identity, requestId: number): void {
    this.execute('cancel', () => {
      this.assertCaller(caller);

      const request = this.requireRequest(requestId);

      if (caller !== request.requester) {
        throw ApiError.notRequestParty(`Only the requester of request ${requestId} can cancel it`);
      }
      if (request.status !== RequestStatus.PENDING) {
        throw terminalStateError(request.status, requestId);
      }

      const now = this.env.clock.now();
      this.store.setStatus(requestId, RequestStatus.CANCELLED);
      this.events.append({
        eventType: EventType.REQUEST_CANCELLED,
        requestId,
        timestamp: now,
        payload: { requester: caller, cancelledAt: now },
      });

      this.env.unitOfWork.afterCommit(() => {
        log.info({ requestId, requester: caller }, 'Payment request cancelled');
      });
    });
  }

  // ============================================
  // Queries
  // ============================================

  getRequest(requestId: number): Readonly<PaymentRequestRecord> {
    return Object.freeze(this.requireRequest(requestId));
  }

  getRequesterRequests(identity: Identity): number[] {
    return this.store.requesterIndex(identity);
  }

  getPayerRequests(identity: Identity): number[] {
    return this.store.payerIndex(identity);
  }

  /**
   * True once the deadline has passed while the request is still pending
   */
  isExpired(requestId: number): boolean {
    const request = this.requireRequest(requestId);
    return (
      request.status === RequestStatus.PENDING &&
      request.deadline !== 0 &&
      this.env.clock.now() > request.deadline
    );
  }

  get expiryPolicy(): LedgerEnvironment['expiryPolicy'] {
    return this.env.expiryPolicy;
  }

  getNextRequestId(): number {
    return this.store.peekNextId();
  }

  getEvents(afterSequence = 0): LedgerEvent[] {
    return this.events.since(afterSequence);
  }

  /**
   * Committed events, in order
   */
  subscribe(listener: EventListener): () => void {
    return this.events.subscribe(listener);
  }

  /**
   * Snapshots of records changed by committed operations, and of expiries
   * written under the committed expiry policy
   */
  onRecordChange(listener: RecordChangeListener): () => void {
    return this.store.onChange(listener);
  }

  // ============================================
  // Internals
  // ============================================

  private execute<T>(operation: LedgerOperation, work: () => T): T {
    try {
      const result = this.env.unitOfWork.run(work);
      ledgerOperationsTotal.inc({ operation, outcome: 'success' });
      return result;
    } catch (error) {
      const outcome = isApiError(error) ? ErrorCode[error.errorCode] : 'error';
      ledgerOperationsTotal.inc({ operation, outcome });
      log.debug({ operation, outcome, err: error }, 'Ledger operation failed');
      throw error;
    }
  }

  private requireRequest(requestId: number): PaymentRequestRecord {
    const request = this.store.get(requestId);
    if (!request) {
      throw ApiError.requestNotFound(requestId);
    }
    return request;
  }

  private assertCaller(caller: Identity): void {
    if (!isIdentity(caller)) {
      throw ApiError.unauthorized('Caller identity is required');
    }
  }
}
