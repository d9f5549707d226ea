import { RequestStatus } from '../../types/events';
import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability';
import { UnitOfWork } from './request.journal';
import { validateTransition } from './request.state';
import {
  Identity,
  NewRequestFields,
  PaymentRequestRecord,
  RecordChangeListener,
  isIdentity,
} from './request.types';

const log = createServiceLogger('request-store');

export interface StatusUpdate {
  paidAt?: number;
  /**
   * Unjournaled writes survive a failing operation and notify listeners
   * immediately instead of on commit
   */
  journaled?: boolean;
}

const copyRecord = (record: PaymentRequestRecord): PaymentRequestRecord => ({ ...record });

const statuses: readonly unknown[] = Object.values(RequestStatus);
const isStatus = (value: unknown): value is RequestStatus => statuses.includes(value);

/**
 * Reject stored records that break the record invariants
 */
function assertRestorable(record: PaymentRequestRecord): void {
  const problems: string[] = [];

  if (!Number.isSafeInteger(record.id) || record.id < 0) problems.push('id');
  if (!isIdentity(record.requester)) problems.push('requester');
  if (!isIdentity(record.payer)) problems.push('payer');
  if (!Number.isSafeInteger(record.amount) || record.amount <= 0) problems.push('amount');
  if (!Number.isSafeInteger(record.deadline) || record.deadline < 0) problems.push('deadline');
  if (!isStatus(record.status)) problems.push('status');
  if ((record.status === RequestStatus.PAID) !== (record.paidAt !== undefined)) problems.push('paidAt');

  if (problems.length > 0) {
    throw ApiError.database(`Stored request ${record.id} is corrupt: ${problems.join(', ')}`);
  }
}

/**
 * In-memory state of one ledger: records by id, the per-identity index
 * sequences and the id counter
 */
export class RequestStore {
  private readonly records = new Map<number, PaymentRequestRecord>();
  private readonly byRequester = new Map<Identity, number[]>();
  private readonly byPayer = new Map<Identity, number[]>();
  private readonly listeners = new Set<RecordChangeListener>();
  private nextId = 0;

  constructor(private readonly unitOfWork: UnitOfWork) {}

  /**
   * Rebuild a store from persisted records. Index sequences are rebuilt in id
   * order, which is creation order.
   */
  static fromRecords(unitOfWork: UnitOfWork, records: PaymentRequestRecord[]): RequestStore {
    const store = new RequestStore(unitOfWork);
    const sorted = [...records].sort((a, b) => a.id - b.id);

    for (const record of sorted) {
      assertRestorable(record);
      if (store.records.has(record.id)) {
        throw ApiError.database(`Stored request ${record.id} appears more than once`);
      }
      store.records.set(record.id, copyRecord(record));
      store.appendIndex(store.byRequester, record.requester, record.id);
      store.appendIndex(store.byPayer, record.payer, record.id);
      store.nextId = record.id + 1;
    }

    log.info({ count: sorted.length, nextId: store.nextId }, 'Request store restored');
    return store;
  }

  get(id: number): PaymentRequestRecord | undefined {
    const record = this.records.get(id);
    return record ? copyRecord(record) : undefined;
  }

  peekNextId(): number {
    return this.nextId;
  }

  get size(): number {
    return this.records.size;
  }

  all(): PaymentRequestRecord[] {
    return [...this.records.values()].sort((a, b) => a.id - b.id).map(copyRecord);
  }

  requesterIndex(identity: Identity): number[] {
    return [...(this.byRequester.get(identity) ?? [])];
  }

  payerIndex(identity: Identity): number[] {
    return [...(this.byPayer.get(identity) ?? [])];
  }

  insert(fields: NewRequestFields): PaymentRequestRecord {
    const id = this.nextId;
    const record: PaymentRequestRecord = { ...fields, id, status: RequestStatus.PENDING };

    this.nextId = id + 1;
    this.records.set(id, record);
    this.appendIndex(this.byRequester, record.requester, id);
    this.appendIndex(this.byPayer, record.payer, id);

    this.unitOfWork.record(() => {
      this.records.delete(id);
      this.popIndex(this.byRequester, record.requester);
      this.popIndex(this.byPayer, record.payer);
      this.nextId = id;
    });
    this.unitOfWork.afterCommit(() => this.notify(id));

    return copyRecord(record);
  }

  setStatus(id: number, status: RequestStatus, update: StatusUpdate = {}): PaymentRequestRecord {
    const record = this.records.get(id);
    if (!record) {
      throw ApiError.requestNotFound(id);
    }

    validateTransition(record.status, status, id);

    const previousStatus = record.status;
    const previousPaidAt = record.paidAt;

    record.status = status;
    if (status === RequestStatus.PAID) {
      record.paidAt = update.paidAt;
    }

    if (update.journaled ?? true) {
      this.unitOfWork.record(() => {
        record.status = previousStatus;
        if (previousPaidAt === undefined) {
          delete record.paidAt;
        } else {
          record.paidAt = previousPaidAt;
        }
      });
      this.unitOfWork.afterCommit(() => this.notify(id));
    } else {
      this.notify(id);
    }

    return copyRecord(record);
  }

  onChange(listener: RecordChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(id: number): void {
    const record = this.records.get(id);
    if (!record) return;

    const snapshot = Object.freeze(copyRecord(record));
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        log.error({ err: error, requestId: id }, 'Record change listener failed');
      }
    }
  }

  private appendIndex(index: Map<Identity, number[]>, identity: Identity, id: number): void {
    const ids = index.get(identity);
    if (ids) {
      ids.push(id);
    } else {
      index.set(identity, [id]);
    }
  }

  private popIndex(index: Map<Identity, number[]>, identity: Identity): void {
    const ids = index.get(identity);
    if (!ids) return;
    ids.pop();
    if (ids.length === 0) {
      index.delete(identity);
    }
  }
}
