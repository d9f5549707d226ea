import { createServiceLogger, persistenceWritesTotal } from '../../observability';
import { RequestLedger } from './request.ledger';
import { RequestRepository } from './request.repository';
import { LedgerEnvironment, PaymentRequestRecord } from './request.types';

const log = createServiceLogger('request-persistence');

export interface RequestPersistenceOptions {
  /** Base delay between flush retries; the n-th retry waits n times this */
  retryDelayMs?: number;
  /** Retry rounds `flush` makes before giving up on failed writes */
  maxFlushRetries?: number;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Write-behind projection of committed record changes.
 *
 * Writes are chained so they reach the repository in commit order. A failed
 * write keeps the latest snapshot of its request and is retried ahead of every
 * later write, unless a newer snapshot of the same request replaces it.
 */
export class RequestPersistence {
  private queue: Promise<void> = Promise.resolve();
  private detach: (() => void) | undefined;
  private pending = 0;
  private readonly failed = new Map<number, Readonly<PaymentRequestRecord>>();
  private readonly retryDelayMs: number;
  private readonly maxFlushRetries: number;

  constructor(
    private readonly repository: RequestRepository,
    options: RequestPersistenceOptions = {}
  ) {
    this.retryDelayMs = options.retryDelayMs ?? 100;
    this.maxFlushRetries = options.maxFlushRetries ?? 5;
  }

  attach(ledger: RequestLedger): void {
    this.stop();
    this.detach = ledger.onRecordChange((record) => this.enqueue(record));
  }

  stop(): void {
    this.detach?.();
    this.detach = undefined;
  }

  get backlog(): number {
    return this.pending;
  }

  /** Requests whose latest snapshot has not reached the repository */
  get failedWrites(): number {
    return this.failed.size;
  }

  /**
   * Resolves once every write queued so far is stored. Failed writes are
   * retried with a growing delay; rejects if any are still failing after
   * the last retry.
   */
  async flush(): Promise<void> {
    await this.queue;

    for (let attempt = 1; this.failed.size > 0; attempt++) {
      if (attempt > this.maxFlushRetries) {
        throw new Error(
          `Could not persist ${this.failed.size} payment request(s) after ${this.maxFlushRetries} retries`
        );
      }
      await sleep(attempt * this.retryDelayMs);
      this.queue = this.queue.then(() => this.retryFailed());
      await this.queue;
    }
  }

  private enqueue(record: Readonly<PaymentRequestRecord>): void {
    this.pending++;
    this.queue = this.queue
      .then(() => this.write(record))
      .finally(() => {
        this.pending--;
      });
  }

  private async write(record: Readonly<PaymentRequestRecord>): Promise<void> {
    this.failed.delete(record.id);
    await this.retryFailed();
    await this.attempt(record);
  }

  private async retryFailed(): Promise<void> {
    for (const record of [...this.failed.values()]) {
      this.failed.delete(record.id);
      await this.attempt(record);
    }
  }

  private async attempt(record: Readonly<PaymentRequestRecord>): Promise<void> {
    try {
      await this.repository.save(record);
      persistenceWritesTotal.inc({ outcome: 'success' });
    } catch (error) {
      persistenceWritesTotal.inc({ outcome: 'failure' });
      this.failed.set(record.id, record);
      log.error(
        { err: error, requestId: record.id, status: record.status, failedWrites: this.failed.size },
        'Failed to persist payment request'
      );
    }
  }
}

/**
 * Rebuild a ledger from everything the repository holds
 */
export async function restoreLedger(
  repository: RequestRepository,
  env: LedgerEnvironment
): Promise<RequestLedger> {
  const records = await repository.loadAll();
  return RequestLedger.restore(env, records);
}
