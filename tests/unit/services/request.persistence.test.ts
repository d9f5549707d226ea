/**
 * Unit tests for Request Persistence
 *
 * Uses an in-memory repository in place of MongoDB.
 */

import { createLedgerContext, restoreLedgerContext } from '../../../src/context';
import { RequestPersistence } from '../../../src/services/request/request.persistence';
import { PaymentRequestRecord } from '../../../src/services/request/request.types';
import { RequestStatus } from '../../../src/types/events';
import { ErrorCode } from '../../../src/types/errors';
import { persistenceWritesTotal, resetMetrics } from '../../../src/observability';
import { InMemoryRequestRepository, ManualClock, captureErrorCode } from '../../helpers';

const START = 1_700_000_000;

const stored = (overrides: Partial<PaymentRequestRecord> & { id: number }): PaymentRequestRecord => ({
  requester: 'alice',
  payer: 'bob',
  amount: 100,
  deadline: 0,
  status: RequestStatus.PENDING,
  description: '',
  ...overrides,
});

describe('RequestPersistence', () => {
  let clock: ManualClock;
  let repository: InMemoryRequestRepository;

  beforeEach(() => {
    resetMetrics();
    clock = new ManualClock(START);
    repository = new InMemoryRequestRepository();
  });

  describe('attach', () => {
    it('should save every committed change in commit order', async () => {
      const { ledger, vault } = createLedgerContext({ clock, expiryPolicy: 'speculative' });
      const persistence = new RequestPersistence(repository);
      persistence.attach(ledger);
      vault.deposit('bob', 100);

      ledger.createRequest('alice', 'bob', 100, 0, 'rent');
      ledger.createRequest('alice', 'carol', 20);
      ledger.payRequest('bob', 0, 100);
      await persistence.flush();

      expect(repository.saves.map((record) => [record.id, record.status])).toEqual([
        [0, RequestStatus.PENDING],
        [1, RequestStatus.PENDING],
        [0, RequestStatus.PAID],
      ]);
      expect(repository.documents.get(0)).toEqual(
        stored({ id: 0, status: RequestStatus.PAID, paidAt: START, description: 'rent' })
      );
      expect(persistence.backlog).toBe(0);
    });

    it('should save nothing for a failed operation', async () => {
      const { ledger } = createLedgerContext({ clock, expiryPolicy: 'speculative' });
      const persistence = new RequestPersistence(repository);
      persistence.attach(ledger);
      ledger.createRequest('alice', 'bob', 100, START + 10);
      clock.advance(11);

      captureErrorCode(() => ledger.payRequest('bob', 0, 100));
      await persistence.flush();

      expect(repository.saves).toHaveLength(1);
    });

    it('should save the expiry written under the committed policy', async () => {
      const { ledger } = createLedgerContext({ clock, expiryPolicy: 'committed' });
      const persistence = new RequestPersistence(repository);
      persistence.attach(ledger);
      ledger.createRequest('alice', 'bob', 100, START + 10);
      clock.advance(11);

      expect(captureErrorCode(() => ledger.payRequest('bob', 0, 100))).toBe(ErrorCode.REQUEST_EXPIRED);
      await persistence.flush();

      expect(repository.documents.get(0)?.status).toBe(RequestStatus.EXPIRED);
    });

    it('should retry a failed write ahead of the next one', async () => {
      const { ledger } = createLedgerContext({ clock, expiryPolicy: 'speculative' });
      const persistence = new RequestPersistence(repository, { retryDelayMs: 0 });
      persistence.attach(ledger);
      repository.failNextSaves = 1;

      ledger.createRequest('alice', 'bob', 100);
      ledger.createRequest('alice', 'bob', 200);
      await persistence.flush();

      expect(repository.saves.map((record) => record.id)).toEqual([0, 1]);
      expect(persistence.failedWrites).toBe(0);
      const metric = await persistenceWritesTotal.get();
      const count = (outcome: string) =>
        metric.values.find((entry) => entry.labels.outcome === outcome)?.value;
      expect(count('failure')).toBe(1);
      expect(count('success')).toBe(2);
    });

    it('should replace a failed snapshot with the newer one of the same request', async () => {
      const { ledger, vault } = createLedgerContext({ clock, expiryPolicy: 'speculative' });
      const persistence = new RequestPersistence(repository, { retryDelayMs: 0 });
      persistence.attach(ledger);
      vault.deposit('bob', 100);
      repository.failNextSaves = 1;

      ledger.createRequest('alice', 'bob', 100);
      ledger.payRequest('bob', 0, 100);
      await persistence.flush();

      expect(repository.saves.map((record) => [record.id, record.status])).toEqual([
        [0, RequestStatus.PAID],
      ]);
    });

    it('should keep a paid request paid across a restart after a failed write', async () => {
      const { ledger, vault } = createLedgerContext({ clock, expiryPolicy: 'speculative' });
      const persistence = new RequestPersistence(repository, { retryDelayMs: 0 });
      persistence.attach(ledger);
      vault.deposit('bob', 200);
      ledger.createRequest('alice', 'bob', 100);
      repository.failNextSaves = 1;

      ledger.payRequest('bob', 0, 100);
      await persistence.flush();

      const restored = await restoreLedgerContext(repository, { clock, expiryPolicy: 'speculative' });
      restored.vault.deposit('bob', 100);
      expect(restored.ledger.getRequest(0)).toMatchObject({ status: RequestStatus.PAID, paidAt: START });
      expect(restored.ledger.getNextRequestId()).toBe(1);
      expect(captureErrorCode(() => restored.ledger.payRequest('bob', 0, 100))).toBe(ErrorCode.ALREADY_PAID);
    });

    it('should not reuse the id of a request whose create write failed', async () => {
      const { ledger } = createLedgerContext({ clock, expiryPolicy: 'speculative' });
      const persistence = new RequestPersistence(repository, { retryDelayMs: 0 });
      persistence.attach(ledger);
      repository.failNextSaves = 1;

      expect(ledger.createRequest('alice', 'bob', 100)).toBe(0);
      await persistence.flush();

      const restored = await restoreLedgerContext(repository, { clock, expiryPolicy: 'speculative' });
      expect(restored.ledger.getNextRequestId()).toBe(1);
      expect(restored.ledger.createRequest('carol', 'bob', 5)).toBe(1);
    });

    it('should reject flush while writes keep failing', async () => {
      const { ledger } = createLedgerContext({ clock, expiryPolicy: 'speculative' });
      const persistence = new RequestPersistence(repository, { retryDelayMs: 0, maxFlushRetries: 2 });
      persistence.attach(ledger);
      repository.failNextSaves = 10;

      ledger.createRequest('alice', 'bob', 100);

      await expect(persistence.flush()).rejects.toThrow(
        'Could not persist 1 payment request(s) after 2 retries'
      );
      expect(persistence.failedWrites).toBe(1);
      expect(repository.failNextSaves).toBe(7);
      expect(repository.documents.size).toBe(0);
    });

    it('should stop saving after stop', async () => {
      const { ledger } = createLedgerContext({ clock, expiryPolicy: 'speculative' });
      const persistence = new RequestPersistence(repository);
      persistence.attach(ledger);
      persistence.stop();

      ledger.createRequest('alice', 'bob', 100);
      await persistence.flush();

      expect(repository.saves).toHaveLength(0);
    });
  });

  describe('restoreLedgerContext', () => {
    it('should rebuild records, indexes and the id counter', async () => {
      repository = new InMemoryRequestRepository([
        stored({ id: 1, requester: 'bob', payer: 'alice', amount: 5 }),
        stored({ id: 0, status: RequestStatus.PAID, paidAt: START - 50 }),
        stored({ id: 2, deadline: START + 100, description: 'later' }),
      ]);

      const { ledger } = await restoreLedgerContext(repository, { clock, expiryPolicy: 'speculative' });

      expect(ledger.getNextRequestId()).toBe(3);
      expect(ledger.getRequest(0)).toMatchObject({ status: RequestStatus.PAID, paidAt: START - 50 });
      expect(ledger.getRequesterRequests('alice')).toEqual([0, 2]);
      expect(ledger.getPayerRequests('alice')).toEqual([1]);
      expect(ledger.getEvents()).toEqual([]);
    });

    it('should continue numbering after the restored records', async () => {
      repository = new InMemoryRequestRepository([stored({ id: 0 }), stored({ id: 1 })]);
      const { ledger } = await restoreLedgerContext(repository, { clock, expiryPolicy: 'speculative' });

      expect(ledger.createRequest('carol', 'bob', 7)).toBe(2);
      expect(ledger.getEvents()[0].sequence).toBe(1);
    });

    it('should start empty from an empty repository', async () => {
      const { ledger } = await restoreLedgerContext(repository, { clock, expiryPolicy: 'speculative' });

      expect(ledger.getNextRequestId()).toBe(0);
    });

    it('should refuse a corrupt record', async () => {
      repository = new InMemoryRequestRepository([stored({ id: 0, amount: 0 })]);

      await expect(
        restoreLedgerContext(repository, { clock, expiryPolicy: 'speculative' })
      ).rejects.toThrow('Stored request 0 is corrupt: amount');
    });

    it('should refuse a paid record without payment time', async () => {
      repository = new InMemoryRequestRepository([stored({ id: 4, status: RequestStatus.PAID })]);

      await expect(
        restoreLedgerContext(repository, { clock, expiryPolicy: 'speculative' })
      ).rejects.toThrow('Stored request 4 is corrupt: paidAt');
    });
  });
});
