import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger, valueTransfersTotal } from '../../observability';
import { UnitOfWork } from '../request/request.journal';
import { FundsCustody, Identity } from '../request/request.types';

const log = createServiceLogger('vault');

/**
 * Runs when value arrives for an identity. Returning false (or throwing)
 * refuses the transfer. The hook may call back into the ledger.
 */
export type ReceiveHook = (amount: number) => boolean | void;

/**
 * In-process funds custody: per-identity balances plus the balance the ledger
 * holds while a payment is settling.
 *
 * Balance writes are recorded on the shared unit of work, so a failing ledger
 * operation also undoes the value it moved.
 */
export class Vault implements FundsCustody {
  private readonly balances = new Map<Identity, number>();
  private readonly hooks = new Map<Identity, ReceiveHook>();
  private custody = 0;

  constructor(private readonly unitOfWork: UnitOfWork) {}

  balanceOf(owner: Identity): number {
    return this.balances.get(owner) ?? 0;
  }

  getCustodyBalance(): number {
    return this.custody;
  }

  /**
   * Credit an identity from outside the ledger
   */
  deposit(owner: Identity, amount: number): number {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw ApiError.invalidAmount('Deposit amount must be a positive integer');
    }

    return this.unitOfWork.run(() => {
      const next = this.balanceOf(owner) + amount;
      if (!Number.isSafeInteger(next)) {
        throw ApiError.invalidAmount('Deposit would overflow the balance');
      }
      this.setBalance(owner, next);
      log.debug({ owner, amount, balance: next }, 'Deposit credited');
      return next;
    });
  }

  /**
   * Move value from an identity into custody
   */
  receive(from: Identity, amount: number): boolean {
    const balance = this.balanceOf(from);
    if (balance < amount) {
      log.warn({ from, amount, balance }, 'Insufficient balance to collect payment');
      return false;
    }

    this.setBalance(from, balance - amount);
    this.setCustody(this.custody + amount);
    return true;
  }

  /**
   * Release value from custody to a recipient
   */
  transfer(to: Identity, amount: number): boolean {
    if (amount > this.custody) {
      log.error({ to, amount, custody: this.custody }, 'Custody balance too low for transfer');
      valueTransfersTotal.inc({ outcome: 'short' });
      return false;
    }

    try {
      this.unitOfWork.run(() => {
        this.setCustody(this.custody - amount);
        this.setBalance(to, this.balanceOf(to) + amount);

        const hook = this.hooks.get(to);
        if (hook && hook(amount) === false) {
          throw ApiError.paymentFailed(`Recipient ${to} refused the transfer`);
        }
      });
    } catch (error) {
      log.warn({ err: error, to, amount }, 'Value transfer rejected');
      valueTransfersTotal.inc({ outcome: 'rejected' });
      return false;
    }

    this.unitOfWork.afterCommit(() => valueTransfersTotal.inc({ outcome: 'success' }));
    return true;
  }

  /**
   * Install the receive hook of an identity. Returns a function removing it.
   */
  onReceive(identity: Identity, hook: ReceiveHook): () => void {
    this.hooks.set(identity, hook);
    return () => {
      if (this.hooks.get(identity) === hook) {
        this.hooks.delete(identity);
      }
    };
  }

  private setBalance(owner: Identity, next: number): void {
    const previous = this.balances.get(owner);
    this.balances.set(owner, next);
    this.unitOfWork.record(() => {
      if (previous === undefined) {
        this.balances.delete(owner);
      } else {
        this.balances.set(owner, previous);
      }
    });
  }

  private setCustody(next: number): void {
    const previous = this.custody;
    this.custody = next;
    this.unitOfWork.record(() => {
      this.custody = previous;
    });
  }
}
