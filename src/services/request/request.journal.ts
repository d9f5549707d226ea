/**
 * Unit of work for ledger operations
 *
 * Every mutation of the store, the event log and the vault records a
 * compensation on the active journal. A failing operation runs its
 * compensations in reverse order, so callers never observe a partial effect.
 *
 * Journals nest: an operation started while another one is running (a
 * recipient hook reentering the ledger mid-transfer) gets a child journal.
 * A child that completes hands its compensations and commit hooks to its
 * parent, so the outer operation failing later still undoes the inner one.
 * Commit hooks run only when the outermost journal completes.
 */

export type Compensation = () => void;
export type CommitHook = () => void;

export class Journal {
  private readonly compensations: Compensation[] = [];
  private readonly commitHooks: CommitHook[] = [];

  constructor(readonly parent?: Journal) {}

  record(compensation: Compensation): void {
    this.compensations.push(compensation);
  }

  afterCommit(hook: CommitHook): void {
    this.commitHooks.push(hook);
  }

  /**
   * Undo every recorded mutation, newest first
   */
  rollback(): void {
    for (let i = this.compensations.length - 1; i >= 0; i--) {
      this.compensations[i]();
    }
    this.compensations.length = 0;
    this.commitHooks.length = 0;
  }

  mergeInto(parent: Journal): void {
    parent.compensations.push(...this.compensations);
    parent.commitHooks.push(...this.commitHooks);
  }

  commit(): void {
    const hooks = this.commitHooks.splice(0);
    this.compensations.length = 0;
    for (const hook of hooks) {
      hook();
    }
  }
}

export class UnitOfWork {
  private active: Journal | undefined;

  get inProgress(): boolean {
    return this.active !== undefined;
  }

  get depth(): number {
    let depth = 0;
    for (let journal = this.active; journal; journal = journal.parent) {
      depth++;
    }
    return depth;
  }

  run<T>(work: () => T): T {
    const journal = new Journal(this.active);
    this.active = journal;

    let result: T;
    try {
      result = work();
    } catch (error) {
      this.active = journal.parent;
      journal.rollback();
      throw error;
    }

    this.active = journal.parent;
    if (journal.parent) {
      journal.mergeInto(journal.parent);
    } else {
      journal.commit();
    }
    return result;
  }

  /**
   * Register a compensation with the running operation.
   * Mutations made outside any operation are final and need none.
   */
  record(compensation: Compensation): void {
    this.active?.record(compensation);
  }

  /**
   * Defer a hook until the outermost operation commits, or run it now when
   * no operation is running
   */
  afterCommit(hook: CommitHook): void {
    if (this.active) {
      this.active.afterCommit(hook);
    } else {
      hook();
    }
  }
}
