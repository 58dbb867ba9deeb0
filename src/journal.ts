// ============================================================================
// @phasemint/engine — Operation Journal
// ============================================================================

type Step = () => void;

/** Steps handed over when a journal commits. */
export interface CommittedSteps {
  /** Undo steps, oldest first. Kept alive while an enclosing operation is open. */
  undo: Step[];
  /** Deferred side effects, in registration order. */
  deferred: Step[];
}

/**
 * Records how to undo each mutation an operation makes, and which
 * notifications to deliver once it commits.
 *
 * On failure the undo steps run newest-first, leaving state exactly as it
 * was before the operation; deferred notifications are dropped.
 */
export class OperationJournal {
  private readonly undoSteps: Step[] = [];
  private readonly commitSteps: Step[] = [];
  private settled = false;

  /** Register the inverse of a mutation that has just been applied. */
  onRollback(step: Step): void {
    this.assertOpen();
    this.undoSteps.push(step);
  }

  /** Queue a side effect (typically a notification) for after commit. */
  onCommit(step: Step): void {
    this.assertOpen();
    this.commitSteps.push(step);
  }

  get size(): number {
    return this.undoSteps.length;
  }

  /** Take over the steps of an operation that committed inside this one. */
  adopt(steps: CommittedSteps): void {
    this.assertOpen();
    this.undoSteps.push(...steps.undo);
    this.commitSteps.push(...steps.deferred);
  }

  rollback(): void {
    this.settle();
    while (this.undoSteps.length > 0) {
      const step = this.undoSteps.pop();
      if (step) step();
    }
    this.commitSteps.length = 0;
  }

  /** Close the journal and hand back its steps. */
  commit(): CommittedSteps {
    this.settle();
    return { undo: this.undoSteps.splice(0), deferred: this.commitSteps.splice(0) };
  }

  private settle(): void {
    this.assertOpen();
    this.settled = true;
  }

  private assertOpen(): void {
    if (this.settled) {
      throw new Error('PhaseMint: operation journal already settled');
    }
  }
}

// ---------------------------------------------------------------------------
// TransactionContext
// ---------------------------------------------------------------------------

/**
 * Stack of open journals for everything that moves value on one funds
 * ledger.
 *
 * An operation that commits while another is open (a receive hook buying
 * from a second instance, say) does not commit for good: its undo steps and
 * notifications move into the enclosing journal. Rolling the outer
 * operation back therefore rolls the nested one back too, and nested
 * notifications wait for the outermost commit.
 */
export class TransactionContext {
  private readonly open: OperationJournal[] = [];

  get depth(): number {
    return this.open.length;
  }

  begin(): OperationJournal {
    const journal = new OperationJournal();
    this.open.push(journal);
    return journal;
  }

  /**
   * Commit `journal`.
   *
   * @returns The deferred steps to run now: empty unless `journal` was the
   *          outermost open operation.
   */
  commit(journal: OperationJournal): Step[] {
    this.close(journal);
    const steps = journal.commit();
    const parent = this.open[this.open.length - 1];
    if (parent) {
      parent.adopt(steps);
      return [];
    }
    return steps.deferred;
  }

  rollback(journal: OperationJournal): void {
    this.close(journal);
    journal.rollback();
  }

  private close(journal: OperationJournal): void {
    if (this.open[this.open.length - 1] !== journal) {
      throw new Error('PhaseMint: journals must settle innermost first');
    }
    this.open.pop();
  }
}

const contexts = new WeakMap<object, TransactionContext>();

/** The context shared by every engine settling on `ledger`. */
export function transactionContextFor(ledger: object): TransactionContext {
  let context = contexts.get(ledger);
  if (!context) {
    context = new TransactionContext();
    contexts.set(ledger, context);
  }
  return context;
}
