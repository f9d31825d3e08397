import { computeDelta, isEmptyDelta, type StateDelta } from "./delta";
import { canonicalDocument, type StateDocument, type StateSnapshot } from "./snapshot";

/**
 * Last-broadcast snapshot of one session. The revision moves only when
 * something is actually sent out.
 */
export class StateSynchronizer {
  private snapshot: StateSnapshot;

  constructor(initial: StateDocument) {
    this.snapshot = { revision: 0, state: canonicalDocument(initial) };
  }

  current(): StateSnapshot {
    return this.snapshot;
  }

  get revision(): number {
    return this.snapshot.revision;
  }

  /** Delta from the last broadcast to `next`, or null if nothing changed. */
  commit(next: StateDocument): StateDelta | null {
    const state = canonicalDocument(next);
    const delta = computeDelta(this.snapshot, state);
    if (isEmptyDelta(delta)) return null;
    this.snapshot = { revision: delta.newRevision, state };
    return delta;
  }

  /** Replace the state wholesale; clients get a full STATE at the new revision. */
  rebase(next: StateDocument): StateSnapshot {
    this.snapshot = { revision: this.snapshot.revision + 1, state: canonicalDocument(next) };
    return this.snapshot;
  }
}
