import type { Attribute, FactRecord, FactValue, TransactionId } from './fact.js';

/** Attributes asserted by a single transaction */
export type Delta = ReadonlyMap<Attribute, FactValue>;

/** Complete known state of an entity right after a transaction */
export type Snapshot = ReadonlyMap<Attribute, FactValue>;

/** Facts that were committed together, as produced by the grouper */
export interface TransactionGroup {
  transactionId: TransactionId;
  txTimestamp?: number;
  facts: FactRecord[];
}

/** Net effect of one transaction */
export interface TransactionDelta {
  transactionId: TransactionId;
  txTimestamp?: number;
  assertions: Delta;
  /** Attributes retracted without a replacing assertion */
  retractions: ReadonlySet<Attribute>;
}

/** A snapshot together with the transaction that produced it */
export interface SnapshotEntry {
  transactionId: TransactionId;
  txTimestamp?: number;
  delta: Delta;
  state: Snapshot;
}

/**
 * What happens to an attribute that a transaction retracts without asserting
 * a new value:
 * - `retain` keeps its last value in later snapshots
 * - `remove` drops it from the snapshot of that transaction onward
 */
export type RetractionPolicy = 'retain' | 'remove';

export interface ReconstructionOptions {
  /** Default: `'retain'` */
  retractionPolicy?: RetractionPolicy;
}
