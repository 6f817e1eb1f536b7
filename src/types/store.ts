import type { Attribute, EntityId, FactRecord, FactValue, TransactionId } from './fact.js';
import type { Snapshot } from './snapshot.js';

/**
 * Durable source of facts. Implementations own storage, indexing and
 * transaction ordering; the reconstruction pipeline only reads from them.
 */
export interface FactStore {
  /** Current state of an entity, or undefined if it has no facts */
  queryCurrent(entityId: EntityId): Promise<Snapshot | undefined>;

  /**
   * Every assertion and retraction ever made for the entity, in no
   * particular order. Retractions must not be omitted.
   */
  queryHistory(entityId: EntityId): Promise<FactRecord[]>;
}

/** Change set submitted to a writable store */
export interface TransactionChanges {
  set?: Readonly<Record<Attribute, FactValue>>;
  retract?: readonly Attribute[];
}

export interface TransactOptions {
  /** Commit timestamp in epoch ms (defaults to the store clock) */
  timestamp?: number;
}

/** Outcome of a committed transaction */
export interface TransactionReceipt {
  entityId: EntityId;
  /** Undefined when the change set produced no facts */
  transactionId: TransactionId | undefined;
  txTimestamp: number;
  facts: FactRecord[];
}

/** Store that accepts change sets, synchronously or not */
export interface WritableFactStore extends FactStore {
  transact(
    entityId: EntityId,
    changes: TransactionChanges,
    options?: TransactOptions,
  ): TransactionReceipt | Promise<TransactionReceipt>;
}

/** Called after every transaction that produced facts */
export type TransactionListener = (receipt: TransactionReceipt) => void;

/** Source of commit timestamps */
export type Clock = () => number;
