import type { Attribute, EntityId, FactRecord, FactValue, TransactionId } from '../types/fact.js';
import type { Snapshot } from '../types/snapshot.js';
import type {
  Clock,
  TransactionChanges,
  TransactionListener,
  TransactionReceipt,
  TransactOptions,
  WritableFactStore,
} from '../types/store.js';
import { applyFacts, planTransaction } from './transaction-planner.js';

export const DEFAULT_INITIAL_TRANSACTION_ID = 1000;

export interface MemoryFactStoreConfig {
  name?: string;
  /** Id given to the first transaction (default: 1000) */
  initialTransactionId?: TransactionId;
  /** Commit timestamp source (default: Date.now) */
  clock?: Clock;
  onTransaction?: TransactionListener;
}

/**
 * In-memory transactional fact log.
 *
 * Keeps the append-only log per entity plus an index of current values.
 * `transact()` is synchronous, so readers never observe half a transaction.
 */
export class MemoryFactStore implements WritableFactStore {
  private readonly log: Map<EntityId, FactRecord[]> = new Map();
  private readonly current: Map<EntityId, Map<Attribute, FactValue>> = new Map();
  private readonly name: string;
  private readonly clock: Clock;
  private readonly listener: TransactionListener | undefined;
  private nextTransactionId: TransactionId;

  constructor(config: MemoryFactStoreConfig = {}) {
    this.name = config.name ?? 'fact-store';
    this.clock = config.clock ?? Date.now;
    this.listener = config.onTransaction;
    this.nextTransactionId = config.initialTransactionId ?? DEFAULT_INITIAL_TRANSACTION_ID;
  }

  static async start(config: MemoryFactStoreConfig = {}): Promise<MemoryFactStore> {
    return new MemoryFactStore(config);
  }

  /**
   * Commits a change set for one entity.
   *
   * Change sets that change nothing consume no transaction id and return a
   * receipt without facts.
   */
  transact(
    entityId: EntityId,
    changes: TransactionChanges,
    options: TransactOptions = {},
  ): TransactionReceipt {
    const txTimestamp = options.timestamp ?? this.clock();
    const state = this.current.get(entityId) ?? new Map<Attribute, FactValue>();
    const facts = planTransaction(entityId, state, changes, this.nextTransactionId, txTimestamp);

    if (facts.length === 0) {
      return { entityId, transactionId: undefined, txTimestamp, facts };
    }

    const transactionId = this.nextTransactionId++;
    let entries = this.log.get(entityId);
    if (!entries) {
      entries = [];
      this.log.set(entityId, entries);
    }
    entries.push(...facts);

    applyFacts(state, facts);
    this.current.set(entityId, state);

    const receipt: TransactionReceipt = { entityId, transactionId, txTimestamp, facts: [...facts] };
    this.notify(receipt);
    return receipt;
  }

  async queryCurrent(entityId: EntityId): Promise<Snapshot | undefined> {
    const state = this.current.get(entityId);
    return state ? new Map(state) : undefined;
  }

  /** All facts of the entity in storage order; callers must not rely on it. */
  async queryHistory(entityId: EntityId): Promise<FactRecord[]> {
    return [...(this.log.get(entityId) ?? [])];
  }

  /** Ids of all entities with at least one fact. */
  entities(): EntityId[] {
    return [...this.log.keys()];
  }

  /** Number of facts across all entities. */
  get size(): number {
    let total = 0;
    for (const entries of this.log.values()) {
      total += entries.length;
    }
    return total;
  }

  /** Drops all facts. Transaction ids keep increasing. */
  clear(): void {
    this.log.clear();
    this.current.clear();
  }

  private notify(receipt: TransactionReceipt): void {
    if (this.listener) {
      try {
        this.listener(receipt);
      } catch (error) {
        console.error(`[${this.name}] Error in transaction listener:`, error);
      }
    }
  }
}
