import type { StorageAdapter, PersistedState } from '@hamicek/noex';
import type { Attribute, EntityId, FactRecord, FactValue, TransactionId } from '../types/fact.js';
import type { Snapshot } from '../types/snapshot.js';
import type {
  Clock,
  TransactionChanges,
  TransactionReceipt,
  TransactOptions,
  WritableFactStore,
} from '../types/store.js';
import { applyFacts, planTransaction } from '../core/transaction-planner.js';
import { DEFAULT_INITIAL_TRANSACTION_ID } from '../core/memory-fact-store.js';

const LOG_KEY_PREFIX = 'fact-log:';
const META_KEY = 'fact-log-meta';
const SERVER_ID = 'fact-log';

export interface PersistentFactStoreConfig {
  /** Storage adapter holding the fact logs */
  adapter: StorageAdapter;

  /** Id given to the first transaction of an empty store (default: 1000) */
  initialTransactionId?: TransactionId;

  /** Commit timestamp source (default: Date.now) */
  clock?: Clock;

  /** Schema version written with every log; logs of other versions are ignored (default: 1) */
  schemaVersion?: number;
}

/** Persisted shape of one entity's log */
interface FactLogState {
  facts: FactRecord[];
}

/** Persisted transaction counter */
interface FactLogMetaState {
  lastTransactionId: TransactionId;
}

/**
 * Fact store persisted through a StorageAdapter, one key per entity
 * (`fact-log:{entityId}`).
 *
 * Every `transact()` is written to the adapter before it resolves. Writes are
 * queued so transaction ids stay monotonic across concurrent callers. The
 * counter is saved ahead of the entity log; a commit that fails part way
 * leaves a gap in the ids, never a duplicate.
 */
export class PersistentFactStore implements WritableFactStore {
  private readonly adapter: StorageAdapter;
  private readonly clock: Clock;
  private readonly schemaVersion: number;
  private lastTransactionId: TransactionId;
  private queue: Promise<unknown> = Promise.resolve();

  private constructor(config: PersistentFactStoreConfig, lastTransactionId: TransactionId) {
    this.adapter = config.adapter;
    this.clock = config.clock ?? Date.now;
    this.schemaVersion = config.schemaVersion ?? 1;
    this.lastTransactionId = lastTransactionId;
  }

  /**
   * Creates a store and restores its transaction counter from the adapter.
   */
  static async start(config: PersistentFactStoreConfig): Promise<PersistentFactStore> {
    const meta = await config.adapter.load<FactLogMetaState>(META_KEY);
    const initial = (config.initialTransactionId ?? DEFAULT_INITIAL_TRANSACTION_ID) - 1;
    return new PersistentFactStore(config, meta ? meta.state.lastTransactionId : initial);
  }

  /**
   * Commits a change set and persists the entity log and counter.
   */
  transact(
    entityId: EntityId,
    changes: TransactionChanges,
    options: TransactOptions = {},
  ): Promise<TransactionReceipt> {
    const run = this.queue.then(() => this.commit(entityId, changes, options));
    // keep the queue alive after a failed commit; the caller still gets the rejection
    this.queue = run.catch(() => undefined);
    return run;
  }

  async queryHistory(entityId: EntityId): Promise<FactRecord[]> {
    return [...(await this.loadLog(entityId))];
  }

  async queryCurrent(entityId: EntityId): Promise<Snapshot | undefined> {
    const facts = await this.loadLog(entityId);
    if (facts.length === 0) return undefined;
    return currentState(facts);
  }

  /** Ids of all entities with a persisted log. */
  async entities(): Promise<EntityId[]> {
    const keys = await this.adapter.listKeys(LOG_KEY_PREFIX);
    return keys.map(key => key.slice(LOG_KEY_PREFIX.length));
  }

  /** Deletes an entity's log. Returns false if there was none. */
  async forget(entityId: EntityId): Promise<boolean> {
    return this.adapter.delete(`${LOG_KEY_PREFIX}${entityId}`);
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private async commit(
    entityId: EntityId,
    changes: TransactionChanges,
    options: TransactOptions,
  ): Promise<TransactionReceipt> {
    const txTimestamp = options.timestamp ?? this.clock();
    const existing = await this.loadLog(entityId);
    const transactionId = this.lastTransactionId + 1;
    const facts = planTransaction(entityId, currentState(existing), changes, transactionId, txTimestamp);

    if (facts.length === 0) {
      return { entityId, transactionId: undefined, txTimestamp, facts };
    }

    // reserve the id first; a failed write below leaves a gap, not a duplicate
    this.lastTransactionId = transactionId;
    await this.adapter.save(META_KEY, this.wrap<FactLogMetaState>({ lastTransactionId: transactionId }));
    await this.adapter.save(`${LOG_KEY_PREFIX}${entityId}`, this.wrap<FactLogState>({
      facts: [...existing, ...facts],
    }));

    return { entityId, transactionId, txTimestamp, facts };
  }

  private async loadLog(entityId: EntityId): Promise<readonly FactRecord[]> {
    const persisted = await this.adapter.load<FactLogState>(`${LOG_KEY_PREFIX}${entityId}`);
    if (!persisted || persisted.metadata.schemaVersion !== this.schemaVersion) {
      return [];
    }
    return persisted.state.facts;
  }

  private wrap<T>(state: T): PersistedState<T> {
    return {
      state,
      metadata: {
        persistedAt: Date.now(),
        serverId: SERVER_ID,
        schemaVersion: this.schemaVersion,
      },
    };
  }
}

/** Current values implied by a log, replayed in transaction order. */
function currentState(facts: readonly FactRecord[]): Map<Attribute, FactValue> {
  const byTransaction = new Map<TransactionId, FactRecord[]>();
  for (const fact of facts) {
    const group = byTransaction.get(fact.transactionId) ?? [];
    group.push(fact);
    byTransaction.set(fact.transactionId, group);
  }

  const state = new Map<Attribute, FactValue>();
  for (const id of [...byTransaction.keys()].sort((a, b) => a - b)) {
    applyFacts(state, byTransaction.get(id) ?? []);
  }
  return state;
}
