/**
 * History reconstruction: fact stream → ordered snapshot sequence.
 *
 * ```
 * store.queryHistory ─▶ groupByTransaction ─▶ resolveDelta ─▶ accumulateSnapshots
 * ```
 *
 * Only the fetch touches the store; every later stage is pure and
 * synchronous, so reconstructions of any entities may run concurrently.
 *
 * @example
 * ```typescript
 * const snapshots = await reconstruct(store, 'order-1');
 * if (snapshots.length === 0) {
 *   // entity not found
 * }
 * const current = snapshots[snapshots.length - 1];
 * ```
 *
 * @module
 */

import type { EntityId, FactRecord, TransactionId } from '../types/fact.js';
import type { ReconstructionOptions, Snapshot, SnapshotEntry } from '../types/snapshot.js';
import type { FactStore } from '../types/store.js';
import { StoreUnavailableError } from './errors.js';
import { groupByTransaction } from './transaction-grouper.js';
import { resolveDelta } from './delta-resolver.js';
import { accumulateSnapshots } from './snapshot-accumulator.js';

/**
 * Runs the pure stages over facts the caller already holds.
 * Returns one entry per distinct transaction, oldest first.
 */
export function replayFacts(
  facts: Iterable<FactRecord>,
  options: ReconstructionOptions = {},
): SnapshotEntry[] {
  const deltas = groupByTransaction(facts).map(resolveDelta);
  const snapshots = accumulateSnapshots(deltas, options);

  return deltas.map((delta, i) => ({
    transactionId: delta.transactionId,
    ...(delta.txTimestamp !== undefined && { txTimestamp: delta.txTimestamp }),
    delta: delta.assertions,
    state: snapshots[i] ?? new Map(),
  }));
}

/**
 * Reconstructs every state the entity has been in.
 *
 * The last element is the current state. An entity without facts yields an
 * empty array.
 *
 * @throws {StoreUnavailableError} When the history fetch fails.
 * @throws {MalformedFactGroupError} When the history breaks a fact invariant.
 */
export async function reconstruct(
  store: FactStore,
  entityId: EntityId,
  options: ReconstructionOptions = {},
): Promise<Snapshot[]> {
  const entries = await reconstructHistory(store, entityId, options);
  return entries.map(entry => entry.state);
}

/**
 * Like {@link reconstruct}, with each snapshot paired with the transaction
 * id, commit timestamp and delta that produced it.
 */
export async function reconstructHistory(
  store: FactStore,
  entityId: EntityId,
  options: ReconstructionOptions = {},
): Promise<SnapshotEntry[]> {
  const facts = await fetchHistory(store, entityId);
  return replayFacts(facts, options);
}

/**
 * State of the entity right after the last transaction with an id not
 * greater than `transactionId`, or undefined if it did not exist yet.
 */
export async function reconstructAsOf(
  store: FactStore,
  entityId: EntityId,
  transactionId: TransactionId,
  options: ReconstructionOptions = {},
): Promise<Snapshot | undefined> {
  const entries = await reconstructHistory(store, entityId, options);
  return findLast(entries, entry => entry.transactionId <= transactionId)?.state;
}

/**
 * State of the entity at wall-clock time `timestamp` (epoch ms).
 * Transactions without a commit timestamp are never selected.
 */
export async function reconstructAt(
  store: FactStore,
  entityId: EntityId,
  timestamp: number,
  options: ReconstructionOptions = {},
): Promise<Snapshot | undefined> {
  const entries = await reconstructHistory(store, entityId, options);
  return findLast(
    entries,
    entry => entry.txTimestamp !== undefined && entry.txTimestamp <= timestamp,
  )?.state;
}

// ---------------------------------------------------------------------------
// Private
// ---------------------------------------------------------------------------

/** Single bulk read; any failure, sync or async, becomes StoreUnavailableError. */
async function fetchHistory(store: FactStore, entityId: EntityId): Promise<FactRecord[]> {
  try {
    return await store.queryHistory(entityId);
  } catch (err) {
    throw new StoreUnavailableError(entityId, err);
  }
}

function findLast<T>(items: readonly T[], predicate: (item: T) => boolean): T | undefined {
  for (let i = items.length - 1; i >= 0; i--) {
    const item = items[i];
    if (item !== undefined && predicate(item)) {
      return item;
    }
  }
  return undefined;
}
