import type { Attribute, FactValue, TransactionId } from '../types/fact.js';
import type { Snapshot, SnapshotEntry } from '../types/snapshot.js';
import { factValueEquals } from '../utils/fact-value.js';

const DEFAULT_LIMIT = 50;

/** Filters and paging for a reconstructed history */
export interface HistoryQuery {
  /** Maximum number of entries to return (default: 50) */
  limit?: number;

  /** Number of entries to skip for pagination */
  offset?: number;

  /** Sort order by transaction id (default: 'asc') */
  order?: 'asc' | 'desc';

  /** Filter: minimum transaction id (inclusive) */
  fromTransaction?: TransactionId;

  /** Filter: maximum transaction id (inclusive) */
  toTransaction?: TransactionId;

  /** Filter: committed at or after this timestamp */
  from?: number;

  /** Filter: committed at or before this timestamp */
  to?: number;

  /** Filter: only transactions that asserted one of these attributes */
  attributes?: Attribute[];
}

export interface HistoryQueryResult {
  /** Matching entries */
  entries: SnapshotEntry[];

  /** Number of transactions in the history (before filtering) */
  totalTransactions: number;

  /** Whether more entries exist beyond the current page */
  hasMore: boolean;
}

export type AttributeChangeKind = 'added' | 'removed' | 'changed';

/** A single attribute-level difference between two snapshots */
export interface AttributeChange {
  attribute: Attribute;
  kind: AttributeChangeKind;
  oldValue?: FactValue;
  newValue?: FactValue;
}

/** Diff between the snapshots of two transactions */
export interface SnapshotDiff {
  fromTransaction: TransactionId;
  toTransaction: TransactionId;
  changes: AttributeChange[];
}

/**
 * Filters, orders and paginates a reconstructed history.
 *
 * Time bounds exclude entries without a commit timestamp.
 */
export function queryHistory(
  entries: readonly SnapshotEntry[],
  params: HistoryQuery = {},
): HistoryQueryResult {
  let filtered = applyFilters(entries, params);

  if (params.order === 'desc') {
    filtered = filtered.slice().reverse();
  }

  const offset = params.offset ?? 0;
  const limit = params.limit ?? DEFAULT_LIMIT;
  const page = filtered.slice(offset, offset + limit);
  const hasMore = offset + limit < filtered.length;

  return { entries: page, totalTransactions: entries.length, hasMore };
}

/**
 * Attribute-level diff of two snapshots, sorted by attribute name.
 * Unchanged attributes are omitted.
 */
export function diffSnapshots(from: Snapshot, to: Snapshot): AttributeChange[] {
  const changes: AttributeChange[] = [];

  for (const [attribute, oldValue] of from) {
    const newValue = to.get(attribute);
    if (newValue === undefined) {
      changes.push({ attribute, kind: 'removed', oldValue });
    } else if (!factValueEquals(oldValue, newValue)) {
      changes.push({ attribute, kind: 'changed', oldValue, newValue });
    }
  }
  for (const [attribute, newValue] of to) {
    if (!from.has(attribute)) {
      changes.push({ attribute, kind: 'added', newValue });
    }
  }

  return changes.sort((a, b) => (a.attribute < b.attribute ? -1 : a.attribute > b.attribute ? 1 : 0));
}

/**
 * Diffs the snapshots produced by two transactions of a history.
 *
 * Returns undefined if either transaction is not part of it.
 */
export function diffTransactions(
  entries: readonly SnapshotEntry[],
  fromTransaction: TransactionId,
  toTransaction: TransactionId,
): SnapshotDiff | undefined {
  const fromEntry = entries.find(e => e.transactionId === fromTransaction);
  const toEntry = entries.find(e => e.transactionId === toTransaction);
  if (!fromEntry || !toEntry) return undefined;

  return {
    fromTransaction,
    toTransaction,
    changes: diffSnapshots(fromEntry.state, toEntry.state),
  };
}

// ---------------------------------------------------------------------------
// Private
// ---------------------------------------------------------------------------

function applyFilters(entries: readonly SnapshotEntry[], params: HistoryQuery): SnapshotEntry[] {
  const { fromTransaction, toTransaction, from, to, attributes } = params;
  let result = [...entries];

  if (fromTransaction !== undefined) {
    result = result.filter(e => e.transactionId >= fromTransaction);
  }
  if (toTransaction !== undefined) {
    result = result.filter(e => e.transactionId <= toTransaction);
  }
  if (from !== undefined) {
    result = result.filter(e => e.txTimestamp !== undefined && e.txTimestamp >= from);
  }
  if (to !== undefined) {
    result = result.filter(e => e.txTimestamp !== undefined && e.txTimestamp <= to);
  }
  if (attributes && attributes.length > 0) {
    const wanted = new Set(attributes);
    result = result.filter(e => [...e.delta.keys()].some(a => wanted.has(a)));
  }

  return result;
}
