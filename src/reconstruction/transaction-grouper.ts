import type { FactRecord, TransactionId } from '../types/fact.js';
import type { TransactionGroup } from '../types/snapshot.js';

/**
 * Groups an entity's facts by transaction and orders the groups by ascending
 * transaction id, which is also commit order.
 *
 * Input order is irrelevant: the store gives no ordering guarantee, so the
 * groups are always sorted explicitly. Facts keep their input order inside a
 * group. A group's commit timestamp is the earliest one among its facts. An
 * empty input yields an empty array.
 */
export function groupByTransaction(facts: Iterable<FactRecord>): TransactionGroup[] {
  const byTransaction = new Map<TransactionId, TransactionGroup>();

  for (const fact of facts) {
    let group = byTransaction.get(fact.transactionId);
    if (!group) {
      group = { transactionId: fact.transactionId, facts: [] };
      byTransaction.set(fact.transactionId, group);
    }
    if (
      fact.txTimestamp !== undefined
      && (group.txTimestamp === undefined || fact.txTimestamp < group.txTimestamp)
    ) {
      group.txTimestamp = fact.txTimestamp;
    }
    group.facts.push(fact);
  }

  return [...byTransaction.values()].sort((a, b) => a.transactionId - b.transactionId);
}
