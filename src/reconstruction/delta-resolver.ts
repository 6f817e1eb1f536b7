import type { Attribute, FactValue } from '../types/fact.js';
import type { TransactionDelta, TransactionGroup } from '../types/snapshot.js';
import { formatFactValue } from '../utils/fact-value.js';
import { MalformedFactGroupError } from './errors.js';

/**
 * Collapses one transaction's add/retract pairs into its net effect.
 *
 * Assertions become the delta. Retractions are trusted (they are not checked
 * against prior state) and only decide whether an attribute was removed
 * without replacement.
 *
 * @throws {MalformedFactGroupError} On a second assertion for the same
 *   attribute, or on a fact that belongs to another transaction.
 */
export function resolveDelta(group: TransactionGroup): TransactionDelta {
  const assertions = new Map<Attribute, FactValue>();
  const retracted = new Set<Attribute>();

  for (const fact of group.facts) {
    if (fact.transactionId !== group.transactionId) {
      throw new MalformedFactGroupError(
        `contains a fact of transaction ${fact.transactionId}`,
        group.transactionId,
        fact.attribute,
      );
    }

    if (!fact.added) {
      retracted.add(fact.attribute);
      continue;
    }

    const previous = assertions.get(fact.attribute);
    if (previous !== undefined) {
      throw new MalformedFactGroupError(
        `attribute "${fact.attribute}" is asserted more than once `
          + `(${formatFactValue(previous)}, then ${formatFactValue(fact.value)})`,
        group.transactionId,
        fact.attribute,
      );
    }
    assertions.set(fact.attribute, fact.value);
  }

  const retractions = new Set<Attribute>();
  for (const attribute of retracted) {
    if (!assertions.has(attribute)) {
      retractions.add(attribute);
    }
  }

  return {
    transactionId: group.transactionId,
    ...(group.txTimestamp !== undefined && { txTimestamp: group.txTimestamp }),
    assertions,
    retractions,
  };
}
