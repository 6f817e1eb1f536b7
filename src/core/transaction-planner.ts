import type { Attribute, EntityId, FactRecord, FactValue, TransactionId } from '../types/fact.js';
import type { Snapshot } from '../types/snapshot.js';
import type { TransactionChanges } from '../types/store.js';
import { TransactionError } from '../reconstruction/errors.js';
import { factValueEquals } from '../utils/fact-value.js';

/**
 * Translates a change set into the facts a transaction has to append,
 * given the entity's current state.
 *
 * - setting an attribute to its current value is a no-op
 * - replacing a value emits a retraction of the old and an assertion of the new
 * - retracting an attribute that has no value is a no-op
 *
 * @throws {TransactionError} On an empty attribute name, an attribute that is
 *   both set and retracted, or a non-finite number.
 */
export function planTransaction(
  entityId: EntityId,
  current: Snapshot,
  changes: TransactionChanges,
  transactionId: TransactionId,
  txTimestamp: number,
): FactRecord[] {
  const set: Array<[Attribute, FactValue]> = changes.set ? Object.entries(changes.set) : [];
  const retract = changes.retract ?? [];
  validateChanges(entityId, set, retract);

  const facts: FactRecord[] = [];
  const fact = (attribute: Attribute, value: FactValue, added: boolean): FactRecord => ({
    transactionId,
    attribute,
    value,
    added,
    txTimestamp,
  });

  for (const [attribute, value] of set) {
    const existing = current.get(attribute);
    if (existing && factValueEquals(existing, value)) continue;
    if (existing) {
      facts.push(fact(attribute, existing, false));
    }
    facts.push(fact(attribute, value, true));
  }

  for (const attribute of retract) {
    const existing = current.get(attribute);
    if (existing) {
      facts.push(fact(attribute, existing, false));
    }
  }

  return facts;
}

/**
 * Applies committed facts to a current-state index in place.
 */
export function applyFacts(state: Map<Attribute, FactValue>, facts: readonly FactRecord[]): void {
  for (const f of facts) {
    if (!f.added) state.delete(f.attribute);
  }
  for (const f of facts) {
    if (f.added) state.set(f.attribute, f.value);
  }
}

function validateChanges(
  entityId: EntityId,
  set: ReadonlyArray<[Attribute, FactValue]>,
  retract: readonly Attribute[],
): void {
  const setAttributes = new Set<Attribute>();

  for (const [attribute, value] of set) {
    if (attribute.length === 0) {
      throw new TransactionError(entityId, 'attribute name must not be empty');
    }
    if (value.type === 'number' && !Number.isFinite(value.value)) {
      throw new TransactionError(entityId, `attribute "${attribute}" has a non-finite number`);
    }
    setAttributes.add(attribute);
  }

  for (const attribute of retract) {
    if (attribute.length === 0) {
      throw new TransactionError(entityId, 'attribute name must not be empty');
    }
    if (setAttributes.has(attribute)) {
      throw new TransactionError(entityId, `attribute "${attribute}" is both set and retracted`);
    }
  }
}
