import type { Attribute, FactValue } from '../types/fact.js';
import type {
  Delta,
  ReconstructionOptions,
  RetractionPolicy,
  Snapshot,
  TransactionDelta,
} from '../types/snapshot.js';

export const DEFAULT_RETRACTION_POLICY: RetractionPolicy = 'retain';

/**
 * Overlays `overlay` onto `base` and returns the result as a new map.
 *
 * Keys of the overlay win; all other keys of the base are carried forward.
 * Keys in `removals` are dropped afterwards unless the overlay sets them.
 * Neither input is modified.
 */
export function mergeInto(
  base: Snapshot | undefined,
  overlay: Delta,
  removals: Iterable<Attribute> = [],
): Map<Attribute, FactValue> {
  const merged = new Map<Attribute, FactValue>(base ?? []);

  for (const [attribute, value] of overlay) {
    merged.set(attribute, value);
  }
  for (const attribute of removals) {
    if (!overlay.has(attribute)) {
      merged.delete(attribute);
    }
  }

  return merged;
}

/**
 * Folds ordered per-transaction deltas (oldest first) into one cumulative
 * snapshot per transaction.
 *
 * The first snapshot is a copy of the first delta; each following snapshot is
 * the previous one merged with the next delta. With the `remove` policy,
 * bare retractions also delete keys.
 */
export function accumulateSnapshots(
  deltas: readonly TransactionDelta[],
  options: ReconstructionOptions = {},
): Snapshot[] {
  const policy = options.retractionPolicy ?? DEFAULT_RETRACTION_POLICY;
  const snapshots: Snapshot[] = [];
  let previous: Snapshot | undefined;

  for (const delta of deltas) {
    const removals = policy === 'remove' ? delta.retractions : [];
    const snapshot = mergeInto(previous, delta.assertions, removals);
    snapshots.push(snapshot);
    previous = snapshot;
  }

  return snapshots;
}
