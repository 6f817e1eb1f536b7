import { describe, it, expect } from 'vitest';
import {
  accumulateSnapshots,
  mergeInto,
  DEFAULT_RETRACTION_POLICY,
} from '../../../src/reconstruction/snapshot-accumulator';
import { FactValues } from '../../../src/utils/fact-value';
import type { FactValue } from '../../../src/types/fact';
import type { TransactionDelta } from '../../../src/types/snapshot';

const s = FactValues.string;

function delta(
  transactionId: number,
  assertions: Record<string, FactValue>,
  retractions: string[] = [],
): TransactionDelta {
  return {
    transactionId,
    assertions: new Map(Object.entries(assertions)),
    retractions: new Set(retractions),
  };
}

describe('mergeInto()', () => {
  it('copies the overlay when there is no base', () => {
    const overlay = new Map([['a', s('1')]]);
    const merged = mergeInto(undefined, overlay);

    expect(merged).toEqual(overlay);
    expect(merged).not.toBe(overlay);
  });

  it('lets overlay keys win and carries other keys forward', () => {
    const base = new Map([['a', s('1')], ['b', s('2')]]);
    const merged = mergeInto(base, new Map([['b', s('3')], ['c', s('4')]]));

    expect(merged).toEqual(new Map([['a', s('1')], ['b', s('3')], ['c', s('4')]]));
  });

  it('does not mutate its inputs', () => {
    const base = new Map([['a', s('1')]]);
    const overlay = new Map([['a', s('2')]]);

    mergeInto(base, overlay, ['a']);

    expect(base).toEqual(new Map([['a', s('1')]]));
    expect(overlay).toEqual(new Map([['a', s('2')]]));
  });

  it('drops removed keys that the overlay does not set', () => {
    const base = new Map([['a', s('1')], ['b', s('2')]]);
    const merged = mergeInto(base, new Map([['b', s('3')]]), ['a', 'b']);

    expect(merged).toEqual(new Map([['b', s('3')]]));
  });

  it('ignores removals of absent keys', () => {
    const merged = mergeInto(new Map([['a', s('1')]]), new Map(), ['zzz']);

    expect(merged).toEqual(new Map([['a', s('1')]]));
  });
});

describe('accumulateSnapshots()', () => {
  it('defaults to the retain policy', () => {
    expect(DEFAULT_RETRACTION_POLICY).toBe('retain');
  });

  it('returns an empty array for no deltas', () => {
    expect(accumulateSnapshots([])).toEqual([]);
  });

  it('returns one snapshot per delta', () => {
    const snapshots = accumulateSnapshots([
      delta(1, { a: s('1') }),
      delta(2, { b: s('2') }),
      delta(3, { a: s('3') }),
    ]);

    expect(snapshots).toHaveLength(3);
  });

  it('uses the first delta as the first snapshot', () => {
    const [first] = accumulateSnapshots([delta(1, { a: s('1'), b: s('2') })]);

    expect(first).toEqual(new Map([['a', s('1')], ['b', s('2')]]));
  });

  it('overlays each delta on the previous snapshot', () => {
    const snapshots = accumulateSnapshots([
      delta(1, { a: s('1'), b: s('2') }),
      delta(2, { b: s('3') }),
      delta(3, { c: s('4') }),
    ]);

    expect(snapshots).toEqual([
      new Map([['a', s('1')], ['b', s('2')]]),
      new Map([['a', s('1')], ['b', s('3')]]),
      new Map([['a', s('1')], ['b', s('3')], ['c', s('4')]]),
    ]);
  });

  it('never loses keys missing from a partial delta', () => {
    const deltas = [
      delta(1, { a: s('1'), b: s('2'), c: s('3') }),
      delta(2, { a: s('4') }),
      delta(3, { b: s('5') }),
      delta(4, { d: s('6') }),
    ];
    const snapshots = accumulateSnapshots(deltas);

    for (let i = 1; i < snapshots.length; i++) {
      const previous = snapshots[i - 1] ?? new Map<string, FactValue>();
      const current = snapshots[i] ?? new Map<string, FactValue>();
      const changed = deltas[i]?.assertions ?? new Map<string, FactValue>();
      for (const [attribute, value] of current) {
        if (!changed.has(attribute)) {
          expect(value).toEqual(previous.get(attribute));
        }
      }
    }
  });

  it('returns independent snapshots', () => {
    const snapshots = accumulateSnapshots([delta(1, { a: s('1') }), delta(2, { b: s('2') })]);

    expect(snapshots[0]).not.toBe(snapshots[1]);
    expect(snapshots[0]?.has('b')).toBe(false);
  });

  describe('retraction policy', () => {
    const deltas = [
      delta(1, { a: s('1'), location: s('warehouse A') }),
      delta(2, { a: s('2') }, ['location']),
      delta(3, { a: s('3') }),
    ];

    it('retain keeps the last value of a bare retraction', () => {
      const snapshots = accumulateSnapshots(deltas, { retractionPolicy: 'retain' });

      expect(snapshots[1]?.get('location')).toEqual(s('warehouse A'));
      expect(snapshots[2]?.get('location')).toEqual(s('warehouse A'));
    });

    it('remove drops the attribute from that transaction on', () => {
      const snapshots = accumulateSnapshots(deltas, { retractionPolicy: 'remove' });

      expect(snapshots[0]?.get('location')).toEqual(s('warehouse A'));
      expect(snapshots[1]).toEqual(new Map([['a', s('2')]]));
      expect(snapshots[2]).toEqual(new Map([['a', s('3')]]));
    });

    it('remove lets a later transaction reintroduce the attribute', () => {
      const snapshots = accumulateSnapshots(
        [...deltas, delta(4, { location: s('hub C') })],
        { retractionPolicy: 'remove' },
      );

      expect(snapshots[3]?.get('location')).toEqual(s('hub C'));
    });
  });
});
