import { describe, it, expect } from 'vitest';
import { resolveDelta } from '../../../src/reconstruction/delta-resolver';
import { MalformedFactGroupError, ReconstructionError } from '../../../src/reconstruction/errors';
import { FactValues } from '../../../src/utils/fact-value';
import type { FactRecord } from '../../../src/types/fact';
import type { TransactionGroup } from '../../../src/types/snapshot';

function fact(attribute: string, value: string, added = true, transactionId = 1001): FactRecord {
  return { transactionId, attribute, value: FactValues.string(value), added };
}

function group(facts: FactRecord[], txTimestamp?: number): TransactionGroup {
  return {
    transactionId: 1001,
    facts,
    ...(txTimestamp !== undefined && { txTimestamp }),
  };
}

describe('resolveDelta()', () => {
  it('keeps only asserted values', () => {
    const delta = resolveDelta(group([
      fact('order/operator', 'A', false),
      fact('order/operator', 'B'),
      fact('order/action', 'create', false),
      fact('order/action', 'assign'),
    ]));

    expect(delta.assertions).toEqual(new Map([
      ['order/operator', FactValues.string('B')],
      ['order/action', FactValues.string('assign')],
    ]));
    expect(delta.retractions.size).toBe(0);
  });

  it('does not depend on the order of retraction and assertion', () => {
    const delta = resolveDelta(group([
      fact('order/operator', 'B'),
      fact('order/operator', 'A', false),
    ]));

    expect(delta.assertions.get('order/operator')).toEqual(FactValues.string('B'));
    expect(delta.retractions.size).toBe(0);
  });

  it('accepts a first assertion without retraction', () => {
    const delta = resolveDelta(group([fact('order/location', 'warehouse A')]));

    expect([...delta.assertions.keys()]).toEqual(['order/location']);
  });

  it('lists attributes retracted without replacement', () => {
    const delta = resolveDelta(group([
      fact('order/location', 'warehouse A', false),
      fact('order/operator', 'B'),
    ]));

    expect(delta.assertions.has('order/location')).toBe(false);
    expect([...delta.retractions]).toEqual(['order/location']);
  });

  it('carries transaction id and timestamp', () => {
    const delta = resolveDelta(group([fact('a', 'x')], 1_530_446_400_000));

    expect(delta.transactionId).toBe(1001);
    expect(delta.txTimestamp).toBe(1_530_446_400_000);
  });

  it('omits txTimestamp when the group has none', () => {
    const delta = resolveDelta(group([fact('a', 'x')]));

    expect('txTimestamp' in delta).toBe(false);
  });

  it('returns an empty delta for an empty group', () => {
    const delta = resolveDelta(group([]));

    expect(delta.assertions.size).toBe(0);
    expect(delta.retractions.size).toBe(0);
  });

  it('rejects two assertions of one attribute', () => {
    const malformed = group([fact('order/operator', 'A'), fact('order/operator', 'B')]);

    expect(() => resolveDelta(malformed)).toThrow(MalformedFactGroupError);
    expect(() => resolveDelta(malformed)).toThrow(
      'Transaction 1001: attribute "order/operator" is asserted more than once (A, then B)',
    );
  });

  it('renders both asserted values in the message', () => {
    const malformed: TransactionGroup = {
      transactionId: 1001,
      facts: [
        { transactionId: 1001, attribute: 'order/status', value: FactValues.keyword('status/open'), added: true },
        { transactionId: 1001, attribute: 'order/status', value: FactValues.instant(0), added: true },
      ],
    };

    expect(() => resolveDelta(malformed)).toThrow(
      'attribute "order/status" is asserted more than once (:status/open, then 1970-01-01T00:00:00.000Z)',
    );
  });

  it('rejects duplicate assertions even with equal values', () => {
    expect(() => resolveDelta(group([fact('a', 'x'), fact('a', 'x')]))).toThrow(MalformedFactGroupError);
  });

  it('rejects a fact of another transaction', () => {
    let error: unknown;
    try {
      resolveDelta(group([fact('a', 'x'), fact('b', 'y', true, 1002)]));
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(MalformedFactGroupError);
    expect(error).toBeInstanceOf(ReconstructionError);
    expect(error).toMatchObject({
      code: 'MALFORMED_FACT_GROUP',
      transactionId: 1001,
      attribute: 'b',
      message: 'Transaction 1001: contains a fact of transaction 1002',
    });
  });
});
