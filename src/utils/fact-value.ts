import type { FactValue, FactValueType } from '../types/fact.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** All value tags, in declaration order */
export const FACT_VALUE_TYPES: readonly FactValueType[] = [
  'string',
  'number',
  'boolean',
  'instant',
  'uuid',
  'keyword',
] as const;

/**
 * Constructors for tagged fact values.
 *
 * @example
 * ```typescript
 * const facts = {
 *   'order/id': FactValues.uuid('287fc397-a432-49d7-9068-d7499cd2e28c'),
 *   'order/time': FactValues.instant('2018-07-01T12:00:00Z'),
 *   'order/operator': FactValues.string('me'),
 * };
 * ```
 */
export const FactValues = {
  string(value: string): FactValue {
    return { type: 'string', value };
  },

  number(value: number): FactValue {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Fact number must be finite, got ${value}`);
    }
    return { type: 'number', value };
  },

  boolean(value: boolean): FactValue {
    return { type: 'boolean', value };
  },

  /** Accepts a Date, epoch milliseconds or an ISO 8601 string. */
  instant(value: Date | number | string): FactValue {
    const ms = value instanceof Date
      ? value.getTime()
      : typeof value === 'number' ? value : Date.parse(value);
    if (!Number.isFinite(ms)) {
      throw new RangeError(`Invalid instant: ${String(value)}`);
    }
    return { type: 'instant', value: ms };
  },

  uuid(value: string): FactValue {
    if (!UUID_RE.test(value)) {
      throw new RangeError(`Invalid uuid: ${value}`);
    }
    return { type: 'uuid', value: value.toLowerCase() };
  },

  keyword(value: string): FactValue {
    return { type: 'keyword', value };
  },
} as const;

export function isFactValueType(value: unknown): value is FactValueType {
  return FACT_VALUE_TYPES.some(type => type === value);
}

/** Tag and payload equality. */
export function factValueEquals(a: FactValue, b: FactValue): boolean {
  return a.type === b.type && a.value === b.value;
}

/**
 * Human-readable rendering: instants as ISO 8601, keywords with a leading
 * colon, everything else as its payload.
 */
export function formatFactValue(value: FactValue): string {
  switch (value.type) {
    case 'instant':
      return new Date(value.value).toISOString();
    case 'keyword':
      return `:${value.value}`;
    default:
      return String(value.value);
  }
}
