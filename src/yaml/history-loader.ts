/**
 * YAML loader for entity histories.
 *
 * A history file lists one entity's transactions in commit order. It is used
 * to seed a store with known data, e.g. for fixtures and demos.
 *
 * @example
 * ```typescript
 * const history = loadHistoryFromYAML(`
 *   entity: order-1
 *   transactions:
 *     - at: 2018-07-01T12:00:00Z
 *       set:
 *         order/id: { uuid: 287fc397-a432-49d7-9068-d7499cd2e28c }
 *         order/operator: me
 *     - set:
 *         order/operator: logistics
 * `);
 * const receipts = await seedStore(new MemoryFactStore(), history);
 * ```
 *
 * @module
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import type { Attribute, EntityId, FactValue } from '../types/fact.js';
import type { TransactionChanges, TransactionReceipt, WritableFactStore } from '../types/store.js';
import { ReconstructionError } from '../reconstruction/errors.js';
import { FACT_VALUE_TYPES, FactValues, isFactValueType } from '../utils/fact-value.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HistoryTransaction {
  changes: TransactionChanges;
  /** Commit timestamp in epoch ms */
  at?: number;
}

export interface EntityHistoryInput {
  entityId: EntityId;
  transactions: HistoryTransaction[];
}

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class YamlLoadError extends ReconstructionError {
  readonly filePath: string | undefined;

  constructor(message: string, filePath?: string) {
    super('YAML_LOAD_ERROR', filePath ? `${filePath}: ${message}` : message);
    this.name = 'YamlLoadError';
    this.filePath = filePath;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parses and validates a history document.
 *
 * @throws {YamlLoadError} On a syntax error, empty input or invalid structure
 */
export function loadHistoryFromYAML(yamlContent: string): EntityHistoryInput {
  let parsed: unknown;
  try {
    parsed = parse(yamlContent);
  } catch (err) {
    throw new YamlLoadError(
      `YAML syntax error: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (parsed === null || parsed === undefined) {
    throw new YamlLoadError('YAML content is empty');
  }

  const root = requireRecord(parsed, 'history');
  const entityId = requireString(root['entity'], 'entity');
  const transactions = requireArray(root['transactions'], 'transactions');
  if (transactions.length === 0) {
    throw new YamlLoadError('transactions: expected at least one transaction');
  }

  return {
    entityId,
    transactions: transactions.map((item, i) => parseTransaction(item, `transactions[${i}]`)),
  };
}

/**
 * Reads a history document from disk.
 *
 * @throws {YamlLoadError} On a read failure or an invalid document; the
 *   message is prefixed with the file path
 */
export async function loadHistoryFromFile(filePath: string): Promise<EntityHistoryInput> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new YamlLoadError(
      `Failed to read file: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  try {
    return loadHistoryFromYAML(content);
  } catch (err) {
    if (err instanceof YamlLoadError) {
      throw new YamlLoadError(err.message, filePath);
    }
    throw err;
  }
}

/**
 * Commits the history's transactions to a store, one after another.
 */
export async function seedStore(
  store: WritableFactStore,
  history: EntityHistoryInput,
): Promise<TransactionReceipt[]> {
  const receipts: TransactionReceipt[] = [];
  for (const tx of history.transactions) {
    receipts.push(await store.transact(
      history.entityId,
      tx.changes,
      tx.at !== undefined ? { timestamp: tx.at } : {},
    ));
  }
  return receipts;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function parseTransaction(raw: unknown, path: string): HistoryTransaction {
  const obj = requireRecord(raw, path);
  const changes: TransactionChanges = {};

  if (obj['set'] !== undefined && obj['set'] !== null) {
    const setObj = requireRecord(obj['set'], `${path}.set`);
    changes.set = Object.fromEntries(
      Object.entries(setObj).map(([attribute, value]): [Attribute, FactValue] => [
        attribute,
        parseValue(value, `${path}.set.${attribute}`),
      ]),
    );
  }

  if (obj['retract'] !== undefined && obj['retract'] !== null) {
    changes.retract = requireArray(obj['retract'], `${path}.retract`)
      .map((item, i) => requireString(item, `${path}.retract[${i}]`));
  }

  if (changes.set === undefined && changes.retract === undefined) {
    throw new YamlLoadError(`${path}: expected "set" or "retract"`);
  }

  const at = obj['at'];
  if (at === undefined || at === null) {
    return { changes };
  }
  return { changes, at: parseInstant(at, `${path}.at`) };
}

function parseValue(raw: unknown, path: string): FactValue {
  if (typeof raw === 'string') return FactValues.string(raw);
  if (typeof raw === 'boolean') return FactValues.boolean(raw);
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) {
      throw new YamlLoadError(`${path}: must be a finite number`);
    }
    return FactValues.number(raw);
  }

  const entries = Object.entries(requireRecord(raw, path));
  const [entry] = entries;
  const type = entry?.[0];
  if (entries.length !== 1 || entry === undefined || !isFactValueType(type)) {
    throw new YamlLoadError(
      `${path}: tagged value must have exactly one key of ${FACT_VALUE_TYPES.join(', ')}`,
    );
  }

  const payload = entry[1];
  switch (type) {
    case 'string':
      return FactValues.string(requireString(payload, `${path}.string`));
    case 'keyword':
      return FactValues.keyword(requireString(payload, `${path}.keyword`));
    case 'uuid':
      return tagged(() => FactValues.uuid(requireString(payload, `${path}.uuid`)), path);
    case 'instant':
      return FactValues.instant(parseInstant(payload, `${path}.instant`));
    case 'number':
      if (typeof payload !== 'number' || !Number.isFinite(payload)) {
        throw new YamlLoadError(`${path}.number: must be a finite number`);
      }
      return FactValues.number(payload);
    case 'boolean':
      if (typeof payload !== 'boolean') {
        throw new YamlLoadError(`${path}.boolean: must be a boolean`);
      }
      return FactValues.boolean(payload);
  }
}

function parseInstant(raw: unknown, path: string): number {
  const ms = typeof raw === 'number' ? raw : typeof raw === 'string' ? Date.parse(raw) : NaN;
  if (!Number.isFinite(ms)) {
    throw new YamlLoadError(`${path}: must be an ISO 8601 timestamp or epoch milliseconds`);
  }
  return ms;
}

/** Rewraps constructor range errors with the document path. */
function tagged(build: () => FactValue, path: string): FactValue {
  try {
    return build();
  } catch (err) {
    if (err instanceof RangeError) {
      throw new YamlLoadError(`${path}: ${err.message}`);
    }
    throw err;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new YamlLoadError(
      `${path}: must be an object, got ${Array.isArray(value) ? 'array' : typeof value}`,
    );
  }
  return value;
}

function requireArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new YamlLoadError(`${path}: must be an array, got ${typeof value}`);
  }
  return value;
}

function requireString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new YamlLoadError(
      `${path}: must be a non-empty string, got ${value === '' ? 'empty string' : typeof value}`,
    );
  }
  return value;
}
