/**
 * Error hierarchy for history reconstruction.
 *
 * Every error carries a stable `code`:
 *
 * ```typescript
 * try {
 *   await reconstruct(store, 'order-1');
 * } catch (err) {
 *   if (err instanceof ReconstructionError && err.code === 'STORE_UNAVAILABLE') {
 *     // retry policy belongs to the caller
 *   }
 * }
 * ```
 *
 * @module
 */

import type { Attribute, EntityId, TransactionId } from '../types/fact.js';

export type ReconstructionErrorCode =
  | 'STORE_UNAVAILABLE'
  | 'MALFORMED_FACT_GROUP'
  | 'INVALID_TRANSACTION'
  | 'YAML_LOAD_ERROR';

/** Common base of all errors raised by this package. */
export class ReconstructionError extends Error {
  readonly code: ReconstructionErrorCode;

  constructor(code: ReconstructionErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ReconstructionError';
    this.code = code;
  }
}

/**
 * The fact store could not deliver an entity's history.
 * No partial reconstruction is attempted; the original failure is the `cause`.
 */
export class StoreUnavailableError extends ReconstructionError {
  readonly entityId: EntityId;

  constructor(entityId: EntityId, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('STORE_UNAVAILABLE', `Failed to fetch history of "${entityId}": ${reason}`, { cause });
    this.name = 'StoreUnavailableError';
    this.entityId = entityId;
  }
}

/**
 * A transaction group breaks the one-assertion-per-attribute invariant, or
 * mixes facts of different transactions. Points at store corruption.
 */
export class MalformedFactGroupError extends ReconstructionError {
  readonly transactionId: TransactionId;
  readonly attribute: Attribute | undefined;

  constructor(message: string, transactionId: TransactionId, attribute?: Attribute) {
    super('MALFORMED_FACT_GROUP', `Transaction ${transactionId}: ${message}`);
    this.name = 'MalformedFactGroupError';
    this.transactionId = transactionId;
    this.attribute = attribute;
  }
}

/** A writable store rejected a change set before committing anything. */
export class TransactionError extends ReconstructionError {
  readonly entityId: EntityId;

  constructor(entityId: EntityId, message: string) {
    super('INVALID_TRANSACTION', `Entity "${entityId}": ${message}`);
    this.name = 'TransactionError';
    this.entityId = entityId;
  }
}
