/** Identifier of the entity whose history is being reconstructed */
export type EntityId = string;

/** Name of an entity field, e.g. `order/operator` */
export type Attribute = string;

/**
 * Store-assigned transaction id. Opaque to callers, but totally ordered:
 * a higher id was committed later.
 */
export type TransactionId = number;

/** Tag of a {@link FactValue} */
export type FactValueType = FactValue['type'];

/**
 * Attribute value. A closed tagged union so that merge and comparison logic
 * never has to look at an untyped payload.
 */
export type FactValue =
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'number'; readonly value: number }
  | { readonly type: 'boolean'; readonly value: boolean }
  | { readonly type: 'instant'; readonly value: number }   // epoch ms
  | { readonly type: 'uuid'; readonly value: string }
  | { readonly type: 'keyword'; readonly value: string };

/** One row of an entity's change log */
export interface FactRecord {
  transactionId: TransactionId;
  attribute: Attribute;
  value: FactValue;
  /** `true` = assertion, `false` = retraction */
  added: boolean;
  /** Commit wall-clock time (epoch ms), if the store provides it */
  txTimestamp?: number;
}
