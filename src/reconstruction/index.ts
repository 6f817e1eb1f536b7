export { groupByTransaction } from './transaction-grouper.js';
export { resolveDelta } from './delta-resolver.js';
export {
  accumulateSnapshots,
  mergeInto,
  DEFAULT_RETRACTION_POLICY,
} from './snapshot-accumulator.js';
export {
  reconstruct,
  reconstructHistory,
  reconstructAsOf,
  reconstructAt,
  replayFacts,
} from './reconstruction-pipeline.js';
export {
  queryHistory,
  diffSnapshots,
  diffTransactions,
  type HistoryQuery,
  type HistoryQueryResult,
  type AttributeChange,
  type AttributeChangeKind,
  type SnapshotDiff,
} from './history-query.js';
export {
  ReconstructionError,
  StoreUnavailableError,
  MalformedFactGroupError,
  TransactionError,
  type ReconstructionErrorCode,
} from './errors.js';
