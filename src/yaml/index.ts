export {
  loadHistoryFromYAML,
  loadHistoryFromFile,
  seedStore,
  YamlLoadError,
  type EntityHistoryInput,
  type HistoryTransaction,
} from './history-loader.js';
