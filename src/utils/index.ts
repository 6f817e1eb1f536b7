export {
  FactValues,
  FACT_VALUE_TYPES,
  factValueEquals,
  formatFactValue,
  isFactValueType,
} from './fact-value.js';
