/**
 * Comprehension Code Generator
 * Main entry point and re-exports
 */

export { generate, inputName } from './generator.js';
export {
  FOLD_OPERATORS,
  type FoldOperator,
  lookupOperator,
  OUT_SLOT,
  RESULT_VAR,
  RUNTIME_VAR,
} from './operators.js';
