/**
 * Comprehension Runtime
 * Procedure builder, scope binding and cache
 */

export {
  assembleSource,
  build,
  buildComprehension,
  compile,
  parameterNames,
} from './builder.js';
export { createComprehension } from './cache.js';
export { RUNTIME_INTRINSICS, type RuntimeIntrinsics } from './intrinsics.js';
export { createScope } from './scope.js';
export type {
  BuildEvent,
  CacheHitEvent,
  Comprehension,
  ComprehensionFn,
  ComprehensionOptions,
  Environment,
  ObservabilityCallbacks,
} from './types.js';
