/**
 * Comprehension Cache
 *
 * Memoizes built procedures per expression string. Each cache is bound to a
 * single environment; `comp.new()` makes an independent one.
 */

import { buildComprehension } from './builder.js';
import type {
  Comprehension,
  ComprehensionFn,
  ComprehensionOptions,
} from './types.js';

/**
 * Create a callable comprehension cache.
 *
 * @example
 * ```typescript
 * const comp = createComprehension({ environment: { square: (n: number) => n * n } });
 * comp('square(x) for x')([1, 2, 3]); // [1, 4, 9]
 * comp.has('square(x) for x'); // true
 * ```
 */
export function createComprehension(
  options: ComprehensionOptions = {}
): Comprehension {
  const environment = options.environment ?? globalThis;
  const observability = options.observability ?? {};
  const procedures = new Map<string, ComprehensionFn>();

  const get = (expression: string): ComprehensionFn => {
    const cached = procedures.get(expression);
    if (cached) {
      observability.onCacheHit?.({ expression });
      return cached;
    }
    // A failed build throws before anything is stored
    const fn = buildComprehension(expression, environment, observability);
    procedures.set(expression, fn);
    return fn;
  };

  return Object.assign((expression: string) => get(expression), {
    get,
    has: (expression: string): boolean => procedures.has(expression),
    clear: (): void => procedures.clear(),
    environment,
    new: (child: ComprehensionOptions = {}): Comprehension =>
      createComprehension({
        environment: child.environment ?? environment,
        observability: child.observability ?? observability,
      }),
  });
}
