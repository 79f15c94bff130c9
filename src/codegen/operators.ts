/**
 * Fold Operator Registry
 *
 * Each operator supplies the accumulator's initial expression and the
 * statement folding one iteration's output into it. `%s` in `accum` marks
 * where the output expression text goes.
 */

import type { FoldOperatorName } from '../types.js';

export interface FoldOperator {
  readonly init: string;
  readonly accum: string;
}

/** Insertion point for the output expression in `accum` */
export const OUT_SLOT = '%s';

/** Generated code reads intrinsics from here, never from the environment */
export const RUNTIME_VAR = '__runtime';
export const RESULT_VAR = '__result';

export const FOLD_OPERATORS: Readonly<Record<FoldOperatorName, FoldOperator>> =
  {
    list: {
      init: '[]',
      accum: '__result.push(%s);',
    },
    table: {
      init: 'new __runtime.Map()',
      accum: 'const [__k, __v] = [%s]; __result.set(__k, __v);',
    },
    sum: {
      init: '0',
      accum: '__result = __result + (%s);',
    },
    min: {
      init: 'void 0',
      accum:
        'const __tmp = (%s); if (__result === void 0 || __tmp < __result) __result = __tmp;',
    },
    max: {
      init: 'void 0',
      accum:
        'const __tmp = (%s); if (__result === void 0 || __tmp > __result) __result = __tmp;',
    },
  };

/**
 * Registry lookup. The parser only yields registered names, so a miss is a
 * caller bug rather than bad input.
 */
export function lookupOperator(name: FoldOperatorName): FoldOperator {
  const operator: FoldOperator | undefined = Object.hasOwn(FOLD_OPERATORS, name)
    ? FOLD_OPERATORS[name]
    : undefined;
  if (!operator) {
    throw new Error(`Unknown fold operator: ${name}`);
  }
  return operator;
}
