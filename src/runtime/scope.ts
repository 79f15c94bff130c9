/**
 * Scope Binding
 *
 * Compiled comprehensions run inside `with (scope)`. The proxy claims every
 * name except the procedure's own parameters, so lookups that are not bound
 * by the comprehension itself go to the environment and never fall through
 * to the real global object. Generated temporaries are block-scoped inside
 * the `with` body and shadow the proxy.
 */

import type { Environment } from './types.js';

export function createScope(
  environment: Environment,
  parameters: readonly string[]
): object {
  return new Proxy(environment, {
    has: (_target, key) =>
      typeof key === 'string' && !parameters.includes(key),
    get: (target, key) =>
      // `with` consults @@unscopables; nothing in the environment is hidden
      key === Symbol.unscopables ? undefined : Reflect.get(target, key),
  });
}
