/**
 * Runtime Intrinsics
 *
 * Generated code reaches built-ins only through this object, passed in as
 * `__runtime`. Bare names would resolve against the caller's environment.
 */

export interface RuntimeIntrinsics {
  readonly Map: MapConstructor;
  /** Validate the bounds of a numeric for clause before looping */
  readonly checkRange: (start: unknown, stop: unknown, step: unknown) => void;
}

function checkRange(start: unknown, stop: unknown, step: unknown): void {
  if (typeof start !== 'number') {
    throw new TypeError("'for' initial value must be a number");
  }
  if (typeof stop !== 'number') {
    throw new TypeError("'for' limit must be a number");
  }
  if (typeof step !== 'number') {
    throw new TypeError("'for' step must be a number");
  }
  if (step === 0) {
    throw new RangeError("'for' step is zero");
  }
}

export const RUNTIME_INTRINSICS: RuntimeIntrinsics = Object.freeze({
  Map,
  checkRange,
});
