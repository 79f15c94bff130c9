/**
 * Runtime Types
 * Options, observability events, and the callable shapes the runtime returns
 */

import type { FoldOperatorName } from '../types.js';

/**
 * Object that free identifiers in embedded expressions resolve against.
 * Reads of missing names yield undefined; assignments write to it.
 */
export type Environment = object;

/**
 * Procedure built from one comprehension. Arguments are the `_1 … _N`
 * placeholder values, then one array-like input per implicit `for x`
 * clause, in clause order.
 */
export type ComprehensionFn = (...args: unknown[]) => unknown;

// ============================================================
// OBSERVABILITY
// ============================================================

/** A comprehension was compiled */
export interface BuildEvent {
  readonly expression: string;
  readonly opName: FoldOperatorName;
  /** Compiled JavaScript source */
  readonly source: string;
  readonly durationMs: number;
}

/** A comprehension was served from the cache */
export interface CacheHitEvent {
  readonly expression: string;
}

/** Observability callbacks for monitoring builds */
export interface ObservabilityCallbacks {
  /** Called after a comprehension compiles */
  onBuild?: ((event: BuildEvent) => void) | undefined;
  /** Called when a cached procedure is reused */
  onCacheHit?: ((event: CacheHitEvent) => void) | undefined;
}

// ============================================================
// OPTIONS
// ============================================================

/** Options for createComprehension */
export interface ComprehensionOptions {
  /** Name resolution for embedded expressions (default: globalThis) */
  environment?: Environment | undefined;
  /** Observability callbacks */
  observability?: ObservabilityCallbacks | undefined;
}

// ============================================================
// CACHE
// ============================================================

/**
 * Memoizing comprehension builder bound to one environment.
 * Calling it is the same as calling `get`.
 */
export interface Comprehension {
  (expression: string): ComprehensionFn;
  /** Procedure for `expression`, built on first request */
  get(expression: string): ComprehensionFn;
  has(expression: string): boolean;
  /** Drop every cached procedure */
  clear(): void;
  readonly environment: Environment;
  /**
   * Independent cache. Options left out are inherited from this one.
   */
  'new'(options?: ComprehensionOptions): Comprehension;
}
