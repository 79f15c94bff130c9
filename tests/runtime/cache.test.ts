/**
 * Comprehension Cache Tests
 * Memoization, lifecycle and per-environment isolation
 */

import { describe, expect, it } from 'vitest';
import { comp, createComprehension, ParseError } from '../../src/index.js';
import { createEventCollector } from '../helpers/comprehension.js';

describe('createComprehension', () => {
  describe('memoization', () => {
    it('builds once per expression', () => {
      const cache = createComprehension();
      const first = cache('x for x');
      expect(cache('x for x')).toBe(first);
      expect(cache.get('x for x')).toBe(first);
    });

    it('keys on the exact expression text', () => {
      const cache = createComprehension();
      expect(cache('x for x')).not.toBe(cache('x  for x'));
    });

    it('reports builds and cache hits', () => {
      const { events, callbacks } = createEventCollector();
      const cache = createComprehension({ observability: callbacks });
      cache('x for x');
      cache('x for x');
      cache.get('x for x');

      expect(events.build.map((e) => e.expression)).toEqual(['x for x']);
      expect(events.cacheHit).toEqual([
        { expression: 'x for x' },
        { expression: 'x for x' },
      ]);
    });
  });

  describe('lifecycle', () => {
    it('tracks cached expressions', () => {
      const cache = createComprehension();
      expect(cache.has('x for x')).toBe(false);
      cache('x for x');
      expect(cache.has('x for x')).toBe(true);
    });

    it('rebuilds after clear', () => {
      const cache = createComprehension();
      const first = cache('x for x');
      cache.clear();
      expect(cache.has('x for x')).toBe(false);
      expect(cache('x for x')).not.toBe(first);
    });

    it('leaves the cache untouched when a build fails', () => {
      const cache = createComprehension();
      expect(() => cache('x')).toThrow(ParseError);
      expect(cache.has('x')).toBe(false);
    });
  });

  describe('environments', () => {
    it('defaults to globalThis', () => {
      expect(createComprehension().environment).toBe(globalThis);
      expect(comp.environment).toBe(globalThis);
    });

    it('resolves names per cache', () => {
      const one = createComprehension({ environment: { k: 1 } });
      const two = createComprehension({ environment: { k: 2 } });
      expect(one('k + x for x')([1])).toEqual([2]);
      expect(two('k + x for x')([1])).toEqual([3]);
    });

    it('creates independent caches with new', () => {
      const env = { k: 10 };
      const parent = createComprehension();
      parent('x for x');

      const child = parent.new({ environment: env });
      expect(child.environment).toBe(env);
      expect(child.has('x for x')).toBe(false);
      expect(child('k * x for x')([2])).toEqual([20]);
      expect(parent.has('k * x for x')).toBe(false);
    });

    it('inherits environment and observability by default', () => {
      const { events, callbacks } = createEventCollector();
      const env = { k: 1 };
      const parent = createComprehension({
        environment: env,
        observability: callbacks,
      });
      const child = parent.new();

      expect(child.environment).toBe(env);
      child('k for x');
      expect(events.build).toHaveLength(1);
    });
  });

  describe('default cache', () => {
    it('runs against globalThis', () => {
      expect(comp('Math.max(x, 2) for x')([1, 3])).toEqual([2, 3]);
    });
  });
});
