/**
 * Comprehension Language Tests
 * End-to-end behavior of every fold operator and clause kind
 */

import { describe, expect, it } from 'vitest';
import {
  buildComprehension,
  createComprehension,
  parse,
  ParseError,
} from '../../src/index.js';
import { run } from '../helpers/comprehension.js';

describe('Comprehensions', () => {
  describe('list', () => {
    it('yields an empty array for empty input', () => {
      expect(run('x for x', [])).toEqual([]);
    });

    it('preserves input order', () => {
      expect(run('x for x', [2, 3])).toEqual([2, 3]);
    });

    it('maps each element', () => {
      expect(run('x ** 2 for x', [2, 3])).toEqual([4, 9]);
    });

    it('filters with a predicate', () => {
      expect(run('x for x if x % 2 === 0', [4, 5, 6, 7])).toEqual([4, 6]);
    });

    it('nests clauses with several predicates', () => {
      expect(
        run('[x, y] for x for y if x > 2 if y > 4', [2, 3], [4, 5])
      ).toEqual([[3, 5]]);
    });

    it('applies predicates regardless of their order', () => {
      const xs = [2, 3, 4];
      const ys = [5, 6, 7];
      const first = run('x * y for x for y if x < 4 if y < 6', xs, ys);
      const second = run('x * y for x for y if y < 6 if x < 4', xs, ys);
      expect(first).toEqual([10, 15]);
      expect(second).toEqual(first);
    });

    it('reads any array-like input', () => {
      expect(run('c for c', 'ab')).toEqual(['a', 'b']);
      expect(run('n + 1 for n', new Uint8Array([1, 2]))).toEqual([2, 3]);
    });
  });

  describe('table', () => {
    it('maps keys to values', () => {
      expect(run('table(x, x + 1 for x)', [3, 4])).toEqual(
        new Map([
          [3, 4],
          [4, 5],
        ])
      );
    });

    it('folds nested clauses', () => {
      expect(run('table(x, x + y for x for y)', [3, 4], [2])).toEqual(
        new Map([
          [3, 5],
          [4, 6],
        ])
      );
    });

    it('inverts an object', () => {
      expect(
        run('table(v, k for k, v in Object.entries(_1))', { 3: 5, 5: 7 })
      ).toEqual(
        new Map([
          [5, '3'],
          [7, '5'],
        ])
      );
    });

    it('keeps the last value for a repeated key', () => {
      expect(run('table(x % 2, x for x)', [1, 2, 3])).toEqual(
        new Map([
          [1, 3],
          [0, 2],
        ])
      );
    });
  });

  describe('sum', () => {
    it('is zero for empty input', () => {
      expect(run('sum(x for x)', [])).toBe(0);
    });

    it('adds elements', () => {
      expect(run('sum(x for x)', [2, 3])).toBe(5);
      expect(run('sum(x ** 2 for x)', [2, 3])).toBe(13);
    });

    it('adds across nested clauses', () => {
      expect(run('sum(x * y for x for y)', [2, 3], [4, 5])).toBe(45);
    });

    it('adds filtered elements', () => {
      expect(run('sum(x ** 2 for x if x % 2 === 0)', [4, 5, 6, 7])).toBe(52);
      expect(
        run('sum(x * y for x for y if x > 2 if y > 4)', [2, 3], [4, 5])
      ).toBe(15);
    });
  });

  describe('min and max', () => {
    it('finds the extremes', () => {
      expect(run('min(x for x)', [3, 5, 2, 4])).toBe(2);
      expect(run('max(x for x)', [3, 5, 2, 4])).toBe(5);
    });

    it('yields undefined for empty input', () => {
      expect(run('min(x for x)', [])).toBeUndefined();
      expect(run('max(x for x)', [])).toBeUndefined();
    });

    it('keeps the first of equal extremes', () => {
      expect(run('max(x.n for x)', [{ n: 1 }, { n: 1 }])).toBe(1);
    });
  });

  describe('placeholders', () => {
    it('binds placeholders before array inputs', () => {
      expect(
        run('sum(x ** _1 + _3 for x if x >= _4)', 2, undefined, 3, 4, [3, 4, 5])
      ).toBe(47);
    });

    it('ignores placeholders inside strings and comments', () => {
      expect(run('sum(("_5" && x) ** _1 /* _6 */ for x)', 2, [4, 5])).toBe(41);
    });
  });

  describe('numeric for', () => {
    it('iterates an inclusive range', () => {
      expect(run('sum(x ** 2 for x = 2, 3)')).toBe(13);
    });

    it('uses an explicit step', () => {
      expect(run('sum(x ** 2 for x = 2, 6, 1 + 1)')).toBe(56);
      expect(run('i for i = 5, 1, -2')).toEqual([5, 3, 1]);
      expect(run('i for i = 0, 1, 0.5')).toEqual([0, 0.5, 1]);
    });

    it('skips an empty range', () => {
      expect(run('i for i = 3, 1')).toEqual([]);
    });

    it('evaluates bounds once', () => {
      let calls = 0;
      const env = {
        limit: (): number => {
          calls++;
          return 3;
        },
      };
      const fn = buildComprehension('i for i = 1, limit()', env);
      expect(fn()).toEqual([1, 2, 3]);
      expect(calls).toBe(1);
    });

    it('gives the same total for reordered clauses', () => {
      const a = run('sum(x * y * z for x = 1, 2 for y = 3, 3 for z)', [5, 6]);
      const b = run('sum(x * y * z for z for x = 1, 2 for y = 3, 3)', [5, 6]);
      expect(a).toBe(99);
      expect(b).toBe(a);
    });
  });

  describe('iterator for', () => {
    it('destructures entries', () => {
      expect(run('sum(i * v for i, v in _1.entries())', [2, 3])).toBe(3);
    });

    it('walks several iterables in turn', () => {
      expect(run('v for v in _1, _2', [1, 2], new Set([3]))).toEqual([1, 2, 3]);
    });

    it('iterates generators', () => {
      function* count(): Generator<number> {
        yield 1;
        yield 2;
      }
      expect(run('n * 10 for n in _1', count())).toEqual([10, 20]);
    });
  });

  describe('embedded JavaScript', () => {
    it('does not split on keywords inside strings', () => {
      expect(run('" x for x " for x', [2])).toEqual([' x for x ']);
    });

    it('does not split on keywords inside comments', () => {
      expect(run('x /* for x\n\n */ for x', [2])).toEqual([2]);
    });

    it('keeps loops inside nested functions', () => {
      const expression =
        '(() => { for (let i = 1; i <= 1; i++) return x * 2; })() for x';
      expect(run(expression, [2])).toEqual([4]);
    });

    it('tells regular expressions from division', () => {
      expect(run('w for w if /^a/.test(w)', ['ab', 'ba'])).toEqual(['ab']);
      expect(run('x / 2 for x', [4])).toEqual([2]);
    });

    it('evaluates template literals', () => {
      expect(run('`${x}!` for x', [1])).toEqual(['1!']);
    });

    it('evaluates comma expressions inside template substitutions', () => {
      expect(run('`${0, x}` for x', [1, 2])).toEqual(['1', '2']);
    });

    it('keeps replacement patterns in output text', () => {
      expect(run("'$&' + x for x", ['a'])).toEqual(['$&a']);
    });

    it('supports optional chaining and nullish defaults', () => {
      expect(run('o?.v ?? 0 for o', [{ v: 1 }, null])).toEqual([1, 0]);
    });
  });

  describe('determinism', () => {
    it('builds equivalent procedures from the same text', () => {
      const expression = '[x, y] for x for y if x !== y';
      const first = buildComprehension(expression);
      const second = buildComprehension(expression);
      expect(first).not.toBe(second);
      expect(first([1, 2], [2, 3])).toEqual(second([1, 2], [2, 3]));
    });
  });

  describe('errors', () => {
    it('rejects variables with the reserved prefix', () => {
      expect(() => parse('x for __result')).toThrow(ParseError);
      expect(() => parse('x for __result')).toThrow('__ prefix');
    });
  });

  describe('environment', () => {
    it('binds procedures to the environment of their cache', () => {
      const comp = createComprehension({ environment: { d: 5 } });
      expect(comp('sum(d for x)')([1])).toBe(5);
    });
  });
});
