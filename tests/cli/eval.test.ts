/**
 * Comprehend CLI Tests: comprehend-eval command
 */

import { describe, expect, it } from 'vitest';
import { CompileError, parse, ParseError } from '../../src/index.js';
import { formatError, formatOutput } from '../../src/cli-shared.js';
import {
  evaluateExpression,
  generateSource,
  parseArgs,
  parseArgument,
} from '../../src/cli-eval.js';
import { catchParseError } from '../helpers/comprehension.js';

describe('comprehend-eval', () => {
  describe('parseArgs', () => {
    it('shows help without arguments', () => {
      expect(parseArgs([])).toEqual({ mode: 'help' });
    });

    it('finds --help and --version in any position', () => {
      expect(parseArgs(['x for x', '--help'])).toEqual({ mode: 'help' });
      expect(parseArgs(['x for x', '--version'])).toEqual({
        mode: 'version',
      });
    });

    it('takes the expression and its arguments', () => {
      expect(parseArgs(['x * 2 for x', '[1, 2]'])).toEqual({
        mode: 'eval',
        expression: 'x * 2 for x',
        args: ['[1, 2]'],
      });
    });

    it('switches to code mode', () => {
      expect(parseArgs(['--code', 'x for x'])).toEqual({
        mode: 'code',
        expression: 'x for x',
        args: [],
      });
    });

    it('accepts negative numbers as arguments', () => {
      expect(parseArgs(['i for i = _1, 0, -1', '-3'])).toEqual({
        mode: 'eval',
        expression: 'i for i = _1, 0, -1',
        args: ['-3'],
      });
    });

    it('stops reading options after --', () => {
      expect(parseArgs(['--', '--code'])).toEqual({
        mode: 'eval',
        expression: '--code',
        args: [],
      });
    });

    it('rejects unknown options', () => {
      expect(() => parseArgs(['--verbose', 'x for x'])).toThrow(
        'Unknown option: --verbose'
      );
    });
  });

  describe('parseArgument', () => {
    it('parses YAML values', () => {
      expect(parseArgument('[1, 2]')).toEqual([1, 2]);
      expect(parseArgument('{a: 1}')).toEqual({ a: 1 });
      expect(parseArgument('3')).toBe(3);
      expect(parseArgument('-3')).toBe(-3);
      expect(parseArgument('null')).toBeNull();
    });

    it('keeps plain words as strings', () => {
      expect(parseArgument('hello')).toBe('hello');
    });
  });

  describe('evaluateExpression', () => {
    it('evaluates with positional arguments', () => {
      expect(evaluateExpression('x * 2 for x', [[1, 2]])).toEqual([2, 4]);
      expect(evaluateExpression('sum(x for x = 1, _1)', [4])).toBe(10);
    });

    it('resolves globals', () => {
      expect(evaluateExpression('Math.max(x, 2) for x', [[1, 3]])).toEqual([
        2, 3,
      ]);
    });

    it('throws parse errors', () => {
      expect(() => evaluateExpression('x')).toThrow(ParseError);
    });
  });

  describe('generateSource', () => {
    it('prints the compiled procedure', () => {
      expect(generateSource('x for x')).toBe(
        [
          'with (__scope) {',
          'let [__in1] = __args;',
          'let __result = [];',
          'for (let __idx1 = 0; __idx1 < __in1.length; __idx1++) {',
          '  let x = __in1[__idx1];',
          '  __result.push(x);',
          '}',
          'return __result;',
          '}',
        ].join('\n')
      );
    });
  });

  describe('formatOutput', () => {
    it('prints absent values as null', () => {
      expect(formatOutput(undefined)).toBe('null');
      expect(formatOutput(null)).toBe('null');
    });

    it('prints scalars as text', () => {
      expect(formatOutput('a')).toBe('a');
      expect(formatOutput(3)).toBe('3');
      expect(formatOutput(true)).toBe('true');
    });

    it('prints arrays as JSON', () => {
      expect(formatOutput([1, 2])).toBe('[\n  1,\n  2\n]');
    });

    it('prints tables as objects', () => {
      expect(formatOutput(new Map([['a', 1]]))).toBe('{\n  "a": 1\n}');
      expect(formatOutput([new Map([['k', 2]])])).toBe(
        '[\n  {\n    "k": 2\n  }\n]'
      );
    });

    it('prints functions as a marker', () => {
      expect(formatOutput(() => 1)).toBe('[function]');
    });
  });

  describe('formatError', () => {
    it('formats parse errors with their location', () => {
      const err = catchParseError(() => parse('x'));
      expect(formatError(err)).toBe(
        "Parse error at line 1, column 2: Missing 'for' clause"
      );
    });

    it('formats compile errors with the generated source', () => {
      const err = new CompileError('Unexpected token', 'return );');
      expect(formatError(err)).toBe(
        'Compile error: Unexpected token\nreturn );'
      );
    });

    it('passes other errors through', () => {
      expect(formatError(new TypeError('boom'))).toBe('boom');
    });
  });
});
