#!/usr/bin/env node
/**
 * Comprehend CLI - Evaluate a comprehension
 *
 * Usage:
 *   comprehend-eval 'x * 2 for x' '[1, 2, 3]'
 *   comprehend-eval --code 'sum(x for x = 1, _1)'
 *   comprehend-eval --help
 *   comprehend-eval --version
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import {
  assembleSource,
  buildComprehension,
  generate,
  parse,
} from './index.js';
import { formatError, formatOutput } from './cli-shared.js';

export type CliCommand =
  | { mode: 'eval' | 'code'; expression: string; args: string[] }
  | { mode: 'help' }
  | { mode: 'version' };

/** A leading `-` followed by a digit or `.` is a negative number, not a flag */
function isFlag(arg: string): boolean {
  return arg.startsWith('-') && arg !== '-' && !/^-\.?\d/.test(arg);
}

/**
 * Parse command-line arguments into structured command
 */
export function parseArgs(argv: string[]): CliCommand {
  const separator = argv.indexOf('--');
  const options = separator === -1 ? argv : argv.slice(0, separator);
  const rest = separator === -1 ? [] : argv.slice(separator + 1);

  if (options.includes('--help')) {
    return { mode: 'help' };
  }
  if (options.includes('--version')) {
    return { mode: 'version' };
  }

  let mode: 'eval' | 'code' = 'eval';
  const positional: string[] = [];
  for (const arg of options) {
    if (arg === '--code') {
      mode = 'code';
    } else if (isFlag(arg)) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }
  positional.push(...rest);

  const [expression, ...args] = positional;
  if (expression === undefined) {
    return { mode: 'help' };
  }
  return { mode, expression, args };
}

/**
 * Parse one command-line argument as YAML. Plain words stay strings;
 * `[1, 2]`, `{a: 1}`, `3` and `null` become values.
 */
export function parseArgument(text: string): unknown {
  const value: unknown = yaml.parse(text);
  return value;
}

/**
 * Build a comprehension and call it with the given arguments
 */
export function evaluateExpression(
  expression: string,
  args: readonly unknown[] = []
): unknown {
  const fn = buildComprehension(expression, globalThis);
  return fn(...args);
}

/**
 * Compiled JavaScript source for a comprehension
 */
export function generateSource(expression: string): string {
  const result = parse(expression);
  return assembleSource(
    generate(result),
    result.forClauses.length,
    result.maxParam,
    result.forClauses
  );
}

/**
 * Display help information
 */
function showHelp(): void {
  console.log(`Comprehension Evaluator

Usage:
  comprehend-eval <expression> [argument...]   Evaluate a comprehension
  comprehend-eval --code <expression>          Print the generated source
  comprehend-eval --help                       Show this help message
  comprehend-eval --version                    Show version information

Arguments are parsed as YAML and passed as _1.._N, then as the inputs of
each bare 'for x' clause.

Examples:
  comprehend-eval 'x * 2 for x' '[1, 2, 3]'
  comprehend-eval 'sum(x for x = 1, _1)' 100
  comprehend-eval 'table(k, v * 10 for k, v in Object.entries(_1))' '{a: 1}'`);
}

/**
 * Display version information
 */
function showVersion(): void {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    fs.readFileSync(packageJsonPath, 'utf-8')
  );
  const version =
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
      ? packageJson.version
      : 'unknown';
  console.log(`comprehend-eval ${version}`);
}

/**
 * Entry point for comprehend-eval binary
 */
function main(): void {
  try {
    const command = parseArgs(process.argv.slice(2));

    if (command.mode === 'help') {
      showHelp();
      return;
    }

    if (command.mode === 'version') {
      showVersion();
      return;
    }

    if (command.mode === 'code') {
      console.log(generateSource(command.expression));
      return;
    }

    const args = command.args.map(parseArgument);
    console.log(formatOutput(evaluateExpression(command.expression, args)));
  } catch (err) {
    console.error(err instanceof Error ? formatError(err) : String(err));
    process.exit(1);
  }
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
