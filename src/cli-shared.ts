/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import { CompileError, ParseError } from './types.js';

function toJson(_key: string, value: unknown): unknown {
  if (value instanceof Map) return Object.fromEntries(value);
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'function') return '[function]';
  return value;
}

/**
 * Convert a comprehension result to human-readable text
 *
 * Absent values print as `null`; tables print as JSON objects.
 */
export function formatOutput(value: unknown): string {
  if (value === undefined || value === null) return 'null';
  if (typeof value === 'string') return value;
  if (
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint'
  ) {
    return String(value);
  }
  if (typeof value === 'function') return '[function]';
  return JSON.stringify(value, toJson, 2);
}

/**
 * Format error for stderr output
 */
export function formatError(err: Error): string {
  if (err instanceof ParseError) {
    const { line, column } = err.location;
    return `Parse error at line ${line}, column ${column}: ${err.toData().message}`;
  }

  if (err instanceof CompileError) {
    return `Compile error: ${err.diagnostic}\n${err.source}`;
  }

  return err.message;
}
