/**
 * Comprehension Error Classes
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ComprehensionErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

function lookupTemplate(errorId: string, category: ErrorCategory): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition.messageTemplate;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all comprehension errors.
 * Provides structured data for host applications to format as needed.
 */
export class ComprehensionError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: ComprehensionErrorData) {
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'ComprehensionError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): ComprehensionErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: ComprehensionErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/**
 * Malformed comprehension text.
 * The message is rendered from the registry template with `context`.
 */
export class ParseError extends ComprehensionError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    const template = lookupTemplate(errorId, 'parse');
    super({
      errorId,
      message: renderMessage(template, context),
      location,
      context,
    });
    this.name = 'ParseError';
    this.location = location;
  }
}

/** Generated source rejected by the JavaScript compiler */
export class CompileError extends ComprehensionError {
  /** Compiler diagnostic */
  readonly diagnostic: string;
  /** Full generated source */
  readonly source: string;

  constructor(diagnostic: string, source: string) {
    const template = lookupTemplate('COMP-C001', 'compile');
    super({
      errorId: 'COMP-C001',
      message: renderMessage(template, { diagnostic, source }),
      context: { diagnostic, source },
    });
    this.name = 'CompileError';
    this.diagnostic = diagnostic;
    this.source = source;
  }
}
