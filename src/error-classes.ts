/**
 * Flatcall Error Classes
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';
import { DIAGNOSTIC_ERROR_IDS, type Diagnostic } from './lexer/diagnostics.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface FlatcallErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

function requireCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all flatcall errors.
 * Provides structured data for host applications to format as needed.
 */
export class FlatcallError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: FlatcallErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'FlatcallError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): FlatcallErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: FlatcallErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Syntax failure of a tokenize call, wrapping its single diagnostic */
export class TokenizeError extends FlatcallError {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic, location: SourceLocation) {
    const errorId = DIAGNOSTIC_ERROR_IDS[diagnostic.kind];
    requireCategory(errorId, 'lexer');

    const template = ERROR_REGISTRY.get(errorId)?.messageTemplate ?? '';
    super({
      errorId,
      message: renderMessage(template, {}),
      location,
      context: { kind: diagnostic.kind, offset: diagnostic.offset },
    });
    this.name = 'TokenizeError';
    this.diagnostic = diagnostic;
  }
}

/** Nesting depth exceeded the configured bound; never a syntax diagnostic */
export class ResourceLimitError extends FlatcallError {
  readonly limit: number;

  constructor(limit: number, location?: SourceLocation) {
    requireCategory('FLAT-X001', 'resource');
    const template = ERROR_REGISTRY.get('FLAT-X001')?.messageTemplate ?? '';
    super({
      errorId: 'FLAT-X001',
      message: renderMessage(template, { limit }),
      location,
      context: { limit },
    });
    this.name = 'ResourceLimitError';
    this.limit = limit;
  }
}

/** Configuration file could not be read or validated */
export class ConfigError extends FlatcallError {
  readonly path: string;

  constructor(path: string, reason: string) {
    requireCategory('FLAT-C001', 'config');
    const template = ERROR_REGISTRY.get('FLAT-C001')?.messageTemplate ?? '';
    super({
      errorId: 'FLAT-C001',
      message: renderMessage(template, { path, reason }),
      context: { path, reason },
    });
    this.name = 'ConfigError';
    this.path = path;
  }
}
