/**
 * Scan Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ScanErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Creates an error from the registry, rendering its message template with
 * `context`.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError("SCAN-T002", { counter: "bytes", amount: 3, value: 1 })
 * // TrackerError: "Cannot move bytes back by 3 from 1"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>
): ScanError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  switch (definition.category) {
    case 'tracker':
      return new TrackerError(errorId, context);
    case 'pattern':
      return new PatternError(errorId, context);
  }
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all scan errors.
 * These report broken call contracts (programmer errors), not bad input.
 */
export class ScanError extends Error {
  readonly errorId: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: ScanErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'ScanError';
    this.errorId = data.errorId;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): ScanErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: ScanErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return `${this.errorId}: ${this.message}`;
  }
}

function renderFor(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** A tracker was asked to move back over text it never moved forward over */
export class TrackerError extends ScanError {
  constructor(errorId: string, context: Record<string, unknown> = {}) {
    super({
      errorId,
      message: renderFor(errorId, 'tracker', context),
      context,
    });
    this.name = 'TrackerError';
  }
}

/** A pattern reported a match offset the cursor cannot use */
export class PatternError extends ScanError {
  constructor(errorId: string, context: Record<string, unknown> = {}) {
    super({
      errorId,
      message: renderFor(errorId, 'pattern', context),
      context,
    });
    this.name = 'PatternError';
  }
}
