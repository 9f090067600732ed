/**
 * Lox Error Classes and Factory
 * Structured diagnostics with registry-based error IDs
 */

import type { SourceSpan } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorKind,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LoxErrorData {
  readonly errorId: string;
  readonly kind: ErrorKind;
  readonly message: string;
  /** Offending text, when the message alone does not name it */
  readonly subject?: string | undefined;
  readonly location?: SourceSpan | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Canonical display form:
 * `[line: L, col: C] <Kind> Error (<message>)[: <subject>]`
 * The location clause is omitted when there is no location.
 */
export function formatDiagnostic(data: LoxErrorData): string {
  const locationStr = data.location
    ? `[line: ${data.location.start.line}, col: ${data.location.start.column}] `
    : '';
  const subjectStr = data.subject !== undefined ? `: ${data.subject}` : '';
  return `${locationStr}${data.kind} Error (${data.message})${subjectStr}`;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base class for every user-facing diagnostic.
 * `message` holds the display form; `detail` holds the bare message.
 */
export class LoxError extends Error {
  readonly errorId: string;
  readonly kind: ErrorKind;
  readonly detail: string;
  readonly subject: string | undefined;
  readonly location: SourceSpan | undefined;
  readonly context: Record<string, unknown> | undefined;

  constructor(data: LoxErrorData) {
    const definition = ERROR_REGISTRY.get(data.errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }
    if (definition.kind !== data.kind) {
      throw new TypeError(
        `Expected ${data.kind.toLowerCase()} error ID, got: ${data.errorId}`
      );
    }

    super(formatDiagnostic(data));
    this.name = 'LoxError';
    this.errorId = data.errorId;
    this.kind = data.kind;
    this.detail = data.message;
    this.subject = data.subject;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LoxErrorData {
    return {
      errorId: this.errorId,
      kind: this.kind,
      message: this.detail,
      subject: this.subject,
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LoxErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

interface StageErrorOptions {
  readonly subject?: string | undefined;
  readonly location?: SourceSpan | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/** Lexical errors */
export class ScanError extends LoxError {
  constructor(errorId: string, message: string, options: StageErrorOptions) {
    super({ errorId, kind: 'Scanning', message, ...options });
    this.name = 'ScanError';
  }
}

/** Structural errors */
export class ParseError extends LoxError {
  constructor(errorId: string, message: string, options: StageErrorOptions) {
    super({ errorId, kind: 'Parsing', message, ...options });
    this.name = 'ParseError';
  }
}

/** Evaluation-time type and operand errors */
export class RuntimeError extends LoxError {
  constructor(
    errorId: string,
    message: string,
    options: StageErrorOptions = {}
  ) {
    super({ errorId, kind: 'Runtime', message, ...options });
    this.name = 'RuntimeError';
  }

  /** Create from an AST node */
  static fromNode(
    errorId: string,
    context: Record<string, unknown>,
    node?: { span: SourceSpan }
  ): RuntimeError {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    return new RuntimeError(
      errorId,
      renderMessage(definition.messageTemplate, context),
      { location: node?.span, context }
    );
  }
}

/**
 * A broken invariant between stages (for example a token list without
 * its EOF sentinel). Never collected into an ErrorLog.
 */
export class InternalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InternalError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create a diagnostic from the registry, rendering its message template
 * with `context`.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('LOX-S001', {}, { subject: '@', location })
 * // ScanError: "[line: 1, col: 9] Scanning Error (Unexpected character): @"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  options: Omit<StageErrorOptions, 'context'> = {}
): LoxError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);
  const full = { ...options, context };
  switch (definition.kind) {
    case 'Scanning':
      return new ScanError(errorId, message, full);
    case 'Parsing':
      return new ParseError(errorId, message, full);
    case 'Runtime':
      return new RuntimeError(errorId, message, full);
  }
}

// ============================================================
// ERROR LOG
// ============================================================

/**
 * Append-only, ordered collection of diagnostics.
 * Owned by the stage that is collecting; read-only once the stage returns.
 */
export class ErrorLog implements Iterable<LoxError> {
  private readonly errors: LoxError[] = [];

  static of(...errors: LoxError[]): ErrorLog {
    const log = new ErrorLog();
    for (const error of errors) log.push(error);
    return log;
  }

  push(error: LoxError): void {
    this.errors.push(error);
  }

  get length(): number {
    return this.errors.length;
  }

  isEmpty(): boolean {
    return this.errors.length === 0;
  }

  at(index: number): LoxError | undefined {
    return this.errors[index];
  }

  toArray(): readonly LoxError[] {
    return [...this.errors];
  }

  [Symbol.iterator](): Iterator<LoxError> {
    return this.errors[Symbol.iterator]();
  }

  /** One display line per diagnostic */
  toString(): string {
    return this.errors.map((error) => error.message).join('\n');
  }
}
