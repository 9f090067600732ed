/**
 * Diagnostics Tests
 * Registry lookups, message templates and the display form
 */

import { describe, expect, it } from 'vitest';
import {
  createError,
  ERROR_REGISTRY,
  ErrorLog,
  formatDiagnostic,
  InternalError,
  LoxError,
  makeSpan,
  ParseError,
  renderMessage,
  RuntimeError,
  ScanError,
} from '../../src/types.js';

const span = makeSpan(
  { line: 2, column: 5, index: 9 },
  { line: 2, column: 6, index: 10 }
);

describe('ERROR_REGISTRY', () => {
  it('holds every diagnostic by ID', () => {
    expect(ERROR_REGISTRY.size).toBe(11);
    expect(ERROR_REGISTRY.has('LOX-R004')).toBe(true);
    expect(ERROR_REGISTRY.get('LOX-S002')?.messageTemplate).toBe(
      'Unterminated String'
    );
  });

  it('keys each entry by its own ID and kind prefix', () => {
    const prefixes = { Scanning: 'S', Parsing: 'P', Runtime: 'R' } as const;
    for (const [id, definition] of ERROR_REGISTRY.entries()) {
      expect(definition.errorId).toBe(id);
      expect(id).toMatch(new RegExp(`^LOX-${prefixes[definition.kind]}\\d{3}$`));
    }
  });

  it('returns undefined for unknown IDs', () => {
    expect(ERROR_REGISTRY.get('LOX-X999')).toBeUndefined();
  });
});

describe('renderMessage', () => {
  it('replaces every placeholder occurrence', () => {
    expect(
      renderMessage('{a} {op} {b} {op}', { a: 1, op: '+', b: true })
    ).toBe('1 + true +');
  });

  it('renders missing values as empty', () => {
    expect(renderMessage("Undefined variable '{name}'", {})).toBe(
      "Undefined variable ''"
    );
  });

  it('leaves a template with an unclosed brace unchanged', () => {
    expect(renderMessage('open {name', { name: 'x' })).toBe('open {name');
  });
});

describe('display form', () => {
  it('renders a scanning error with its subject', () => {
    const error = createError('LOX-S001', {}, { subject: '@', location: span });
    expect(error).toBeInstanceOf(ScanError);
    expect(error.message).toBe(
      '[line: 2, col: 5] Scanning Error (Unexpected character): @'
    );
  });

  it('renders a parsing error', () => {
    const error = createError(
      'LOX-P001',
      { expected: ';', context: 'after expression', found: '2' },
      { location: span }
    );
    expect(error).toBeInstanceOf(ParseError);
    expect(error.message).toBe(
      "[line: 2, col: 5] Parsing Error (Expected ';' after expression, instead found '2')"
    );
  });

  it('renders a runtime error from a node', () => {
    const error = RuntimeError.fromNode('LOX-R003', { condition: '1' }, { span });
    expect(error.message).toBe(
      '[line: 2, col: 5] Runtime Error (Non-boolean condition in ternary: 1)'
    );
    expect(error.context).toEqual({ condition: '1' });
  });

  it('omits the location clause when there is none', () => {
    const error = createError('LOX-P004', {});
    expect(error.message).toBe(
      'Parsing Error (Ran out of tokens while satisfying expression rule)'
    );
  });

  it('exposes structured data for custom formatting', () => {
    const error = createError('LOX-R004', { name: 'x' }, { location: span });
    expect(error.toData()).toEqual({
      errorId: 'LOX-R004',
      kind: 'Runtime',
      message: "Undefined variable 'x'",
      subject: undefined,
      location: span,
      context: { name: 'x' },
    });
    expect(error.format((data) => `${data.errorId}: ${data.message}`)).toBe(
      "LOX-R004: Undefined variable 'x'"
    );
    expect(formatDiagnostic(error.toData())).toBe(error.message);
  });

  it('rejects unknown IDs and mismatched kinds', () => {
    expect(() => createError('LOX-X999', {})).toThrow(
      'Unknown error ID: LOX-X999'
    );
    expect(() => new ParseError('LOX-R001', 'x', {})).toThrow(
      'Expected parsing error ID, got: LOX-R001'
    );
  });

  it('keeps internal faults outside the diagnostic hierarchy', () => {
    const fault = new InternalError('token list has no EOF');
    expect(fault).not.toBeInstanceOf(LoxError);
    expect(fault.name).toBe('InternalError');
  });
});

describe('ErrorLog', () => {
  it('keeps diagnostics in order', () => {
    const first = createError('LOX-S002', {}, { location: span });
    const second = createError('LOX-P004', {});
    const log = ErrorLog.of(first, second);

    expect(log.length).toBe(2);
    expect(log.at(0)).toBe(first);
    expect([...log]).toEqual([first, second]);
    expect(log.toString()).toBe(
      '[line: 2, col: 5] Scanning Error (Unterminated String)\n' +
        'Parsing Error (Ran out of tokens while satisfying expression rule)'
    );
  });

  it('hands out copies of its entries', () => {
    const log = new ErrorLog();
    const before = log.toArray();
    log.push(createError('LOX-P004', {}));
    expect(before).toHaveLength(0);
    expect(log.toArray()).toHaveLength(1);
    expect(log.isEmpty()).toBe(false);
  });
});
