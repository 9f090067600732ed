/**
 * tlox Scanner Tests
 * Token recognition, spans, and lexical diagnostics
 */

import { describe, expect, it } from 'vitest';
import {
  scan,
  spanText,
  splitGraphemes,
  TOKEN_TYPES,
  type SourceToken,
  type Token,
} from '../src/index.js';

/** Tokens without whitespace, spans dropped */
function significant(source: string): Token[] {
  return scan(source)
    .tokens.filter(({ token }) => token.type !== TOKEN_TYPES.WHITESPACE)
    .map(({ token }) => token);
}

function types(source: string): string[] {
  return significant(source).map((token) => token.type);
}

describe('Scanner', () => {
  describe('EOF sentinel', () => {
    it('returns only EOF for empty source', () => {
      const { tokens, errors } = scan('');
      expect(tokens).toEqual([
        {
          token: { type: 'EOF' },
          span: {
            start: { line: 1, column: 1, index: 0 },
            end: { line: 1, column: 1, index: 0 },
          },
        },
      ]);
      expect(errors.isEmpty()).toBe(true);
    });

    it('ends every token list with exactly one EOF', () => {
      const sources = ['', ' ', 'print 1;', '"open', '@#', '// c', '1.', '\r\n'];
      for (const source of sources) {
        const { tokens } = scan(source);
        expect(tokens.length).toBeGreaterThan(0);
        expect(tokens.at(-1)?.token.type).toBe('EOF');
        expect(tokens.filter(({ token }) => token.type === 'EOF')).toHaveLength(1);
      }
    });

    it('gives EOF a zero-width span at the end of input', () => {
      const eof = scan('ab\nc').tokens.at(-1);
      expect(eof?.span.start).toEqual({ line: 2, column: 2, index: 4 });
      expect(eof?.span.end).toEqual(eof?.span.start);
    });
  });

  describe('Numbers', () => {
    it('scans a decimal number as one token', () => {
      expect(significant('123.45')).toEqual([
        { type: 'NUMBER', value: 123.45 },
        { type: 'EOF' },
      ]);
    });

    it('leaves a trailing dot as a separate token', () => {
      expect(significant('10.')).toEqual([
        { type: 'NUMBER', value: 10 },
        { type: 'DOT' },
        { type: 'EOF' },
      ]);
    });

    it('does not start a number with a dot', () => {
      expect(significant('.5')).toEqual([
        { type: 'DOT' },
        { type: 'NUMBER', value: 5 },
        { type: 'EOF' },
      ]);
    });
  });

  describe('Strings', () => {
    it('scans string content without the quotes', () => {
      expect(significant('"abc"')).toEqual([
        { type: 'STRING', text: 'abc' },
        { type: 'EOF' },
      ]);
    });

    it('allows strings to span lines', () => {
      const { tokens } = scan('"a\nb" x');
      expect(tokens[0]?.token).toEqual({ type: 'STRING', text: 'a\nb' });
      expect(tokens[2]?.span.start).toEqual({ line: 2, column: 4, index: 6 });
    });

    it('reports an unterminated string and emits no token for it', () => {
      const { tokens, errors } = scan('"abc');
      expect(tokens.map(({ token }) => token.type)).toEqual(['EOF']);
      expect(errors.length).toBe(1);
      expect(errors.at(0)?.kind).toBe('Scanning');
      expect(errors.at(0)?.message).toBe(
        '[line: 1, col: 1] Scanning Error (Unterminated String)'
      );
    });
  });

  describe('Keywords and identifiers', () => {
    it('scans print as a keyword', () => {
      expect(significant('print')).toEqual([
        { type: 'PRINT' },
        { type: 'EOF' },
      ]);
    });

    it('recognizes every keyword', () => {
      expect(
        types(
          'and class else false fun for if nil or print return super this true var while'
        )
      ).toEqual([
        'AND',
        'CLASS',
        'ELSE',
        'FALSE',
        'FUN',
        'FOR',
        'IF',
        'NIL',
        'OR',
        'PRINT',
        'RETURN',
        'SUPER',
        'THIS',
        'TRUE',
        'VAR',
        'WHILE',
        'EOF',
      ]);
    });

    it('treats keyword prefixes and object member names as identifiers', () => {
      expect(significant('printer constructor __proto__')).toEqual([
        { type: 'IDENTIFIER', text: 'printer' },
        { type: 'IDENTIFIER', text: 'constructor' },
        { type: 'IDENTIFIER', text: '__proto__' },
        { type: 'EOF' },
      ]);
    });

    it('accepts letters beyond ASCII, digits and underscores', () => {
      expect(significant('_x1 café')).toEqual([
        { type: 'IDENTIFIER', text: '_x1' },
        { type: 'IDENTIFIER', text: 'café' },
        { type: 'EOF' },
      ]);
    });
  });

  describe('Operators', () => {
    it('combines a following equals sign', () => {
      expect(types('!= == <= >= ! = < >')).toEqual([
        'BANG_EQUAL',
        'EQUAL_EQUAL',
        'LESS_EQUAL',
        'GREATER_EQUAL',
        'BANG',
        'EQUAL',
        'LESS',
        'GREATER',
        'EOF',
      ]);
    });

    it('scans punctuation', () => {
      expect(types('(){},.-+;/*?:')).toEqual([
        'LEFT_PAREN',
        'RIGHT_PAREN',
        'LEFT_BRACE',
        'RIGHT_BRACE',
        'COMMA',
        'DOT',
        'MINUS',
        'PLUS',
        'SEMICOLON',
        'SLASH',
        'STAR',
        'QUESTION',
        'COLON',
        'EOF',
      ]);
    });
  });

  describe('Comments and whitespace', () => {
    it('keeps the comment text including the slashes', () => {
      const { tokens } = scan('// note\nx');
      expect(tokens.map(({ token }) => token)).toEqual([
        { type: 'COMMENT', text: '// note' },
        { type: 'WHITESPACE', kind: 'newline' },
        { type: 'IDENTIFIER', text: 'x' },
        { type: 'EOF' },
      ]);
      expect(tokens[2]?.span.start).toEqual({ line: 2, column: 1, index: 8 });
    });

    it('classifies each whitespace grapheme', () => {
      const { tokens } = scan(' \t\rx\n');
      expect(tokens.map(({ token }) => token)).toEqual([
        { type: 'WHITESPACE', kind: 'space' },
        { type: 'WHITESPACE', kind: 'tab' },
        { type: 'WHITESPACE', kind: 'carriage-return' },
        { type: 'IDENTIFIER', text: 'x' },
        { type: 'WHITESPACE', kind: 'newline' },
        { type: 'EOF' },
      ]);
    });

    it('treats CR LF as a single newline', () => {
      const { tokens } = scan('a\r\nb');
      expect(tokens.map(({ token }) => token)).toEqual([
        { type: 'IDENTIFIER', text: 'a' },
        { type: 'WHITESPACE', kind: 'newline' },
        { type: 'IDENTIFIER', text: 'b' },
        { type: 'EOF' },
      ]);
      expect(tokens[2]?.span.start).toEqual({ line: 2, column: 1, index: 2 });
    });
  });

  describe('Unexpected characters', () => {
    it('reports the character and keeps scanning', () => {
      const { tokens, errors } = scan('1 @ 2');
      expect(
        tokens
          .filter(({ token }) => token.type !== 'WHITESPACE')
          .map(({ token }) => token)
      ).toEqual([
        { type: 'NUMBER', value: 1 },
        { type: 'NUMBER', value: 2 },
        { type: 'EOF' },
      ]);
      expect(errors.length).toBe(1);
      expect(errors.at(0)?.subject).toBe('@');
      expect(errors.at(0)?.message).toBe(
        '[line: 1, col: 3] Scanning Error (Unexpected character): @'
      );
    });

    it('collects one error per offending character', () => {
      const { errors } = scan('@\n#');
      expect(errors.toString()).toBe(
        '[line: 1, col: 1] Scanning Error (Unexpected character): @\n' +
          '[line: 2, col: 1] Scanning Error (Unexpected character): #'
      );
    });
  });

  describe('Spans', () => {
    function tokenTexts(source: string): string[] {
      const graphemes = splitGraphemes(source);
      return scan(source).tokens.map((t: SourceToken) =>
        spanText(graphemes, t.span)
      );
    }

    it('covers exactly the lexeme of each token', () => {
      expect(tokenTexts('var x = "hi";')).toEqual([
        'var',
        ' ',
        'x',
        ' ',
        '=',
        ' ',
        '"hi"',
        ';',
        '',
      ]);
    });

    it('reproduces a clean source when all token texts are joined', () => {
      const source =
        'var total = 10.5; // running total\r\nprint total >= 3 ? "big" : "small";\n\tprint !nil;';
      expect(scan(source).errors.isEmpty()).toBe(true);

      const joined = tokenTexts(source).join('');
      expect(joined).toBe(source);
      expect(scan(joined).tokens).toEqual(scan(source).tokens);
    });
  });

  describe('Large input', () => {
    it('scans a long source in linear time', () => {
      const source = '1 + '.repeat(50_000);
      const started = performance.now();
      const { tokens, errors } = scan(source);
      expect(performance.now() - started).toBeLessThan(5000);
      expect(errors.isEmpty()).toBe(true);
      expect(tokens).toHaveLength(200_001);
      expect(tokens.at(-1)?.span.start).toEqual({
        line: 1,
        column: 200_001,
        index: 200_000,
      });
    });
  });
});
