/**
 * Parser Extension: Primary Expressions
 * Literals, variables, and parenthesized groups
 */

import { Parser } from './parser.js';
import type { ExprNode, LoxValue, SourceToken } from '../types.js';
import { createError, makeSpan, TOKEN_TYPES, tokenLexeme } from '../types.js';
import { advance, consume, current, previous } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePrimary(): ExprNode;
    parseGrouping(open: SourceToken): ExprNode;
  }
}

/**
 * primary -> NUMBER | STRING | "true" | "false" | "nil"
 *          | "(" expression ")" | IDENTIFIER
 */
Parser.prototype.parsePrimary = function (this: Parser): ExprNode {
  const sourceToken = advance(this.state);
  if (!sourceToken) {
    throw createError(
      'LOX-P004',
      {},
      { location: (previous(this.state) ?? current(this.state)).span }
    );
  }

  const { token, span } = sourceToken;
  let value: LoxValue;
  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      value = token.value;
      break;
    case TOKEN_TYPES.STRING:
      value = token.text;
      break;
    case TOKEN_TYPES.TRUE:
      value = true;
      break;
    case TOKEN_TYPES.FALSE:
      value = false;
      break;
    case TOKEN_TYPES.NIL:
      value = null;
      break;
    case TOKEN_TYPES.IDENTIFIER:
      return { type: 'Variable', name: token.text, span };
    case TOKEN_TYPES.LEFT_PAREN:
      return this.parseGrouping(sourceToken);
    default:
      throw createError(
        'LOX-P003',
        { found: tokenLexeme(token) },
        { location: span }
      );
  }

  return { type: 'Literal', value, span };
};

/** Parse the rest of a group; `open` is the consumed `(` */
Parser.prototype.parseGrouping = function (
  this: Parser,
  open: SourceToken
): ExprNode {
  const expression = this.parseExpression();
  const close = consume(this.state, TOKEN_TYPES.RIGHT_PAREN, 'after expression');

  return {
    type: 'Grouping',
    expression,
    span: makeSpan(open.span.start, close.span.end),
  };
};
