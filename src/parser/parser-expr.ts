/**
 * Parser Extension: Expression Parsing
 * Ternary, the binary precedence chain, and unary operators
 */

import { Parser } from './parser.js';
import type { BinaryOp, ExprNode, TokenType, UnaryOp } from '../types.js';
import { makeSpan, TOKEN_TYPES } from '../types.js';
import {
  advance,
  consume,
  current,
  enterLevel,
  nested,
  peek,
} from './state.js';

// ============================================================
// OPERATOR TABLES
// ============================================================

export type OperatorTable<Op> = ReadonlyMap<TokenType, Op>;

const EQUALITY_OPS: OperatorTable<BinaryOp> = new Map<TokenType, BinaryOp>([
  [TOKEN_TYPES.BANG_EQUAL, '!='],
  [TOKEN_TYPES.EQUAL_EQUAL, '=='],
]);

const COMPARISON_OPS: OperatorTable<BinaryOp> = new Map<TokenType, BinaryOp>([
  [TOKEN_TYPES.GREATER, '>'],
  [TOKEN_TYPES.GREATER_EQUAL, '>='],
  [TOKEN_TYPES.LESS, '<'],
  [TOKEN_TYPES.LESS_EQUAL, '<='],
]);

const TERM_OPS: OperatorTable<BinaryOp> = new Map<TokenType, BinaryOp>([
  [TOKEN_TYPES.MINUS, '-'],
  [TOKEN_TYPES.PLUS, '+'],
]);

const FACTOR_OPS: OperatorTable<BinaryOp> = new Map<TokenType, BinaryOp>([
  [TOKEN_TYPES.SLASH, '/'],
  [TOKEN_TYPES.STAR, '*'],
]);

const UNARY_OPS: OperatorTable<UnaryOp> = new Map<TokenType, UnaryOp>([
  [TOKEN_TYPES.BANG, '!'],
  [TOKEN_TYPES.MINUS, '-'],
]);

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExprNode;
    parseTernary(): ExprNode;
    parseEquality(): ExprNode;
    parseComparison(): ExprNode;
    parseTerm(): ExprNode;
    parseFactor(): ExprNode;
    parseUnary(): ExprNode;
    parseBinaryLevel(
      operators: OperatorTable<BinaryOp>,
      operand: () => ExprNode
    ): ExprNode;
    matchOperator<Op>(operators: OperatorTable<Op>): Op | null;
  }
}

// ============================================================
// EXPRESSIONS
// ============================================================

/** expression -> ternary */
Parser.prototype.parseExpression = function (this: Parser): ExprNode {
  return this.parseTernary();
};

/**
 * ternary -> equality ( "?" equality ":" equality )*
 *
 * Each fold nests the tree one level deeper and counts toward the limit.
 */
Parser.prototype.parseTernary = function (this: Parser): ExprNode {
  let expr = this.parseEquality();
  let folds = 0;

  try {
    while (peek(this.state)?.token.type === TOKEN_TYPES.QUESTION) {
      advance(this.state); // consume ?
      enterLevel(this.state);
      folds++;
      const leftResult = this.parseEquality();
      consume(this.state, TOKEN_TYPES.COLON, 'after ternary branch');
      const rightResult = this.parseEquality();

      expr = {
        type: 'Ternary',
        condition: expr,
        leftResult,
        rightResult,
        span: makeSpan(expr.span.start, rightResult.span.end),
      };
    }
  } finally {
    this.state.depth -= folds;
  }

  return expr;
};

/** equality -> comparison ( ( "!=" | "==" ) comparison )* */
Parser.prototype.parseEquality = function (this: Parser): ExprNode {
  return this.parseBinaryLevel(EQUALITY_OPS, () => this.parseComparison());
};

/** comparison -> term ( ( ">" | ">=" | "<" | "<=" ) term )* */
Parser.prototype.parseComparison = function (this: Parser): ExprNode {
  return this.parseBinaryLevel(COMPARISON_OPS, () => this.parseTerm());
};

/** term -> factor ( ( "-" | "+" ) factor )* */
Parser.prototype.parseTerm = function (this: Parser): ExprNode {
  return this.parseBinaryLevel(TERM_OPS, () => this.parseFactor());
};

/** factor -> unary ( ( "/" | "*" ) unary )* */
Parser.prototype.parseFactor = function (this: Parser): ExprNode {
  return this.parseBinaryLevel(FACTOR_OPS, () => this.parseUnary());
};

/**
 * unary -> ( "!" | "-" ) unary | primary
 *
 * Every unary/primary level counts toward the nesting limit; grouping
 * recurses through here too.
 */
Parser.prototype.parseUnary = function (this: Parser): ExprNode {
  return nested(this.state, (): ExprNode => {
    const start = current(this.state).span.start;
    const operator = this.matchOperator(UNARY_OPS);
    if (operator === null) {
      return this.parsePrimary();
    }

    const right = this.parseUnary();
    return {
      type: 'Unary',
      operator,
      right,
      span: makeSpan(start, right.span.end),
    };
  });
};

// ============================================================
// HELPERS
// ============================================================

/**
 * Left-fold one precedence level: operand ( op operand )*
 * Every fold adds a level to the tree, so it counts toward the nesting
 * limit until the level is done.
 */
Parser.prototype.parseBinaryLevel = function (
  this: Parser,
  operators: OperatorTable<BinaryOp>,
  operand: () => ExprNode
): ExprNode {
  let left = operand();
  let folds = 0;

  try {
    let operator = this.matchOperator(operators);
    while (operator !== null) {
      enterLevel(this.state);
      folds++;
      const right = operand();
      left = {
        type: 'Binary',
        left,
        operator,
        right,
        span: makeSpan(left.span.start, right.span.end),
      };
      operator = this.matchOperator(operators);
    }
  } finally {
    this.state.depth -= folds;
  }

  return left;
};

/** Consume the next token when it is one of `operators` */
Parser.prototype.matchOperator = function <Op>(
  this: Parser,
  operators: OperatorTable<Op>
): Op | null {
  const token = peek(this.state);
  if (!token) return null;

  const operator = operators.get(token.token.type);
  if (operator === undefined) return null;

  advance(this.state);
  return operator;
};
