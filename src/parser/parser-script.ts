/**
 * Parser Extension: Program Parsing
 * Declarations, statements, and resynchronization after errors
 */

import { Parser } from './parser.js';
import type {
  ExpressionStmtNode,
  PrintStmtNode,
  StmtNode,
  VarStmtNode,
} from '../types.js';
import { makeSpan, ParseError, TOKEN_TYPES } from '../types.js';
import { STATEMENT_KEYWORDS } from '../lexer/operators.js';
import {
  advance,
  check,
  consume,
  current,
  isAtEnd,
  peek,
  previous,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): StmtNode[];
    parseDeclaration(): StmtNode | null;
    parseVarDeclaration(): VarStmtNode;
    parseStatement(): StmtNode;
    parsePrintStatement(): PrintStmtNode;
    parseExpressionStatement(): ExpressionStmtNode;
    synchronize(startPos: number): void;
  }
}

// ============================================================
// PROGRAM PARSING
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): StmtNode[] {
  const statements: StmtNode[] = [];
  while (!isAtEnd(this.state)) {
    const statement = this.parseDeclaration();
    if (statement) statements.push(statement);
  }
  return statements;
};

/**
 * declaration -> varDecl | statement
 *
 * A failed declaration is logged, the cursor is moved to the next
 * statement boundary, and null is returned.
 */
Parser.prototype.parseDeclaration = function (this: Parser): StmtNode | null {
  const startPos = this.state.pos;
  try {
    if (check(this.state, TOKEN_TYPES.VAR)) {
      return this.parseVarDeclaration();
    }
    return this.parseStatement();
  } catch (err) {
    if (err instanceof ParseError) {
      this.state.errors.push(err);
      this.synchronize(startPos);
      return null;
    }
    throw err;
  }
};

/**
 * Skip tokens until the one just consumed is `;` or the next one starts a
 * statement. Only tokens of the failed declaration count, so an error
 * always moves the cursor forward.
 */
Parser.prototype.synchronize = function (this: Parser, startPos: number) {
  while (!isAtEnd(this.state)) {
    if (this.state.pos > startPos) {
      if (previous(this.state)?.token.type === TOKEN_TYPES.SEMICOLON) return;
      const next = peek(this.state);
      if (next && STATEMENT_KEYWORDS.has(next.token.type)) return;
    }
    advance(this.state);
  }
};

// ============================================================
// DECLARATIONS
// ============================================================

/** varDecl -> "var" IDENTIFIER ( "=" expression )? ";" */
Parser.prototype.parseVarDeclaration = function (this: Parser): VarStmtNode {
  const start = current(this.state).span.start;
  advance(this.state); // consume var

  const nameToken = consume(this.state, TOKEN_TYPES.IDENTIFIER, "after 'var'");
  const name =
    nameToken.token.type === TOKEN_TYPES.IDENTIFIER ? nameToken.token.text : '';

  let initializer = null;
  if (check(this.state, TOKEN_TYPES.EQUAL)) {
    advance(this.state); // consume =
    initializer = this.parseExpression();
  }

  const end = consume(
    this.state,
    TOKEN_TYPES.SEMICOLON,
    'after variable declaration'
  );

  return {
    type: 'VarStmt',
    name,
    initializer,
    span: makeSpan(start, end.span.end),
  };
};

// ============================================================
// STATEMENTS
// ============================================================

/** statement -> printStmt | exprStmt */
Parser.prototype.parseStatement = function (this: Parser): StmtNode {
  if (check(this.state, TOKEN_TYPES.PRINT)) {
    return this.parsePrintStatement();
  }
  return this.parseExpressionStatement();
};

/** printStmt -> "print" expression ";" */
Parser.prototype.parsePrintStatement = function (this: Parser): PrintStmtNode {
  const start = current(this.state).span.start;
  advance(this.state); // consume print

  const expression = this.parseExpression();
  const end = consume(this.state, TOKEN_TYPES.SEMICOLON, 'after expression');

  return {
    type: 'PrintStmt',
    expression,
    span: makeSpan(start, end.span.end),
  };
};

/** exprStmt -> expression ";" */
Parser.prototype.parseExpressionStatement = function (
  this: Parser
): ExpressionStmtNode {
  const expression = this.parseExpression();
  const end = consume(this.state, TOKEN_TYPES.SEMICOLON, 'after expression');

  return {
    type: 'ExpressionStmt',
    expression,
    span: makeSpan(expression.span.start, end.span.end),
  };
};
