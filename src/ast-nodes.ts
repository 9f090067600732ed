import type { SourceSpan } from './source-location.js';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// VALUES
// ============================================================

/**
 * Runtime value, also the payload of literal expressions.
 * `null` is the language's `nil`.
 */
export type LoxValue = number | string | boolean | null;

// ============================================================
// EXPRESSIONS
// ============================================================

export type UnaryOp = '-' | '!';

export type BinaryOp =
  | '-'
  | '+'
  | '/'
  | '*'
  | '>'
  | '>='
  | '<'
  | '<='
  | '=='
  | '!=';

export interface LiteralNode extends BaseNode {
  readonly type: 'Literal';
  readonly value: LoxValue;
}

/** Parenthesized expression: ( expr ) */
export interface GroupingNode extends BaseNode {
  readonly type: 'Grouping';
  readonly expression: ExprNode;
}

export interface UnaryNode extends BaseNode {
  readonly type: 'Unary';
  readonly operator: UnaryOp;
  readonly right: ExprNode;
}

export interface BinaryNode extends BaseNode {
  readonly type: 'Binary';
  readonly left: ExprNode;
  readonly operator: BinaryOp;
  readonly right: ExprNode;
}

/** condition ? leftResult : rightResult */
export interface TernaryNode extends BaseNode {
  readonly type: 'Ternary';
  readonly condition: ExprNode;
  readonly leftResult: ExprNode;
  readonly rightResult: ExprNode;
}

/** Bare identifier read from the environment */
export interface VariableNode extends BaseNode {
  readonly type: 'Variable';
  readonly name: string;
}

export type ExprNode =
  | LiteralNode
  | GroupingNode
  | UnaryNode
  | BinaryNode
  | TernaryNode
  | VariableNode;

// ============================================================
// STATEMENTS
// ============================================================

export interface ExpressionStmtNode extends BaseNode {
  readonly type: 'ExpressionStmt';
  readonly expression: ExprNode;
}

export interface PrintStmtNode extends BaseNode {
  readonly type: 'PrintStmt';
  readonly expression: ExprNode;
}

/** var name ( = initializer )? ; */
export interface VarStmtNode extends BaseNode {
  readonly type: 'VarStmt';
  readonly name: string;
  readonly initializer: ExprNode | null;
}

export type StmtNode = ExpressionStmtNode | PrintStmtNode | VarStmtNode;

export type ASTNode = ExprNode | StmtNode;
