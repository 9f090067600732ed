/**
 * AST Printer
 * Parenthesized prefix rendering of expressions and statements
 */

import type { ExprNode, StmtNode } from './types.js';
import { inspectValue } from './runtime/index.js';

/**
 * Render an expression.
 *
 * @example
 * printExpr(parsed('1 + 2 * 3'))   // '(+ 1 (* 2 3))'
 * printExpr(parsed('a ? "x" : nil')) // '(a ? "x" : nil)'
 */
export function printExpr(node: ExprNode): string {
  switch (node.type) {
    case 'Literal':
      return inspectValue(node.value);
    case 'Variable':
      return node.name;
    case 'Grouping':
      return `(group ${printExpr(node.expression)})`;
    case 'Unary':
      return `(${node.operator} ${printExpr(node.right)})`;
    case 'Binary':
      return `(${node.operator} ${printExpr(node.left)} ${printExpr(node.right)})`;
    case 'Ternary':
      return `(${printExpr(node.condition)} ? ${printExpr(node.leftResult)} : ${printExpr(node.rightResult)})`;
  }
}

export function printStmt(node: StmtNode): string {
  switch (node.type) {
    case 'ExpressionStmt':
      return `Expression Statement: ${printExpr(node.expression)}`;
    case 'PrintStmt':
      return `Print Statement: ${printExpr(node.expression)}`;
    case 'VarStmt':
      return node.initializer
        ? `Variable Statement: ${node.name} = ${printExpr(node.initializer)}`
        : `Variable Statement: ${node.name}`;
  }
}
