/**
 * ExpressionsEvaluator: Binary and Unary Expressions
 *
 * Handles arithmetic, comparison, equality and negation.
 *
 * Error Handling:
 * - Non-number operand to unary '-' throws RuntimeError(LOX-R001)
 * - Number or string operand to '!' throws RuntimeError(LOX-R001)
 * - Non-number operand to arithmetic or comparison throws
 *   RuntimeError(LOX-R002)
 *
 * Division by zero yields Infinity or NaN.
 *
 * @internal
 */

import type { BinaryNode, BinaryOp, UnaryNode } from '../../../types.js';
import type { LoxValue } from '../values.js';
import { inspectValue, isTruthy, valuesEqual } from '../values.js';
import { VariablesEvaluator } from './variables.js';

type NumericOp = Exclude<BinaryOp, '==' | '!='>;

export abstract class ExpressionsEvaluator extends VariablesEvaluator {
  evaluateUnary(node: UnaryNode): LoxValue {
    const operand = this.evaluateExpression(node.right);

    if (node.operator === '-') {
      if (typeof operand === 'number') return -operand;
    } else {
      const truthy = isTruthy(operand);
      if (truthy !== null) return !truthy;
    }

    throw this.fail(
      'LOX-R001',
      { operator: node.operator, operand: inspectValue(operand) },
      node
    );
  }

  /** Both operands are always evaluated, left first */
  evaluateBinary(node: BinaryNode): LoxValue {
    const left = this.evaluateExpression(node.left);
    const right = this.evaluateExpression(node.right);
    const { operator } = node;

    if (operator === '==') return valuesEqual(left, right);
    if (operator === '!=') return !valuesEqual(left, right);

    if (typeof left !== 'number' || typeof right !== 'number') {
      throw this.fail(
        'LOX-R002',
        {
          operator,
          left: inspectValue(left),
          right: inspectValue(right),
        },
        node
      );
    }

    return this.applyNumeric(operator, left, right);
  }

  protected applyNumeric(
    operator: NumericOp,
    left: number,
    right: number
  ): LoxValue {
    switch (operator) {
      case '+':
        return left + right;
      case '-':
        return left - right;
      case '*':
        return left * right;
      case '/':
        return left / right;
      case '>':
        return left > right;
      case '>=':
        return left >= right;
      case '<':
        return left < right;
      case '<=':
        return left <= right;
    }
  }
}
