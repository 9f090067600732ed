/**
 * ControlFlowEvaluator: Ternary Expressions
 *
 * The condition must be a boolean; truthiness does not apply here.
 * Branch evaluation follows the context's ternary mode.
 *
 * Error Handling:
 * - Non-boolean condition throws RuntimeError(LOX-R003)
 *
 * @internal
 */

import type { TernaryNode } from '../../../types.js';
import type { LoxValue } from '../values.js';
import { inspectValue } from '../values.js';
import { ExpressionsEvaluator } from './expressions.js';

export abstract class ControlFlowEvaluator extends ExpressionsEvaluator {
  evaluateTernary(node: TernaryNode): LoxValue {
    const condition = this.evaluateExpression(node.condition);
    if (typeof condition !== 'boolean') {
      throw this.fail(
        'LOX-R003',
        { condition: inspectValue(condition) },
        node
      );
    }

    if (this.ctx.ternary === 'eager') {
      const whenTrue = this.evaluateExpression(node.leftResult);
      const whenFalse = this.evaluateExpression(node.rightResult);
      return condition ? whenTrue : whenFalse;
    }

    return this.evaluateExpression(
      condition ? node.leftResult : node.rightResult
    );
  }
}
