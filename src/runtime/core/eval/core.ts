/**
 * CoreEvaluator: Expression Dispatch
 *
 * Routes each expression node to the layer that evaluates it.
 * Adding a node kind without a case here fails to compile.
 *
 * @internal
 */

import type { ExprNode } from '../../../types.js';
import type { LoxValue } from '../values.js';
import { ControlFlowEvaluator } from './control-flow.js';

export abstract class CoreEvaluator extends ControlFlowEvaluator {
  evaluateExpression(node: ExprNode): LoxValue {
    switch (node.type) {
      case 'Literal':
        return this.evaluateLiteral(node);
      case 'Grouping':
        return this.evaluateGrouping(node);
      case 'Unary':
        return this.evaluateUnary(node);
      case 'Binary':
        return this.evaluateBinary(node);
      case 'Ternary':
        return this.evaluateTernary(node);
      case 'Variable':
        return this.evaluateVariable(node);
    }
  }
}
