/**
 * LiteralsEvaluator: Literal and Grouped Expressions
 *
 * @internal
 */

import type { GroupingNode, LiteralNode } from '../../../types.js';
import type { LoxValue } from '../values.js';
import { EvaluatorBase } from './base.js';

export abstract class LiteralsEvaluator extends EvaluatorBase {
  /** Literal payloads are already runtime values */
  evaluateLiteral(node: LiteralNode): LoxValue {
    return node.value;
  }

  evaluateGrouping(node: GroupingNode): LoxValue {
    return this.evaluateExpression(node.expression);
  }
}
