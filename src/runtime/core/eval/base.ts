/**
 * Evaluator Base Class
 *
 * Foundation for the layered evaluator architecture.
 * Provides context access and the dispatch entry point every layer
 * recurses through.
 *
 * @internal
 */

import type { ExprNode } from '../../../types.js';
import { RuntimeError } from '../../../types.js';
import type { RuntimeContext } from '../types.js';
import type { LoxValue } from '../values.js';

/**
 * Base class for the evaluator.
 * Contains shared utilities used by all layers.
 */
export abstract class EvaluatorBase {
  constructor(protected ctx: RuntimeContext) {}

  /**
   * Evaluate any expression node.
   * Implemented by CoreEvaluator once every node kind has a handler.
   */
  abstract evaluateExpression(node: ExprNode): LoxValue;

  /**
   * Build a located runtime diagnostic for `node`.
   * Callers throw the result so control flow stays visible at the call site.
   */
  protected fail(
    errorId: string,
    context: Record<string, unknown>,
    node: ExprNode
  ): RuntimeError {
    return RuntimeError.fromNode(errorId, context, node);
  }
}
