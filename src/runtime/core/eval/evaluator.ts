/**
 * Composed Evaluator
 *
 * The complete evaluator class, built as a chain of layers.
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * Layer order (bottom to top):
 * 1. EvaluatorBase - Context access, diagnostics
 * 2. LiteralsEvaluator - Literals and grouping
 * 3. VariablesEvaluator - Variable reads and declarations
 * 4. ExpressionsEvaluator - Unary and binary operators
 * 5. ControlFlowEvaluator - Ternary
 * 6. CoreEvaluator - Expression dispatch
 * 7. StatementsEvaluator - Statement execution (outermost)
 *
 * Each layer may call methods of the layers below it, and any layer may
 * recurse through `evaluateExpression`.
 *
 * @internal
 */

import type { RuntimeContext } from '../types.js';
import { StatementsEvaluator } from './statements.js';

export class Evaluator extends StatementsEvaluator {}

/**
 * WeakMap cache for evaluator instances.
 *
 * Key: RuntimeContext object reference
 * Value: Evaluator instance for that context
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create an evaluator instance for a given RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
