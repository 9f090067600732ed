/**
 * VariablesEvaluator: Variable Reads and Declarations
 *
 * Error Handling:
 * - Reading a name with no binding in any scope throws
 *   RuntimeError(LOX-R004)
 *
 * @internal
 */

import type { VariableNode, VarStmtNode } from '../../../types.js';
import type { LoxValue } from '../values.js';
import { LiteralsEvaluator } from './literals.js';

export abstract class VariablesEvaluator extends LiteralsEvaluator {
  evaluateVariable(node: VariableNode): LoxValue {
    const binding = this.ctx.environment.lookup(node.name);
    if (!binding) {
      throw this.fail('LOX-R004', { name: node.name }, node);
    }
    return binding.value;
  }

  /**
   * Define the declared name in the current scope.
   * Missing initializers bind nil; redeclaration overwrites.
   */
  declareVariable(node: VarStmtNode): LoxValue {
    const value = node.initializer
      ? this.evaluateExpression(node.initializer)
      : null;
    this.ctx.environment.define(node.name, value);
    return value;
  }
}
