/**
 * StatementsEvaluator: Statement Execution
 *
 * @internal
 */

import type { StmtNode } from '../../../types.js';
import type { LoxValue } from '../values.js';
import { inspectValue } from '../values.js';
import { CoreEvaluator } from './core.js';

export abstract class StatementsEvaluator extends CoreEvaluator {
  /** Execute one statement and return the value it produced */
  executeStatement(node: StmtNode): LoxValue {
    switch (node.type) {
      case 'ExpressionStmt':
        return this.evaluateExpression(node.expression);
      case 'PrintStmt': {
        const value = this.evaluateExpression(node.expression);
        this.ctx.callbacks.writeLine(inspectValue(value));
        return value;
      }
      case 'VarStmt':
        return this.declareVariable(node);
    }
  }
}
