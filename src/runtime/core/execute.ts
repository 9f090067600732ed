/**
 * Script Execution
 *
 * Runs parsed statements against a runtime context, either all at once
 * or one statement per step.
 */

import type { StmtNode } from '../../types.js';
import { ErrorLog, RuntimeError } from '../../types.js';
import { createRuntimeContext } from './context.js';
import { getEvaluator } from './eval/evaluator.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  RuntimeOptions,
  StepResult,
} from './types.js';
import type { LoxValue } from './values.js';

/**
 * Run one statement with step events around it.
 * Failures are reported to `onError` and rethrown.
 */
function runStep(
  statements: readonly StmtNode[],
  index: number,
  ctx: RuntimeContext
): LoxValue {
  const statement = statements[index];
  if (!statement) {
    throw new RangeError(`No statement at index ${index}`);
  }

  const total = statements.length;
  const { observability } = ctx;
  observability.onStepStart?.({ index, total });
  const startTime = performance.now();

  try {
    const value = getEvaluator(ctx).executeStatement(statement);
    observability.onStepEnd?.({
      index,
      total,
      value,
      durationMs: performance.now() - startTime,
    });
    return value;
  } catch (error) {
    if (error instanceof Error) {
      observability.onError?.({ error, index });
    }
    throw error;
  }
}

/**
 * Execute every statement in order.
 *
 * @throws RuntimeError on the first failing statement; later statements
 * do not run
 */
export function execute(
  statements: readonly StmtNode[],
  ctx: RuntimeContext
): ExecutionResult {
  let value: LoxValue = null;
  for (let index = 0; index < statements.length; index++) {
    value = runStep(statements, index, ctx);
  }
  return { value, variables: ctx.environment.entries() };
}

/**
 * Create a stepper that executes one statement per `step()` call.
 *
 * @example
 * ```typescript
 * const stepper = createStepper(statements, ctx);
 * while (!stepper.done) stepper.step();
 * const { variables } = stepper.getResult();
 * ```
 */
export function createStepper(
  statements: readonly StmtNode[],
  ctx: RuntimeContext
): ExecutionStepper {
  let index = 0;
  let lastValue: LoxValue = null;
  const total = statements.length;

  return {
    get done() {
      return index >= total;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return ctx;
    },

    step(): StepResult {
      if (index >= total) {
        return { value: lastValue, done: true, index, total };
      }

      lastValue = runStep(statements, index, ctx);
      index++;
      return {
        value: lastValue,
        done: index >= total,
        index: index - 1,
        total,
      };
    },

    getResult(): ExecutionResult {
      if (index < total) {
        throw new Error('Cannot get result: execution not complete');
      }
      return { value: lastValue, variables: ctx.environment.entries() };
    },
  };
}

/**
 * Execute statements and report the outcome as a diagnostic log.
 * The log is empty on success and holds the single runtime error that
 * stopped execution otherwise.
 */
export function interpret(
  statements: readonly StmtNode[],
  options: RuntimeOptions = {}
): ErrorLog {
  const ctx = createRuntimeContext(options);
  try {
    execute(statements, ctx);
    return new ErrorLog();
  } catch (error) {
    if (error instanceof RuntimeError) {
      return ErrorLog.of(error);
    }
    throw error;
  }
}
