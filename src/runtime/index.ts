/**
 * Lox Runtime
 *
 * Public API for executing parsed Lox statements.
 *
 * Module Structure:
 * - core/types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 * - core/values.ts: Value rendering, truthiness, equality
 * - core/environment.ts: Variable scopes
 * - core/context.ts: Runtime context factory
 * - core/execute.ts: Statement execution (execute, createStepper, interpret)
 * - core/eval/: Layered AST evaluator (internal)
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StepEndEvent,
  StepResult,
  StepStartEvent,
  TernaryMode,
} from './core/types.js';

// ============================================================
// VALUES AND SCOPES
// ============================================================

export {
  inspectValue,
  isTruthy,
  typeName,
  valuesEqual,
  type LoxTypeName,
  type LoxValue,
} from './core/values.js';

export { Environment, type Binding } from './core/environment.js';

// ============================================================
// EXECUTION
// ============================================================

export { createRuntimeContext } from './core/context.js';
export { createStepper, execute, interpret } from './core/execute.js';
