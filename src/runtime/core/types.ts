/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { Environment } from './environment.js';
import type { LoxValue } from './values.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called once per `print` statement with the rendered value */
  writeLine: (line: string) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called when a statement fails */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
  /** Value produced by the statement */
  value: LoxValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  /** The error that occurred */
  error: Error;
  /** Statement index where error occurred */
  index: number;
}

/**
 * How a ternary evaluates its branches.
 * - short-circuit: only the selected branch
 * - eager: both branches, left to right, then select
 */
export type TernaryMode = 'short-circuit' | 'eager';

/** Runtime context with variables, callbacks, and evaluation settings */
export interface RuntimeContext {
  /** Global variable scope */
  readonly environment: Environment;
  /** I/O callbacks */
  readonly callbacks: RuntimeCallbacks;
  /** Observability callbacks */
  readonly observability: ObservabilityCallbacks;
  readonly ternary: TernaryMode;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Initial global variables */
  variables?: Record<string, LoxValue>;
  /** Existing scope to run in; variables defined by the run persist there */
  environment?: Environment;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks>;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks;
  /** Ternary branch evaluation (default: short-circuit) */
  ternary?: TernaryMode;
}

/** Result of script execution */
export interface ExecutionResult {
  /** Value of the last statement, or nil for an empty program */
  value: LoxValue;
  /** Global variables after the run */
  variables: Record<string, LoxValue>;
}

/** Result of a single step execution */
export interface StepResult {
  /** Value produced by this step */
  value: LoxValue;
  /** Whether execution is complete (no more statements) */
  done: boolean;
  /** Current statement index (0-based) */
  index: number;
  /** Total number of statements */
  total: number;
}

/** Stepper for controlled step-by-step execution */
export interface ExecutionStepper {
  /** Whether execution is complete */
  readonly done: boolean;
  /** Current statement index (0-based) */
  readonly index: number;
  /** Total number of statements */
  readonly total: number;
  /** The runtime context (for inspecting variables) */
  readonly context: RuntimeContext;
  /** Execute the next statement */
  step(): StepResult;
  /** Get final result (only valid after done=true) */
  getResult(): ExecutionResult;
}
