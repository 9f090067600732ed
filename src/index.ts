/**
 * tlox Module
 * Exports scanner, parser, runtime, printer, pipeline and core types
 */

export { nextToken, scan, type ScanResult } from './lexer/index.js';
export {
  DEFAULT_MAX_DEPTH,
  parse,
  Parser,
  type ParseResult,
  type ParserOptions,
} from './parser/index.js';
export {
  createRuntimeContext,
  createStepper,
  Environment,
  type Binding,
  type ErrorEvent,
  execute,
  type ExecutionResult,
  type ExecutionStepper,
  inspectValue,
  interpret,
  isTruthy,
  type LoxTypeName,
  type ObservabilityCallbacks,
  type RuntimeCallbacks,
  type RuntimeContext,
  type RuntimeOptions,
  type StepEndEvent,
  type StepResult,
  type StepStartEvent,
  type TernaryMode,
  typeName,
  valuesEqual,
} from './runtime/index.js';
export { printExpr, printStmt } from './printer.js';
export {
  runSource,
  type RunOptions,
  type RunResult,
  type Stage,
} from './pipeline.js';
export * from './types.js';
