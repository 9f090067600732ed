/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for script execution.
 * Public API for host applications.
 */

import { Environment } from './environment.js';
import type {
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';

const defaultCallbacks: RuntimeCallbacks = {
  writeLine: (line) => {
    console.log(line);
  },
};

/**
 * Create a runtime context for script execution.
 * This is the main entry point for configuring the Lox runtime.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const environment = options.environment ?? new Environment();

  if (options.variables) {
    for (const [name, value] of Object.entries(options.variables)) {
      environment.define(name, value);
    }
  }

  return {
    environment,
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
    ternary: options.ternary ?? 'short-circuit',
  };
}
