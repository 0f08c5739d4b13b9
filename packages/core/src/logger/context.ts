/**
 * File: packages/core/src/logger/context.ts
 * Purpose: AsyncLocalStorage-based context propagation for run IDs and step names
 * Relationships: Provides context to all logger calls within one CLI invocation
 * Key Dependencies: async_hooks (Node.js native), factory.ts
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { Logger } from 'pino';
import { getLogger } from './factory.js';
import type { PipelineContext } from './types.js';

const pipelineContext = new AsyncLocalStorage<PipelineContext>();

/**
 * Get the current run context, or undefined outside runPipeline()
 */
export function getContext(): PipelineContext | undefined {
  return pipelineContext.getStore();
}

/**
 * Get a logger with current run context
 *
 * Returns a child logger with runId and step bindings from
 * AsyncLocalStorage. If no context is available, returns the base logger.
 *
 * @example
 * ```typescript
 * await runPipeline(runId, async () => {
 *   await runStep('compile', async () => {
 *     getContextLogger().info('Compiling');  // runId + step
 *   });
 * });
 * ```
 */
export function getContextLogger(): Logger {
  const context = getContext();
  if (context) {
    return getLogger().child(context);
  }
  return getLogger();
}

/**
 * Execute a function with custom context
 *
 * Low-level API. Prefer runPipeline() and runStep().
 */
export async function runWithContext<T>(
  context: PipelineContext,
  fn: () => Promise<T>
): Promise<T> {
  return pipelineContext.run(context, fn);
}

/**
 * Execute a function with run context (run ID)
 *
 * All async operations within the function see the run ID via
 * getContextLogger().
 */
export async function runPipeline<T>(
  runId: string,
  fn: () => Promise<T>
): Promise<T> {
  return runWithContext({ runId }, fn);
}

/**
 * Execute a function with step context
 *
 * Must be called within a runPipeline() context. Nested runStep() calls
 * replace the step name.
 *
 * @throws {Error} If called outside pipeline context
 */
export async function runStep<T>(
  stepName: string,
  fn: () => Promise<T>
): Promise<T> {
  const context = getContext();
  if (!context) {
    throw new Error('runStep called outside pipeline context. Must be called within runPipeline()');
  }

  const stepContext: PipelineContext = { ...context, step: stepName };
  return pipelineContext.run(stepContext, fn);
}
