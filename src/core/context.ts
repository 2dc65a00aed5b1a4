/**
 * Core Step Context
 *
 * Provides the StepContext interface and its factory. Steps receive the
 * context alongside the shared build state: the state carries build data,
 * the context carries execution concerns (logging, cancellation).
 */

import type { Logger } from 'pino';

// ===== TYPES =====

/**
 * Core step execution context.
 *
 * This interface defines what every step receives during execution.
 * It provides access to logging and cancellation.
 */
export interface StepContext {
  /**
   * Optional abort signal for cancellation support.
   * Steps check it before calling out to the driver and forward it on.
   */
  signal?: AbortSignal;

  /**
   * Logger for debugging and error tracking.
   * User-facing output goes through the build's Ui, not the logger.
   */
  logger: Logger;
}

// ===== CONTEXT OPTIONS =====

/**
 * Options for creating a step context.
 */
export interface ContextOptions {
  /** Optional abort signal for cancellation */
  signal?: AbortSignal;
}

// ===== CONTEXT FACTORY =====

/**
 * Create a StepContext for step execution.
 *
 * @example
 * ```typescript
 * import { createStepContext } from '@/core/context';
 * import { createLogger } from '@/lib/logger';
 *
 * const logger = createLogger({ name: 'build' });
 * const ctx = createStepContext(logger, { signal: abortController.signal });
 *
 * const action = await step.run(state, ctx);
 * ```
 */
export function createStepContext(logger: Logger, options: ContextOptions = {}): StepContext {
  const { signal } = options;

  const ctx: StepContext = { logger };

  if (signal !== undefined) ctx.signal = signal;

  return ctx;
}
