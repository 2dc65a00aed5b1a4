/**
 * Core type definitions for the machine image builder.
 * Provides the Result type for error handling and the step execution context.
 */

export * from './core';

/**
 * Step execution context
 *
 * @remarks
 * StepContext provides essential utilities for step execution:
 * - `logger`: Structured logging with Pino
 * - `signal`: Optional AbortSignal for cancellation
 *
 * @public
 */
export type { StepContext } from '../core/context';
