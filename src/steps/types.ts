/**
 * Step Types
 * The contract between build steps and the host that sequences them
 */

import type { StepContext } from '@/core/context';
import type { BuildConfig } from '@/config/config';
import type { Driver } from '@/driver/types';
import type { Ui } from '@/ui/ui';
import type { StateBag } from './state-bag';

export const StepAction = {
  CONTINUE: 'continue',
  HALT: 'halt',
} as const;
export type StepAction = (typeof StepAction)[keyof typeof StepAction];

/**
 * Entries shared between the steps of one build
 */
export interface BuildState {
  config: BuildConfig;
  driver: Driver;
  ui: Ui;
  /** Set by the step that halts the build */
  error: Error;
}

/**
 * A unit of build work. `run` is called once, in sequence; `cleanup` is
 * called for every step that ran, in reverse order, once the build ends.
 */
export interface Step<S extends object = BuildState> {
  name: string;
  run(state: StateBag<S>, context: StepContext): Promise<StepAction>;
  cleanup(state: StateBag<S>): void;
}
