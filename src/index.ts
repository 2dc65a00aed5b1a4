/**
 * Public API for the Compute Engine machine image builder
 * Configuration preparation, the existence precondition step, and the
 * collaborator interfaces steps run against
 */

/**
 * Prepare a build configuration from an untyped field bag.
 *
 * Decodes every field, applies defaults, checks cross-field rules and
 * returns either a normalized `BuildConfig` or one failure listing every
 * problem.
 *
 * @example
 * ```typescript
 * import { prepareConfig } from 'gce-machine-image-builder';
 *
 * const { warnings, result } = prepareConfig(JSON.parse(definition));
 * if (!result.ok) {
 *   console.error(result.error);
 * }
 * ```
 *
 * @public
 */
export { prepareConfig, deriveRegion, mergeRaw } from './config/config';
export type { BuildConfig, PrepareOptions, PrepareResult } from './config/config';

/**
 * Sub-configurations and their helpers.
 *
 * - `applyIAPTunnel`: point a communicator at the local end of an IAP tunnel
 * - `prepareBlockDevices`: validate `disk_attachment` entries
 *
 * @public
 */
export { applyIAPTunnel } from './iap/config';
export type { IAPConfig } from './iap/config';
export type { CommunicatorConfig } from './communicator/config';
export { prepareBlockDevices } from './disks/block-device';
export type { BlockDevice } from './disks/block-device';
export type { DiskEncryptionKey } from './disks/encryption-key';
export type { NodeAffinity } from './config/schema';

/**
 * Build steps and the state they share.
 *
 * @example
 * ```typescript
 * import {
 *   createCheckExistingMachineImageStep,
 *   createStateBag,
 *   createStepContext,
 *   StepAction,
 * } from 'gce-machine-image-builder';
 *
 * const state = createStateBag<BuildState>({ config, driver, ui });
 * const step = createCheckExistingMachineImageStep();
 * if ((await step.run(state, createStepContext(logger))) === StepAction.HALT) {
 *   throw state.get('error');
 * }
 * ```
 *
 * @public
 */
export { createCheckExistingMachineImageStep } from './steps/check-existing-machine-image';
export { createStateBag } from './steps/state-bag';
export type { StateBag } from './steps/state-bag';
export { StepAction } from './steps/types';
export type { Step, BuildState } from './steps/types';
export { createStepContext } from './core/context';
export type { StepContext } from './core/context';

/**
 * Collaborators supplied by the host.
 *
 * @public
 */
export type { Driver, DriverCallOptions } from './driver/types';
export { createBasicUi, createLoggerUi } from './ui/ui';
export type { Ui } from './ui/ui';

/**
 * Result handling and shared utilities.
 *
 * @public
 */
export { Success, Failure } from './types/core';
export type { Result, ErrorGuidance } from './types/core';
export { MultiError } from './lib/errors';
export { createLogger } from './lib/logger';
export { parseDuration, formatDuration } from './lib/duration';
export { interpolate } from './lib/template';
export type { TemplateContext } from './lib/template';
