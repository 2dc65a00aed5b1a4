/**
 * Check that the target machine image does not exist yet, and stop the
 * build before any resources are created if it does.
 *
 * The answer is stored on the config as `machineImageAlreadyExists` so a
 * later step can delete the old image when the build is forced.
 */

import type { StepContext } from '@/core/context';
import { createTimer } from '@/lib/logger';
import { ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';
import type { StateBag } from './state-bag';
import { type BuildState, type Step, StepAction } from './types';

const STEP_NAME = 'check-existing-machine-image';

function halt(state: StateBag<BuildState>, error: Error): StepAction {
  state.put('error', error);
  state.get('ui')?.error(error.message);
  return StepAction.HALT;
}

async function run(state: StateBag<BuildState>, context: StepContext): Promise<StepAction> {
  const { logger, signal } = context;

  const config = state.get('config');
  const driver = state.get('driver');
  const ui = state.get('ui');
  if (!config) return halt(state, new Error(ERROR_MESSAGES.STATE_MISSING('config')));
  if (!driver) return halt(state, new Error(ERROR_MESSAGES.STATE_MISSING('driver')));
  if (!ui) return halt(state, new Error(ERROR_MESSAGES.STATE_MISSING('ui')));

  if (signal?.aborted) {
    return halt(state, new Error(ERROR_MESSAGES.CANCELLED(STEP_NAME)));
  }

  ui.say('Checking machine image does not exist...');
  const timer = createTimer(logger, STEP_NAME);

  try {
    config.machineImageAlreadyExists = await driver.machineImageExists(
      config.projectId,
      config.machineImageName,
      signal !== undefined ? { signal } : {},
    );
  } catch (error) {
    timer.error(error);
    return halt(
      state,
      new Error(
        `Could not check whether machine image ${config.machineImageName} exists in project ` +
          `${config.projectId}: ${extractErrorMessage(error)}`,
      ),
    );
  }

  timer.end({
    projectId: config.projectId,
    machineImageName: config.machineImageName,
    exists: config.machineImageAlreadyExists,
  });

  if (config.machineImageAlreadyExists && !config.packerForce) {
    return halt(
      state,
      new Error(ERROR_MESSAGES.MACHINE_IMAGE_EXISTS(config.machineImageName, config.projectId)),
    );
  }

  if (config.machineImageAlreadyExists) {
    logger.info(
      { projectId: config.projectId, machineImageName: config.machineImageName },
      'Machine image exists; continuing because the build is forced',
    );
  }
  return StepAction.CONTINUE;
}

/**
 * Create the existence check step
 */
export function createCheckExistingMachineImageStep(): Step<BuildState> {
  return {
    name: STEP_NAME,
    run,
    cleanup: () => {},
  };
}
