/**
 * `validate` command: prepare a JSON build definition and report the result
 */

import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import { prepareConfig, mergeRaw, type BuildConfig } from '@/config/config';
import { extractErrorMessage } from '@/lib/errors';
import { isRecord } from '@/lib/decode';
import { formatDuration } from '@/lib/duration';
import { type Result, Success, Failure } from '@/types';
import type { LineWriter } from '@/ui/ui';

export const EXIT_CODES = {
  OK: 0,
  INVALID_CONFIG: 1,
  BAD_INPUT: 2,
} as const;

export interface ValidateOptions {
  /** Sets packer_force */
  force?: boolean;
  /** `key=value` user variables */
  vars?: string[];
  /** Print the normalized config as JSON */
  json?: boolean;
}

export interface ValidateIO {
  stdout: LineWriter;
  stderr: LineWriter;
  logger: Logger;
  now?: Date;
}

/**
 * Parse `key=value` pairs; the value may itself contain `=`
 */
export function parseVars(pairs: string[]): Result<Record<string, string>> {
  const vars: Record<string, string> = {};
  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      return Failure(`invalid variable "${pair}", expected key=value`);
    }
    vars[pair.slice(0, index)] = pair.slice(index + 1);
  }
  return Success(vars);
}

function summarize(config: BuildConfig): string[] {
  const comm = config.comm;
  const endpoint =
    comm.type === 'ssh'
      ? ` (${comm.sshHost || '<instance>'}:${comm.sshPort})`
      : comm.type === 'winrm'
        ? ` (${comm.winrmHost || '<instance>'}:${comm.winrmPort})`
        : '';

  return [
    '✅ Configuration is valid',
    `  Project:        ${config.projectId}`,
    `  Zone:           ${config.zone} (region ${config.region})`,
    `  Machine image:  ${config.machineImageName}${config.packerForce ? ' (force)' : ''}`,
    `  Source:         ${config.sourceImage || `family ${config.sourceImageFamily}`}`,
    `  Communicator:   ${comm.type}${endpoint}${config.useIAP ? ' via IAP' : ''}`,
    `  Extra disks:    ${config.extraBlockDevices.length}`,
    `  State timeout:  ${formatDuration(config.stateTimeout)}`,
  ];
}

/**
 * Run the validate command and return its exit code
 */
export async function runValidate(
  file: string,
  options: ValidateOptions,
  io: ValidateIO,
): Promise<number> {
  const { stdout, stderr, logger } = io;

  let document: unknown;
  try {
    document = JSON.parse(await readFile(file, 'utf-8'));
  } catch (error) {
    logger.debug({ file, error: extractErrorMessage(error) }, 'Failed to load build definition');
    stderr.write(`❌ Could not read ${file}: ${extractErrorMessage(error)}\n`);
    return EXIT_CODES.BAD_INPUT;
  }

  const vars = parseVars(options.vars ?? []);
  if (!vars.ok) {
    stderr.write(`❌ ${vars.error}\n`);
    return EXIT_CODES.BAD_INPUT;
  }

  const overlay: Record<string, unknown> = {};
  if (options.force) overlay.packer_force = true;
  if (Object.keys(vars.value).length > 0) {
    // CLI values win; a malformed file value is left for the validator to report
    const fileVars = isRecord(document) ? document.packer_user_variables : undefined;
    if (fileVars === undefined || fileVars === null) {
      overlay.packer_user_variables = vars.value;
    } else if (isRecord(fileVars)) {
      overlay.packer_user_variables = { ...fileVars, ...vars.value };
    }
  }

  const merged = mergeRaw(document, overlay);
  if (!merged.ok) {
    stderr.write(`❌ ${merged.error}\n`);
    return EXIT_CODES.BAD_INPUT;
  }

  const { warnings, result } = prepareConfig(merged.value, {
    logger,
    ...(io.now !== undefined && { now: io.now }),
  });
  for (const warning of warnings) {
    stderr.write(`⚠️  ${warning}\n`);
  }

  if (!result.ok) {
    stderr.write(`❌ ${result.error}\n`);
    return EXIT_CODES.INVALID_CONFIG;
  }

  if (options.json) {
    stdout.write(`${JSON.stringify(result.value, null, 2)}\n`);
  } else {
    stdout.write(`${summarize(result.value).join('\n')}\n`);
  }
  return EXIT_CODES.OK;
}
