/**
 * Communicator configuration
 *
 * Settings for the connection the build uses to provision the source
 * instance: SSH, WinRM, or none. Only configuration lives here; the
 * transport itself belongs to the host.
 */

import { existsSync } from 'node:fs';
import { z } from 'zod';
import {
  COMMUNICATOR,
  COMMUNICATOR_TYPES,
  LIMITS,
  type CommunicatorType,
} from '@/config/constants';
import { ERROR_MESSAGES, type MultiError } from '@/lib/errors';
import { duration, weakBoolean, weakInt, type DecodedFields } from '@/lib/decode';

export interface CommunicatorConfig {
  type: CommunicatorType;
  sshHost: string;
  sshPort: number;
  sshUsername: string;
  sshPassword: string;
  sshPrivateKeyFile: string;
  /** Milliseconds */
  sshTimeout: number;
  sshHandshakeAttempts: number;
  winrmHost: string;
  winrmPort: number;
  winrmUsername: string;
  winrmPassword: string;
  /** Milliseconds */
  winrmTimeout: number;
  winrmUseSSL: boolean;
  winrmInsecure: boolean;
  /** Milliseconds */
  pauseBeforeConnecting: number;
}

/**
 * Raw field schemas, keyed by their wire names
 */
export const communicatorFieldSchemas = {
  communicator: z.enum(COMMUNICATOR_TYPES),
  ssh_host: z.string(),
  ssh_port: weakInt,
  ssh_username: z.string(),
  ssh_password: z.string(),
  ssh_private_key_file: z.string(),
  ssh_timeout: duration,
  ssh_handshake_attempts: weakInt,
  winrm_host: z.string(),
  winrm_port: weakInt,
  winrm_username: z.string(),
  winrm_password: z.string(),
  winrm_timeout: duration,
  winrm_use_ssl: weakBoolean,
  winrm_insecure: weakBoolean,
  pause_before_connecting: duration,
};

export type CommunicatorFields = DecodedFields<typeof communicatorFieldSchemas>;

function checkPort(key: string, port: number | undefined, errors: MultiError): void {
  if (port === undefined) return;
  if (port < LIMITS.MIN_PORT || port > LIMITS.MAX_PORT) {
    errors.append(
      ERROR_MESSAGES.INVALID_VALUE(key, `must be between ${LIMITS.MIN_PORT} and ${LIMITS.MAX_PORT}`),
    );
  }
}

/**
 * Apply communicator defaults and validate the settings for the chosen type
 */
export function prepareCommunicator(
  fields: CommunicatorFields,
  errors: MultiError,
): CommunicatorConfig {
  const type = fields.communicator ?? COMMUNICATOR.DEFAULT_TYPE;
  const winrmUseSSL = fields.winrm_use_ssl ?? false;

  const comm: CommunicatorConfig = {
    type,
    sshHost: fields.ssh_host ?? '',
    sshPort: fields.ssh_port ?? COMMUNICATOR.SSH_PORT,
    sshUsername: fields.ssh_username ?? '',
    sshPassword: fields.ssh_password ?? '',
    sshPrivateKeyFile: fields.ssh_private_key_file ?? '',
    sshTimeout: fields.ssh_timeout ?? COMMUNICATOR.SSH_TIMEOUT,
    sshHandshakeAttempts: fields.ssh_handshake_attempts ?? COMMUNICATOR.SSH_HANDSHAKE_ATTEMPTS,
    winrmHost: fields.winrm_host ?? '',
    winrmPort:
      fields.winrm_port ?? (winrmUseSSL ? COMMUNICATOR.WINRM_SSL_PORT : COMMUNICATOR.WINRM_PORT),
    winrmUsername: fields.winrm_username ?? '',
    winrmPassword: fields.winrm_password ?? '',
    winrmTimeout: fields.winrm_timeout ?? COMMUNICATOR.WINRM_TIMEOUT,
    winrmUseSSL,
    winrmInsecure: fields.winrm_insecure ?? false,
    pauseBeforeConnecting: fields.pause_before_connecting ?? 0,
  };

  switch (comm.type) {
    case 'ssh':
      if (comm.sshUsername === '') {
        errors.append(ERROR_MESSAGES.REQUIRED('ssh_username'));
      }
      if (comm.sshPrivateKeyFile !== '' && !existsSync(comm.sshPrivateKeyFile)) {
        errors.append(ERROR_MESSAGES.FILE_NOT_FOUND('ssh_private_key_file', comm.sshPrivateKeyFile));
      }
      if (comm.sshHandshakeAttempts < 1) {
        errors.append(ERROR_MESSAGES.INVALID_VALUE('ssh_handshake_attempts', 'must be at least 1'));
      }
      checkPort('ssh_port', fields.ssh_port, errors);
      break;
    case 'winrm':
      if (comm.winrmUsername === '') {
        errors.append(ERROR_MESSAGES.REQUIRED('winrm_username'));
      }
      checkPort('winrm_port', fields.winrm_port, errors);
      break;
    case 'none':
      break;
  }

  return comm;
}
