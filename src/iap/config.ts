/**
 * Identity-Aware Proxy tunnel settings
 *
 * With `use_iap`, the communicator dials a local port forwarded through an
 * IAP tunnel instead of the instance address. The tunnel is launched by a
 * helper script whose interpreter line and file extension depend on the
 * host platform.
 */

import { z } from 'zod';
import { IAP, LIMITS } from '@/config/constants';
import type { CommunicatorConfig } from '@/communicator/config';
import { type Result, Success, Failure } from '@/types';
import { getSystemInfo } from '@/lib/platform';
import { weakBoolean, weakInt, type DecodedFields } from '@/lib/decode';
import type { MultiError } from '@/lib/errors';

export interface IAPConfig {
  useIAP: boolean;
  /** 0 means the tunnel picks a free port when it starts */
  iapLocalhostPort: number;
  iapHashBang: string;
  iapExt: string;
  /** Seconds */
  iapTunnelLaunchWait: number;
}

export const iapFieldSchemas = {
  use_iap: weakBoolean,
  iap_localhost_port: weakInt,
  iap_hashbang: z.string(),
  iap_ext: z.string(),
  iap_tunnel_launch_wait: weakInt,
};

export type IAPFields = DecodedFields<typeof iapFieldSchemas>;

/**
 * Point a communicator at the local end of an IAP tunnel
 */
export function applyIAPTunnel(comm: CommunicatorConfig, port: number): Result<CommunicatorConfig> {
  switch (comm.type) {
    case 'ssh':
      comm.sshHost = IAP.LOCALHOST;
      comm.sshPort = port;
      return Success(comm);
    case 'winrm':
      comm.winrmHost = IAP.LOCALHOST;
      comm.winrmPort = port;
      return Success(comm);
    default:
      return Failure(`IAP tunnel is not implemented for ${comm.type} communicator`);
  }
}

/**
 * Fill platform defaults for the tunnel script and rewire the communicator
 * when IAP is enabled. Values the user supplied are kept as given, whether
 * or not the rest of the configuration is valid.
 */
export function prepareIAPConfig(
  fields: IAPFields,
  comm: CommunicatorConfig,
  errors: MultiError,
  platform: NodeJS.Platform = process.platform,
): IAPConfig {
  const { isWindows } = getSystemInfo(platform);

  const iap: IAPConfig = {
    useIAP: fields.use_iap ?? false,
    iapLocalhostPort: fields.iap_localhost_port ?? IAP.LOCALHOST_PORT,
    iapHashBang: fields.iap_hashbang ?? (isWindows ? IAP.WINDOWS_HASHBANG : IAP.UNIX_HASHBANG),
    iapExt: fields.iap_ext ?? (isWindows ? IAP.WINDOWS_EXT : IAP.UNIX_EXT),
    iapTunnelLaunchWait: fields.iap_tunnel_launch_wait ?? IAP.TUNNEL_LAUNCH_WAIT,
  };

  if (iap.iapLocalhostPort < 0 || iap.iapLocalhostPort > LIMITS.MAX_PORT) {
    errors.append(`iap_localhost_port: must be between 0 and ${LIMITS.MAX_PORT}`);
  }

  if (iap.useIAP) {
    const applied = applyIAPTunnel(comm, iap.iapLocalhostPort);
    if (!applied.ok) errors.append(applied.error);
  }

  return iap;
}
