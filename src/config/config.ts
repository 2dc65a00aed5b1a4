/**
 * Build configuration: decoding, defaulting and validation
 *
 * `prepareConfig` turns an untyped field bag into a normalized BuildConfig.
 * Every field is decoded and every rule is checked before returning, so a
 * failed prepare lists all problems at once.
 *
 * @example
 * ```typescript
 * const { warnings, result } = prepareConfig({
 *   project_id: 'my-project',
 *   zone: 'us-east1-b',
 *   source_image_family: 'debian-12',
 *   ssh_username: 'builder',
 * });
 * if (!result.ok) console.error(result.error);
 * ```
 */

import { existsSync } from 'node:fs';
import type { Logger } from 'pino';
import { type Result, Success, Failure } from '@/types';
import { createLogger } from '@/lib/logger';
import { ERROR_MESSAGES, MultiError } from '@/lib/errors';
import { decodeFields, isRecord, setOwn } from '@/lib/decode';
import { interpolate, type TemplateContext } from '@/lib/template';
import { prepareCommunicator, type CommunicatorConfig } from '@/communicator/config';
import { prepareIAPConfig, type IAPConfig } from '@/iap/config';
import { prepareBlockDevices, type BlockDevice } from '@/disks/block-device';
import type { DiskEncryptionKey } from '@/disks/encryption-key';
import { prepareCredentials, type CredentialsConfig } from './credentials';
import { configFieldSchemas, type ConfigFields, type NodeAffinity } from './schema';
import { DEFAULTS, type OnHostMaintenance } from './constants';

export interface BuildConfig extends CredentialsConfig, IAPConfig {
  // Host settings
  packerForce: boolean;
  packerBuildName: string;
  packerBuilderType: string;
  packerDebug: boolean;
  packerOnError: string;
  packerUserVariables: Record<string, string>;

  // Target
  projectId: string;
  zone: string;
  /** Derived from zone */
  region: string;
  machineImageName: string;
  machineImageDescription: string;
  machineImageStorageLocations: string[];
  guestFlush: boolean;

  // Source instance
  instanceName: string;
  machineType: string;
  sourceImage: string;
  sourceImageFamily: string;
  sourceImageProjectId: string[];
  diskName: string;
  diskSizeGb: number;
  diskType: string;
  diskEncryptionKey?: DiskEncryptionKey;
  extraBlockDevices: BlockDevice[];
  /** Disk the machine image is taken from; '' means the boot disk */
  imageSourceDisk: string;
  labels: Record<string, string>;
  metadata: Record<string, string>;
  metadataFiles: Record<string, string>;
  startupScriptFile: string;
  tags: string[];
  network: string;
  networkProjectId: string;
  subnetwork: string;
  address: string;
  omitExternalIP: boolean;
  useInternalIP: boolean;
  preemptible: boolean;
  onHostMaintenance: OnHostMaintenance;
  acceleratorType: string;
  acceleratorCount: number;
  minCpuPlatform: string;
  nodeAffinities: NodeAffinity[];
  scopes: string[];
  serviceAccountEmail: string;
  disableDefaultServiceAccount: boolean;
  enableSecureBoot: boolean;
  enableVtpm: boolean;
  enableIntegrityMonitoring: boolean;
  useOSLogin: boolean;
  /** Milliseconds */
  waitToAddSSHKeys: number;
  /** Milliseconds */
  stateTimeout: number;

  comm: CommunicatorConfig;

  /** Set by the existence check step; later steps read it */
  machineImageAlreadyExists: boolean;
}

export interface PrepareOptions {
  /** Render time for `{{timestamp}}` and `{{isotime}}` */
  now?: Date;
  /** Host platform for IAP script defaults */
  platform?: NodeJS.Platform;
  logger?: Logger;
}

export interface PrepareResult {
  /** Non-fatal findings; reported whether or not the config is valid */
  warnings: string[];
  result: Result<BuildConfig>;
}

/**
 * Strip the zone letter: `us-east1-a` → `us-east1`
 */
export function deriveRegion(zone: string): string {
  const match = /^(.+)-[a-z]$/.exec(zone);
  return match?.[1] ?? zone;
}

/**
 * Merge raw field bags left to right; later bags win per key
 */
export function mergeRaw(...raws: unknown[]): Result<Record<string, unknown>> {
  const merged: Record<string, unknown> = {};
  for (const [index, raw] of raws.entries()) {
    if (raw === undefined || raw === null) continue;
    if (!isRecord(raw)) {
      return Failure(`configuration source ${index} is not an object`, {
        message: 'Build configuration must be a key/value object',
        resolution: 'Pass the decoded build definition, e.g. the result of JSON.parse',
      });
    }
    for (const [key, value] of Object.entries(raw)) {
      setOwn(merged, key, value);
    }
  }
  return Success(merged);
}

let moduleLogger: Logger | null = null;
function getLogger(): Logger {
  if (!moduleLogger) {
    moduleLogger = createLogger({ name: 'config' });
  }
  return moduleLogger;
}

function render(
  key: string,
  template: string,
  ctx: TemplateContext,
  errors: MultiError,
): string {
  const rendered = interpolate(template, ctx);
  if (!rendered.ok) {
    errors.append(ERROR_MESSAGES.INVALID_VALUE(key, rendered.error));
    return template;
  }
  return rendered.value;
}

function checkFileExists(key: string, file: string, errors: MultiError): void {
  if (file !== '' && !existsSync(file)) {
    errors.append(ERROR_MESSAGES.FILE_NOT_FOUND(key, file));
  }
}

interface SchedulingSettings {
  onHostMaintenance: OnHostMaintenance;
  acceleratorType: string;
  acceleratorCount: number;
}

/**
 * Accelerators cannot live-migrate, and preemptible instances are never
 * migrated; both need TERMINATE
 */
function prepareScheduling(fields: ConfigFields, errors: MultiError): SchedulingSettings {
  const acceleratorCount = fields.accelerator_count ?? 0;
  const acceleratorType = fields.accelerator_type ?? '';
  const preemptible = fields.preemptible ?? false;
  const requested = fields.on_host_maintenance;

  if (acceleratorCount < 0) {
    errors.append(ERROR_MESSAGES.INVALID_VALUE('accelerator_count', 'must not be negative'));
  }
  if (acceleratorCount > 0) {
    if (requested === 'MIGRATE') {
      errors.append(
        "'on_host_maintenance' must be set to 'TERMINATE' when 'accelerator_count' is more than 0",
      );
    }
    if (acceleratorType === '') {
      errors.append("'accelerator_type' must be set when 'accelerator_count' is more than 0");
    }
  }
  if (preemptible && requested === 'MIGRATE') {
    errors.append("'on_host_maintenance' must be set to 'TERMINATE' when 'preemptible' is true");
  }

  const needsTerminate = preemptible || acceleratorCount > 0;
  return {
    onHostMaintenance: requested ?? (needsTerminate ? 'TERMINATE' : 'MIGRATE'),
    acceleratorType,
    acceleratorCount,
  };
}

/**
 * Decode, default and validate a raw build definition
 */
export function prepareConfig(raw: unknown, options: PrepareOptions = {}): PrepareResult {
  const logger = options.logger ?? getLogger();
  const warnings: string[] = [];

  const merged = mergeRaw(raw);
  if (!merged.ok) {
    return { warnings, result: Failure(merged.error, merged.guidance) };
  }

  const errors = new MultiError();
  const fields = decodeFields(configFieldSchemas, merged.value, errors);

  const templateCtx: TemplateContext = { now: options.now ?? new Date() };
  if (fields.packer_user_variables) templateCtx.userVariables = fields.packer_user_variables;
  if (fields.packer_build_name) templateCtx.buildName = fields.packer_build_name;

  // Required settings
  const projectId = fields.project_id ?? '';
  const zone = fields.zone ?? '';
  if (projectId === '') errors.append(ERROR_MESSAGES.REQUIRED('project_id'));
  if (zone === '') errors.append(ERROR_MESSAGES.REQUIRED('zone'));

  const sourceImage = fields.source_image ?? '';
  const sourceImageFamily = fields.source_image_family ?? '';
  if (sourceImage === '' && sourceImageFamily === '') {
    errors.append('a source_image or source_image_family must be specified');
  }

  const credentials = prepareCredentials(fields, errors);

  // Names
  const machineImageName = render(
    'machine_image_name',
    fields.machine_image_name ?? DEFAULTS.MACHINE_IMAGE_NAME,
    templateCtx,
    errors,
  );
  const machineImageDescription = render(
    'machine_image_description',
    fields.machine_image_description ?? '',
    templateCtx,
    errors,
  );
  const instanceName = render(
    'instance_name',
    fields.instance_name ?? DEFAULTS.INSTANCE_NAME,
    templateCtx,
    errors,
  );
  const diskName =
    fields.disk_name !== undefined
      ? render('disk_name', fields.disk_name, templateCtx, errors)
      : instanceName;

  const labels: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields.labels ?? {})) {
    labels[key] = render(`labels.${key}`, value, templateCtx, errors);
  }

  // Files
  const startupScriptFile = fields.startup_script_file ?? '';
  checkFileExists('startup_script_file', startupScriptFile, errors);
  const metadataFiles = fields.metadata_files ?? {};
  for (const [key, file] of Object.entries(metadataFiles)) {
    checkFileExists(`metadata_files.${key}`, file, errors);
  }

  // Scheduling and accelerators
  const scheduling = prepareScheduling(fields, errors);

  // Service account
  const serviceAccountEmail = fields.service_account_email ?? '';
  const disableDefaultServiceAccount = fields.disable_default_service_account ?? false;
  if (disableDefaultServiceAccount && serviceAccountEmail !== '') {
    errors.append(
      "you may not specify a 'service_account_email' when 'disable_default_service_account' is true",
    );
  }

  // Networking
  const useInternalIP = fields.use_internal_ip ?? false;
  const omitExternalIP = fields.omit_external_ip ?? false;
  if (omitExternalIP && !useInternalIP) {
    errors.append("'omit_external_ip' requires 'use_internal_ip' to be true");
  }
  const subnetwork = fields.subnetwork ?? '';
  const network = fields.network ?? (subnetwork === '' ? DEFAULTS.NETWORK : '');

  // Communicator, then IAP, which rewires it
  const comm = prepareCommunicator(fields, errors);
  const iap = prepareIAPConfig(fields, comm, errors, options.platform);

  // Extra disks
  const disks = prepareBlockDevices(fields.disk_attachment ?? [], { zone, instanceName }, errors);

  const diskSizeGb = fields.disk_size ?? DEFAULTS.DISK_SIZE_GB;
  if (diskSizeGb <= 0) {
    errors.append(ERROR_MESSAGES.INVALID_VALUE('disk_size', 'must be greater than 0'));
  }

  if (errors.size > 0) {
    logger.debug({ errorCount: errors.size }, 'Build configuration rejected');
    return {
      warnings,
      result: Failure(errors.message, {
        message: 'Build configuration is invalid',
        hint: `${errors.size} field(s) failed validation`,
        resolution: 'Fix the listed fields and run the build again',
        details: { errors: errors.messages() },
      }),
    };
  }

  const config: BuildConfig = {
    ...credentials,
    ...iap,
    packerForce: fields.packer_force ?? false,
    packerBuildName: fields.packer_build_name ?? '',
    packerBuilderType: fields.packer_builder_type ?? '',
    packerDebug: fields.packer_debug ?? false,
    packerOnError: fields.packer_on_error ?? '',
    packerUserVariables: fields.packer_user_variables ?? {},
    projectId,
    zone,
    region: deriveRegion(zone),
    machineImageName,
    machineImageDescription,
    machineImageStorageLocations: fields.machine_image_storage_locations ?? [],
    guestFlush: fields.guest_flush ?? false,
    instanceName,
    machineType: fields.machine_type ?? DEFAULTS.MACHINE_TYPE,
    sourceImage,
    sourceImageFamily,
    sourceImageProjectId: fields.source_image_project_id ?? [],
    diskName,
    diskSizeGb,
    diskType: fields.disk_type ?? DEFAULTS.DISK_TYPE,
    extraBlockDevices: disks.devices,
    imageSourceDisk: disks.imageSourceDisk,
    labels,
    metadata: fields.metadata ?? {},
    metadataFiles,
    startupScriptFile,
    tags: fields.tags ?? [],
    network,
    networkProjectId: fields.network_project_id ?? '',
    subnetwork,
    address: fields.address ?? '',
    omitExternalIP,
    useInternalIP,
    preemptible: fields.preemptible ?? false,
    ...scheduling,
    minCpuPlatform: fields.min_cpu_platform ?? '',
    nodeAffinities: fields.node_affinity ?? [],
    scopes:
      fields.scopes !== undefined && fields.scopes.length > 0 ? fields.scopes : [...DEFAULTS.SCOPES],
    serviceAccountEmail,
    disableDefaultServiceAccount,
    enableSecureBoot: fields.enable_secure_boot ?? false,
    enableVtpm: fields.enable_vtpm ?? false,
    enableIntegrityMonitoring: fields.enable_integrity_monitoring ?? false,
    useOSLogin: fields.use_os_login ?? false,
    waitToAddSSHKeys: fields.wait_to_add_ssh_keys ?? DEFAULTS.WAIT_TO_ADD_SSH_KEYS,
    stateTimeout: fields.state_timeout ?? DEFAULTS.STATE_TIMEOUT,
    comm,
    machineImageAlreadyExists: false,
  };
  if (fields.disk_encryption_key !== undefined) {
    config.diskEncryptionKey = fields.disk_encryption_key;
  }

  logger.debug(
    { projectId, zone, machineImageName, communicator: comm.type, useIAP: iap.useIAP },
    'Build configuration prepared',
  );
  return { warnings, result: Success(config) };
}
