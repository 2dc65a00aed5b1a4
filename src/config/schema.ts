/**
 * Raw field schemas for the build configuration
 *
 * Keys are the wire names build definitions use. Each schema decodes one
 * field; cross-field rules live in `./config`.
 */

import { z } from 'zod';
import { ON_HOST_MAINTENANCE } from './constants';
import { credentialsFieldSchemas } from './credentials';
import { communicatorFieldSchemas } from '@/communicator/config';
import { iapFieldSchemas } from '@/iap/config';
import { diskEncryptionKeySchema } from '@/disks/encryption-key';
import {
  duration,
  singleOrArray,
  stringList,
  stringMap,
  weakBoolean,
  weakInt,
  type DecodedFields,
} from '@/lib/decode';

/**
 * Sole-tenant node affinity
 */
export const nodeAffinitySchema = z
  .object({
    key: z.string().min(1, 'key must not be empty'),
    operator: z.enum(['IN', 'NOT_IN']),
    values: z.array(z.string()).min(1, 'values must not be empty'),
  })
  .strict();

export type NodeAffinity = z.output<typeof nodeAffinitySchema>;

/**
 * Settings the host injects into every build
 */
export const hostFieldSchemas = {
  packer_force: weakBoolean,
  packer_build_name: z.string(),
  packer_builder_type: z.string(),
  packer_debug: weakBoolean,
  packer_on_error: z.enum(['cleanup', 'abort', 'ask', 'run-cleanup-provisioner']),
  packer_user_variables: stringMap,
};

export const machineImageFieldSchemas = {
  machine_image_name: z.string(),
  machine_image_description: z.string(),
  machine_image_storage_locations: stringList,
  guest_flush: weakBoolean,
};

export const instanceFieldSchemas = {
  project_id: z.string(),
  zone: z.string(),
  instance_name: z.string(),
  machine_type: z.string(),
  source_image: z.string(),
  source_image_family: z.string(),
  source_image_project_id: singleOrArray(z.string()),
  disk_name: z.string(),
  disk_size: weakInt,
  disk_type: z.string(),
  disk_encryption_key: diskEncryptionKeySchema,
  disk_attachment: singleOrArray(z.unknown()),
  labels: stringMap,
  metadata: stringMap,
  metadata_files: stringMap,
  startup_script_file: z.string(),
  tags: stringList,
  network: z.string(),
  network_project_id: z.string(),
  subnetwork: z.string(),
  address: z.string(),
  omit_external_ip: weakBoolean,
  use_internal_ip: weakBoolean,
  preemptible: weakBoolean,
  on_host_maintenance: z.enum(ON_HOST_MAINTENANCE),
  accelerator_type: z.string(),
  accelerator_count: weakInt,
  min_cpu_platform: z.string(),
  node_affinity: singleOrArray(nodeAffinitySchema),
  scopes: stringList,
  service_account_email: z.string(),
  disable_default_service_account: weakBoolean,
  enable_secure_boot: weakBoolean,
  enable_vtpm: weakBoolean,
  enable_integrity_monitoring: weakBoolean,
  use_os_login: weakBoolean,
  wait_to_add_ssh_keys: duration,
  state_timeout: duration,
};

/**
 * Every field a build definition may set
 */
export const configFieldSchemas = {
  ...hostFieldSchemas,
  ...credentialsFieldSchemas,
  ...machineImageFieldSchemas,
  ...instanceFieldSchemas,
  ...iapFieldSchemas,
  ...communicatorFieldSchemas,
};

export type ConfigFields = DecodedFields<typeof configFieldSchemas>;
