/**
 * Extra disks attached to the source instance (`disk_attachment` entries)
 *
 * One entry may be marked `create_image`; the machine image is then taken
 * with that disk as its source.
 */

import { z } from 'zod';
import { DISKS } from '@/config/constants';
import { ERROR_MESSAGES, MultiError } from '@/lib/errors';
import { decodeFields, stringList, weakBoolean, weakInt, isRecord } from '@/lib/decode';
import { diskEncryptionKeySchema, type DiskEncryptionKey } from './encryption-key';

export type VolumeType = (typeof DISKS.VOLUME_TYPES)[number];
export type AttachmentMode = (typeof DISKS.ATTACHMENT_MODES)[number];
export type InterfaceType = (typeof DISKS.INTERFACE_TYPES)[number];

export interface BlockDevice {
  attachmentMode: AttachmentMode;
  createImage: boolean;
  deviceName: string;
  diskEncryptionKey?: DiskEncryptionKey;
  diskName: string;
  interfaceType: InterfaceType;
  keepDevice: boolean;
  replicaZones: string[];
  sourceVolume: string;
  /** GB */
  volumeSize: number;
  volumeType: VolumeType;
  zone: string;
}

export const blockDeviceFieldSchemas = {
  attachment_mode: z.enum(DISKS.ATTACHMENT_MODES),
  create_image: weakBoolean,
  device_name: z.string(),
  disk_encryption_key: diskEncryptionKeySchema,
  disk_name: z.string(),
  interface_type: z.enum(DISKS.INTERFACE_TYPES),
  keep_device: weakBoolean,
  replica_zones: stringList,
  source_volume: z.string(),
  volume_size: weakInt,
  volume_type: z.enum(DISKS.VOLUME_TYPES),
  zone: z.string(),
};

export interface BlockDeviceDefaults {
  /** Zone of the build; disks without a zone inherit it */
  zone: string;
  /** Base for generated disk names */
  instanceName: string;
}

/**
 * Decode and validate one `disk_attachment` entry
 */
export function prepareBlockDevice(
  raw: unknown,
  index: number,
  defaults: BlockDeviceDefaults,
  errors: MultiError,
): BlockDevice | null {
  const prefix = ['disk_attachment', index] as const;
  const label = `disk_attachment[${index}]`;

  if (!isRecord(raw)) {
    errors.append(`${label}: expected an object`);
    return null;
  }

  const local = new MultiError();
  const fields = decodeFields(blockDeviceFieldSchemas, raw, local, { prefix });

  const volumeTypeRejected = local
    .messages()
    .some((message) => message.startsWith(`${label}.volume_type: `));
  if (fields.volume_type === undefined && !volumeTypeRejected) {
    local.append(`${label}: ${ERROR_MESSAGES.REQUIRED('volume_type')}`);
  }

  const volumeType = fields.volume_type ?? 'pd-standard';
  const isScratch = volumeType === 'scratch';
  const diskName = fields.disk_name ?? `${defaults.instanceName}-${index + 1}`;

  const device: BlockDevice = {
    attachmentMode: fields.attachment_mode ?? 'READ_WRITE',
    createImage: fields.create_image ?? false,
    deviceName: fields.device_name ?? diskName,
    diskName,
    interfaceType: fields.interface_type ?? 'SCSI',
    keepDevice: fields.keep_device ?? false,
    replicaZones: fields.replica_zones ?? [],
    sourceVolume: fields.source_volume ?? '',
    volumeSize: fields.volume_size ?? (isScratch ? DISKS.SCRATCH_SIZE_GB : 0),
    volumeType,
    zone: fields.zone ?? defaults.zone,
  };
  if (fields.disk_encryption_key !== undefined) {
    device.diskEncryptionKey = fields.disk_encryption_key;
  }

  if (isScratch) {
    if (device.volumeSize !== DISKS.SCRATCH_SIZE_GB) {
      local.append(`${label}: scratch disks must be exactly ${DISKS.SCRATCH_SIZE_GB}GB`);
    }
    if (device.attachmentMode !== 'READ_WRITE') {
      local.append(`${label}: scratch disks can only be attached READ_WRITE`);
    }
    const unsupported: Array<[string, boolean]> = [
      ['source_volume', device.sourceVolume !== ''],
      ['replica_zones', device.replicaZones.length > 0],
      ['disk_encryption_key', device.diskEncryptionKey !== undefined],
      ['keep_device', device.keepDevice],
      ['create_image', device.createImage],
    ];
    for (const [key, set] of unsupported) {
      if (set) local.append(`${label}: ${key} is not supported for scratch disks`);
    }
  } else if (device.volumeSize <= 0 && device.sourceVolume === '') {
    local.append(`${label}: volume_size must be greater than 0 unless source_volume is set`);
  }

  if (
    device.replicaZones.length > 0 &&
    device.replicaZones.length !== DISKS.REPLICA_ZONE_COUNT
  ) {
    local.append(
      `${label}: replica_zones must list exactly ${DISKS.REPLICA_ZONE_COUNT} zones, got ${device.replicaZones.length}`,
    );
  }

  errors.append(local);
  return local.size === 0 ? device : null;
}

export interface PreparedBlockDevices {
  devices: BlockDevice[];
  /** Disk name of the `create_image` entry, '' when there is none */
  imageSourceDisk: string;
}

/**
 * Prepare every `disk_attachment` entry and pick the image source disk
 */
export function prepareBlockDevices(
  entries: unknown[],
  defaults: BlockDeviceDefaults,
  errors: MultiError,
): PreparedBlockDevices {
  const devices: BlockDevice[] = [];
  entries.forEach((entry, index) => {
    const device = prepareBlockDevice(entry, index, defaults, errors);
    if (device) devices.push(device);
  });

  const imageSources = devices.filter((device) => device.createImage);
  if (imageSources.length > 1) {
    errors.append(
      `only one disk_attachment may set create_image, found ${imageSources.length}: ` +
        imageSources.map((device) => device.diskName).join(', '),
    );
  }

  return {
    devices,
    imageSourceDisk: imageSources.length === 1 ? (imageSources[0]?.diskName ?? '') : '',
  };
}
