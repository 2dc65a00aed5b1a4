/**
 * Application Constants and Defaults
 *
 * Consolidated default values, limits and enumerations for the builder
 * configuration. Durations are in milliseconds.
 */

/**
 * Environment variables read by the package
 */
export const ENV_VARS = {
  LOG_LEVEL: 'LOG_LEVEL',
} as const;

/**
 * Build configuration defaults
 */
export const DEFAULTS = {
  /** Machine image name template, rendered at prepare time */
  MACHINE_IMAGE_NAME: 'packer-{{timestamp}}',
  /** Source instance name template */
  INSTANCE_NAME: 'packer-{{uuid}}',
  MACHINE_TYPE: 'e2-standard-2',
  DISK_SIZE_GB: 20,
  DISK_TYPE: 'pd-standard',
  NETWORK: 'default',
  /** Instance state polling timeout: 5 minutes. */
  STATE_TIMEOUT: 300_000,
  /** Delay before SSH keys are added: none. */
  WAIT_TO_ADD_SSH_KEYS: 0,
  SCOPES: [
    'https://www.googleapis.com/auth/userinfo.email',
    'https://www.googleapis.com/auth/compute',
    'https://www.googleapis.com/auth/devstorage.full_control',
  ],
} as const;

/**
 * Communicator defaults
 */
export const COMMUNICATOR = {
  DEFAULT_TYPE: 'ssh',
  SSH_PORT: 22,
  /** SSH connect timeout: 5 minutes. */
  SSH_TIMEOUT: 300_000,
  SSH_HANDSHAKE_ATTEMPTS: 10,
  WINRM_PORT: 5985,
  WINRM_SSL_PORT: 5986,
  /** WinRM connect timeout: 30 minutes. */
  WINRM_TIMEOUT: 1_800_000,
} as const;

/**
 * IAP tunnel defaults
 */
export const IAP = {
  /** Host the communicator dials once traffic goes through the local tunnel */
  LOCALHOST: 'localhost',
  /** 0 lets the tunnel pick a free port when it starts */
  LOCALHOST_PORT: 0,
  /** Seconds to wait for the tunnel to come up */
  TUNNEL_LAUNCH_WAIT: 30,
  WINDOWS_HASHBANG: '',
  WINDOWS_EXT: '.cmd',
  UNIX_HASHBANG: '/bin/sh',
  UNIX_EXT: '',
} as const;

/**
 * Block device constants
 */
export const DISKS = {
  /** Local SSDs come in one size */
  SCRATCH_SIZE_GB: 375,
  VOLUME_TYPES: [
    'scratch',
    'pd-standard',
    'pd-balanced',
    'pd-ssd',
    'pd-extreme',
    'hyperdisk-balanced',
    'hyperdisk-extreme',
    'hyperdisk-ml',
    'hyperdisk-throughput',
  ],
  ATTACHMENT_MODES: ['READ_WRITE', 'READ_ONLY'],
  INTERFACE_TYPES: ['SCSI', 'NVME'],
  REPLICA_ZONE_COUNT: 2,
} as const;

export const ON_HOST_MAINTENANCE = ['MIGRATE', 'TERMINATE'] as const;
export type OnHostMaintenance = (typeof ON_HOST_MAINTENANCE)[number];

export const COMMUNICATOR_TYPES = ['ssh', 'winrm', 'none'] as const;
export type CommunicatorType = (typeof COMMUNICATOR_TYPES)[number];

/**
 * Validation limits
 */
export const LIMITS = {
  MIN_PORT: 1,
  MAX_PORT: 65_535,
} as const;
