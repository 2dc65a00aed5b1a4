import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import type { DirResult } from 'tmp';
import { prepareConfig, deriveRegion, mergeRaw, type PrepareResult } from '@/config/config';
import { createTestTempDir } from '../../__support__/utilities/tmp-helpers';
import {
  createMockLogger,
  testConfig,
  TEST_NOW,
  TEST_TIMESTAMP,
} from '../../__support__/utilities/mocks';

function fieldErrors({ result }: PrepareResult): string[] {
  if (result.ok) return [];
  const errors = result.guidance?.details?.errors;
  return Array.isArray(errors)
    ? errors.filter((error): error is string => typeof error === 'string')
    : [];
}

describe('prepareConfig', () => {
  let testDir: DirResult;
  let cleanup: () => Promise<void>;
  const logger = createMockLogger();

  beforeAll(() => {
    const result = createTestTempDir('config-');
    testDir = result.dir;
    cleanup = result.cleanup;
  });

  afterAll(async () => {
    await cleanup();
  });

  const prepare = (overrides: Record<string, unknown> = {}, remove: string[] = []) => {
    const raw: Record<string, unknown> = { ...testConfig(testDir.name), ...overrides };
    for (const key of remove) delete raw[key];
    return prepareConfig(raw, { logger, now: TEST_NOW, platform: 'linux' });
  };

  describe('field decoding', () => {
    const ok: Array<[string, unknown]> = [
      ['project_id', 'foo'],
      ['zone', 'foo'],
      ['ssh_timeout', '5s'],
      ['wait_to_add_ssh_keys', '5s'],
      ['state_timeout', '5s'],
      ['use_internal_ip', false],
      ['on_host_maintenance', 'TERMINATE'],
      ['node_affinity', { key: 'workload', operator: 'IN', values: ['packer'] }],
      ['scopes', []],
      [
        'scopes',
        [
          'https://www.googleapis.com/auth/userinfo.email',
          'https://www.googleapis.com/auth/compute',
          'https://www.googleapis.com/auth/devstorage.full_control',
          'https://www.googleapis.com/auth/sqlservice.admin',
        ],
      ],
      ['scopes', ['https://www.googleapis.com/auth/cloud-platform']],
      ['disable_default_service_account', ''],
      ['disable_default_service_account', false],
      ['disable_default_service_account', true],
      ['disk_encryption_key', { kmsKeyName: 'foo' }],
      ['disk_encryption_key', { kmsKeyName: 'foo', RawKey: 'foo' }],
    ];

    it.each(ok)('should accept %s = %j', (key, value) => {
      const prepared = prepare({ [key]: value });
      expect(fieldErrors(prepared)).toEqual([]);
      expect(prepared.result.ok).toBe(true);
      expect(prepared.warnings).toEqual([]);
    });

    it.each(['use_internal_ip', 'on_host_maintenance', 'node_affinity', 'disable_default_service_account'])(
      'should accept a missing %s',
      (key) => {
        expect(prepare({}, [key]).result.ok).toBe(true);
      },
    );

    const bad: Array<[string, unknown, string]> = [
      ['unknown_key', 'bad', 'unknown configuration key: "unknown_key"'],
      ['private_key_file', '/tmp/i/should/not/exist', 'unknown configuration key: "private_key_file"'],
      ['ssh_timeout', 'SO BAD', 'ssh_timeout: invalid duration "SO BAD"'],
      ['wait_to_add_ssh_keys', 'SO BAD', 'wait_to_add_ssh_keys: invalid duration "SO BAD"'],
      ['state_timeout', 'SO BAD', 'state_timeout: invalid duration "SO BAD"'],
      ['use_internal_ip', 'SO VERY BAD', 'use_internal_ip: cannot parse "SO VERY BAD" as a boolean'],
      [
        'disable_default_service_account',
        'NOT A BOOL',
        'disable_default_service_account: cannot parse "NOT A BOOL" as a boolean',
      ],
    ];

    it.each(bad)('should reject %s = %j', (key, value, message) => {
      const prepared = prepare({ [key]: value });
      expect(prepared.result.ok).toBe(false);
      expect(fieldErrors(prepared)).toEqual([message]);
      expect(prepared.warnings).toEqual([]);
    });

    it('should reject an unknown on_host_maintenance value', () => {
      const errors = fieldErrors(prepare({ on_host_maintenance: 'SO VERY BAD' }));
      expect(errors).toHaveLength(1);
      expect(errors[0]?.startsWith('on_host_maintenance: ')).toBe(true);
    });

    it('should reject unknown disk_encryption_key sub-keys', () => {
      const errors = fieldErrors(prepare({ disk_encryption_key: { 'No such key': 'foo' } }));
      expect(errors).toHaveLength(1);
      expect(errors[0]?.startsWith('disk_encryption_key: ')).toBe(true);
      expect(errors[0]).toContain('No such key');
    });

    it('should match disk_encryption_key sub-keys case-insensitively', () => {
      const { result } = prepare({ disk_encryption_key: { kmsKeyName: 'foo', RawKey: 'bar' } });
      expect(result.ok && result.value.diskEncryptionKey).toEqual({ kmsKeyName: 'foo', rawKey: 'bar' });
    });

    it('should decode durations to milliseconds', () => {
      const { result } = prepare({ ssh_timeout: '5s', state_timeout: '1m30s' });
      expect(result.ok && result.value.comm.sshTimeout).toBe(5_000);
      expect(result.ok && result.value.stateTimeout).toBe(90_000);
    });

    it('should accept numbers written as strings', () => {
      const { result } = prepare({ disk_size: '50', ssh_port: '2222' });
      expect(result.ok && result.value.diskSizeGb).toBe(50);
      expect(result.ok && result.value.comm.sshPort).toBe(2222);
    });
  });

  describe('required fields', () => {
    it.each([
      ['project_id', 'a project_id must be specified'],
      ['zone', 'a zone must be specified'],
    ])('should fail without %s and report no warnings', (key, message) => {
      const prepared = prepare({}, [key]);
      expect(prepared.result.ok).toBe(false);
      expect(fieldErrors(prepared)).toEqual([message]);
      expect(prepared.warnings).toEqual([]);
    });

    it('should require a source image or family', () => {
      expect(fieldErrors(prepare({}, ['source_image']))).toEqual([
        'a source_image or source_image_family must be specified',
      ]);
      expect(prepare({ source_image_family: 'debian-12' }, ['source_image']).result.ok).toBe(true);
    });

    it('should report every problem at once', () => {
      const prepared = prepareConfig({}, { logger, now: TEST_NOW });
      const expected = [
        'a project_id must be specified',
        'a zone must be specified',
        'a source_image or source_image_family must be specified',
        'a ssh_username must be specified',
      ];
      expect(fieldErrors(prepared)).toEqual(expected);
      expect(prepared.result.ok).toBe(false);
      if (!prepared.result.ok) {
        expect(prepared.result.error).toBe(
          `4 error(s) occurred:\n\n${expected.map((message) => `* ${message}`).join('\n')}`,
        );
        expect(prepared.result.guidance?.message).toBe('Build configuration is invalid');
      }
    });

    it('should report a __proto__ key as unknown', () => {
      const definition: unknown = JSON.parse(
        `{"__proto__":{"x":1},${JSON.stringify(testConfig(testDir.name)).slice(1)}`,
      );
      const prepared = prepareConfig(definition, { logger, now: TEST_NOW });
      expect(prepared.result.ok).toBe(false);
      expect(fieldErrors(prepared)).toEqual(['unknown configuration key: "__proto__"']);
    });

    it('should reject input that is not an object', () => {
      const { result } = prepareConfig('project_id=foo', { logger });
      expect(result.ok).toBe(false);
      expect(!result.ok && result.error).toBe('configuration source 0 is not an object');
    });
  });

  describe('accelerators', () => {
    const cases: Array<[number, string, string | undefined, string | null]> = [
      [
        1,
        'MIGRATE',
        'something_valid',
        "'on_host_maintenance' must be set to 'TERMINATE' when 'accelerator_count' is more than 0",
      ],
      [1, 'TERMINATE', 'something_valid', null],
      [1, 'TERMINATE', undefined, "'accelerator_type' must be set when 'accelerator_count' is more than 0"],
      [1, 'TERMINATE', '', "'accelerator_type' must be set when 'accelerator_count' is more than 0"],
    ];

    it.each(cases)(
      'count=%d maintenance=%s type=%j',
      (count, maintenance, type, message) => {
        const overrides: Record<string, unknown> = {
          accelerator_count: count,
          on_host_maintenance: maintenance,
        };
        if (type !== undefined) overrides.accelerator_type = type;
        const prepared = prepare(overrides);
        expect(fieldErrors(prepared)).toEqual(message === null ? [] : [message]);
        expect(prepared.result.ok).toBe(message === null);
      },
    );

    it('should default on_host_maintenance to TERMINATE with accelerators', () => {
      const { result } = prepare({ accelerator_count: 2, accelerator_type: 'nvidia-tesla-t4' });
      expect(result.ok && result.value.onHostMaintenance).toBe('TERMINATE');
    });

    it('should default on_host_maintenance to MIGRATE otherwise', () => {
      const { result } = prepare();
      expect(result.ok && result.value.onHostMaintenance).toBe('MIGRATE');
    });

    it('should require TERMINATE for preemptible instances', () => {
      expect(fieldErrors(prepare({ preemptible: true, on_host_maintenance: 'MIGRATE' }))).toEqual([
        "'on_host_maintenance' must be set to 'TERMINATE' when 'preemptible' is true",
      ]);
      const { result } = prepare({ preemptible: true });
      expect(result.ok && result.value.onHostMaintenance).toBe('TERMINATE');
    });
  });

  describe('service account', () => {
    it.each([
      [true, 'service@account.email.com', false],
      [false, 'service@account.email.com', true],
      [true, '', true],
    ])('disable_default=%s email=%j → ok=%s', (disable, email, ok) => {
      const prepared = prepare({
        disable_default_service_account: disable,
        service_account_email: email,
      });
      expect(prepared.result.ok).toBe(ok);
      expect(fieldErrors(prepared)).toEqual(
        ok
          ? []
          : ["you may not specify a 'service_account_email' when 'disable_default_service_account' is true"],
      );
    });
  });

  describe('credentials', () => {
    it('should allow only one credential source', () => {
      expect(fieldErrors(prepare({ access_token: 'test-token' }))).toEqual([
        "only one of 'credentials_file', 'access_token' may be set",
      ]);
    });

    it('should accept credentials_json holding a key document', () => {
      const { result } = prepare(
        { credentials_json: JSON.stringify({ type: 'authorized_user' }) },
        ['credentials_file'],
      );
      expect(result.ok && result.value.credentialsJSON).toBe('{"type":"authorized_user"}');
    });

    it('should reject credentials_json without a type', () => {
      expect(
        fieldErrors(prepare({ credentials_json: '{"type":""}' }, ['credentials_file'])),
      ).toEqual(['credentials_json: not a credentials document (missing "type")']);
    });

    it('should reject credentials_json that is not JSON', () => {
      const errors = fieldErrors(prepare({ credentials_json: 'nope' }, ['credentials_file']));
      expect(errors).toHaveLength(1);
      expect(errors[0]?.startsWith('credentials_json: not valid JSON: ')).toBe(true);
    });

    it('should report an unreadable credentials_file', () => {
      const errors = fieldErrors(prepare({ credentials_file: `${testDir.name}/missing.json` }));
      expect(errors).toHaveLength(1);
      expect(errors[0]?.startsWith(`credentials_file: could not read "${testDir.name}/missing.json": `)).toBe(
        true,
      );
    });
  });

  describe('files', () => {
    it('should reject a missing startup_script_file', () => {
      const prepared = prepareConfig(
        {
          project_id: 'project',
          source_image: 'foo',
          ssh_username: 'packer',
          startup_script_file: 'no-such-file',
          zone: 'us-central1-a',
        },
        { logger },
      );
      expect(fieldErrors(prepared)).toEqual(['startup_script_file: file "no-such-file" does not exist']);
    });

    it('should reject missing metadata_files entries', () => {
      expect(fieldErrors(prepare({ metadata_files: { 'user-data': 'no-such-file' } }))).toEqual([
        'metadata_files.user-data: file "no-such-file" does not exist',
      ]);
    });
  });

  describe('IAP', () => {
    it('should tunnel ssh through localhost', () => {
      const { result } = prepareConfig(
        {
          project_id: 'project',
          source_image: 'foo',
          ssh_username: 'packer',
          zone: 'us-central1-a',
          communicator: 'ssh',
          use_iap: true,
        },
        { logger, platform: 'linux' },
      );
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.comm.sshHost).toBe('localhost');
        expect(result.value.comm.sshPort).toBe(0);
        expect(result.value.iapHashBang).toBe('/bin/sh');
        expect(result.value.iapExt).toBe('');
        expect(result.value.iapTunnelLaunchWait).toBe(30);
      }
    });

    it('should tunnel winrm through localhost with Windows script defaults', () => {
      const { result } = prepareConfig(
        {
          project_id: 'project',
          source_image: 'foo',
          winrm_username: 'packer',
          zone: 'us-central1-a',
          communicator: 'winrm',
          use_iap: true,
          iap_localhost_port: 8447,
        },
        { logger, platform: 'win32' },
      );
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.comm.winrmHost).toBe('localhost');
        expect(result.value.comm.winrmPort).toBe(8447);
        expect(result.value.iapHashBang).toBe('');
        expect(result.value.iapExt).toBe('.cmd');
      }
    });

    it('should reject IAP without a communicator', () => {
      const prepared = prepareConfig(
        {
          project_id: 'project',
          source_image: 'foo',
          winrm_username: 'packer',
          zone: 'us-central1-a',
          communicator: 'none',
          iap_hashbang: '/bin/bash',
          iap_ext: '.ps1',
          use_iap: true,
        },
        { logger },
      );
      expect(fieldErrors(prepared)).toEqual(['IAP tunnel is not implemented for none communicator']);
    });
  });

  describe('defaults', () => {
    it('should default to an ssh communicator on port 22', () => {
      const { result } = prepare();
      expect(result.ok && result.value.comm.type).toBe('ssh');
      expect(result.ok && result.value.comm.sshPort).toBe(22);
    });

    it('should fill instance defaults', () => {
      const { result } = prepare();
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.machineType).toBe('e2-standard-2');
        expect(result.value.diskSizeGb).toBe(20);
        expect(result.value.diskType).toBe('pd-standard');
        expect(result.value.network).toBe('default');
        expect(result.value.stateTimeout).toBe(300_000);
        expect(result.value.scopes).toEqual([
          'https://www.googleapis.com/auth/userinfo.email',
          'https://www.googleapis.com/auth/compute',
          'https://www.googleapis.com/auth/devstorage.full_control',
        ]);
        expect(result.value.machineImageAlreadyExists).toBe(false);
        expect(result.value.imageSourceDisk).toBe('');
      }
    });

    it('should use the default scopes when scopes is empty', () => {
      const { result } = prepare({ scopes: [] });
      expect(result.ok && result.value.scopes).toEqual([
        'https://www.googleapis.com/auth/userinfo.email',
        'https://www.googleapis.com/auth/compute',
        'https://www.googleapis.com/auth/devstorage.full_control',
      ]);
    });

    it('should keep explicit scopes', () => {
      const { result } = prepare({ scopes: ['https://www.googleapis.com/auth/cloud-platform'] });
      expect(result.ok && result.value.scopes).toEqual(['https://www.googleapis.com/auth/cloud-platform']);
    });

    it('should leave network empty when a subnetwork is set', () => {
      const { result } = prepare({ subnetwork: 'builders' });
      expect(result.ok && result.value.network).toBe('');
    });

    it('should render the default machine image name', () => {
      const { result } = prepare();
      expect(result.ok && result.value.machineImageName).toBe(`packer-${TEST_TIMESTAMP}`);
    });

    it('should render the machine image name without a fixed clock', () => {
      for (let i = 0; i < 2; i++) {
        const { result } = prepareConfig(testConfig(testDir.name), { logger });
        expect(result.ok).toBe(true);
        if (result.ok) {
          expect(result.value.machineImageName.startsWith('packer-')).toBe(true);
          expect(result.value.machineImageName).not.toContain('{{');
        }
      }
    });

    it('should name the instance with a uuid and reuse it for the boot disk', () => {
      const { result } = prepare();
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.instanceName).toMatch(
          /^packer-[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
        );
        expect(result.value.diskName).toBe(result.value.instanceName);
      }
    });

    it('should derive the region from the zone', () => {
      const { result } = prepare();
      expect(result.ok && result.value.region).toBe('us-east1');
    });
  });

  describe('templates', () => {
    it('should render user variables and the build name', () => {
      const { result } = prepare({
        machine_image_name: 'app-{{user "version"}}',
        machine_image_description: '{{ build_name }} at {{isotime}}',
        labels: { built: '{{timestamp}}' },
        packer_user_variables: { version: '1-2' },
        packer_build_name: 'nightly',
      });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.machineImageName).toBe('app-1-2');
        expect(result.value.machineImageDescription).toBe('nightly at 2024-01-02T03:04:05Z');
        expect(result.value.labels).toEqual({ built: TEST_TIMESTAMP });
      }
    });

    it('should report unknown template functions against the field', () => {
      expect(fieldErrors(prepare({ machine_image_name: '{{nope}}' }))).toEqual([
        'machine_image_name: template: function "nope" not defined',
      ]);
    });
  });

  describe('networking', () => {
    it('should require use_internal_ip for omit_external_ip', () => {
      expect(fieldErrors(prepare({ omit_external_ip: true }))).toEqual([
        "'omit_external_ip' requires 'use_internal_ip' to be true",
      ]);
      expect(prepare({ omit_external_ip: true, use_internal_ip: 'true' }).result.ok).toBe(true);
    });
  });

  describe('disk attachments', () => {
    it('should forward the build zone to extra disks', () => {
      const { result } = prepare({ disk_attachment: [{ volume_type: 'scratch', volume_size: 375 }] });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.extraBlockDevices).toHaveLength(1);
        const [device] = result.value.extraBlockDevices;
        expect(device?.zone).toBe(result.value.zone);
        expect(device?.diskName).toBe(`${result.value.instanceName}-1`);
      }
    });

    it('should use the create_image disk as the image source', () => {
      const { result } = prepare({
        disk_attachment: [
          { volume_type: 'pd-standard', volume_size: 20, disk_name: 'second-disk', create_image: true },
        ],
      });
      expect(result.ok && result.value.imageSourceDisk).toBe('second-disk');
    });

    it('should reject more than one create_image disk', () => {
      const prepared = prepare({
        disk_attachment: [
          { volume_type: 'pd-standard', volume_size: 20, disk_name: 'second-disk', create_image: true },
          { volume_type: 'pd-standard', volume_size: 20, disk_name: 'third-disk', create_image: true },
        ],
      });
      expect(fieldErrors(prepared)).toEqual([
        'only one disk_attachment may set create_image, found 2: second-disk, third-disk',
      ]);
    });

    it('should accept a single disk_attachment object', () => {
      const { result } = prepare({ disk_attachment: { volume_type: 'pd-ssd', volume_size: 10 } });
      expect(result.ok && result.value.extraBlockDevices.map((device) => device.volumeType)).toEqual([
        'pd-ssd',
      ]);
    });

    it('should reject a non-positive boot disk size', () => {
      expect(fieldErrors(prepare({ disk_size: 0 }))).toEqual(['disk_size: must be greater than 0']);
    });
  });
});

describe('deriveRegion', () => {
  it.each([
    ['us-east1-a', 'us-east1'],
    ['europe-west4-c', 'europe-west4'],
    ['us-central1-f', 'us-central1'],
  ])('%s → %s', (zone, region) => {
    expect(deriveRegion(zone)).toBe(region);
  });

  it('should return a zone without a letter suffix unchanged', () => {
    expect(deriveRegion('foo')).toBe('foo');
  });
});

describe('mergeRaw', () => {
  it('should let later sources win per key', () => {
    const merged = mergeRaw({ zone: 'a', project_id: 'p' }, undefined, { zone: 'b' });
    expect(merged).toEqual({ ok: true, value: { zone: 'b', project_id: 'p' } });
  });

  it('should keep __proto__ as an own key', () => {
    const merged = mergeRaw(JSON.parse('{"__proto__":{"x":1}}'), { zone: 'b' });
    expect(merged.ok && Object.keys(merged.value)).toEqual(['__proto__', 'zone']);
  });

  it('should reject a source that is not an object', () => {
    const merged = mergeRaw({ zone: 'a' }, ['zone']);
    expect(merged.ok).toBe(false);
    expect(!merged.ok && merged.error).toBe('configuration source 1 is not an object');
  });
});
