/**
 * Test utilities: in-memory host fixtures and factories
 */

import type { SmartctlReport } from '../adapters/smartctl-schema.js';
import { Logger } from '../logger/index.js';
import type {
  DiskContext,
  PartitionEnumerator,
  PartitionRecord,
  PersistentNameScheme,
  SmartBackend,
  SysfsAdapter,
  UdevAdapter,
} from '../types/adapters.js';
import type { PowerMode } from '../types/smart.js';

export interface FixtureDevice {
  name: string;
  deviceId: string;
  /** Files below /sys/class/block/<name>, keyed by relative path */
  attributes?: Record<string, string>;
  /** udev E: properties */
  properties?: Record<string, string | Buffer>;
}

interface StoredDevice {
  deviceId: string;
  attributes: Map<string, string>;
  properties: Map<string, Buffer>;
  parent?: string;
}

/**
 * In-memory sysfs and udev for a made-up host
 */
export class FixtureHost implements SysfsAdapter, UdevAdapter {
  private readonly devices = new Map<string, StoredDevice>();
  private readonly blockDevices: string[] = [];
  private readonly links = new Map<PersistentNameScheme, Array<{ entry: string; target: string }>>();

  /** `${name}/${attribute}` pairs whose read fails with an I/O error */
  readonly failingAttributes = new Set<string>();
  readonly failingSchemes = new Set<PersistentNameScheme>();
  /** Device ids whose udev database entry cannot be read */
  readonly failingProperties = new Set<string>();

  addDisk(device: FixtureDevice): this {
    this.store(device);
    this.blockDevices.push(device.name);
    return this;
  }

  addPartition(parent: string, device: FixtureDevice): this {
    this.store(device, parent);
    return this;
  }

  addLink(scheme: PersistentNameScheme, entry: string, target: string): this {
    const entries = this.links.get(scheme) ?? [];
    entries.push({ entry, target });
    this.links.set(scheme, entries);
    return this;
  }

  /** Update a sysfs attribute of a registered device */
  setAttribute(name: string, attribute: string, value: string | null): this {
    const device = this.devices.get(name);
    if (device) {
      if (value === null) {
        device.attributes.delete(attribute);
      } else {
        device.attributes.set(attribute, value);
      }
    }
    return this;
  }

  private store(device: FixtureDevice, parent?: string): void {
    const attributes = new Map<string, string>([['dev', device.deviceId]]);
    for (const [key, value] of Object.entries(device.attributes ?? {})) {
      attributes.set(key, value);
    }
    const properties = new Map<string, Buffer>();
    for (const [key, value] of Object.entries(device.properties ?? {})) {
      properties.set(key, typeof value === 'string' ? Buffer.from(value, 'utf-8') : value);
    }
    this.devices.set(device.name, { deviceId: device.deviceId, attributes, properties, parent });
  }

  async listBlockDevices(): Promise<string[]> {
    return [...this.blockDevices];
  }

  async readAttribute(name: string, attribute: string): Promise<string | null> {
    if (this.failingAttributes.has(`${name}/${attribute}`)) {
      throw new Error(`EIO: i/o error, read '${name}/${attribute}'`);
    }
    return this.devices.get(name)?.attributes.get(attribute) ?? null;
  }

  async listEntries(name: string, dir: string): Promise<string[] | null> {
    const device = this.devices.get(name);
    if (!device) {
      return null;
    }

    const prefix = dir === '' ? '' : `${dir}/`;
    const entries: string[] = [];
    for (const key of device.attributes.keys()) {
      if (key.startsWith(prefix)) {
        const [entry] = key.slice(prefix.length).split('/');
        if (entry && !entries.includes(entry)) {
          entries.push(entry);
        }
      }
    }
    if (dir === '') {
      for (const [child, stored] of this.devices) {
        if (stored.parent === name) {
          entries.push(child);
        }
      }
    }
    return entries.length > 0 || dir === '' ? entries : null;
  }

  linkPath(scheme: PersistentNameScheme, entry: string): string {
    return `/dev/disk/${scheme}/${entry}`;
  }

  async listLinks(scheme: PersistentNameScheme): Promise<string[]> {
    if (this.failingSchemes.has(scheme)) {
      throw new Error(`EACCES: permission denied, scandir '/dev/disk/${scheme}'`);
    }
    return (this.links.get(scheme) ?? []).map(({ entry }) => this.linkPath(scheme, entry));
  }

  async resolveLink(path: string): Promise<string | null> {
    for (const [scheme, entries] of this.links) {
      const link = entries.find(({ entry }) => this.linkPath(scheme, entry) === path);
      if (link) {
        return `/dev/${link.target}`;
      }
    }
    const name = path.startsWith('/dev/') ? path.slice('/dev/'.length) : undefined;
    return name !== undefined && this.devices.has(name) ? path : null;
  }

  async readProperties(deviceId: string): Promise<Map<string, Buffer> | null> {
    if (this.failingProperties.has(deviceId)) {
      throw new Error(`EIO: i/o error, read 'b${deviceId}'`);
    }
    for (const device of this.devices.values()) {
      if (device.deviceId === deviceId) {
        return new Map(device.properties);
      }
    }
    return null;
  }
}

export class FixtureSmartBackend implements SmartBackend {
  readonly calls: Array<{ operation: 'queryPowerMode' | 'readSmart'; devicePath: string }> = [];
  powerMode: PowerMode = 'active';
  report: SmartctlReport | Error = createMockAtaReport();

  async queryPowerMode(devicePath: string): Promise<PowerMode> {
    this.calls.push({ operation: 'queryPowerMode', devicePath });
    return this.powerMode;
  }

  async readSmart(devicePath: string): Promise<SmartctlReport> {
    this.calls.push({ operation: 'readSmart', devicePath });
    if (this.report instanceof Error) {
      throw this.report;
    }
    return this.report;
  }
}

export class FixturePartitionEnumerator implements PartitionEnumerator {
  readonly records = new Map<string, PartitionRecord[]>();
  failure?: Error;

  async listPartitions(diskName: string): Promise<PartitionRecord[]> {
    if (this.failure) {
      throw this.failure;
    }
    return this.records.get(diskName) ?? [];
  }
}

/**
 * Logger that stays quiet during tests
 */
export function createTestLogger(): Logger {
  return new Logger({ level: 'error', format: 'simple', maxFiles: 1, maxSize: '1m' });
}

export function createTestContext(
  host: FixtureHost = new FixtureHost(),
  overrides?: Partial<DiskContext>
): DiskContext {
  return {
    sysfs: host,
    udev: host,
    smart: new FixtureSmartBackend(),
    partitions: new FixturePartitionEnumerator(),
    logger: createTestLogger(),
    devRoot: '/dev',
    encoding: 'utf-8',
    ...overrides,
  };
}

/**
 * Create a smartctl report for a healthy ATA drive
 */
export function createMockAtaReport(overrides?: Partial<SmartctlReport>): SmartctlReport {
  return {
    smartctl: { exit_status: 0 },
    device: { name: '/dev/sda', type: 'sat', protocol: 'ATA' },
    smart_support: { available: true, enabled: true },
    smart_status: { passed: true },
    temperature: { current: 31 },
    ata_smart_attributes: {
      table: [
        {
          id: 5,
          name: 'Reallocated_Sector_Ct',
          value: 100,
          worst: 100,
          thresh: 10,
          when_failed: '',
          flags: { value: 51, string: 'PO--CK ', prefailure: true, updated_online: true },
          raw: { value: 0, string: '0' },
        },
        {
          id: 9,
          name: 'Power_On_Hours',
          value: 97,
          worst: 97,
          thresh: 0,
          when_failed: '',
          flags: { value: 50, string: '-O--CK ', prefailure: false, updated_online: true },
          raw: { value: 12034, string: '12034' },
        },
        {
          id: 194,
          name: 'Temperature_Celsius',
          value: 69,
          worst: 52,
          thresh: 0,
          when_failed: '',
          flags: { value: 34, string: '-O---K ', prefailure: false, updated_online: true },
          raw: { value: 31, string: '31 (Min/Max 18/48)' },
        },
      ],
    },
    ...overrides,
  };
}

/**
 * Create a smartctl report for a healthy NVMe drive
 */
export function createMockNvmeReport(overrides?: Partial<SmartctlReport>): SmartctlReport {
  return {
    smartctl: { exit_status: 0 },
    device: { name: '/dev/nvme0n1', type: 'nvme', protocol: 'NVMe' },
    smart_status: { passed: true },
    temperature: { current: 38 },
    nvme_smart_health_information_log: {
      critical_warning: 0,
      temperature: 38,
      available_spare: 100,
      available_spare_threshold: 10,
      percentage_used: 2,
      data_units_read: 1234567,
      data_units_written: 2345678,
      host_reads: 34567890,
      host_writes: 45678901,
      controller_busy_time: 321,
      power_cycles: 150,
      power_on_hours: 4321,
      unsafe_shutdowns: 12,
      media_errors: 0,
      num_err_log_entries: 3,
      warning_temp_time: 0,
      critical_comp_time: 0,
    },
    ...overrides,
  };
}

export const SAMPLE_SSD_SERIAL = 'S3D2NY0J819218R';
export const SAMPLE_SSD_BY_ID = `ata-Samsung_SSD_850_PRO_1TB_${SAMPLE_SSD_SERIAL}`;
export const SAMPLE_SSD_WWN = '0x5002538d40a0eb4f';

/**
 * A host with one SSD (two partitions), one HDD, one NVMe drive and a loop device,
 * listed in /sys/block as sdb, nvme0n1, sda, loop0.
 */
export function createMockHost(): FixtureHost {
  return new FixtureHost()
    .addDisk({
      name: 'sdb',
      deviceId: '8:16',
      attributes: {
        size: '7814037168',
        'queue/rotational': '1',
        'queue/physical_block_size': '4096',
        'queue/logical_block_size': '512',
        'device/model': 'WDC WD40EFRX-68N',
        'device/rev': '0A82',
        'device/hwmon/hwmon3/temp1_input': '34000',
      },
      properties: {
        ID_SERIAL_SHORT: 'WD-WCC7K0000001',
        ID_PART_TABLE_TYPE: 'dos',
        ID_PART_TABLE_UUID: '4f2a7c1e',
      },
    })
    .addDisk({
      name: 'nvme0n1',
      deviceId: '259:0',
      attributes: {
        size: '1953525168',
        'queue/rotational': '0',
        'queue/physical_block_size': '512',
        'queue/logical_block_size': '512',
        'device/firmware_rev': '2B2QEXM7',
      },
      properties: {
        ID_SERIAL_SHORT: 'S4EWNX0R000001',
        ID_WWN: 'eui.0025385b71b0a1f2',
        ID_MODEL: 'Samsung SSD 970 EVO Plus 1TB',
      },
    })
    .addDisk({
      name: 'sda',
      deviceId: '8:0',
      attributes: {
        size: '2000409264',
        'queue/rotational': '0',
        'queue/physical_block_size': '512',
        'queue/logical_block_size': '512',
        'device/model': 'Samsung SSD 850',
      },
      properties: {
        ID_SERIAL_SHORT: SAMPLE_SSD_SERIAL,
        ID_WWN: SAMPLE_SSD_WWN,
        ID_MODEL_ENC: 'Samsung\\x20SSD\\x20850\\x20PRO\\x201TB',
        ID_MODEL: 'Samsung_SSD_850_PRO_1TB',
        ID_REVISION: 'EXM04B6Q',
        ID_PART_TABLE_TYPE: 'gpt',
        ID_PART_TABLE_UUID: '7c1e4f2a-1111-4222-8333-944455556666',
      },
    })
    .addPartition('sda', {
      name: 'sda2',
      deviceId: '8:2',
      attributes: { partition: '2', size: '1999358000', start: '1050624' },
    })
    .addPartition('sda', {
      name: 'sda1',
      deviceId: '8:1',
      attributes: { partition: '1', size: '1048576', start: '2048' },
    })
    .addDisk({
      name: 'loop0',
      deviceId: '7:0',
      attributes: { size: '131072', 'queue/rotational': '0' },
    })
    .addLink('by-id', SAMPLE_SSD_BY_ID, 'sda')
    .addLink('by-id', `wwn-${SAMPLE_SSD_WWN}`, 'sda')
    .addLink('by-id', 'nvme-Samsung_SSD_970_EVO_Plus_1TB_S4EWNX0R000001', 'nvme0n1')
    .addLink('by-id', `${SAMPLE_SSD_BY_ID}-part1`, 'sda1')
    .addLink('by-id', 'ata-WDC_WD40EFRX-68N32N0_WD-WCC7K0000001', 'sdb')
    .addLink('by-path', 'pci-0000:00:17.0-ata-1', 'sda')
    .addLink('by-path', 'pci-0000:00:17.0-ata-1-part1', 'sda1')
    .addLink('by-path', 'pci-0000:00:17.0-ata-2', 'sdb')
    .addLink('by-partuuid', '0f1e2d3c-0000-4000-8000-000000000001', 'sda1')
    .addLink('by-uuid', 'A1B2-C3D4', 'sda1')
    .addLink('by-label', 'EFI', 'sda1');
}

/**
 * Create a partition record for testing
 */
export function createMockPartitionRecord(overrides?: Partial<PartitionRecord>): PartitionRecord {
  return {
    name: 'sda1',
    deviceId: '8:1',
    size: 1048576,
    scheme: 'gpt',
    label: Buffer.from('EFI system partition', 'utf-8'),
    uuid: '0f1e2d3c-0000-4000-8000-000000000001',
    typeUuid: 'c12a7328-f81f-11d2-ba4b-00a0c93ec93b',
    number: 1,
    offset: 2048,
    filesystem: {
      type: 'vfat',
      usage: 'filesystem',
      version: 'FAT32',
      uuid: 'A1B2-C3D4',
      label: Buffer.from('EFI', 'utf-8'),
    },
    freeSize: 1000000,
    mountPoint: Buffer.from('/boot/efi', 'utf-8'),
    ...overrides,
  };
}
