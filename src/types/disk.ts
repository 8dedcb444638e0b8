/**
 * Type definitions for the disk and partition models
 */

import type { DiskError } from '../errors/index.js';

export interface PresentAttr<T> {
  readonly state: 'present';
  readonly value: T;
}

export interface AbsentAttr {
  readonly state: 'absent';
}

export interface FailedAttr {
  readonly state: 'error';
  readonly error: DiskError;
}

/**
 * Optional attribute value. 'absent' means the host does not expose the
 * attribute, 'error' means it exists but could not be read.
 */
export type Attr<T> = PresentAttr<T> | AbsentAttr | FailedAttr;

export type DiskType = 'HDD' | 'SSD' | 'NVMe' | 'LOOP' | 'OTHER';

export type PartitionTableType = 'gpt' | 'mbr';

export type FilesystemUsage = 'filesystem' | 'other' | 'raid' | 'crypto';

/**
 * metric: powers of 1000 (kB, MB), iec: powers of 1024 (KiB, MiB),
 * legacy: powers of 1024 with metric-looking symbols (KB, MB)
 */
export type SizeUnits = 'metric' | 'iec' | 'legacy';

export interface DiskAttributes {
  name: string;
  path: string;
  deviceId: string;
  type: DiskType;
  /** In 512-byte sectors */
  size: number;
  byIdPaths: Attr<readonly string[]>;
  byPathPaths: Attr<readonly string[]>;
  serialNumber: Attr<string>;
  wwn: Attr<string>;
  model: Attr<string>;
  firmware: Attr<string>;
  physicalBlockSize: Attr<number>;
  logicalBlockSize: Attr<number>;
  partitionTableType: Attr<PartitionTableType>;
  partitionTableUuid: Attr<string>;
}

export interface PartitionAttributes {
  name: string;
  path: string;
  deviceId: string;
  diskName: string;
  /** In 512-byte sectors */
  size: number;
  byIdPaths: Attr<readonly string[]>;
  byPath: Attr<string>;
  byPartUuid: Attr<string>;
  byPartLabel: Attr<string>;
  byUuid: Attr<string>;
  byLabel: Attr<string>;
  scheme: Attr<string>;
  label: Attr<string>;
  uuid: Attr<string>;
  typeUuid: Attr<string>;
  number: Attr<number>;
  offset: Attr<number>;
  fsLabel: Attr<string>;
  fsUuid: Attr<string>;
  fsType: Attr<string>;
  fsVersion: Attr<string>;
  fsUsage: Attr<FilesystemUsage>;
  /** In 512-byte units */
  fsFreeSize: Attr<number>;
  mountPoint: Attr<string>;
}

/** Attribute keys that hold an Attr rather than a mandatory value */
export type OptionalDiskAttribute = {
  [K in keyof DiskAttributes]: DiskAttributes[K] extends Attr<unknown> ? K : never;
}[keyof DiskAttributes];

export type OptionalPartitionAttribute = {
  [K in keyof PartitionAttributes]: PartitionAttributes[K] extends Attr<unknown> ? K : never;
}[keyof PartitionAttributes];

export type TemperatureReading =
  | { supported: true; celsius: number; source: 'hwmon' | 'smart' }
  | { supported: false };

export interface DiskSummary {
  name: string;
  path: string;
  deviceId: string;
  type: DiskType;
  size: number;
  model?: string;
  serialNumber?: string;
  wwn?: string;
  firmware?: string;
  physicalBlockSize?: number;
  logicalBlockSize?: number;
  partitionTableType?: PartitionTableType;
  partitionTableUuid?: string;
  byIdPaths: readonly string[];
  byPathPaths: readonly string[];
}

export interface PartitionSummary {
  name: string;
  path: string;
  deviceId: string;
  diskName: string;
  size: number;
  number?: number;
  offset?: number;
  scheme?: string;
  label?: string;
  uuid?: string;
  typeUuid?: string;
  fsType?: string;
  fsVersion?: string;
  fsUsage?: FilesystemUsage;
  fsLabel?: string;
  fsUuid?: string;
  fsFreeSize?: number;
  mountPoint?: string;
}
