/**
 * Partition model and its builder
 */

import {
  PartitionEnumerationError,
  TextDecodingError,
  getErrorMessage,
  toError,
} from '../errors/index.js';
import type { DiskContext, PartitionRecord, PersistentNameScheme } from '../types/adapters.js';
import type {
  Attr,
  FilesystemUsage,
  OptionalPartitionAttribute,
  PartitionAttributes,
  PartitionSummary,
  SizeUnits,
} from '../types/disk.js';
import { absent, attrValue, failed, firstOf, present } from '../utils/attr.js';
import { sizeInHrf, type HumanValue } from '../utils/size.js';
import { decodeText } from '../utils/text.js';
import type { Disk } from './disk.js';
import { collectPersistentNames } from './resolver.js';

const PARTITION_SCHEMES: readonly PersistentNameScheme[] = [
  'by-id',
  'by-path',
  'by-partuuid',
  'by-partlabel',
  'by-uuid',
  'by-label',
];

const FILESYSTEM_USAGES: readonly FilesystemUsage[] = ['filesystem', 'other', 'raid', 'crypto'];

export class Partition {
  private readonly attrs: Readonly<PartitionAttributes>;

  constructor(attributes: PartitionAttributes) {
    this.attrs = Object.freeze({ ...attributes });
  }

  getName(): string {
    return this.attrs.name;
  }

  getPath(): string {
    return this.attrs.path;
  }

  getDeviceId(): string {
    return this.attrs.deviceId;
  }

  /** Kernel name of the disk holding the partition */
  getDiskName(): string {
    return this.attrs.diskName;
  }

  /** Size in 512-byte sectors */
  getSize(): number {
    return this.attrs.size;
  }

  getSizeInHrf(units: SizeUnits = 'metric'): HumanValue {
    return sizeInHrf(this.attrs.size * 512, units);
  }

  getByIdPaths(): readonly string[] {
    return attrValue(this.attrs.byIdPaths) ?? [];
  }

  getByPath(): string | undefined {
    return attrValue(this.attrs.byPath);
  }

  getByPartUuid(): string | undefined {
    return attrValue(this.attrs.byPartUuid);
  }

  getByPartLabel(): string | undefined {
    return attrValue(this.attrs.byPartLabel);
  }

  getByUuid(): string | undefined {
    return attrValue(this.attrs.byUuid);
  }

  getByLabel(): string | undefined {
    return attrValue(this.attrs.byLabel);
  }

  /** Partition table scheme, gpt or dos */
  getScheme(): string | undefined {
    return attrValue(this.attrs.scheme);
  }

  getLabel(): string | undefined {
    return attrValue(this.attrs.label);
  }

  getUuid(): string | undefined {
    return attrValue(this.attrs.uuid);
  }

  getTypeUuid(): string | undefined {
    return attrValue(this.attrs.typeUuid);
  }

  getNumber(): number | undefined {
    return attrValue(this.attrs.number);
  }

  /** Start sector on the disk */
  getOffset(): number | undefined {
    return attrValue(this.attrs.offset);
  }

  getFsLabel(): string | undefined {
    return attrValue(this.attrs.fsLabel);
  }

  getFsUuid(): string | undefined {
    return attrValue(this.attrs.fsUuid);
  }

  getFsType(): string | undefined {
    return attrValue(this.attrs.fsType);
  }

  getFsVersion(): string | undefined {
    return attrValue(this.attrs.fsVersion);
  }

  getFsUsage(): FilesystemUsage | undefined {
    return attrValue(this.attrs.fsUsage);
  }

  /** Free space in 512-byte units, only known for mounted filesystems */
  getFsFreeSize(): number | undefined {
    return attrValue(this.attrs.fsFreeSize);
  }

  getFsFreeSizeInHrf(units: SizeUnits = 'metric'): HumanValue | undefined {
    const free = this.getFsFreeSize();
    return free === undefined ? undefined : sizeInHrf(free * 512, units);
  }

  getMountPoint(): string | undefined {
    return attrValue(this.attrs.mountPoint);
  }

  hasFilesystem(): boolean {
    return this.attrs.fsUsage.state === 'present';
  }

  attribute<K extends OptionalPartitionAttribute>(key: K): PartitionAttributes[K] {
    return this.attrs[key];
  }

  toJSON(): PartitionSummary {
    return {
      name: this.attrs.name,
      path: this.attrs.path,
      deviceId: this.attrs.deviceId,
      diskName: this.attrs.diskName,
      size: this.attrs.size,
      number: this.getNumber(),
      offset: this.getOffset(),
      scheme: this.getScheme(),
      label: this.getLabel(),
      uuid: this.getUuid(),
      typeUuid: this.getTypeUuid(),
      fsType: this.getFsType(),
      fsVersion: this.getFsVersion(),
      fsUsage: this.getFsUsage(),
      fsLabel: this.getFsLabel(),
      fsUuid: this.getFsUuid(),
      fsFreeSize: this.getFsFreeSize(),
      mountPoint: this.getMountPoint(),
    };
  }

  toString(): string {
    const fs = this.getFsType();
    return fs ? `${this.attrs.name} (${fs})` : this.attrs.name;
  }
}

function optional<T>(value: T | undefined): Attr<T> {
  return value === undefined || value === '' ? absent : present(value);
}

function filesystemUsage(usage: string | undefined): Attr<FilesystemUsage> {
  if (usage === undefined) {
    return absent;
  }
  // blkid usages outside the known set are non-filesystem content
  return present(FILESYSTEM_USAGES.find((known) => known === usage) ?? 'other');
}

/**
 * Orders by partition number, partitions without one last, then by name
 */
export function comparePartitions(a: Partition, b: Partition): number {
  const left = a.getNumber() ?? Number.MAX_SAFE_INTEGER;
  const right = b.getNumber() ?? Number.MAX_SAFE_INTEGER;
  if (left !== right) {
    return left - right;
  }
  const nameA = a.getName();
  const nameB = b.getName();
  return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
}

async function buildPartition(disk: Disk, record: PartitionRecord, ctx: DiskContext): Promise<Partition> {
  const names = await collectPersistentNames(record.name, PARTITION_SCHEMES, ctx);
  const link = (scheme: PersistentNameScheme): Attr<string> => {
    const found = names.get(scheme);
    return found ? firstOf(found) : absent;
  };

  const decode = (field: string, bytes: Buffer | undefined): Attr<string> => {
    if (bytes === undefined || bytes.length === 0) {
      return absent;
    }
    try {
      return optional(decodeText(bytes, ctx.encoding));
    } catch (error) {
      ctx.logger.debug(`Cannot decode ${field} as ${ctx.encoding}`, { device: record.name });
      return failed(new TextDecodingError(record.name, field, ctx.encoding, toError(error)));
    }
  };

  const fs = record.filesystem;

  return new Partition({
    name: record.name,
    path: `${ctx.devRoot}/${record.name}`,
    deviceId: record.deviceId,
    diskName: disk.getName(),
    size: record.size,
    byIdPaths: names.get('by-id') ?? present([]),
    byPath: link('by-path'),
    byPartUuid: link('by-partuuid'),
    byPartLabel: link('by-partlabel'),
    byUuid: link('by-uuid'),
    byLabel: link('by-label'),
    scheme: optional(record.scheme),
    label: decode('label', record.label),
    uuid: optional(record.uuid),
    typeUuid: optional(record.typeUuid),
    number: optional(record.number),
    offset: optional(record.offset),
    fsLabel: fs ? decode('fsLabel', fs.label) : absent,
    fsUuid: optional(fs?.uuid),
    fsType: optional(fs?.type),
    fsVersion: optional(fs?.version),
    fsUsage: fs ? filesystemUsage(fs.usage ?? 'filesystem') : absent,
    fsFreeSize: fs ? optional(record.freeSize) : absent,
    mountPoint: fs ? decode('mountPoint', record.mountPoint) : absent,
  });
}

/**
 * Partitions of a disk ordered by partition number. A disk without a
 * partition table yields an empty list.
 */
export async function buildPartitionList(disk: Disk, ctx: DiskContext): Promise<Partition[]> {
  let records: PartitionRecord[];
  try {
    records = await ctx.partitions.listPartitions(disk.getName());
  } catch (error) {
    if (error instanceof PartitionEnumerationError) {
      throw error;
    }
    throw new PartitionEnumerationError(disk.getName(), getErrorMessage(error), toError(error));
  }

  const partitions: Partition[] = [];
  for (const record of records) {
    partitions.push(await buildPartition(disk, record, ctx));
  }
  return partitions.sort(comparePartitions);
}
