import type { DiskContext } from '../types/adapters.js';
import type {
  DiskAttributes,
  DiskSummary,
  DiskType,
  OptionalDiskAttribute,
  PartitionTableType,
  SizeUnits,
  TemperatureReading,
} from '../types/disk.js';
import type { SmartSnapshot } from '../types/smart.js';
import { attrValue } from '../utils/attr.js';
import { formatSize, sizeInHrf, type HumanValue } from '../utils/size.js';
import { buildPartitionList, type Partition } from './partition.js';
import { readSmart, readTemperature } from './smart.js';

/**
 * A whole-disk block device.
 *
 * Static attributes are captured when the disk is built and never change.
 * Temperature, SMART data and partitions are read from the host on every call.
 */
export class Disk {
  private readonly attrs: Readonly<DiskAttributes>;

  constructor(
    attributes: DiskAttributes,
    private readonly context: DiskContext
  ) {
    this.attrs = Object.freeze({ ...attributes });
  }

  getName(): string {
    return this.attrs.name;
  }

  getPath(): string {
    return this.attrs.path;
  }

  /** major:minor */
  getDeviceId(): string {
    return this.attrs.deviceId;
  }

  getType(): DiskType {
    return this.attrs.type;
  }

  getTypeStr(): string {
    return this.attrs.type;
  }

  isHdd(): boolean {
    return this.attrs.type === 'HDD';
  }

  isSsd(): boolean {
    return this.attrs.type === 'SSD';
  }

  isNvme(): boolean {
    return this.attrs.type === 'NVMe';
  }

  isLoop(): boolean {
    return this.attrs.type === 'LOOP';
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

  getByPathPaths(): readonly string[] {
    return attrValue(this.attrs.byPathPaths) ?? [];
  }

  getSerialNumber(): string | undefined {
    return attrValue(this.attrs.serialNumber);
  }

  getWwn(): string | undefined {
    return attrValue(this.attrs.wwn);
  }

  getModel(): string | undefined {
    return attrValue(this.attrs.model);
  }

  getFirmware(): string | undefined {
    return attrValue(this.attrs.firmware);
  }

  getPhysicalBlockSize(): number | undefined {
    return attrValue(this.attrs.physicalBlockSize);
  }

  getLogicalBlockSize(): number | undefined {
    return attrValue(this.attrs.logicalBlockSize);
  }

  getPartitionTableType(): PartitionTableType | undefined {
    return attrValue(this.attrs.partitionTableType);
  }

  getPartitionTableUuid(): string | undefined {
    return attrValue(this.attrs.partitionTableUuid);
  }

  /**
   * Raw three-state value, to tell an absent attribute from a failed read
   */
  attribute<K extends OptionalDiskAttribute>(key: K): DiskAttributes[K] {
    return this.attrs[key];
  }

  getTemperature(): Promise<TemperatureReading> {
    return readTemperature(this, this.context);
  }

  /**
   * Unless skipStandbyCheck is set, a drive in standby is left asleep and
   * only reported as such.
   */
  getSmartData(skipStandbyCheck = false): Promise<SmartSnapshot> {
    return readSmart(this, skipStandbyCheck, this.context);
  }

  getPartitionList(): Promise<Partition[]> {
    return buildPartitionList(this, this.context);
  }

  /** Orders disks by kernel name */
  compare(other: Disk): number {
    const a = this.attrs.name;
    const b = other.getName();
    return a < b ? -1 : a > b ? 1 : 0;
  }

  equals(other: Disk): boolean {
    return this.attrs.name === other.getName() && this.attrs.deviceId === other.getDeviceId();
  }

  toJSON(): DiskSummary {
    return {
      name: this.attrs.name,
      path: this.attrs.path,
      deviceId: this.attrs.deviceId,
      type: this.attrs.type,
      size: this.attrs.size,
      model: this.getModel(),
      serialNumber: this.getSerialNumber(),
      wwn: this.getWwn(),
      firmware: this.getFirmware(),
      physicalBlockSize: this.getPhysicalBlockSize(),
      logicalBlockSize: this.getLogicalBlockSize(),
      partitionTableType: this.getPartitionTableType(),
      partitionTableUuid: this.getPartitionTableUuid(),
      byIdPaths: this.getByIdPaths(),
      byPathPaths: this.getByPathPaths(),
    };
  }

  toString(): string {
    const model = this.getModel() ?? 'unknown model';
    return `${this.attrs.name} (${this.attrs.type}, ${model}, ${formatSize(this.attrs.size * 512)})`;
  }
}
