/**
 * Block device discovery and attribute model for Linux hosts
 */

export { createSystemContext } from './context.js';

export { Disk } from './disk/disk.js';
export { Partition, buildPartitionList, comparePartitions } from './disk/partition.js';
export { buildDisk, openDisk } from './disk/builder.js';
export {
  resolveDisk,
  collectPersistentNames,
  type DiskIdentifier,
  type ResolvedDevice,
} from './disk/resolver.js';
export { classifyDevice, probeDiskType, DISK_TYPES } from './disk/classify.js';
export {
  readSmart,
  readTemperature,
  findSmartAttributeById,
  findSmartAttributeByName,
} from './disk/smart.js';
export {
  DiskInfo,
  discoverDisks,
  createTypeMatcher,
  DEFAULT_INCLUDED_TYPES,
  type DiskTypeFilter,
  type DiscoveryOptions,
} from './disk/discovery.js';

export { FsSysfsAdapter } from './adapters/sysfs.js';
export { FsUdevAdapter } from './adapters/udev.js';
export { SmartctlBackend } from './adapters/smartctl.js';
export { SysfsPartitionEnumerator } from './adapters/partitions.js';
export type { SmartctlReport } from './adapters/smartctl-schema.js';

export { ConfigLoader, getConfig, resetConfig, type Config } from './config/index.js';
export { Logger, getLogger, resetLogger } from './logger/index.js';
export * from './errors/index.js';

export { sizeInHrf, timeInHrf, formatSize, type HumanValue, type TimeUnit } from './utils/size.js';
export { absent, present, failed, attrValue } from './utils/attr.js';

export type * from './types/disk.js';
export type * from './types/smart.js';
export type * from './types/adapters.js';
