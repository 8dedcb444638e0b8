/**
 * Enumeration of every whole disk on the host
 */

import { ConfigurationError, getErrorMessage } from '../errors/index.js';
import type { DiskContext } from '../types/adapters.js';
import type { DiskType } from '../types/disk.js';
import { buildDisk } from './builder.js';
import { DISK_TYPES, isDiskType, probeDiskType } from './classify.js';
import type { Disk } from './disk.js';

export const DEFAULT_INCLUDED_TYPES: readonly DiskType[] = ['HDD', 'SSD', 'NVMe'];

export interface DiskTypeFilter {
  include?: Iterable<DiskType>;
  exclude?: Iterable<DiskType>;
}

export interface DiscoveryOptions extends DiskTypeFilter {
  /** Sort by kernel name instead of enumeration order */
  sort?: boolean;
  /** Reverse the sorted order, ignored without sort */
  reverse?: boolean;
}

function toTypeSet(types: Iterable<DiskType>, option: string): Set<DiskType> {
  const set = new Set<DiskType>();
  for (const type of types) {
    if (!isDiskType(type)) {
      throw new ConfigurationError(`Unknown disk type in ${option}: ${String(type)}`, {
        option,
        allowed: DISK_TYPES,
      });
    }
    set.add(type);
  }
  return set;
}

/**
 * Build a predicate for a type filter. A type both included and excluded is excluded.
 */
export function createTypeMatcher(filter: DiskTypeFilter = {}): (type: DiskType) => boolean {
  const include = toTypeSet(filter.include ?? DEFAULT_INCLUDED_TYPES, 'include');
  const exclude = toTypeSet(filter.exclude ?? [], 'exclude');
  return (type) => include.has(type) && !exclude.has(type);
}

export function orderDisks(disks: readonly Disk[], options: DiscoveryOptions = {}): Disk[] {
  const result = [...disks];
  if (options.sort) {
    result.sort((a, b) => a.compare(b));
    if (options.reverse) {
      result.reverse();
    }
  }
  return result;
}

/**
 * Classify every block device, then build only the ones the filter keeps.
 * Devices that fail to build are logged and left out.
 */
export async function discoverDisks(ctx: DiskContext, options: DiscoveryOptions = {}): Promise<Disk[]> {
  const matches = createTypeMatcher(options);
  const disks: Disk[] = [];

  for (const name of await ctx.sysfs.listBlockDevices()) {
    try {
      // Partitions never belong in /sys/block, but stacked drivers have exposed them there
      if ((await ctx.sysfs.readAttribute(name, 'partition')) !== null) {
        continue;
      }
      const type = await probeDiskType(name, ctx.sysfs);
      if (type === null) {
        ctx.logger.warn('Skipping block device without device number', { device: name });
        continue;
      }
      if (!matches(type)) {
        continue;
      }
      disks.push(await buildDisk(name, ctx));
    } catch (error) {
      ctx.logger.warn(`Skipping block device: ${getErrorMessage(error)}`, { device: name });
    }
  }

  ctx.logger.debug(`Discovered ${disks.length} disk(s)`);
  return orderDisks(disks, options);
}

/**
 * Snapshot of the disks present when it was taken. Filtering and sorting
 * work on the snapshot without touching the host again.
 */
export class DiskInfo {
  private constructor(private readonly disks: readonly Disk[]) {}

  /** Discovers disks of every type */
  static async discover(ctx: DiskContext): Promise<DiskInfo> {
    return new DiskInfo(await discoverDisks(ctx, { include: DISK_TYPES }));
  }

  getDiskNumber(filter: DiskTypeFilter = {}): number {
    const matches = createTypeMatcher(filter);
    return this.disks.filter((disk) => matches(disk.getType())).length;
  }

  getDiskList(filter: DiskTypeFilter = {}, sort = false, reverse = false): Disk[] {
    const matches = createTypeMatcher(filter);
    return orderDisks(
      this.disks.filter((disk) => matches(disk.getType())),
      { sort, reverse }
    );
  }

  contains(disk: Disk): boolean {
    return this.disks.some((candidate) => candidate.equals(disk));
  }

  toString(): string {
    return this.disks.map((disk) => disk.toString()).join('\n');
  }
}
