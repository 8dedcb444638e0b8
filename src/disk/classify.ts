import type { SysfsAdapter } from '../types/adapters.js';
import type { DiskType } from '../types/disk.js';

export const DISK_TYPES: readonly DiskType[] = ['HDD', 'SSD', 'NVMe', 'LOOP', 'OTHER'];

// Namespaces (nvme0n1) and hidden multipath paths (nvme0c0n1), never partitions
const NVME_NAME = /^nvme\d+(c\d+)?n\d+$/;
const LOOP_NAME = /^loop\d+$/;
const LOOP_MAJOR = 7;

export function isDiskType(value: unknown): value is DiskType {
  return typeof value === 'string' && DISK_TYPES.some((type) => type === value);
}

/**
 * Classify a block device. Naming wins over the rotational flag, since NVMe
 * namespaces and loop devices report rotational 0 like any SSD.
 */
export function classifyDevice(
  name: string,
  deviceId: string,
  rotational: string | undefined
): DiskType {
  if (NVME_NAME.test(name)) {
    return 'NVMe';
  }
  const major = parseInt(deviceId.split(':')[0] ?? '', 10);
  if (major === LOOP_MAJOR || LOOP_NAME.test(name)) {
    return 'LOOP';
  }
  switch (rotational) {
    case '1':
      return 'HDD';
    case '0':
      return 'SSD';
    default:
      return 'OTHER';
  }
}

/**
 * Classify a device from sysfs without building its full model.
 * Resolves null when the device has no device number.
 */
export async function probeDiskType(name: string, sysfs: SysfsAdapter): Promise<DiskType | null> {
  const deviceId = await sysfs.readAttribute(name, 'dev');
  if (deviceId === null) {
    return null;
  }
  const rotational = await sysfs.readAttribute(name, 'queue/rotational');
  return classifyDevice(name, deviceId, rotational ?? undefined);
}
