/**
 * Contracts for the host access layer. The core only talks to the host
 * through these interfaces, bundled in a DiskContext.
 */

import type { Logger } from '../logger/index.js';
import type { SmartctlReport } from '../adapters/smartctl-schema.js';
import type { PowerMode } from './smart.js';

export type PersistentNameScheme =
  | 'by-id'
  | 'by-path'
  | 'by-uuid'
  | 'by-label'
  | 'by-partuuid'
  | 'by-partlabel';

export interface SysfsAdapter {
  /** Kernel names under /sys/block, in enumeration order */
  listBlockDevices(): Promise<string[]>;
  /**
   * Read /sys/class/block/<name>/<attribute>, trimmed.
   * Resolves null when the attribute does not exist.
   */
  readAttribute(name: string, attribute: string): Promise<string | null>;
  /** Directory entries below /sys/class/block/<name>/<dir>, or null when missing */
  listEntries(name: string, dir: string): Promise<string[] | null>;
}

export interface UdevAdapter {
  /** Absolute link paths in /dev/disk/<scheme>, in directory order */
  listLinks(scheme: PersistentNameScheme): Promise<string[]>;
  /** Real device path behind a link, or null when it does not resolve */
  resolveLink(path: string): Promise<string | null>;
  linkPath(scheme: PersistentNameScheme, entry: string): string;
  /** E: properties of the udev database entry for a major:minor, or null */
  readProperties(deviceId: string): Promise<Map<string, Buffer> | null>;
}

export interface SmartBackend {
  /** Power mode probe that must not spin up a sleeping drive */
  queryPowerMode(devicePath: string): Promise<PowerMode>;
  readSmart(devicePath: string): Promise<SmartctlReport>;
}

export interface PartitionRecord {
  name: string;
  deviceId: string;
  /** In 512-byte sectors */
  size: number;
  scheme?: string;
  label?: Buffer;
  uuid?: string;
  typeUuid?: string;
  number?: number;
  offset?: number;
  /** Only reported when a filesystem type or usage is known */
  filesystem?: {
    type?: string;
    usage?: string;
    version?: string;
    uuid?: string;
    label?: Buffer;
  };
  /** In 512-byte units */
  freeSize?: number;
  mountPoint?: Buffer;
}

export interface PartitionEnumerator {
  listPartitions(diskName: string): Promise<PartitionRecord[]>;
}

export interface DiskContext {
  sysfs: SysfsAdapter;
  udev: UdevAdapter;
  smart: SmartBackend;
  partitions: PartitionEnumerator;
  logger: Logger;
  /** Directory device nodes live in, /dev on a real host */
  devRoot: string;
  /** Text encoding for free-text fields such as labels and mount points */
  encoding: string;
}
