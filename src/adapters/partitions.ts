/**
 * Partition enumeration from sysfs children, udev properties and df
 */

import { PartitionEnumerationError, getErrorMessage, toError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type {
  PartitionEnumerator,
  PartitionRecord,
  SysfsAdapter,
  UdevAdapter,
} from '../types/adapters.js';
import { executeCommand } from '../utils/exec.js';
import { unescapeUdev } from '../utils/text.js';

export interface PartitionEnumeratorOptions {
  dfPath: string;
  timeout: number;
  devRoot: string;
}

export interface MountEntry {
  /** Free space in 512-byte units */
  available?: number;
  target: Buffer;
}

const DF_LINE = /^(\S+)\s+(\d+|-)\s+(.*)$/;

/**
 * Parse `df --block-size 512 --output=source,avail,target` output.
 * The text is taken as latin1 so mount point bytes survive untouched.
 */
export function parseDfOutput(output: string): Map<string, MountEntry> {
  const mounts = new Map<string, MountEntry>();
  const lines = output.split('\n').slice(1);

  for (const line of lines) {
    const match = DF_LINE.exec(line.trimEnd());
    const source = match?.[1];
    const available = match?.[2];
    const target = match?.[3];
    if (!source || available === undefined || target === undefined || mounts.has(source)) {
      continue;
    }
    mounts.set(source, {
      available: available === '-' ? undefined : parseInt(available, 10),
      target: Buffer.from(target, 'latin1'),
    });
  }

  return mounts;
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  return parseInt(value, 10);
}

export class SysfsPartitionEnumerator implements PartitionEnumerator {
  constructor(
    private readonly sysfs: SysfsAdapter,
    private readonly udev: UdevAdapter,
    private readonly options: PartitionEnumeratorOptions,
    private readonly logger: Logger
  ) {}

  async listPartitions(diskName: string): Promise<PartitionRecord[]> {
    try {
      const entries = await this.sysfs.listEntries(diskName, '');
      if (entries === null) {
        throw new PartitionEnumerationError(diskName, 'device is not present in sysfs');
      }

      const candidates = entries.filter((entry) => entry !== diskName && entry.startsWith(diskName));
      if (candidates.length === 0) {
        return [];
      }

      const mounts = await this.readMountTable(diskName);
      const records: PartitionRecord[] = [];
      for (const name of candidates) {
        const record = await this.readRecord(name, mounts);
        if (record) {
          records.push(record);
        }
      }
      return records;
    } catch (error) {
      if (error instanceof PartitionEnumerationError) {
        throw error;
      }
      throw new PartitionEnumerationError(diskName, getErrorMessage(error), toError(error));
    }
  }

  private async readRecord(
    name: string,
    mounts: Map<string, MountEntry>
  ): Promise<PartitionRecord | null> {
    const partitionNumber = await this.sysfs.readAttribute(name, 'partition');
    if (partitionNumber === null) {
      return null;
    }

    const deviceId = await this.sysfs.readAttribute(name, 'dev');
    const size = parseInteger((await this.sysfs.readAttribute(name, 'size')) ?? undefined);
    if (!deviceId || size === undefined) {
      this.logger.warn('Skipping partition without device number or size', { device: name });
      return null;
    }

    const properties = (await this.udev.readProperties(deviceId)) ?? new Map<string, Buffer>();
    const text = (key: string): string | undefined => {
      const value = properties.get(key)?.toString('utf-8');
      return value ? value : undefined;
    };
    const escaped = (key: string): Buffer | undefined => {
      const value = properties.get(key);
      return value && value.length > 0 ? unescapeUdev(value) : undefined;
    };

    const record: PartitionRecord = {
      name,
      deviceId,
      size,
      scheme: text('ID_PART_ENTRY_SCHEME'),
      label: escaped('ID_PART_ENTRY_NAME'),
      uuid: text('ID_PART_ENTRY_UUID'),
      typeUuid: text('ID_PART_ENTRY_TYPE'),
      number: parseInteger(text('ID_PART_ENTRY_NUMBER')) ?? parseInteger(partitionNumber),
      offset:
        parseInteger(text('ID_PART_ENTRY_OFFSET')) ??
        parseInteger((await this.sysfs.readAttribute(name, 'start')) ?? undefined),
    };

    const fsType = text('ID_FS_TYPE');
    const fsUsage = text('ID_FS_USAGE');
    if (fsType || fsUsage) {
      record.filesystem = {
        type: fsType,
        usage: fsUsage,
        version: text('ID_FS_VERSION'),
        uuid: text('ID_FS_UUID'),
        label: escaped('ID_FS_LABEL_ENC') ?? properties.get('ID_FS_LABEL'),
      };

      const mount = mounts.get(`${this.options.devRoot}/${name}`);
      if (mount) {
        record.freeSize = mount.available;
        record.mountPoint = mount.target;
      }
    }

    return record;
  }

  private async readMountTable(diskName: string): Promise<Map<string, MountEntry>> {
    const result = await executeCommand(
      this.options.dfPath,
      ['--block-size', '512', '--output=source,avail,target'],
      { timeout: this.options.timeout, encoding: 'latin1' }
    );

    if (result.errno) {
      throw new PartitionEnumerationError(
        diskName,
        `${this.options.dfPath} failed (${result.errno}): ${result.stderr}`
      );
    }
    // df exits non-zero when a single mount is unreadable but still lists the rest
    if (result.exitCode !== 0 && result.stdout.trim() === '') {
      throw new PartitionEnumerationError(
        diskName,
        `${this.options.dfPath} exited with code ${result.exitCode}: ${result.stderr}`
      );
    }
    if (result.exitCode !== 0) {
      this.logger.debug('df reported errors', { device: diskName, stderr: result.stderr });
    }

    return parseDfOutput(result.stdout);
  }
}
