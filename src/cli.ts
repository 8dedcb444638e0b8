#!/usr/bin/env node
/**
 * Command-line interface for inspecting disks on the local host
 */

import { createSystemContext } from './context.js';
import { openDisk } from './disk/builder.js';
import { DiskInfo } from './disk/discovery.js';
import type { Disk } from './disk/disk.js';
import type { DiskIdentifier } from './disk/resolver.js';
import { DISK_TYPES } from './disk/classify.js';
import { DiskError } from './errors/index.js';
import type { DiskContext } from './types/adapters.js';
import { formatSize, timeInHrf } from './utils/size.js';

const IDENTIFIER_FLAGS: Record<string, keyof DiskIdentifier> = {
  '--serial': 'serialNumber',
  '--wwn': 'wwn',
  '--by-id': 'byId',
  '--by-path': 'byPath',
};

/**
 * A bare argument is a kernel name or, when absolute, a device path
 */
function parseIdentifier(args: string[]): DiskIdentifier {
  const [first, second] = args;
  if (first === undefined) {
    throw new Error('Missing disk identifier');
  }
  const key = IDENTIFIER_FLAGS[first];
  if (key) {
    if (second === undefined) {
      throw new Error(`Missing value for ${first}`);
    }
    return { [key]: second };
  }
  return first.startsWith('/') ? { path: first } : { name: first };
}

function printDisk(disk: Disk): void {
  console.log(`${disk.getName()}  ${disk.getPath()}  [${disk.getDeviceId()}]`);
  console.log(`  Type:        ${disk.getTypeStr()}`);
  console.log(`  Model:       ${disk.getModel() ?? '-'}`);
  console.log(`  Serial:      ${disk.getSerialNumber() ?? '-'}`);
  console.log(`  WWN:         ${disk.getWwn() ?? '-'}`);
  console.log(`  Firmware:    ${disk.getFirmware() ?? '-'}`);
  console.log(`  Size:        ${formatSize(disk.getSize() * 512)} (${formatSize(disk.getSize() * 512, 'iec')})`);
  console.log(
    `  Block size:  ${disk.getLogicalBlockSize() ?? '-'} logical, ${disk.getPhysicalBlockSize() ?? '-'} physical`
  );
  console.log(`  Table:       ${disk.getPartitionTableType() ?? '-'} ${disk.getPartitionTableUuid() ?? ''}`);
  for (const link of disk.getByIdPaths()) {
    console.log(`  by-id:       ${link}`);
  }
  for (const link of disk.getByPathPaths()) {
    console.log(`  by-path:     ${link}`);
  }
}

async function listDisks(ctx: DiskContext, args: string[]): Promise<void> {
  const info = await DiskInfo.discover(ctx);
  const include = args.includes('--all') ? DISK_TYPES : undefined;
  const disks = info.getDiskList({ include }, true, args.includes('--reverse'));

  if (args.includes('--json')) {
    console.log(JSON.stringify(disks, null, 2));
    return;
  }
  if (disks.length === 0) {
    console.log('No disks found.');
    return;
  }
  for (const disk of disks) {
    console.log(disk.toString());
  }
}

async function showPartitions(disk: Disk): Promise<void> {
  const partitions = await disk.getPartitionList();
  if (partitions.length === 0) {
    console.log(`${disk.getName()} has no partitions.`);
    return;
  }
  for (const partition of partitions) {
    const free = partition.getFsFreeSize();
    console.log(
      [
        partition.getName().padEnd(12),
        formatSize(partition.getSize() * 512).padEnd(10),
        (partition.getFsType() ?? '-').padEnd(8),
        (partition.getLabel() ?? '-').padEnd(16),
        partition.getMountPoint() ?? '-',
        free === undefined ? '' : `(${formatSize(free * 512)} free)`,
      ].join(' ')
    );
  }
}

async function showSmart(disk: Disk, wake: boolean): Promise<void> {
  const smart = await disk.getSmartData(wake);
  if (smart.standbyMode) {
    console.log(`${disk.getName()} is in standby mode; use --wake to read it anyway.`);
    return;
  }

  console.log(`Health:   ${smart.healthy ? 'PASSED' : 'FAILED'}`);
  console.log(`SMART:    ${smart.smartCapable ? 'capable' : 'not capable'}, ${smart.smartEnabled ? 'enabled' : 'disabled'}`);

  if (smart.deviceClass === 'NVMe') {
    const hours = smart.nvmeAttributes.powerOnHours;
    if (hours !== undefined) {
      const age = timeInHrf(hours, 'hour');
      console.log(`Power on: ${age.value.toFixed(1)} ${age.unit}`);
    }
    console.log(JSON.stringify(smart.nvmeAttributes, null, 2));
    return;
  }

  console.log('ID  Name                      Flags   Value Worst Thresh Type      Updated  Failed Raw');
  for (const attribute of smart.attributes) {
    console.log(
      [
        String(attribute.id).padStart(3),
        attribute.name.padEnd(25),
        attribute.flags.padEnd(7),
        String(attribute.value).padStart(5),
        String(attribute.worst).padStart(5),
        String(attribute.threshold).padStart(6),
        attribute.type.padEnd(9),
        attribute.updated.padEnd(8),
        attribute.whenFailed.padEnd(6),
        attribute.rawValue,
      ].join(' ')
    );
  }
}

async function main(): Promise<void> {
  const command = process.argv[2];
  const args = process.argv.slice(3);

  try {
    const ctx = createSystemContext();

    switch (command) {
      case 'list':
        await listDisks(ctx, args);
        break;

      case 'show':
        printDisk(await openDisk(parseIdentifier(args), ctx));
        break;

      case 'partitions':
        await showPartitions(await openDisk(parseIdentifier(args), ctx));
        break;

      case 'smart':
        await showSmart(
          await openDisk(parseIdentifier(args.filter((arg) => arg !== '--wake')), ctx),
          args.includes('--wake')
        );
        break;

      case 'temp': {
        const disk = await openDisk(parseIdentifier(args), ctx);
        const reading = await disk.getTemperature();
        console.log(
          reading.supported
            ? `${disk.getName()}: ${reading.celsius.toFixed(1)} °C (${reading.source})`
            : `${disk.getName()}: temperature not supported`
        );
        break;
      }

      case 'help':
      default:
        console.log('Usage: diskscope <command> [args]\n');
        console.log('Commands:');
        console.log('  list [--all] [--reverse] [--json]  - List disks (HDD, SSD and NVMe unless --all)');
        console.log('  show <disk>                        - Show disk attributes');
        console.log('  partitions <disk>                  - List partitions of a disk');
        console.log('  smart <disk> [--wake]              - Show SMART data, waking a sleeping drive with --wake');
        console.log('  temp <disk>                        - Show current temperature');
        console.log('  help                               - Show this help message');
        console.log('\n<disk> is a kernel name (sda), a device path (/dev/sda) or one of');
        console.log('--serial <serial>, --wwn <wwn>, --by-id <entry>, --by-path <entry>');
        break;
    }
  } catch (error) {
    console.error('Error:', error instanceof DiskError ? error.toString() : error);
    process.exit(1);
  }
}

void main();
