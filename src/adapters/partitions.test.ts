/**
 * Unit tests for partition enumeration
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { SysfsPartitionEnumerator, parseDfOutput } from './partitions.js';
import { PartitionEnumerationError } from '../errors/index.js';
import { FixtureHost, createTestLogger } from '../__tests__/utils.js';

// Mock command execution
jest.mock('../utils/exec.js');

import { executeCommand } from '../utils/exec.js';

const mockExecuteCommand = jest.mocked(executeCommand);

const DF_OUTPUT = [
  'Filesystem          Avail Mounted on',
  '/dev/sda1          998000 /boot/efi',
  '/dev/sda2        12345678 /srv/my data',
  'tmpfs             3200000 /run',
  '',
].join('\n');

function createHost(): FixtureHost {
  return new FixtureHost()
    .addDisk({ name: 'sda', deviceId: '8:0', attributes: { size: '2000409264' } })
    .addDisk({ name: 'sdb', deviceId: '8:16', attributes: { size: '1000' } })
    .addPartition('sda', {
      name: 'sda1',
      deviceId: '8:1',
      attributes: { partition: '1', size: '1048576', start: '2048' },
      properties: {
        ID_PART_ENTRY_SCHEME: 'gpt',
        ID_PART_ENTRY_NAME: 'EFI\\x20system\\x20partition',
        ID_PART_ENTRY_UUID: '0f1e2d3c-0000-4000-8000-000000000001',
        ID_PART_ENTRY_TYPE: 'c12a7328-f81f-11d2-ba4b-00a0c93ec93b',
        ID_PART_ENTRY_NUMBER: '1',
        ID_PART_ENTRY_OFFSET: '2048',
        ID_FS_TYPE: 'vfat',
        ID_FS_USAGE: 'filesystem',
        ID_FS_VERSION: 'FAT32',
        ID_FS_UUID: 'A1B2-C3D4',
        ID_FS_LABEL: 'EFI',
        ID_FS_LABEL_ENC: 'EFI',
      },
    })
    .addPartition('sda', {
      name: 'sda2',
      deviceId: '8:2',
      attributes: { partition: '2', size: '2000', start: '1050624' },
      properties: {
        ID_PART_ENTRY_SCHEME: 'gpt',
        ID_PART_ENTRY_NAME: 'Donn\\xc3\\xa9es',
        ID_FS_TYPE: 'ext4',
        ID_FS_USAGE: 'filesystem',
        ID_FS_LABEL: 'my_data',
        ID_FS_LABEL_ENC: 'my\\x20data',
      },
    })
    .addPartition('sda', {
      name: 'sda3',
      deviceId: '8:3',
      attributes: { partition: '3', size: '4096' },
      properties: { ID_PART_ENTRY_SCHEME: 'gpt' },
    });
}

describe('SysfsPartitionEnumerator', () => {
  const options = { dfPath: 'df', timeout: 10000, devRoot: '/dev' };
  let host: FixtureHost;
  let enumerator: SysfsPartitionEnumerator;

  beforeEach(() => {
    jest.clearAllMocks();
    host = createHost();
    enumerator = new SysfsPartitionEnumerator(host, host, options, createTestLogger());
    mockExecuteCommand.mockResolvedValue({ stdout: DF_OUTPUT, stderr: '', exitCode: 0 });
  });

  it('should combine sysfs, udev and df data', async () => {
    const records = await enumerator.listPartitions('sda');

    expect(records).toHaveLength(3);
    expect(records[0]).toEqual({
      name: 'sda1',
      deviceId: '8:1',
      size: 1048576,
      scheme: 'gpt',
      label: Buffer.from('EFI system partition'),
      uuid: '0f1e2d3c-0000-4000-8000-000000000001',
      typeUuid: 'c12a7328-f81f-11d2-ba4b-00a0c93ec93b',
      number: 1,
      offset: 2048,
      filesystem: {
        type: 'vfat',
        usage: 'filesystem',
        version: 'FAT32',
        uuid: 'A1B2-C3D4',
        label: Buffer.from('EFI'),
      },
      freeSize: 998000,
      mountPoint: Buffer.from('/boot/efi'),
    });
    expect(mockExecuteCommand).toHaveBeenCalledWith('df', ['--block-size', '512', '--output=source,avail,target'], {
      timeout: 10000,
      encoding: 'latin1',
    });
  });

  it('should unescape labels and fall back to sysfs numbering', async () => {
    const [, second] = await enumerator.listPartitions('sda');

    expect(second?.label).toEqual(Buffer.from('Données', 'utf-8'));
    expect(second?.filesystem?.label).toEqual(Buffer.from('my data'));
    expect(second?.number).toBe(2);
    expect(second?.offset).toBe(1050624);
    expect(second?.mountPoint).toEqual(Buffer.from('/srv/my data'));
    expect(second?.freeSize).toBe(12345678);
  });

  it('should report no filesystem data for unformatted partitions', async () => {
    const [, , third] = await enumerator.listPartitions('sda');

    expect(third?.filesystem).toBeUndefined();
    expect(third?.mountPoint).toBeUndefined();
    expect(third?.number).toBe(3);
    expect(third?.offset).toBeUndefined();
  });

  it('should return nothing for disks without partitions and skip df', async () => {
    await expect(enumerator.listPartitions('sdb')).resolves.toEqual([]);
    expect(mockExecuteCommand).not.toHaveBeenCalled();
  });

  it('should fail for disks missing from sysfs', async () => {
    await expect(enumerator.listPartitions('sdz')).rejects.toThrow(
      'Cannot enumerate partitions of sdz: device is not present in sysfs'
    );
  });

  it('should fail when df cannot run', async () => {
    mockExecuteCommand.mockResolvedValue({ stdout: '', stderr: 'spawn df ENOENT', exitCode: 127, errno: 'ENOENT' });

    await expect(enumerator.listPartitions('sda')).rejects.toBeInstanceOf(PartitionEnumerationError);
  });

  it('should fail when df exits without output', async () => {
    mockExecuteCommand.mockResolvedValue({ stdout: '', stderr: 'df: invalid option', exitCode: 1 });

    await expect(enumerator.listPartitions('sda')).rejects.toThrow(
      'Cannot enumerate partitions of sda: df exited with code 1: df: invalid option'
    );
  });

  it('should keep df output when some mounts could not be read', async () => {
    mockExecuteCommand.mockResolvedValue({ stdout: DF_OUTPUT, stderr: "df: /mnt/gone: No such file or directory", exitCode: 1 });

    const [first] = await enumerator.listPartitions('sda');
    expect(first?.freeSize).toBe(998000);
  });

  it('should wrap sysfs read failures', async () => {
    host.failingAttributes.add('sda2/partition');

    await expect(enumerator.listPartitions('sda')).rejects.toBeInstanceOf(PartitionEnumerationError);
  });
});

describe('parseDfOutput', () => {
  it('should map sources to free space and mount point', () => {
    const mounts = parseDfOutput(DF_OUTPUT);

    expect([...mounts.keys()]).toEqual(['/dev/sda1', '/dev/sda2', 'tmpfs']);
    expect(mounts.get('/dev/sda2')).toEqual({ available: 12345678, target: Buffer.from('/srv/my data') });
  });

  it('should keep the first mount of a source and allow unknown free space', () => {
    const mounts = parseDfOutput(
      ['Filesystem Avail Mounted on', '/dev/sdc1 100 /data', '/dev/sdc1 100 /bind', 'proc - /proc'].join('\n')
    );

    expect(mounts.get('/dev/sdc1')?.target).toEqual(Buffer.from('/data'));
    expect(mounts.get('proc')).toEqual({ available: undefined, target: Buffer.from('/proc') });
  });
});
