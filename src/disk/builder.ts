/**
 * Disk model builder: reads one disk's attributes through the context adapters
 */

import { AttributeReadError, getErrorMessage, toError } from '../errors/index.js';
import type { DiskContext, PersistentNameScheme } from '../types/adapters.js';
import type { Attr, DiskAttributes, PartitionTableType } from '../types/disk.js';
import { absent, failed, firstPresent, flatMapAttr, present } from '../utils/attr.js';
import { decodeText, unescapeUdev } from '../utils/text.js';
import { classifyDevice } from './classify.js';
import { Disk } from './disk.js';
import { collectPersistentNames, resolveDisk, type DiskIdentifier } from './resolver.js';

const DEVICE_ID = /^\d+:\d+$/;
const DISK_SCHEMES: readonly PersistentNameScheme[] = ['by-id', 'by-path'];

type Properties = Attr<Map<string, Buffer>>;

async function readMandatory(name: string, attribute: string, ctx: DiskContext): Promise<string> {
  let value: string | null;
  try {
    value = await ctx.sysfs.readAttribute(name, attribute);
  } catch (error) {
    throw new AttributeReadError(name, attribute, getErrorMessage(error), toError(error));
  }
  if (value === null || value === '') {
    throw new AttributeReadError(name, attribute, 'attribute is missing');
  }
  return value;
}

function optionalFailure<T>(
  name: string,
  attribute: string,
  reason: string,
  ctx: DiskContext,
  originalError?: Error
): Attr<T> {
  ctx.logger.debug(`Optional attribute ${attribute} unreadable: ${reason}`, { device: name });
  return failed(new AttributeReadError(name, attribute, reason, originalError));
}

/**
 * Read an optional sysfs attribute. Empty and missing files both count as absent.
 */
export async function readOptional(
  name: string,
  attribute: string,
  ctx: DiskContext
): Promise<Attr<string>> {
  try {
    const value = await ctx.sysfs.readAttribute(name, attribute);
    return value === null || value === '' ? absent : present(value);
  } catch (error) {
    return optionalFailure(name, attribute, getErrorMessage(error), ctx, toError(error));
  }
}

export async function readOptionalInt(
  name: string,
  attribute: string,
  ctx: DiskContext
): Promise<Attr<number>> {
  const raw = await readOptional(name, attribute, ctx);
  return flatMapAttr(raw, (value) =>
    /^\d+$/.test(value)
      ? present(parseInt(value, 10))
      : optionalFailure<number>(name, attribute, `not a number: ${value}`, ctx)
  );
}

async function readProperties(name: string, deviceId: string, ctx: DiskContext): Promise<Properties> {
  try {
    const properties = await ctx.udev.readProperties(deviceId);
    return properties === null ? absent : present(properties);
  } catch (error) {
    return optionalFailure(name, 'udev properties', getErrorMessage(error), ctx, toError(error));
  }
}

function udevString(properties: Properties, key: string): Attr<string> {
  return flatMapAttr(properties, (map) => {
    const value = map.get(key)?.toString('utf-8').trim();
    return value ? present(value) : absent;
  });
}

function udevEscaped(name: string, properties: Properties, key: string, ctx: DiskContext): Attr<string> {
  return flatMapAttr(properties, (map) => {
    const raw = map.get(key);
    if (!raw || raw.length === 0) {
      return absent;
    }
    try {
      const value = decodeText(unescapeUdev(raw), ctx.encoding).trim();
      return value ? present(value) : absent;
    } catch (error) {
      return optionalFailure<string>(name, key, `not valid ${ctx.encoding}`, ctx, toError(error));
    }
  });
}

function partitionTableType(name: string, properties: Properties, ctx: DiskContext): Attr<PartitionTableType> {
  return flatMapAttr(udevString(properties, 'ID_PART_TABLE_TYPE'), (value): Attr<PartitionTableType> => {
    switch (value.toLowerCase()) {
      case 'gpt':
        return present('gpt');
      case 'dos':
      case 'mbr':
        return present('mbr');
      default:
        ctx.logger.debug(`Unrecognized partition table type ${value}`, { device: name });
        return absent;
    }
  });
}

/**
 * Build the model of a whole disk from its kernel name.
 * Only the device number and size are mandatory.
 */
export async function buildDisk(name: string, ctx: DiskContext): Promise<Disk> {
  const deviceId = await readMandatory(name, 'dev', ctx);
  if (!DEVICE_ID.test(deviceId)) {
    throw new AttributeReadError(name, 'dev', `malformed device number ${deviceId}`);
  }
  const rawSize = await readMandatory(name, 'size', ctx);
  if (!/^\d+$/.test(rawSize)) {
    throw new AttributeReadError(name, 'size', `not a number: ${rawSize}`);
  }

  const rotational = await readOptional(name, 'queue/rotational', ctx);
  const properties = await readProperties(name, deviceId, ctx);
  const names = await collectPersistentNames(name, DISK_SCHEMES, ctx);

  const attributes: DiskAttributes = {
    name,
    path: `${ctx.devRoot}/${name}`,
    deviceId,
    type: classifyDevice(name, deviceId, rotational.state === 'present' ? rotational.value : undefined),
    size: parseInt(rawSize, 10),
    byIdPaths: names.get('by-id') ?? present([]),
    byPathPaths: names.get('by-path') ?? present([]),
    serialNumber: udevString(properties, 'ID_SERIAL_SHORT'),
    wwn: udevString(properties, 'ID_WWN'),
    model: firstPresent(
      udevEscaped(name, properties, 'ID_MODEL_ENC', ctx),
      udevString(properties, 'ID_MODEL'),
      await readOptional(name, 'device/model', ctx)
    ),
    firmware: firstPresent(
      udevString(properties, 'ID_REVISION'),
      await readOptional(name, 'device/firmware_rev', ctx),
      await readOptional(name, 'device/rev', ctx)
    ),
    physicalBlockSize: await readOptionalInt(name, 'queue/physical_block_size', ctx),
    logicalBlockSize: await readOptionalInt(name, 'queue/logical_block_size', ctx),
    partitionTableType: partitionTableType(name, properties, ctx),
    partitionTableUuid: udevString(properties, 'ID_PART_TABLE_UUID'),
  };

  return new Disk(attributes, ctx);
}

/**
 * Resolve an identifier and build the disk it names
 */
export async function openDisk(identifier: DiskIdentifier, ctx: DiskContext): Promise<Disk> {
  const { name } = await resolveDisk(identifier, ctx);
  return buildDisk(name, ctx);
}
