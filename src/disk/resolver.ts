/**
 * Identifier resolution: map any supported identifier to one kernel block device
 */

import { basename } from 'path';

import {
  AttributeReadError,
  ConfigurationError,
  DeviceNotFoundError,
  getErrorMessage,
  toError,
} from '../errors/index.js';
import type { DiskContext, PersistentNameScheme } from '../types/adapters.js';
import type { Attr } from '../types/disk.js';
import { failed, present } from '../utils/attr.js';

export interface DiskIdentifier {
  /** Kernel name, e.g. sda */
  name?: string;
  /** Device path or any link to it, e.g. /dev/sda */
  path?: string;
  /** Entry of /dev/disk/by-id, bare or as a full path */
  byId?: string;
  /** Entry of /dev/disk/by-path, bare or as a full path */
  byPath?: string;
  serialNumber?: string;
  wwn?: string;
}

export interface ResolvedDevice {
  name: string;
  deviceId: string;
}

const IDENTIFIER_KEYS = ['name', 'path', 'byId', 'byPath', 'serialNumber', 'wwn'] as const;
type IdentifierKind = (typeof IDENTIFIER_KEYS)[number];

function describe(kind: IdentifierKind, value: string): string {
  return `${kind}=${value}`;
}

export async function resolveDisk(
  identifier: DiskIdentifier,
  ctx: DiskContext
): Promise<ResolvedDevice> {
  const supplied = IDENTIFIER_KEYS.filter((key) => identifier[key] !== undefined);
  const [kind] = supplied;
  if (supplied.length !== 1 || kind === undefined) {
    throw new ConfigurationError(
      `Exactly one disk identifier must be given, got ${supplied.length === 0 ? 'none' : supplied.join(', ')}`,
      { identifiers: supplied }
    );
  }

  const value = identifier[kind]?.trim() ?? '';
  if (value === '') {
    throw new ConfigurationError(`Disk identifier ${kind} must not be empty`, { identifier: kind });
  }

  const label = describe(kind, value);
  let name: string;
  switch (kind) {
    case 'name':
      name = value;
      break;
    case 'path':
      name = await nameFromLink(value, label, ctx);
      break;
    case 'byId':
      name = await nameFromLink(linkFor('by-id', value, ctx), label, ctx);
      break;
    case 'byPath':
      name = await nameFromLink(linkFor('by-path', value, ctx), label, ctx);
      break;
    case 'serialNumber':
      name = await nameFromProperty(['ID_SERIAL_SHORT'], value, label, ctx);
      break;
    case 'wwn':
      name = await nameFromProperty(['ID_WWN', 'ID_WWN_WITH_EXTENSION'], value, label, ctx);
      break;
  }

  const deviceId = await requireWholeDisk(name, label, ctx);
  ctx.logger.debug(`Resolved ${label} to ${name} (${deviceId})`, { device: name });
  return { name, deviceId };
}

function linkFor(scheme: PersistentNameScheme, value: string, ctx: DiskContext): string {
  return value.startsWith('/') ? value : ctx.udev.linkPath(scheme, value);
}

async function nameFromLink(path: string, label: string, ctx: DiskContext): Promise<string> {
  const target = await ctx.udev.resolveLink(path);
  if (target === null) {
    throw new DeviceNotFoundError(label, `${path} does not exist`);
  }
  return basename(target);
}

/**
 * Linear scan of udev properties across all block devices
 */
async function nameFromProperty(
  keys: readonly string[],
  value: string,
  label: string,
  ctx: DiskContext
): Promise<string> {
  const wanted = value.toLowerCase();

  for (const name of await ctx.sysfs.listBlockDevices()) {
    try {
      const deviceId = await ctx.sysfs.readAttribute(name, 'dev');
      if (deviceId === null) {
        continue;
      }
      const properties = await ctx.udev.readProperties(deviceId);
      const matches = keys.some(
        (key) => properties?.get(key)?.toString('utf-8').toLowerCase() === wanted
      );
      if (matches) {
        return name;
      }
    } catch (error) {
      ctx.logger.debug(`Skipping ${name} while matching ${label}: ${getErrorMessage(error)}`, {
        device: name,
      });
    }
  }

  throw new DeviceNotFoundError(label, 'no device reports this value');
}

/**
 * The kernel name must be listed in /sys/block and expose its device number
 */
async function requireWholeDisk(name: string, label: string, ctx: DiskContext): Promise<string> {
  if (name.includes('/')) {
    throw new DeviceNotFoundError(label, `${name} is not a kernel device name`);
  }
  const devices = await ctx.sysfs.listBlockDevices();
  if (!devices.includes(name)) {
    throw new DeviceNotFoundError(label, `${name} is not a whole-disk block device`);
  }

  let deviceId: string | null;
  try {
    deviceId = await ctx.sysfs.readAttribute(name, 'dev');
  } catch (error) {
    throw new AttributeReadError(name, 'dev', getErrorMessage(error), toError(error));
  }
  if (deviceId === null) {
    throw new DeviceNotFoundError(label, `${name} has no device number`);
  }
  return deviceId;
}

/**
 * Links in each scheme directory that point at the device, in directory
 * order without duplicates. A scheme whose directory cannot be read ends up
 * in error state without affecting the others.
 */
export async function collectPersistentNames(
  name: string,
  schemes: readonly PersistentNameScheme[],
  ctx: DiskContext
): Promise<Map<PersistentNameScheme, Attr<readonly string[]>>> {
  const names = new Map<PersistentNameScheme, Attr<readonly string[]>>();

  for (const scheme of schemes) {
    try {
      const matches: string[] = [];
      for (const link of await ctx.udev.listLinks(scheme)) {
        const target = await ctx.udev.resolveLink(link);
        if (target !== null && basename(target) === name && !matches.includes(link)) {
          matches.push(link);
        }
      }
      names.set(scheme, present(matches));
    } catch (error) {
      ctx.logger.debug(`Cannot list ${scheme} links: ${getErrorMessage(error)}`, { device: name });
      names.set(scheme, failed(new AttributeReadError(name, scheme, getErrorMessage(error), toError(error))));
    }
  }

  return names;
}
