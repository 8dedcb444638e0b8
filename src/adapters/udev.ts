/**
 * udev access: persistent name links under /dev/disk and the udev database
 */

import * as fs from 'fs/promises';
import { join } from 'path';

import type { PersistentNameScheme, UdevAdapter } from '../types/adapters.js';
import { isMissingPathError } from './sysfs.js';

const NEWLINE = 0x0a;

/**
 * Parse the E: lines of a udev database file. Values stay as bytes since
 * udev stores whatever the device reported.
 */
export function parseUdevProperties(data: Buffer): Map<string, Buffer> {
  const properties = new Map<string, Buffer>();
  let start = 0;

  while (start < data.length) {
    let end = data.indexOf(NEWLINE, start);
    if (end === -1) {
      end = data.length;
    }
    const line = data.subarray(start, end);
    start = end + 1;

    if (line.length < 3 || line.toString('latin1', 0, 2) !== 'E:') {
      continue;
    }
    const separator = line.indexOf('=');
    if (separator <= 2) {
      continue;
    }
    properties.set(line.toString('latin1', 2, separator), Buffer.from(line.subarray(separator + 1)));
  }

  return properties;
}

export class FsUdevAdapter implements UdevAdapter {
  constructor(
    private readonly devRoot: string = '/dev',
    private readonly udevDataDir: string = '/run/udev/data'
  ) {}

  linkPath(scheme: PersistentNameScheme, entry: string): string {
    return join(this.devRoot, 'disk', scheme, entry);
  }

  async listLinks(scheme: PersistentNameScheme): Promise<string[]> {
    try {
      const entries = await fs.readdir(join(this.devRoot, 'disk', scheme));
      return entries.map((entry) => this.linkPath(scheme, entry));
    } catch (error) {
      // Schemes without any device (no labelled filesystem, say) have no directory
      if (isMissingPathError(error)) {
        return [];
      }
      throw error;
    }
  }

  async resolveLink(path: string): Promise<string | null> {
    try {
      return await fs.realpath(path);
    } catch (error) {
      if (isMissingPathError(error)) {
        return null;
      }
      throw error;
    }
  }

  async readProperties(deviceId: string): Promise<Map<string, Buffer> | null> {
    try {
      return parseUdevProperties(await fs.readFile(join(this.udevDataDir, `b${deviceId}`)));
    } catch (error) {
      if (isMissingPathError(error)) {
        return null;
      }
      throw error;
    }
  }
}
