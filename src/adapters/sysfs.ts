/**
 * sysfs access for block devices
 */

import * as fs from 'fs/promises';
import { join } from 'path';

import type { SysfsAdapter } from '../types/adapters.js';

/**
 * True for errors meaning "this path does not exist", as opposed to I/O failures
 */
export function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Read a sysfs file, resolving null when it does not exist
 */
export async function readSysFile(path: string): Promise<string | null> {
  try {
    const content = await fs.readFile(path, 'utf-8');
    return content.trim();
  } catch (error) {
    if (isMissingPathError(error)) {
      return null;
    }
    throw error;
  }
}

export class FsSysfsAdapter implements SysfsAdapter {
  constructor(private readonly sysRoot: string = '/sys') {}

  async listBlockDevices(): Promise<string[]> {
    return fs.readdir(join(this.sysRoot, 'block'));
  }

  async readAttribute(name: string, attribute: string): Promise<string | null> {
    return readSysFile(this.devicePath(name, attribute));
  }

  async listEntries(name: string, dir: string): Promise<string[] | null> {
    try {
      return await fs.readdir(this.devicePath(name, dir));
    } catch (error) {
      if (isMissingPathError(error)) {
        return null;
      }
      throw error;
    }
  }

  private devicePath(name: string, relative: string): string {
    return join(this.sysRoot, 'class', 'block', name, relative);
  }
}
