/**
 * SMART and temperature readings for a disk
 */

import type { SmartctlReport } from '../adapters/smartctl-schema.js';
import {
  AttributeReadError,
  DiskError,
  SmartParseError,
  SmartUnavailableError,
  getErrorMessage,
  toError,
} from '../errors/index.js';
import type { DiskContext } from '../types/adapters.js';
import type { TemperatureReading } from '../types/disk.js';
import type {
  AtaSmartSnapshot,
  NvmeAttributes,
  NvmeSmartSnapshot,
  SmartAttribute,
  SmartReadMode,
  SmartSnapshot,
} from '../types/smart.js';
import type { Disk } from './disk.js';

const HWMON_DIRS = ['device/hwmon', 'device/device/hwmon'];
const HWMON_ENTRY = /^hwmon\d+$/;

/**
 * Backend failures that are not already DiskErrors surface as SmartUnavailableError
 */
async function callBackend<T>(disk: Disk, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof DiskError) {
      throw error;
    }
    throw new SmartUnavailableError(disk.getName(), getErrorMessage(error), toError(error));
  }
}

export async function readSmart(
  disk: Disk,
  skipStandbyCheck: boolean,
  ctx: DiskContext
): Promise<SmartSnapshot> {
  const deviceClass = disk.getType();
  const path = disk.getPath();

  switch (deviceClass) {
    case 'NVMe': {
      const report = await callBackend(disk, () => ctx.smart.readSmart(path));
      return toNvmeSnapshot(disk, report);
    }

    case 'HDD':
    case 'SSD': {
      const mode: SmartReadMode = skipStandbyCheck ? 'SKIP_CHECK' : 'CHECK';
      if (mode === 'CHECK') {
        const power = await callBackend(disk, () => ctx.smart.queryPowerMode(path));
        if (power === 'standby') {
          ctx.logger.debug('Drive is in standby, skipping SMART read', { device: disk.getName() });
          return { standbyMode: true, deviceClass };
        }
      }
      const report = await callBackend(disk, () => ctx.smart.readSmart(path));
      return toAtaSnapshot(deviceClass, report);
    }

    case 'LOOP':
    case 'OTHER':
      throw new SmartUnavailableError(disk.getName(), `SMART is not supported on ${deviceClass} devices`);
  }
}

function formatFlags(value: number): string {
  return `0x${value.toString(16).padStart(4, '0')}`;
}

function toAtaSnapshot(
  deviceClass: 'HDD' | 'SSD',
  report: SmartctlReport
): AtaSmartSnapshot {
  // SAS/SCSI drives and drives with SMART disabled report no attribute table
  const table = report.ata_smart_attributes?.table ?? [];

  const attributes: SmartAttribute[] = table.map((entry) => ({
    id: entry.id,
    name: entry.name,
    flags: entry.flags?.string?.trim() || formatFlags(entry.flags?.value ?? 0),
    value: entry.value,
    worst: entry.worst,
    threshold: entry.thresh,
    type: entry.flags?.prefailure ? 'Pre-fail' : 'Old_age',
    updated: entry.flags?.updated_online === false ? 'Offline' : 'Always',
    whenFailed: entry.when_failed === '' ? '-' : entry.when_failed,
    rawValue: entry.raw.string,
  }));

  return {
    standbyMode: false,
    deviceClass,
    healthy: report.smart_status?.passed === true,
    smartEnabled: report.smart_support?.enabled ?? false,
    smartCapable: report.smart_support?.available ?? false,
    attributes,
  };
}

function toNvmeSnapshot(disk: Disk, report: SmartctlReport): NvmeSmartSnapshot {
  const log = report.nvme_smart_health_information_log;
  if (!log) {
    throw new SmartParseError(disk.getName(), 'report has no NVMe health information log');
  }

  const nvmeAttributes: NvmeAttributes = {
    criticalWarning: log.critical_warning,
    temperature: log.temperature,
    availableSpare: log.available_spare,
    availableSpareThreshold: log.available_spare_threshold,
    percentageUsed: log.percentage_used,
    dataUnitsRead: log.data_units_read,
    dataUnitsWritten: log.data_units_written,
    hostReadCommands: log.host_reads,
    hostWriteCommands: log.host_writes,
    controllerBusyTime: log.controller_busy_time,
    powerCycles: log.power_cycles,
    powerOnHours: log.power_on_hours,
    unsafeShutdowns: log.unsafe_shutdowns,
    mediaAndDataIntegrityErrors: log.media_errors,
    errorInformationLogEntries: log.num_err_log_entries,
    warningCompositeTemperatureTime: log.warning_temp_time,
    criticalCompositeTemperatureTime: log.critical_comp_time,
  };

  return {
    standbyMode: false,
    deviceClass: 'NVMe',
    healthy: report.smart_status?.passed === true,
    // NVMe health logs are always available once the controller answers
    smartEnabled: report.smart_support?.enabled ?? true,
    smartCapable: report.smart_support?.available ?? true,
    nvmeAttributes,
  };
}

/**
 * Current temperature in degrees Celsius. HDD and SSD drives report through a
 * hwmon sensor, NVMe drives through their health log.
 */
export async function readTemperature(disk: Disk, ctx: DiskContext): Promise<TemperatureReading> {
  switch (disk.getType()) {
    case 'HDD':
    case 'SSD':
      return readHwmonTemperature(disk, ctx);

    case 'NVMe': {
      const report = await callBackend(disk, () => ctx.smart.readSmart(disk.getPath()));
      const celsius = report.nvme_smart_health_information_log?.temperature ?? report.temperature?.current;
      return celsius === undefined ? { supported: false } : { supported: true, celsius, source: 'smart' };
    }

    case 'LOOP':
    case 'OTHER':
      return { supported: false };
  }
}

async function readHwmonTemperature(disk: Disk, ctx: DiskContext): Promise<TemperatureReading> {
  const name = disk.getName();

  try {
    for (const dir of HWMON_DIRS) {
      const entries = await ctx.sysfs.listEntries(name, dir);
      const sensors = (entries ?? []).filter((entry) => HWMON_ENTRY.test(entry)).sort();

      for (const sensor of sensors) {
        const attribute = `${dir}/${sensor}/temp1_input`;
        const value = await ctx.sysfs.readAttribute(name, attribute);
        if (value === null) {
          continue;
        }
        if (!/^-?\d+$/.test(value)) {
          throw new AttributeReadError(name, attribute, `not a number: ${value}`);
        }
        // Millidegrees
        return { supported: true, celsius: parseInt(value, 10) / 1000, source: 'hwmon' };
      }
    }
  } catch (error) {
    if (error instanceof AttributeReadError) {
      throw error;
    }
    throw new AttributeReadError(name, 'temperature', getErrorMessage(error), toError(error));
  }

  return { supported: false };
}

function ataAttributes(snapshot: SmartSnapshot): SmartAttribute[] {
  return snapshot.standbyMode === false && snapshot.deviceClass !== 'NVMe' ? snapshot.attributes : [];
}

export function findSmartAttributeById(snapshot: SmartSnapshot, id: number): SmartAttribute | undefined {
  return ataAttributes(snapshot).find((attribute) => attribute.id === id);
}

/**
 * First attribute whose name contains the given text
 */
export function findSmartAttributeByName(
  snapshot: SmartSnapshot,
  name: string
): SmartAttribute | undefined {
  return ataAttributes(snapshot).find((attribute) => attribute.name.includes(name));
}
