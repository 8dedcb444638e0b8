/**
 * SMART snapshot type definitions
 */

export type PowerMode = 'active' | 'standby';

export type SmartReadMode = 'CHECK' | 'SKIP_CHECK';

export interface SmartAttribute {
  id: number;
  name: string;
  /** Flag letters as printed by smartctl, e.g. PO--CK, or the hex flag word, e.g. 0x0033, when none are reported */
  flags: string;
  value: number;
  worst: number;
  threshold: number;
  type: 'Pre-fail' | 'Old_age';
  updated: 'Always' | 'Offline';
  /** '-' when the attribute never failed */
  whenFailed: string;
  rawValue: string;
}

export interface NvmeAttributes {
  criticalWarning?: number;
  temperature?: number;
  availableSpare?: number;
  availableSpareThreshold?: number;
  percentageUsed?: number;
  dataUnitsRead?: number;
  dataUnitsWritten?: number;
  hostReadCommands?: number;
  hostWriteCommands?: number;
  controllerBusyTime?: number;
  powerCycles?: number;
  powerOnHours?: number;
  unsafeShutdowns?: number;
  mediaAndDataIntegrityErrors?: number;
  errorInformationLogEntries?: number;
  warningCompositeTemperatureTime?: number;
  criticalCompositeTemperatureTime?: number;
}

export interface StandbySmartSnapshot {
  standbyMode: true;
  deviceClass: 'HDD' | 'SSD';
}

interface SmartHealth {
  standbyMode: false;
  healthy: boolean;
  smartEnabled: boolean;
  smartCapable: boolean;
}

export interface AtaSmartSnapshot extends SmartHealth {
  deviceClass: 'HDD' | 'SSD';
  attributes: SmartAttribute[];
}

export interface NvmeSmartSnapshot extends SmartHealth {
  deviceClass: 'NVMe';
  nvmeAttributes: NvmeAttributes;
}

export type SmartSnapshot = StandbySmartSnapshot | AtaSmartSnapshot | NvmeSmartSnapshot;
