import type { Config } from './schema.js';

/**
 * Default configuration values
 */
export const defaultConfig: Config = {
  logging: {
    level: 'info',
    format: 'simple',
    maxFiles: 10,
    maxSize: '10m',
  },
  paths: {
    sysRoot: '/sys',
    devRoot: '/dev',
    udevDataDir: '/run/udev/data',
  },
  smart: {
    smartctlPath: '/usr/sbin/smartctl',
    sudo: false,
    timeout: 30000,
  },
  partitions: {
    dfPath: 'df',
    timeout: 10000,
  },
};
