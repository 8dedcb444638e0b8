import { FsSysfsAdapter } from './adapters/sysfs.js';
import { FsUdevAdapter } from './adapters/udev.js';
import { SmartctlBackend } from './adapters/smartctl.js';
import { SysfsPartitionEnumerator } from './adapters/partitions.js';
import { getConfig, type Config } from './config/index.js';
import { getLogger, type Logger } from './logger/index.js';
import type { DiskContext } from './types/adapters.js';
import { resolveEncoding } from './utils/text.js';

/**
 * Build the context that reads the live host described by the configuration
 */
export function createSystemContext(
  config: Config = getConfig(),
  logger: Logger = getLogger(config.logging)
): DiskContext {
  const sysfs = new FsSysfsAdapter(config.paths.sysRoot);
  const udev = new FsUdevAdapter(config.paths.devRoot, config.paths.udevDataDir);

  return {
    sysfs,
    udev,
    smart: new SmartctlBackend(config.smart, logger),
    partitions: new SysfsPartitionEnumerator(
      sysfs,
      udev,
      {
        dfPath: config.partitions.dfPath,
        timeout: config.partitions.timeout,
        devRoot: config.paths.devRoot,
      },
      logger
    ),
    logger,
    devRoot: config.paths.devRoot,
    encoding: resolveEncoding(config.partitions.encoding),
  };
}
