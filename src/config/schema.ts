import { z } from 'zod';

/**
 * Configuration schema definitions using Zod
 */

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'simple', 'pretty']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: LogFormatSchema.default('simple'),
  // File transports are only attached when a directory is configured
  dir: z.string().min(1).optional(),
  maxFiles: z.number().int().min(1).default(10),
  maxSize: z
    .string()
    .regex(/^\d+[bkmg]$/i, 'maxSize must look like 10m, 512k or 1g')
    .default('10m'),
});

export const PathsConfigSchema = z.object({
  sysRoot: z.string().min(1).default('/sys'),
  devRoot: z.string().min(1).default('/dev'),
  udevDataDir: z.string().min(1).default('/run/udev/data'),
});

export const SmartConfigSchema = z.object({
  smartctlPath: z.string().min(1).default('/usr/sbin/smartctl'),
  sudo: z.boolean().default(false),
  timeout: z.number().int().min(1000).max(600000).default(30000),
});

export const PartitionsConfigSchema = z.object({
  dfPath: z.string().min(1).default('df'),
  timeout: z.number().int().min(1000).max(600000).default(10000),
  // Falls back to the process locale when unset
  encoding: z.string().min(1).optional(),
});

export const ConfigSchema = z.object({
  logging: LoggingConfigSchema,
  paths: PathsConfigSchema,
  smart: SmartConfigSchema,
  partitions: PartitionsConfigSchema,
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type PathsConfig = z.infer<typeof PathsConfigSchema>;
export type SmartConfig = z.infer<typeof SmartConfigSchema>;
export type PartitionsConfig = z.infer<typeof PartitionsConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
