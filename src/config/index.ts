import { config as loadEnv } from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { ConfigSchema, type Config } from './schema.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError, getErrorMessage, toError } from '../errors/index.js';

type Section = keyof Config;
type RawConfig = Record<Section, Record<string, unknown>>;

const SECTIONS: readonly Section[] = ['logging', 'paths', 'smart', 'partitions'];

export interface ConfigLoaderOptions {
  /** Environment to read overrides from, process.env by default */
  env?: NodeJS.ProcessEnv;
  /** JSON config file, config/default.json under the working directory by default */
  configPath?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from environment variables and config files
 * Priority: Environment Variables > Config File > Defaults
 */
export class ConfigLoader {
  private config: Config;

  constructor(options: ConfigLoaderOptions = {}) {
    if (!options.env) {
      // Load .env file if it exists
      loadEnv();
    }
    const env = options.env ?? process.env;

    const raw: RawConfig = {
      logging: { ...defaultConfig.logging },
      paths: { ...defaultConfig.paths },
      smart: { ...defaultConfig.smart },
      partitions: { ...defaultConfig.partitions },
    };

    this.loadFromFile(raw, options.configPath ?? join(process.cwd(), 'config', 'default.json'));
    this.loadFromEnv(raw, env);
    this.config = this.validate(raw);
  }

  /**
   * Merge configuration from a JSON file, section by section
   */
  private loadFromFile(raw: RawConfig, configPath: string): void {
    if (!existsSync(configPath)) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load config file ${configPath}: ${getErrorMessage(error)}`,
        { configPath },
        toError(error)
      );
    }

    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Config file ${configPath} must contain a JSON object`, {
        configPath,
      });
    }

    for (const section of SECTIONS) {
      const value = parsed[section];
      if (isRecord(value)) {
        Object.assign(raw[section], value);
      }
    }
  }

  /**
   * Load configuration from environment variables
   */
  private loadFromEnv(raw: RawConfig, env: NodeJS.ProcessEnv): void {
    const int = (value: string): number => Number(value);
    const bool = (value: string): boolean => value === 'true' || value === '1';

    const overrides: Array<[string, Section, string, (value: string) => unknown]> = [
      // Logging configuration
      ['DISKSCOPE_LOG_LEVEL', 'logging', 'level', String],
      ['DISKSCOPE_LOG_FORMAT', 'logging', 'format', String],
      ['DISKSCOPE_LOG_DIR', 'logging', 'dir', String],
      ['DISKSCOPE_LOG_MAX_FILES', 'logging', 'maxFiles', int],
      ['DISKSCOPE_LOG_MAX_SIZE', 'logging', 'maxSize', String],

      // Host paths
      ['DISKSCOPE_SYS_ROOT', 'paths', 'sysRoot', String],
      ['DISKSCOPE_DEV_ROOT', 'paths', 'devRoot', String],
      ['DISKSCOPE_UDEV_DATA_DIR', 'paths', 'udevDataDir', String],

      // SMART
      ['DISKSCOPE_SMARTCTL_PATH', 'smart', 'smartctlPath', String],
      ['DISKSCOPE_SMART_SUDO', 'smart', 'sudo', bool],
      ['DISKSCOPE_SMART_TIMEOUT', 'smart', 'timeout', int],

      // Partitions
      ['DISKSCOPE_DF_PATH', 'partitions', 'dfPath', String],
      ['DISKSCOPE_DF_TIMEOUT', 'partitions', 'timeout', int],
      ['DISKSCOPE_ENCODING', 'partitions', 'encoding', String],
    ];

    for (const [name, section, key, parse] of overrides) {
      const value = env[name];
      if (value !== undefined && value !== '') {
        raw[section][key] = parse(value);
      }
    }
  }

  /**
   * Validate configuration using Zod schema
   */
  private validate(raw: RawConfig): Config {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Configuration validation failed: ${issues.join('; ')}`, {
        issues,
      });
    }
    return result.data;
  }

  /**
   * Get the current configuration
   */
  public getConfig(): Config {
    return this.config;
  }
}

// Singleton instance
let configInstance: ConfigLoader | null = null;

/**
 * Get configuration singleton
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = new ConfigLoader();
  }
  return configInstance.getConfig();
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

// Export types
export type { Config } from './schema.js';
