/**
 * SMART backend over `smartctl --json`
 */

import type { SmartConfig } from '../config/schema.js';
import { SmartParseError, SmartUnavailableError, getErrorMessage, toError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { SmartBackend } from '../types/adapters.js';
import type { PowerMode } from '../types/smart.js';
import { executeCommand } from '../utils/exec.js';
import { SmartctlReportSchema, type SmartctlReport } from './smartctl-schema.js';

// smartctl exit status bits
const EXIT_COMMAND_LINE = 1 << 0;
const EXIT_OPEN_FAILED = 1 << 1;
const EXIT_COMMAND_FAILED = 1 << 2;

const STANDBY_MESSAGE = /Device is in (STANDBY|SLEEP)/i;

export class SmartctlBackend implements SmartBackend {
  constructor(
    private readonly config: SmartConfig,
    private readonly logger: Logger
  ) {}

  /**
   * `-n standby` makes smartctl bail out instead of waking a sleeping drive
   */
  async queryPowerMode(devicePath: string): Promise<PowerMode> {
    const report = await this.run(devicePath, ['--json', '--info', '-n', 'standby', devicePath]);

    if (isStandbyReport(report)) {
      return 'standby';
    }
    this.assertOpened(devicePath, report);
    return 'active';
  }

  async readSmart(devicePath: string): Promise<SmartctlReport> {
    const report = await this.run(devicePath, ['--json', '--all', devicePath]);
    this.assertOpened(devicePath, report);

    if (report.smartctl.exit_status & EXIT_COMMAND_FAILED) {
      this.logger.debug('Some SMART commands failed, report may be incomplete', {
        device: devicePath,
        exitStatus: report.smartctl.exit_status,
      });
    }
    return report;
  }

  private async run(devicePath: string, args: string[]): Promise<SmartctlReport> {
    const file = this.config.sudo ? 'sudo' : this.config.smartctlPath;
    const fullArgs = this.config.sudo ? ['-n', this.config.smartctlPath, ...args] : args;

    this.logger.debug(`Running ${file} ${fullArgs.join(' ')}`, { device: devicePath });
    const result = await executeCommand(file, fullArgs, { timeout: this.config.timeout });

    if (result.errno === 'ENOENT') {
      throw new SmartUnavailableError(devicePath, `${file} is not installed`);
    }
    if (result.errno === 'EACCES') {
      throw new SmartUnavailableError(devicePath, `permission denied running ${file}`);
    }
    if (result.errno) {
      throw new SmartUnavailableError(devicePath, `${file} failed (${result.errno}): ${result.stderr}`);
    }
    if (result.stdout.trim() === '') {
      throw new SmartUnavailableError(
        devicePath,
        `${file} produced no output (exit code ${result.exitCode}): ${result.stderr}`
      );
    }

    return parseSmartctlReport(devicePath, result.stdout);
  }

  private assertOpened(devicePath: string, report: SmartctlReport): void {
    const status = report.smartctl.exit_status;
    if (status & (EXIT_COMMAND_LINE | EXIT_OPEN_FAILED)) {
      const reason = report.smartctl.messages?.[0]?.string ?? `smartctl exit status ${status}`;
      throw new SmartUnavailableError(devicePath, reason);
    }
  }
}

/**
 * Parse and validate smartctl JSON output
 */
export function parseSmartctlReport(devicePath: string, output: string): SmartctlReport {
  let json: unknown;
  try {
    json = JSON.parse(output);
  } catch (error) {
    throw new SmartParseError(devicePath, `invalid JSON: ${getErrorMessage(error)}`, toError(error));
  }

  const result = SmartctlReportSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new SmartParseError(devicePath, issues.join('; '), result.error);
  }
  return result.data;
}

export function isStandbyReport(report: SmartctlReport): boolean {
  return (report.smartctl.messages ?? []).some((message) => STANDBY_MESSAGE.test(message.string));
}
