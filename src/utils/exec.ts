/**
 * Utilities for executing system commands
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  /** errno code when the command could not be started or was killed */
  errno?: string;
}

export interface ExecOptions {
  timeout?: number;
  cwd?: string;
  /** latin1 keeps every output byte recoverable with Buffer.from(stdout, 'latin1') */
  encoding?: BufferEncoding;
}

/**
 * Execute a command without a shell and return the result. Never throws:
 * failures are reported through exitCode and errno.
 */
export async function executeCommand(
  file: string,
  args: readonly string[],
  options?: ExecOptions
): Promise<ExecResult> {
  try {
    const { stdout, stderr } = await execFileAsync(file, args, {
      timeout: options?.timeout ?? 30000,
      cwd: options?.cwd,
      encoding: options?.encoding ?? 'utf-8',
      maxBuffer: 10 * 1024 * 1024, // 10MB
    });

    return {
      stdout,
      stderr: stderr.trim(),
      exitCode: 0,
    };
  } catch (error) {
    return describeFailure(error);
  }
}

function describeFailure(error: unknown): ExecResult {
  if (!(error instanceof Error)) {
    return { stdout: '', stderr: String(error), exitCode: 1 };
  }

  const code = 'code' in error ? error.code : undefined;
  const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
  const killed = 'killed' in error && error.killed === true;

  if (typeof code === 'number') {
    return { stdout, stderr: stderr || error.message, exitCode: code };
  }

  if (typeof code === 'string') {
    // Spawn failures follow the shell's convention for missing and non-executable commands
    const exitCode = code === 'ENOENT' ? 127 : code === 'EACCES' ? 126 : 1;
    return { stdout, stderr: stderr || error.message, exitCode, errno: code };
  }

  return {
    stdout,
    stderr: stderr || error.message,
    exitCode: 1,
    ...(killed ? { errno: 'ETIMEDOUT' } : {}),
  };
}
