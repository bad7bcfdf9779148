/**
 * Execution of single pipeline steps: shell commands and the filesystem
 * operations around them
 */

import { spawn } from 'child_process';
import { existsSync } from 'fs';
import { copyFile, mkdir } from 'fs/promises';
import { constants } from 'os';
import { basename, join } from 'path';
import { StepResult } from './types.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('step');

/** Exit code reported for failed filesystem steps, as mkdir and cp do */
export const FILESYSTEM_FAILURE_CODE = 1;

/** Exit code reported when a command cannot be started */
export const COMMAND_NOT_FOUND_CODE = 127;

/**
 * Runs one step at a time and reports its outcome. Implementations never
 * retry and never throw for a failing step; callers inspect the exit code.
 */
export interface StepExecutor {
  /** Run a shell command, capturing combined stdout/stderr */
  run(command: string): Promise<StepResult>;
  /** Create a directory and its parents if absent */
  makeDirectory(path: string): Promise<StepResult>;
  /** Copy a file into a directory, keeping its name */
  copyFile(source: string, destinationDir: string): Promise<StepResult>;
  /** Whether a path exists */
  pathExists(path: string): Promise<boolean>;
}

/**
 * Step executor backed by the system shell and the local filesystem
 */
export class ShellStepExecutor implements StepExecutor {
  constructor(
    private readonly cwd: string = process.cwd(),
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * Run a command under the shell with stderr merged into stdout, so the
   * captured text keeps the order the command wrote it in
   */
  run(command: string): Promise<StepResult> {
    logger.trace(`$ ${command}`);

    return new Promise(resolve => {
      const child = spawn(mergeStderr(command), {
        cwd: this.cwd,
        env: this.env,
        shell: true,
        stdio: ['ignore', 'pipe', 'pipe']
      });

      // Decoded once at the end; a chunk may split a multi-byte character
      const chunks: Buffer[] = [];
      const collect = (data: Buffer): void => {
        chunks.push(data);
      };
      child.stdout?.on('data', collect);
      child.stderr?.on('data', collect);

      child.on('error', error => {
        resolve({
          success: false,
          exitCode: COMMAND_NOT_FOUND_CODE,
          output: Buffer.concat(chunks).toString('utf8') + error.message
        });
      });

      child.on('close', (code, signal) => {
        const exitCode = code ?? (signal ? 128 + constants.signals[signal] : 1);
        resolve({ success: exitCode === 0, exitCode, output: Buffer.concat(chunks).toString('utf8') });
      });
    });
  }

  async makeDirectory(path: string): Promise<StepResult> {
    try {
      await mkdir(path, { recursive: true });
      return { success: true, exitCode: 0, output: '' };
    } catch (error) {
      return {
        success: false,
        exitCode: FILESYSTEM_FAILURE_CODE,
        output: `mkdir: cannot create directory '${path}': ${describeError(error)}`
      };
    }
  }

  async copyFile(source: string, destinationDir: string): Promise<StepResult> {
    const destination = join(destinationDir, basename(source));
    try {
      await copyFile(source, destination);
      return { success: true, exitCode: 0, output: '' };
    } catch (error) {
      return {
        success: false,
        exitCode: FILESYSTEM_FAILURE_CODE,
        output: `cp: cannot copy '${source}' to '${destination}': ${describeError(error)}`
      };
    }
  }

  async pathExists(path: string): Promise<boolean> {
    return existsSync(path);
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Group the command so the redirect covers every part of a list or pipeline
 */
function mergeStderr(command: string): string {
  return `{ ${command}\n} 2>&1`;
}
