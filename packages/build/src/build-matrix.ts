/**
 * Build matrix orchestration
 */

import { BuildMatrix, Platform } from './types.js';
import { BuildConfig } from './config.js';
import { detectHostPlatform, unsupportedPlatformMessage } from './platforms.js';
import { StepExecutor } from './step-executor.js';
import { TargetRunner } from './target-runner.js';
import { describeTarget, expandBuildMatrix, supports32Bit } from './targets.js';
import { createLogger, ProgressReporter } from './utils/logger.js';

const logger = createLogger('build-matrix');

/** Exit code for an unrecognized host */
export const UNSUPPORTED_PLATFORM_EXIT_CODE = 1;

export interface MatrixRunOptions {
  /** Skip detection and build for this platform */
  hostPlatform?: Platform;
  /** Append the 32-bit targets where the platform has them */
  include32Bit: boolean;
}

/**
 * Expands the matrix for the host and runs every target in order,
 * stopping at the first failure
 */
export class MatrixDriver {
  constructor(
    private readonly config: BuildConfig,
    private readonly executor: StepExecutor,
    private readonly runner: TargetRunner = new TargetRunner(config, executor)
  ) {}

  /**
   * Run the matrix and return the process exit code: 0 when every target
   * built, otherwise the first failing step's code
   */
  async run(options: MatrixRunOptions): Promise<number> {
    const platform = options.hostPlatform ?? (await this.detectPlatform());
    if (!platform) {
      return UNSUPPORTED_PLATFORM_EXIT_CODE;
    }

    if (options.include32Bit && !supports32Bit(platform)) {
      logger.debug(`32-bit targets are not built on ${platform}`);
    }

    const matrix = expandBuildMatrix(this.config, platform, options.include32Bit);

    logger.info('Creating initial directories');
    for (const dir of [this.config.stagingDir, this.config.embeddedLibDir]) {
      const result = await this.executor.makeDirectory(dir);
      if (!result.success) {
        logger.failure(result.output);
        return result.exitCode;
      }
    }

    return this.runMatrix(matrix);
  }

  private async runMatrix(matrix: BuildMatrix): Promise<number> {
    const progress = new ProgressReporter('Build matrix', matrix.length, logger);

    for (const target of matrix) {
      progress.update(1, describeTarget(target));

      const result = await this.runner.build(target);
      if (!result.success) {
        progress.fail(`${describeTarget(target)} exited with code ${result.exitCode}`);
        return result.exitCode;
      }
    }

    progress.complete(`${matrix.length} targets built`);
    return 0;
  }

  private async detectPlatform(): Promise<Platform | undefined> {
    const detection = await detectHostPlatform(this.executor);
    if (!detection.platform) {
      logger.failure(unsupportedPlatformMessage(detection.osName, this.config));
    }
    return detection.platform;
  }
}
