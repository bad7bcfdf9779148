/**
 * Per-target build pipeline: toolchain, directories, compile, log, stage
 */

import { writeFile } from 'fs/promises';
import {
  BuildError,
  BuildErrorCode,
  BuildPhase,
  StepResult,
  TargetBuildResult,
  TargetDescriptor
} from './types.js';
import { BuildConfig } from './config.js';
import { StepExecutor } from './step-executor.js';
import { ToolchainBootstrapper } from './toolchain.js';
import { artifactPath, composeCompileCommand, describeTarget } from './targets.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('target');

/** Receives compiler output echoed to the console */
export type OutputSink = (text: string) => void;

const stdoutSink: OutputSink = text => {
  process.stdout.write(text);
};

/**
 * Format captured output the way it is logged and echoed: trailing
 * newlines dropped, exactly one appended
 */
export function formatCapturedOutput(output: string): string {
  return `${output.replace(/\n+$/, '')}\n`;
}

/**
 * Runs one target through the pipeline, stopping at the first failing step
 */
export class TargetRunner {
  constructor(
    private readonly config: BuildConfig,
    private readonly executor: StepExecutor,
    private readonly bootstrapper: ToolchainBootstrapper = new ToolchainBootstrapper(config, executor),
    private readonly echo: OutputSink = stdoutSink
  ) {}

  /**
   * Build a target. Step failures are reported in the result with the
   * step's exit code; anything else is thrown.
   */
  async build(target: TargetDescriptor): Promise<TargetBuildResult> {
    const label = describeTarget(target);

    try {
      await this.ensureToolchain(target);
      await this.createDirectories(target);

      logger.step(
        `Compiling ${this.config.libraryName} with ${this.config.compilers[target.platform]} for ${label}`
      );
      const artifact = await this.compile(target);

      await this.stage(artifact);

      logger.success(`Built ${target.outputFileName}`);
      return { target, success: true, exitCode: 0, artifactPath: artifact };
    } catch (error) {
      if (error instanceof BuildError && error.exitCode !== undefined) {
        logger.failure(`${label}: ${error.message}`);
        return { target, success: false, exitCode: error.exitCode, failedPhase: error.phase };
      }
      throw error;
    }
  }

  private async ensureToolchain(target: TargetDescriptor): Promise<void> {
    const result = await this.bootstrapper.ensureToolchain(target);
    this.check(result, BuildErrorCode.ToolchainInstallFailed, BuildPhase.Bootstrap, `toolchain for ${describeTarget(target)}`);
  }

  private async createDirectories(target: TargetDescriptor): Promise<void> {
    for (const dir of [target.intermediateDir, target.outputDir]) {
      const result = await this.executor.makeDirectory(dir);
      this.check(result, BuildErrorCode.DirectoryCreationFailed, BuildPhase.Prepare, dir);
    }
  }

  /**
   * Run the compiler, then persist and echo its output before looking at
   * the exit code
   */
  private async compile(target: TargetDescriptor): Promise<string> {
    const command = composeCompileCommand(this.config, target);
    logger.debug(command);

    const result = await this.executor.run(command);
    const text = formatCapturedOutput(result.output);

    this.echo(text);
    await this.writeLog(target, text);

    this.check(result, BuildErrorCode.CompilationFailed, BuildPhase.Compile, `${target.outputFileName} (see ${target.logFile})`);
    return artifactPath(target);
  }

  private async writeLog(target: TargetDescriptor, text: string): Promise<void> {
    try {
      await writeFile(target.logFile, text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(`${BuildError.getMessageForCode(BuildErrorCode.LogWriteFailed)} ${target.logFile}: ${reason}`);
    }
  }

  /**
   * Copy the artifact to the embedded library directory, then the staging
   * directory. The first failing copy stops staging.
   */
  private async stage(artifact: string): Promise<void> {
    for (const destination of [this.config.embeddedLibDir, this.config.stagingDir]) {
      const result = await this.executor.copyFile(artifact, destination);
      this.check(result, BuildErrorCode.ArtifactCopyFailed, BuildPhase.Stage, `${artifact} -> ${destination}`);
    }
  }

  private check(result: StepResult, code: BuildErrorCode, phase: BuildPhase, details: string): void {
    if (result.success) {
      return;
    }

    if (phase !== BuildPhase.Compile && result.output) {
      logger.error(result.output.trim());
    }

    const exitCode = result.exitCode !== 0 ? result.exitCode : 1;
    throw new BuildError(code, `${details} (exit code ${exitCode})`, phase, undefined, exitCode);
  }
}
