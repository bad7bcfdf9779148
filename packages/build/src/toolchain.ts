/**
 * One-time bootstrapping of cross-compilation toolchains
 */

import { Architecture, Platform, StepResult, TargetDescriptor, ToolchainCheck } from './types.js';
import { BuildConfig } from './config.js';
import { StepExecutor } from './step-executor.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('toolchain');

/** Key of a (platform, architecture) pair */
export type ToolchainKey = `${Platform}-${Architecture}`;

/** What a non-native target needs installed on the host */
export interface ToolchainRequirement {
  /** System package providing the toolchain */
  packageName: string;
  /** Command installing the package */
  installCommand: string;
  /** Command that succeeds only when the toolchain works */
  probeCommand: (compiler: string) => string;
}

/** Cross toolchains by target */
export const TOOLCHAIN_REQUIREMENTS: Partial<Record<ToolchainKey, ToolchainRequirement>> = {
  'Linux-x86': {
    packageName: 'g++-multilib',
    installCommand: 'sudo apt-get -y install g++-multilib',
    probeCommand: compiler => `echo 'int main() { return 0; }' | ${compiler} -m32 -x c++ - -o /dev/null`
  }
};

const SKIPPED: StepResult = { success: true, exitCode: 0, output: '' };

export function toolchainKey(target: TargetDescriptor): ToolchainKey {
  return `${target.platform}-${target.architecture}`;
}

/**
 * Installs missing cross toolchains at most once per (platform,
 * architecture) within a run
 */
export class ToolchainBootstrapper {
  private readonly satisfied = new Set<ToolchainKey>();

  constructor(
    private readonly config: BuildConfig,
    private readonly executor: StepExecutor,
    private readonly requirements: Partial<Record<ToolchainKey, ToolchainRequirement>> = TOOLCHAIN_REQUIREMENTS
  ) {}

  /**
   * Whether the target is a cross-compilation target
   */
  requiresBootstrap(target: TargetDescriptor): boolean {
    return target.architecture !== this.config.nativeArchitecture;
  }

  /**
   * Make sure the target's toolchain is present, installing it if not.
   * Must run before the target's directories are created.
   */
  async ensureToolchain(target: TargetDescriptor): Promise<StepResult> {
    if (!this.requiresBootstrap(target)) {
      return SKIPPED;
    }

    const key = toolchainKey(target);
    if (this.satisfied.has(key)) {
      return SKIPPED;
    }

    const requirement = this.requirements[key];
    if (!requirement) {
      logger.debug(`No toolchain requirement registered for ${key}`);
      this.satisfied.add(key);
      return SKIPPED;
    }

    if (await this.isInstalled(target, requirement)) {
      logger.debug(`Toolchain for ${key} already installed`);
      this.satisfied.add(key);
      return SKIPPED;
    }

    logger.step(`Doing first time installation of ${target.architecture}`);
    const install = await this.executor.run(requirement.installCommand);
    if (!install.success) {
      return install;
    }

    if (this.config.toolchainCheck === ToolchainCheck.Probe) {
      const verify = await this.executor.run(requirement.probeCommand(this.config.compilers[target.platform]));
      if (!verify.success) {
        return {
          success: false,
          exitCode: verify.exitCode,
          output: `${requirement.packageName} installed but ${key} toolchain still unusable\n${verify.output}`
        };
      }
    }

    logger.success(`Installed ${requirement.packageName}`);
    this.satisfied.add(key);
    return install;
  }

  private async isInstalled(target: TargetDescriptor, requirement: ToolchainRequirement): Promise<boolean> {
    switch (this.config.toolchainCheck) {
      case ToolchainCheck.Marker:
        return this.executor.pathExists(target.intermediateDir);

      case ToolchainCheck.Probe: {
        const probe = await this.executor.run(requirement.probeCommand(this.config.compilers[target.platform]));
        return probe.success;
      }
    }
  }
}
