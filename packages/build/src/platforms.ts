/**
 * Host platform detection
 */

import { Platform } from './types.js';
import { BuildConfig } from './config.js';
import { StepExecutor } from './step-executor.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('platforms');

/** Command whose output names the host operating system */
export const PLATFORM_PROBE_COMMAND = 'uname';

/** `uname` output for each recognized platform */
const OS_NAMES: Record<string, Platform> = {
  Darwin: Platform.MacOS,
  Linux: Platform.Linux
};

/** Platform detection result */
export interface HostDetection {
  /** Raw operating system name reported by the probe */
  osName: string;
  /** Recognized platform, absent when unsupported */
  platform?: Platform;
}

/**
 * Map an operating system name to a supported platform
 */
export function parseHostPlatform(osName: string): Platform | undefined {
  return OS_NAMES[osName.trim()];
}

/**
 * Probe the host operating system through the step executor. A failing
 * probe reports an unrecognized platform.
 */
export async function detectHostPlatform(executor: StepExecutor): Promise<HostDetection> {
  const result = await executor.run(PLATFORM_PROBE_COMMAND);
  const osName = result.success ? result.output.trim() : '';
  const platform = parseHostPlatform(osName);

  logger.debug(`Host operating system: ${osName || '<unknown>'}`);
  return platform ? { osName, platform } : { osName };
}

/**
 * Diagnostic printed for an unsupported host
 */
export function unsupportedPlatformMessage(osName: string, config: BuildConfig): string {
  return (
    `OS ${osName} not recognized.  ` +
    `We support ${config.compilers[Platform.MacOS]} on macOS and ${config.compilers[Platform.Linux]} on Linux`
  );
}
