#!/usr/bin/env node
/**
 * CLI interface for the native build system
 */

import { Command } from 'commander';
import { CliOptions, ListTargetsOptions, Platform } from './types.js';
import { BuildConfig, parsePlatform, resolveBuildConfig } from './config.js';
import { MatrixDriver, UNSUPPORTED_PLATFORM_EXIT_CODE } from './build-matrix.js';
import { detectHostPlatform, unsupportedPlatformMessage } from './platforms.js';
import { ShellStepExecutor, StepExecutor } from './step-executor.js';
import { composeCompileCommand, describeTarget, expandBuildMatrix } from './targets.js';
import { configureLogger, createLogger } from './utils/logger.js';

const logger = createLogger('cli');

/** Process-facing collaborators, replaceable in tests */
export interface CliDependencies {
  createExecutor(rootPath: string): StepExecutor;
  print(line: string): void;
  setExitCode(code: number): void;
}

const defaultDependencies: CliDependencies = {
  createExecutor: rootPath => new ShellStepExecutor(rootPath),
  print: line => {
    process.stdout.write(`${line}\n`);
  },
  setExitCode: code => {
    process.exitCode = code;
  }
};

/**
 * Accept the single-dash `-32bit` spelling of the 32-bit flag
 */
export function normalizeArgv(argv: readonly string[]): string[] {
  return argv.map(arg => (arg === '-32bit' ? '--32bit' : arg));
}

async function loadConfig(options: CliOptions): Promise<BuildConfig> {
  const config = await resolveBuildConfig({
    rootPath: options.root,
    configFile: options.config,
    toolchainCheck: options.toolchainCheck,
    logLevel: options.logLevel
  });
  configureLogger({ level: config.logLevel });
  return config;
}

function reportError(error: unknown): number {
  logger.failure(error instanceof Error ? error.message : String(error));
  return 1;
}

async function runBuild(options: CliOptions, deps: CliDependencies): Promise<number> {
  try {
    const config = await loadConfig(options);
    const driver = new MatrixDriver(config, deps.createExecutor(config.rootPath));
    return await driver.run({ include32Bit: options['32bit'] === true });
  } catch (error) {
    return reportError(error);
  }
}

async function listTargets(options: ListTargetsOptions, deps: CliDependencies): Promise<number> {
  try {
    const config = await loadConfig(options);
    let platform: Platform;
    if (options.platform) {
      platform = parsePlatform(options.platform);
    } else {
      const detection = await detectHostPlatform(deps.createExecutor(config.rootPath));
      if (!detection.platform) {
        deps.print(unsupportedPlatformMessage(detection.osName, config));
        return UNSUPPORTED_PLATFORM_EXIT_CODE;
      }
      platform = detection.platform;
    }

    deps.print(`Build targets for ${platform}:`);
    for (const target of expandBuildMatrix(config, platform, options['32bit'] === true)) {
      deps.print(`  ${describeTarget(target)}: ${target.outputFileName}`);
      if (options.commands) {
        deps.print(`    ${composeCompileCommand(config, target)}`);
      }
    }
    return 0;
  } catch (error) {
    return reportError(error);
  }
}

/**
 * Build the commander program
 */
export function createProgram(deps: CliDependencies = defaultDependencies): Command {
  const program = new Command();

  program
    .name('native-build')
    .description('Build the ebm_native shared library for every target of the host platform')
    .version('0.1.0');

  program
    .command('build', { isDefault: true })
    .description('Compile and stage every target of the build matrix')
    .option('--32bit', 'Also build the 32-bit Linux targets')
    .option('-r, --root <dir>', 'Project root')
    .option('-c, --config <file>', 'JSON configuration file')
    .option('--toolchain-check <strategy>', 'Toolchain detection: probe or marker')
    .option('-l, --log-level <level>', 'Log level (error, warn, info, debug, trace)')
    .action(async (options: CliOptions) => {
      deps.setExitCode(await runBuild(options, deps));
    });

  program
    .command('list-targets')
    .description('List the build matrix without building')
    .option('--32bit', 'Include the 32-bit Linux targets')
    .option('-p, --platform <platform>', 'Platform to list (macOS, Linux)')
    .option('--commands', 'Print the compile command of every target')
    .option('-r, --root <dir>', 'Project root')
    .option('-c, --config <file>', 'JSON configuration file')
    .action(async (options: ListTargetsOptions) => {
      deps.setExitCode(await listTargets(options, deps));
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(normalizeArgv(process.argv))
    .catch((error: unknown) => {
      process.exitCode = reportError(error);
    });
}
