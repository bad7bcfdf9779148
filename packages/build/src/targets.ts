/**
 * Build matrix expansion and compiler command composition
 */

import { join } from 'path';
import {
  Architecture,
  BuildMatrix,
  BuildType,
  Platform,
  TargetDescriptor
} from './types.js';
import {
  ARCHITECTURE_FLAGS,
  BUILD_TYPE_FLAGS,
  BuildConfig,
  COMMON_FLAGS,
  LINUX_BUILD_INPUTS,
  PLATFORM_NAMING
} from './config.js';

/** Architectures built on each platform, 64-bit first */
const PLATFORM_ARCHITECTURES: Record<Platform, { default: Architecture[]; with32Bit: Architecture[] }> = {
  [Platform.MacOS]: {
    default: [Architecture.X64],
    with32Bit: [Architecture.X64]
  },
  [Platform.Linux]: {
    default: [Architecture.X64],
    with32Bit: [Architecture.X64, Architecture.X86]
  }
};

/** Build types in build order */
const BUILD_ORDER: readonly BuildType[] = [BuildType.Release, BuildType.Debug];

/**
 * Quote a path for the shell, the way it appears in a compile command
 */
export function quote(path: string): string {
  return `"${path.replace(/(["\\$`])/g, '\\$1')}"`;
}

/**
 * Whether a platform has 32-bit targets
 */
export function supports32Bit(platform: Platform): boolean {
  return PLATFORM_ARCHITECTURES[platform].with32Bit.includes(Architecture.X86);
}

/**
 * Create the descriptor of a single target
 */
export function createTarget(
  config: BuildConfig,
  platform: Platform,
  architecture: Architecture,
  buildType: BuildType
): TargetDescriptor {
  const naming = PLATFORM_NAMING[platform];
  const library = config.libraryName;
  const debugSuffix = buildType === BuildType.Debug ? '_debug' : '';
  const outputFileName = `lib_${library}_${naming.tag}_${architecture}${debugSuffix}${naming.extension}`;
  const layout = [buildType, naming.tag, architecture, library];

  const intermediateDir = join(config.buildRoot, naming.toolchainDir, 'intermediate', ...layout);
  const outputDir = join(config.buildRoot, naming.toolchainDir, 'bin', ...layout);
  const logFile = join(intermediateDir, `${library}_${buildType}_${naming.tag}_${architecture}_build_log.txt`);

  const extraFlags = [ARCHITECTURE_FLAGS[architecture], ...BUILD_TYPE_FLAGS[platform][buildType]];
  if (platform === Platform.MacOS) {
    extraFlags.push('-install_name', `@rpath/${outputFileName}`);
  }

  return Object.freeze({
    platform,
    architecture,
    buildType,
    outputFileName,
    intermediateDir,
    outputDir,
    logFile,
    extraFlags: Object.freeze(extraFlags)
  });
}

/**
 * Expand the ordered build matrix for a platform: release before debug,
 * 64-bit before 32-bit, 32-bit only on request and only where supported
 */
export function expandBuildMatrix(
  config: BuildConfig,
  platform: Platform,
  include32Bit: boolean
): BuildMatrix {
  const architectures = include32Bit
    ? PLATFORM_ARCHITECTURES[platform].with32Bit
    : PLATFORM_ARCHITECTURES[platform].default;

  const targets: TargetDescriptor[] = [];
  for (const architecture of architectures) {
    for (const buildType of BUILD_ORDER) {
      targets.push(createTarget(config, platform, architecture, buildType));
    }
  }

  return Object.freeze(targets);
}

/**
 * Flags shared by every target: sources, include paths and code generation
 */
export function commonFlags(config: BuildConfig): string[] {
  return [
    ...config.sourceFiles.map(file => quote(join(config.sourceDir, file))),
    `-I${quote(config.sourceDir)}`,
    `-I${quote(join(config.sourceDir, 'inc'))}`,
    ...COMMON_FLAGS
  ];
}

/**
 * Flags layered on the common set for a platform. The Linux set wraps
 * memcpy and links the wrapper translation unit.
 */
export function platformFlags(config: BuildConfig, platform: Platform): string[] {
  switch (platform) {
    case Platform.MacOS:
      return ['-Wnull-dereference', '-Wgnu-zero-variadic-macro-arguments', '-dynamiclib'];

    case Platform.Linux:
      return [
        '-Wlogical-op',
        `-Wl,--version-script=${quote(join(config.sourceDir, LINUX_BUILD_INPUTS.EXPORT_MAP))}`,
        '-Wl,--exclude-libs,ALL',
        '-Wl,-z,relro,-z,now',
        '-Wl,--wrap=memcpy',
        quote(join(config.sourceDir, LINUX_BUILD_INPUTS.WRAPPER_SOURCE)),
        '-static-libgcc',
        '-static-libstdc++',
        '-shared'
      ];
  }
}

/**
 * Path of the artifact a target produces
 */
export function artifactPath(target: TargetDescriptor): string {
  return join(target.outputDir, target.outputFileName);
}

/**
 * Compose the single compiler/linker command for a target
 */
export function composeCompileCommand(config: BuildConfig, target: TargetDescriptor): string {
  return [
    config.compilers[target.platform],
    ...commonFlags(config),
    ...platformFlags(config, target.platform),
    ...target.extraFlags,
    '-o',
    quote(artifactPath(target))
  ].join(' ');
}

/**
 * Human readable target label, e.g. "Linux release|x64"
 */
export function describeTarget(target: TargetDescriptor): string {
  return `${target.platform} ${target.buildType}|${target.architecture}`;
}
