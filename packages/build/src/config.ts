/**
 * Build configuration management and constants
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { isAbsolute, join, resolve } from 'path';
import { z } from 'zod';
import {
  Architecture,
  BuildError,
  BuildErrorCode,
  BuildPhase,
  BuildType,
  LogLevel,
  Platform,
  ToolchainCheck
} from './types.js';

/** Default configuration values */
export const DEFAULT_CONFIG = {
  /** Name of the native library being built */
  LIBRARY_NAME: 'ebm_native',

  /** Config file looked up in the project root */
  CONFIG_FILE: 'native-build.config.json',

  /** Default log level */
  LOG_LEVEL: LogLevel.Info,

  /** Architecture the host compiles for without extra packages */
  NATIVE_ARCHITECTURE: Architecture.X64,

  /** Default toolchain detection strategy */
  TOOLCHAIN_CHECK: ToolchainCheck.Probe
};

/** Default file paths, relative to the project root */
export const PATHS = {
  /** Native sources */
  SOURCE_DIR: 'shared/ebm_native',

  /** Library directory embedded in the Python binding */
  EMBEDDED_LIB_DIR: 'python/interpret-core/interpret/lib',

  /** General staging directory for packaging */
  STAGING_DIR: 'staging',

  /** Root of intermediate and binary outputs */
  BUILD_ROOT: 'tmp'
};

/** Compiler driver per host platform */
export const COMPILERS: Readonly<Record<Platform, string>> = {
  [Platform.MacOS]: 'clang++',
  [Platform.Linux]: 'g++'
};

/** Sources compiled into every target, relative to the source directory */
export const SOURCE_FILES: readonly string[] = [
  'DataSetByFeature.cpp',
  'DataSetByFeatureCombination.cpp',
  'InteractionDetection.cpp',
  'Logging.cpp',
  'SamplingWithReplacement.cpp',
  'Boosting.cpp',
  'Discretization.cpp'
];

/** Linux-only build inputs, relative to the source directory */
export const LINUX_BUILD_INPUTS = {
  /** Symbol visibility map passed to the linker */
  EXPORT_MAP: 'ebm_native_exports.txt',
  /** Translation unit providing the wrapped memcpy */
  WRAPPER_SOURCE: 'wrap_func.cpp'
};

/** Warning, language and code generation flags shared by every target */
export const COMMON_FLAGS: readonly string[] = [
  '-Wall',
  '-Wextra',
  '-Wno-parentheses',
  '-Wold-style-cast',
  '-Wdouble-promotion',
  '-Wshadow',
  '-Wformat=2',
  '-std=c++11',
  '-fvisibility=hidden',
  '-fvisibility-inlines-hidden',
  '-O3',
  '-ffast-math',
  '-fno-finite-math-only',
  '-march=core2',
  '-DEBM_NATIVE_EXPORTS',
  '-fpic'
];

/** Compiler flag per architecture */
export const ARCHITECTURE_FLAGS: Readonly<Record<Architecture, string>> = {
  [Architecture.X64]: '-m64',
  [Architecture.X86]: '-m32'
};

/** Build-type flags per platform */
export const BUILD_TYPE_FLAGS: Readonly<Record<Platform, Readonly<Record<BuildType, readonly string[]>>>> = {
  [Platform.MacOS]: {
    [BuildType.Release]: ['-DNDEBUG'],
    [BuildType.Debug]: ['-fsanitize=address,undefined', '-fno-omit-frame-pointer']
  },
  [Platform.Linux]: {
    [BuildType.Release]: ['-DNDEBUG'],
    [BuildType.Debug]: []
  }
};

/** Per-platform naming used in directories and artifact names */
export const PLATFORM_NAMING: Readonly<Record<Platform, { toolchainDir: string; tag: string; extension: string }>> = {
  [Platform.MacOS]: { toolchainDir: 'clang', tag: 'mac', extension: '.dylib' },
  [Platform.Linux]: { toolchainDir: 'gcc', tag: 'linux', extension: '.so' }
};

/** Environment variable names */
export const ENV_VARS = {
  /** Log level */
  LOG_LEVEL: 'NATIVE_BUILD_LOG_LEVEL',

  /** Toolchain detection strategy */
  TOOLCHAIN_CHECK: 'NATIVE_BUILD_TOOLCHAIN_CHECK'
};

/** Resolved, immutable configuration passed through the whole build */
export interface BuildConfig {
  readonly rootPath: string;
  readonly libraryName: string;
  readonly sourceDir: string;
  readonly sourceFiles: readonly string[];
  readonly embeddedLibDir: string;
  readonly stagingDir: string;
  readonly buildRoot: string;
  readonly compilers: Readonly<Record<Platform, string>>;
  readonly nativeArchitecture: Architecture;
  readonly toolchainCheck: ToolchainCheck;
  readonly logLevel: LogLevel;
}

/** Shape of the optional JSON configuration file */
export const configFileSchema = z
  .object({
    compilers: z
      .object({
        [Platform.MacOS]: z.string().min(1).optional(),
        [Platform.Linux]: z.string().min(1).optional()
      })
      .strict()
      .optional(),
    sourceDir: z.string().min(1).optional(),
    embeddedLibDir: z.string().min(1).optional(),
    stagingDir: z.string().min(1).optional(),
    toolchainCheck: z.nativeEnum(ToolchainCheck).optional(),
    logLevel: z.nativeEnum(LogLevel).optional()
  })
  .strict();

export type ConfigFileOptions = z.infer<typeof configFileSchema>;

/** Values that override the defaults, highest precedence last */
export interface ConfigOverrides {
  rootPath?: string;
  toolchainCheck?: string;
  logLevel?: string;
}

/**
 * Load and validate a JSON configuration file
 */
export async function loadConfigFile(filePath: string): Promise<ConfigFileOptions> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new BuildError(
      BuildErrorCode.InvalidConfig,
      `Cannot read config file ${filePath}`,
      BuildPhase.Detect,
      error instanceof Error ? error : undefined
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new BuildError(
      BuildErrorCode.InvalidConfig,
      `Config file ${filePath} is not valid JSON`,
      BuildPhase.Detect,
      error instanceof Error ? error : undefined
    );
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new BuildError(BuildErrorCode.InvalidConfig, `${filePath}: ${issues}`, BuildPhase.Detect);
  }

  return result.data;
}

/**
 * Parse a toolchain check name, rejecting unknown values
 */
export function parseToolchainCheck(value: string): ToolchainCheck {
  const match = Object.values(ToolchainCheck).find(check => check === value);
  if (!match) {
    throw new BuildError(
      BuildErrorCode.InvalidConfig,
      `Invalid toolchain check "${value}", expected one of: ${Object.values(ToolchainCheck).join(', ')}`
    );
  }
  return match;
}

/**
 * Parse a log level name, rejecting unknown values
 */
export function parseLogLevel(value: string): LogLevel {
  const match = Object.values(LogLevel).find(level => level === value);
  if (!match) {
    throw new BuildError(
      BuildErrorCode.InvalidConfig,
      `Invalid log level "${value}", expected one of: ${Object.values(LogLevel).join(', ')}`
    );
  }
  return match;
}

/**
 * Parse a platform name as accepted on the command line
 */
export function parsePlatform(value: string): Platform {
  const match = Object.values(Platform).find(platform => platform.toLowerCase() === value.toLowerCase());
  if (!match) {
    throw new BuildError(
      BuildErrorCode.UnsupportedPlatform,
      `Invalid platform "${value}", expected one of: ${Object.values(Platform).join(', ')}`
    );
  }
  return match;
}

/**
 * Build the immutable configuration from defaults, the config file,
 * environment variables and explicit overrides, in that order
 */
export function createBuildConfig(
  overrides: ConfigOverrides = {},
  fileOptions: ConfigFileOptions = {},
  env: NodeJS.ProcessEnv = process.env
): BuildConfig {
  const rootPath = resolve(overrides.rootPath ?? process.cwd());
  const fromRoot = (path: string): string => (isAbsolute(path) ? path : join(rootPath, path));

  const toolchainCheck =
    overrides.toolchainCheck ?? env[ENV_VARS.TOOLCHAIN_CHECK] ?? fileOptions.toolchainCheck ?? DEFAULT_CONFIG.TOOLCHAIN_CHECK;
  const logLevel = overrides.logLevel ?? env[ENV_VARS.LOG_LEVEL] ?? fileOptions.logLevel ?? DEFAULT_CONFIG.LOG_LEVEL;

  const config: BuildConfig = {
    rootPath,
    libraryName: DEFAULT_CONFIG.LIBRARY_NAME,
    sourceDir: fromRoot(fileOptions.sourceDir ?? PATHS.SOURCE_DIR),
    sourceFiles: Object.freeze([...SOURCE_FILES]),
    embeddedLibDir: fromRoot(fileOptions.embeddedLibDir ?? PATHS.EMBEDDED_LIB_DIR),
    stagingDir: fromRoot(fileOptions.stagingDir ?? PATHS.STAGING_DIR),
    buildRoot: join(rootPath, PATHS.BUILD_ROOT),
    compilers: Object.freeze({
      [Platform.MacOS]: fileOptions.compilers?.[Platform.MacOS] ?? COMPILERS[Platform.MacOS],
      [Platform.Linux]: fileOptions.compilers?.[Platform.Linux] ?? COMPILERS[Platform.Linux]
    }),
    nativeArchitecture: DEFAULT_CONFIG.NATIVE_ARCHITECTURE,
    toolchainCheck: parseToolchainCheck(toolchainCheck),
    logLevel: parseLogLevel(logLevel)
  };

  return Object.freeze(config);
}

/**
 * Resolve the configuration for a CLI invocation, reading the config file
 * when one is named or present in the project root
 */
export async function resolveBuildConfig(
  overrides: ConfigOverrides & { configFile?: string },
  env: NodeJS.ProcessEnv = process.env
): Promise<BuildConfig> {
  const rootPath = resolve(overrides.rootPath ?? process.cwd());
  const defaultFile = join(rootPath, DEFAULT_CONFIG.CONFIG_FILE);
  const configFile = overrides.configFile
    ? resolve(rootPath, overrides.configFile)
    : existsSync(defaultFile)
      ? defaultFile
      : undefined;

  const fileOptions = configFile ? await loadConfigFile(configFile) : {};
  return createBuildConfig({ ...overrides, rootPath }, fileOptions, env);
}
