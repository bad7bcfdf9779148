/**
 * Core type definitions for the native build system
 */

/** Host platforms the driver knows how to build on */
export enum Platform {
  MacOS = 'macOS',
  Linux = 'Linux'
}

/** Supported CPU architectures */
export enum Architecture {
  X64 = 'x64',
  X86 = 'x86'
}

/** Build flavours produced for every architecture */
export enum BuildType {
  Release = 'release',
  Debug = 'debug'
}

/** Log levels for build process */
export enum LogLevel {
  Error = 'error',
  Warn = 'warn',
  Info = 'info',
  Debug = 'debug',
  Trace = 'trace'
}

/** How the bootstrapper decides whether a cross toolchain is installed */
export enum ToolchainCheck {
  /** Compile a trivial program for the target architecture */
  Probe = 'probe',
  /** Treat an existing intermediate directory as proof of installation */
  Marker = 'marker'
}

/** One concrete (platform, architecture, build type) combination */
export interface TargetDescriptor {
  readonly platform: Platform;
  readonly architecture: Architecture;
  readonly buildType: BuildType;
  /** Artifact file name, unique per triple */
  readonly outputFileName: string;
  readonly intermediateDir: string;
  readonly outputDir: string;
  readonly logFile: string;
  /** Flags layered after the common and platform flags, in order */
  readonly extraFlags: readonly string[];
}

/** Ordered, immutable list of targets for one invocation */
export type BuildMatrix = readonly TargetDescriptor[];

/** Outcome of one pipeline step */
export interface StepResult {
  success: boolean;
  exitCode: number;
  /** Combined stdout/stderr */
  output: string;
}

/** Outcome of running one target through the pipeline */
export interface TargetBuildResult {
  target: TargetDescriptor;
  success: boolean;
  exitCode: number;
  /** Artifact path inside the output directory, set on success */
  artifactPath?: string;
  /** Phase that failed, set on failure */
  failedPhase?: BuildPhase;
}

/** Build phases */
export enum BuildPhase {
  Detect = 'detect',
  Bootstrap = 'bootstrap',
  Prepare = 'prepare',
  Compile = 'compile',
  Stage = 'stage'
}

/** Build error types */
export enum BuildErrorCode {
  // Configuration errors (1000-1099)
  InvalidConfig = 1000,
  UnsupportedPlatform = 1001,

  // Toolchain errors (2000-2099)
  ToolchainInstallFailed = 2001,

  // Pipeline errors (3000-3099)
  DirectoryCreationFailed = 3000,
  CompilationFailed = 3001,
  LogWriteFailed = 3002,
  ArtifactCopyFailed = 3003
}

/** Build error class */
export class BuildError extends Error {
  constructor(
    public readonly code: BuildErrorCode,
    public readonly details: string,
    public readonly phase?: BuildPhase,
    public readonly cause?: Error,
    /** Exit code of the failing step, when the error came from one */
    public readonly exitCode?: number
  ) {
    super(`${BuildError.getMessageForCode(code)}: ${details}`);
    this.name = 'BuildError';
  }

  static getMessageForCode(code: BuildErrorCode): string {
    const messages: Record<BuildErrorCode, string> = {
      [BuildErrorCode.InvalidConfig]: 'Invalid build configuration',
      [BuildErrorCode.UnsupportedPlatform]: 'Unsupported host platform',
      [BuildErrorCode.ToolchainInstallFailed]: 'Toolchain installation failed',
      [BuildErrorCode.DirectoryCreationFailed]: 'Directory creation failed',
      [BuildErrorCode.CompilationFailed]: 'Compilation failed',
      [BuildErrorCode.LogWriteFailed]: 'Failed to write build log',
      [BuildErrorCode.ArtifactCopyFailed]: 'Artifact copy failed'
    };

    return messages[code] || 'Unknown build error';
  }
}

/** CLI command options */
export interface CliOptions {
  /** Also build the 32-bit Linux targets */
  '32bit'?: boolean;
  /** Project root */
  root?: string;
  /** JSON configuration file */
  config?: string;
  /** Toolchain detection strategy */
  toolchainCheck?: string;
  /** Minimum log level */
  logLevel?: string;
}

/** Options of the list-targets command */
export interface ListTargetsOptions extends CliOptions {
  /** Platform to list for instead of the detected host */
  platform?: string;
  /** Print the compile command of every target */
  commands?: boolean;
}
