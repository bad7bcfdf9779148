import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync } from 'fs';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { MatrixDriver } from '../build-matrix';
import { BuildConfig, createBuildConfig } from '../config';
import { TargetRunner } from '../target-runner';
import { createTarget } from '../targets';
import { FakeStepExecutor } from '../testing/fake-step-executor';
import { ToolchainBootstrapper } from '../toolchain';
import { Architecture, BuildType, Platform, ToolchainCheck } from '../types';
import { configureLogger } from '../utils/logger';

const INSTALL = 'sudo apt-get -y install g++-multilib';

describe('MatrixDriver', () => {
  let root: string;
  let config: BuildConfig;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'native-build-matrix-'));
    config = createBuildConfig({ rootPath: root }, {}, {});
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function createDriver(executor: FakeStepExecutor, driverConfig: BuildConfig = config): MatrixDriver {
    const runner = new TargetRunner(
      driverConfig,
      executor,
      new ToolchainBootstrapper(driverConfig, executor),
      () => undefined
    );
    return new MatrixDriver(driverConfig, executor, runner);
  }

  it('should build only the 64-bit Linux targets without the 32-bit flag', async () => {
    const executor = new FakeStepExecutor('Linux');

    const exitCode = await createDriver(executor).run({ include32Bit: false });

    expect(exitCode).toBe(0);
    expect(executor.commands[0]).toBe('uname');
    expect(executor.compiledArtifacts).toEqual(['lib_ebm_native_linux_x64.so', 'lib_ebm_native_linux_x64_debug.so']);
    expect(executor.commands.filter(command => command.includes('-m32'))).toEqual([]);
    expect(executor.commands).not.toContain(INSTALL);
  });

  it('should build all four Linux targets in order with the 32-bit flag', async () => {
    const executor = new FakeStepExecutor('Linux');

    const exitCode = await createDriver(executor).run({ include32Bit: true });

    expect(exitCode).toBe(0);
    expect(executor.compiledArtifacts).toEqual([
      'lib_ebm_native_linux_x64.so',
      'lib_ebm_native_linux_x64_debug.so',
      'lib_ebm_native_linux_x86.so',
      'lib_ebm_native_linux_x86_debug.so'
    ]);
    expect((await readdir(config.stagingDir)).sort()).toEqual([
      'lib_ebm_native_linux_x64.so',
      'lib_ebm_native_linux_x64_debug.so',
      'lib_ebm_native_linux_x86.so',
      'lib_ebm_native_linux_x86_debug.so'
    ]);
  });

  it('should create the staging destinations before the first target', async () => {
    const executor = new FakeStepExecutor('Linux');

    await createDriver(executor).run({ include32Bit: false });

    expect(executor.directories.slice(0, 2)).toEqual([config.stagingDir, config.embeddedLibDir]);
  });

  it('should stop at the first failing target and return its exit code', async () => {
    const executor = new FakeStepExecutor('Linux').on(command =>
      command.endsWith('lib_ebm_native_linux_x64_debug.so"') ? { exitCode: 2, output: 'ld: error\n' } : undefined
    );

    const exitCode = await createDriver(executor).run({ include32Bit: true });

    expect(exitCode).toBe(2);
    expect(executor.compiledArtifacts).toEqual(['lib_ebm_native_linux_x64.so', 'lib_ebm_native_linux_x64_debug.so']);
    expect(executor.commands).not.toContain(INSTALL);
    const x86 = createTarget(config, Platform.Linux, Architecture.X86, BuildType.Release);
    expect(existsSync(x86.intermediateDir)).toBe(false);
    expect(await readdir(config.stagingDir)).toEqual(['lib_ebm_native_linux_x64.so']);
  });

  it('should reject an unrecognized host without creating anything', async () => {
    const lines: string[] = [];
    configureLogger({ output: { write: (text: string) => lines.push(text) } });
    const executor = new FakeStepExecutor('Plan9');

    const exitCode = await createDriver(executor).run({ include32Bit: true });

    expect(exitCode).toBe(1);
    expect(executor.commands).toEqual(['uname']);
    expect(executor.directories).toEqual([]);
    expect(existsSync(config.stagingDir)).toBe(false);
    expect(lines.filter(line => line.includes('OS Plan9 not recognized.  We support clang++ on macOS and g++ on Linux'))).toHaveLength(1);
  });

  it('should build for a given platform without probing', async () => {
    const executor = new FakeStepExecutor('Linux');

    const exitCode = await createDriver(executor).run({ hostPlatform: Platform.MacOS, include32Bit: true });

    expect(exitCode).toBe(0);
    expect(executor.commands).not.toContain('uname');
    expect(executor.compiledArtifacts).toEqual(['lib_ebm_native_mac_x64.dylib', 'lib_ebm_native_mac_x64_debug.dylib']);
    expect(executor.compileCommands.every(command => command.startsWith('clang++ '))).toBe(true);
  });

  it('should produce the same artifacts when run twice', async () => {
    const first = new FakeStepExecutor('Linux');
    const second = new FakeStepExecutor('Linux');

    expect(await createDriver(first).run({ include32Bit: false })).toBe(0);
    const afterFirst = await readFile(join(config.stagingDir, 'lib_ebm_native_linux_x64.so'));
    expect(await createDriver(second).run({ include32Bit: false })).toBe(0);

    expect(await readFile(join(config.stagingDir, 'lib_ebm_native_linux_x64.so'))).toEqual(afterFirst);
    expect((await readdir(config.embeddedLibDir)).sort()).toEqual([
      'lib_ebm_native_linux_x64.so',
      'lib_ebm_native_linux_x64_debug.so'
    ]);
  });

  it('should fail before any target when a staging destination cannot be created', async () => {
    await writeFile(config.stagingDir, 'occupied');
    const executor = new FakeStepExecutor('Linux');

    const exitCode = await createDriver(executor).run({ include32Bit: false });

    expect(exitCode).toBe(1);
    expect(executor.compileCommands).toEqual([]);
  });

  describe('first-time 32-bit bootstrap with the directory marker', () => {
    it('should install once on the first run and skip on the second', async () => {
      const markerConfig = createBuildConfig({ rootPath: root, toolchainCheck: ToolchainCheck.Marker }, {}, {});
      const x86Release = createTarget(markerConfig, Platform.Linux, Architecture.X86, BuildType.Release);
      let intermediateExistedAtInstall: boolean | undefined;
      const firstRun = new FakeStepExecutor('Linux').on(command => {
        if (command === INSTALL) {
          intermediateExistedAtInstall = existsSync(x86Release.intermediateDir);
          return { exitCode: 0 };
        }
        return undefined;
      });

      expect(await createDriver(firstRun, markerConfig).run({ include32Bit: true })).toBe(0);
      expect(firstRun.commands.filter(command => command === INSTALL)).toHaveLength(1);
      expect(intermediateExistedAtInstall).toBe(false);
      const installIndex = firstRun.commands.indexOf(INSTALL);
      const firstX86Compile = firstRun.commands.findIndex(command => command.endsWith('lib_ebm_native_linux_x86.so"'));
      expect(installIndex).toBeLessThan(firstX86Compile);
      expect(firstRun.commands.slice(0, installIndex).filter(command => command.includes('-m32'))).toEqual([]);

      const secondRun = new FakeStepExecutor('Linux');
      expect(await createDriver(secondRun, markerConfig).run({ include32Bit: true })).toBe(0);
      expect(secondRun.commands).not.toContain(INSTALL);
    });
  });
});
