import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdir, mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { BuildConfig, createBuildConfig } from '../config';
import { createTarget } from '../targets';
import { FakeStepExecutor } from '../testing/fake-step-executor';
import { ToolchainBootstrapper } from '../toolchain';
import { Architecture, BuildType, Platform, ToolchainCheck } from '../types';

const INSTALL = 'sudo apt-get -y install g++-multilib';
const PROBE = "echo 'int main() { return 0; }' | g++ -m32 -x c++ - -o /dev/null";

describe('ToolchainBootstrapper', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'native-build-toolchain-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function configFor(check: ToolchainCheck): BuildConfig {
    return createBuildConfig({ rootPath: root, toolchainCheck: check }, {}, {});
  }

  it('should skip native targets without running anything', async () => {
    const config = configFor(ToolchainCheck.Probe);
    const executor = new FakeStepExecutor();
    const bootstrapper = new ToolchainBootstrapper(config, executor);
    const target = createTarget(config, Platform.Linux, Architecture.X64, BuildType.Release);

    expect(bootstrapper.requiresBootstrap(target)).toBe(false);
    await expect(bootstrapper.ensureToolchain(target)).resolves.toEqual({ success: true, exitCode: 0, output: '' });
    expect(executor.commands).toEqual([]);
  });

  describe('probe check', () => {
    it('should not install when the probe succeeds', async () => {
      const config = configFor(ToolchainCheck.Probe);
      const executor = new FakeStepExecutor();
      const bootstrapper = new ToolchainBootstrapper(config, executor);

      const result = await bootstrapper.ensureToolchain(
        createTarget(config, Platform.Linux, Architecture.X86, BuildType.Release)
      );

      expect(result.success).toBe(true);
      expect(executor.commands).toEqual([PROBE]);
    });

    it('should install once, verify, and skip later targets of the same architecture', async () => {
      const config = configFor(ToolchainCheck.Probe);
      let installed = false;
      const executor = new FakeStepExecutor().on(command => {
        if (command === INSTALL) {
          installed = true;
          return { output: 'Setting up g++-multilib\n' };
        }
        if (command === PROBE) {
          return installed ? { exitCode: 0 } : { exitCode: 1, output: 'cannot find -lstdc++\n' };
        }
        return undefined;
      });
      const bootstrapper = new ToolchainBootstrapper(config, executor);

      const release = await bootstrapper.ensureToolchain(
        createTarget(config, Platform.Linux, Architecture.X86, BuildType.Release)
      );
      const debug = await bootstrapper.ensureToolchain(
        createTarget(config, Platform.Linux, Architecture.X86, BuildType.Debug)
      );

      expect(release).toEqual({ success: true, exitCode: 0, output: 'Setting up g++-multilib\n' });
      expect(debug.success).toBe(true);
      expect(executor.commands).toEqual([PROBE, INSTALL, PROBE]);
    });

    it('should return the installer failure unchanged', async () => {
      const config = configFor(ToolchainCheck.Probe);
      const executor = new FakeStepExecutor().on(command => {
        if (command === INSTALL) return { exitCode: 100, output: 'E: Unable to locate package\n' };
        if (command === PROBE) return { exitCode: 1 };
        return undefined;
      });
      const bootstrapper = new ToolchainBootstrapper(config, executor);

      const result = await bootstrapper.ensureToolchain(
        createTarget(config, Platform.Linux, Architecture.X86, BuildType.Release)
      );

      expect(result).toEqual({ success: false, exitCode: 100, output: 'E: Unable to locate package\n' });
    });

    it('should fail when the toolchain is still unusable after installing', async () => {
      const config = configFor(ToolchainCheck.Probe);
      const executor = new FakeStepExecutor().on(command =>
        command === PROBE ? { exitCode: 1, output: 'cannot find -lstdc++\n' } : undefined
      );
      const bootstrapper = new ToolchainBootstrapper(config, executor);

      const result = await bootstrapper.ensureToolchain(
        createTarget(config, Platform.Linux, Architecture.X86, BuildType.Release)
      );

      expect(result).toEqual({
        success: false,
        exitCode: 1,
        output: 'g++-multilib installed but Linux-x86 toolchain still unusable\ncannot find -lstdc++\n'
      });
      expect(executor.commands).toEqual([PROBE, INSTALL, PROBE]);
    });
  });

  describe('marker check', () => {
    it('should install when the intermediate directory is absent and skip once it exists', async () => {
      const config = configFor(ToolchainCheck.Marker);
      const target = createTarget(config, Platform.Linux, Architecture.X86, BuildType.Release);

      const firstRun = new FakeStepExecutor();
      await expect(new ToolchainBootstrapper(config, firstRun).ensureToolchain(target)).resolves.toMatchObject({
        success: true
      });
      expect(firstRun.commands).toEqual([INSTALL]);

      await mkdir(target.intermediateDir, { recursive: true });

      const secondRun = new FakeStepExecutor();
      await new ToolchainBootstrapper(config, secondRun).ensureToolchain(target);
      expect(secondRun.commands).toEqual([]);
    });
  });
});
