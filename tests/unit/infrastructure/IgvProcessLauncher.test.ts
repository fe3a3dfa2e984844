import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import {
  IgvProcessLauncher,
  readyMarker,
  type ChildHandle,
  type SpawnFunction,
} from '../../../src/infrastructure/process/IgvProcessLauncher.js';
import type { PortProbe } from '../../../src/infrastructure/process/PortProbe.js';
import { PortInUseError, ProcessLaunchError } from '../../../src/domain/errors/DomainErrors.js';

class FakeChild extends EventEmitter implements ChildHandle {
  readonly pid = 4242;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly unref = vi.fn();
}

function setup(options: { onSpawn?: (child: FakeChild) => void; probe?: PortProbe } = {}) {
  const child = new FakeChild();
  const spawn = vi.fn<SpawnFunction>(() => {
    setImmediate(() => options.onSpawn?.(child));
    return child;
  });
  const probe = vi.fn<PortProbe>(options.probe ?? (async () => 'free'));
  const kill = vi.fn();
  const echo = vi.fn();
  const launcher = new IgvProcessLauncher({ spawn, probe, kill, echo });
  return { child, spawn, probe, kill, echo, launcher };
}

/**
 * Feature: 啟動 IGV 子行程
 *
 * 作為使用者，我需要啟動一個新的 IGV，
 * 等它開始 listen batch port 後再連線。
 */
describe('IgvProcessLauncher', () => {
  it('should build the ready marker from the port', () => {
    expect(readyMarker(60151)).toBe('Listening on port 60151');
  });

  /**
   * Scenario: 等到 ready 訊息
   * Given IGV 在 stdout 印出 "Listening on port 60151"
   * When launch
   * Then 回傳 pid 與 process group id，子行程已 unref
   */
  it('should resolve once IGV reports the batch port', async () => {
    const { child, spawn, echo, launcher } = setup({
      onSpawn: (c) => {
        c.stderr.write('INFO Starting IGV\n');
        c.stdout.write('INFO [CommandListener] Listening on port 60151\n');
      },
    });

    const record = await launcher.launch({ command: 'igv', port: 60151, extraArgs: ['-g', 'hg19'] });

    expect(record).toEqual({ pid: 4242, processGroupId: 4242, port: 60151, command: 'igv' });
    expect(spawn).toHaveBeenCalledWith('igv', ['--port', '60151', '-g', 'hg19'], {
      cwd: undefined,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    expect(echo).toHaveBeenCalledWith('INFO [CommandListener] Listening on port 60151');
    expect(child.unref).toHaveBeenCalledTimes(1);
  });

  it('should ignore the marker for a different port', async () => {
    const { launcher } = setup({
      onSpawn: (c) => {
        c.stdout.write('Listening on port 60152\n');
        c.emit('close', 1, null);
      },
    });

    await expect(launcher.launch({ command: 'igv', port: 60151 })).rejects.toThrow(
      'igv exited before it was ready (code: 1, signal: null)',
    );
  });

  it('should refuse to launch when the port is in use', async () => {
    const { spawn, launcher } = setup({ probe: async () => 'in-use' });

    await expect(launcher.launch({ command: 'igv', port: 60151 })).rejects.toThrow(PortInUseError);
    expect(spawn).not.toHaveBeenCalled();
  });

  it('should launch anyway when the port status is unknown', async () => {
    const { launcher } = setup({
      probe: async () => 'unknown',
      onSpawn: (c) => c.stdout.write('Listening on port 60151\n'),
    });

    await expect(launcher.launch({ command: 'igv', port: 60151 })).resolves.toMatchObject({ pid: 4242 });
  });

  it('should skip the probe when disabled', async () => {
    const { probe, launcher } = setup({
      onSpawn: (c) => c.stdout.write('Listening on port 60151\n'),
    });

    await launcher.launch({ command: 'igv', port: 60151, probePort: false });
    expect(probe).not.toHaveBeenCalled();
  });

  it('should probe the given host', async () => {
    const { probe, launcher } = setup({
      onSpawn: (c) => c.stdout.write('Listening on port 60151\n'),
    });

    await launcher.launch({ command: 'igv', port: 60151, host: 'localhost' });
    expect(probe).toHaveBeenCalledWith(60151, 'localhost');
  });

  it('should reject when the executable cannot be started', async () => {
    const { launcher } = setup({
      onSpawn: (c) => c.emit('error', new Error('spawn igv ENOENT')),
    });

    const result = launcher.launch({ command: 'igv', port: 60151 });
    await expect(result).rejects.toThrow(ProcessLaunchError);
    await expect(result).rejects.toThrow('Failed to start igv: spawn igv ENOENT');
  });

  /**
   * Scenario: ready 逾時
   * Given readyTimeoutMs 為 20，IGV 一直沒印出 ready 訊息
   * When launch
   * Then 拋出 ProcessLaunchError，並結束剛啟動的 process group
   */
  it('should give up and terminate after the ready timeout', async () => {
    const { kill, launcher } = setup();

    await expect(launcher.launch({ command: 'igv', port: 60151, readyTimeoutMs: 20 })).rejects.toThrow(
      'igv did not report "Listening on port 60151" within 20 ms',
    );
    expect(kill).toHaveBeenCalledWith(-4242, 'SIGTERM');
  });

  describe('terminate', () => {
    it('should signal the whole process group', () => {
      const { kill, launcher } = setup();
      expect(launcher.terminate(4242)).toBe(true);
      expect(kill).toHaveBeenCalledWith(-4242, 'SIGTERM');
    });

    it('should return false when the group is gone', () => {
      const { kill, launcher } = setup();
      kill.mockImplementation(() => {
        throw Object.assign(new Error('kill ESRCH'), { code: 'ESRCH' });
      });
      expect(launcher.terminate(4242, 'SIGKILL')).toBe(false);
    });

    it('should rethrow other errors', () => {
      const { kill, launcher } = setup();
      kill.mockImplementation(() => {
        throw Object.assign(new Error('kill EPERM'), { code: 'EPERM' });
      });
      expect(() => launcher.terminate(4242)).toThrow('kill EPERM');
    });
  });
});
