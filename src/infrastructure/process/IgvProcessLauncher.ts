import { spawn as nodeSpawn, type SpawnOptions } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import net from 'node:net';
import readline from 'node:readline';
import type { Readable } from 'node:stream';
import type { LaunchOptions, ProcessLauncherPort } from '../../domain/ports/ProcessLauncherPort.js';
import type { ProcessRecord } from '../../domain/entities/ProcessRecord.js';
import { PortInUseError, ProcessLaunchError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';
import { probePort, type PortProbe } from './PortProbe.js';

/** launcher 實際用到的子行程介面；node 的 ChildProcess 滿足此介面 */
export interface ChildHandle extends EventEmitter {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  unref(): void;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildHandle;

export type SignalFunction = (pid: number, signal: NodeJS.Signals) => void;

export interface IgvProcessLauncherDeps {
  spawn?: SpawnFunction;
  probe?: PortProbe;
  kill?: SignalFunction;
  /** IGV 輸出的每一行都會轉印到這裡，預設為 stderr */
  echo?: (line: string) => void;
}

/** IGV 綁定 batch port 後印出的訊息 */
export function readyMarker(port: number): string {
  return `Listening on port ${port}`;
}

function unrefStream(stream: Readable | null): void {
  if (stream instanceof net.Socket) stream.unref();
}

function isMissingProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}

/**
 * IGV 子行程啟動器
 *
 * 1. preflight：port 已被占用時直接 PortInUseError，無法判斷時只警告
 * 2. 以 detached 啟動，子行程自成 process group
 * 3. 讀取合併後的 stdout/stderr，直到出現 "Listening on port <port>"
 * 4. unref 子行程與 pipe 後回傳，不 wait、不 reap
 *
 * 預設不設逾時：IGV 不印出 ready 訊息就一直等。
 * 子行程啟動失敗或在 ready 之前結束時改為拋出 ProcessLaunchError。
 */
export class IgvProcessLauncher implements ProcessLauncherPort {
  private readonly spawn: SpawnFunction;
  private readonly probe: PortProbe;
  private readonly kill: SignalFunction;
  private readonly echo: (line: string) => void;
  private readonly logger = new Logger('IgvProcessLauncher');

  constructor(deps: IgvProcessLauncherDeps = {}) {
    this.spawn = deps.spawn ?? ((command, args, options) => nodeSpawn(command, args, options));
    this.probe = deps.probe ?? probePort;
    this.kill = deps.kill ?? ((pid, signal) => {
      process.kill(pid, signal);
    });
    this.echo = deps.echo ?? ((line) => {
      process.stderr.write(`[igv] ${line}\n`);
    });
  }

  async launch(options: LaunchOptions): Promise<ProcessRecord> {
    const { command, port } = options;

    if (options.probePort !== false) {
      await this.preflight(port, options.host ?? '127.0.0.1');
    }

    const args = ['--port', String(port), ...(options.extraArgs ?? [])];
    this.logger.info('Launching IGV', { command, args });

    const child = this.spawn(command, args, {
      cwd: options.cwd,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    await this.waitUntilReady(child, options);

    const pid = child.pid;
    if (pid === undefined) {
      throw new ProcessLaunchError(`${command} reported ready but has no pid`);
    }

    child.unref();
    unrefStream(child.stdout);
    unrefStream(child.stderr);

    this.logger.info('IGV is ready', { pid, processGroupId: pid, port });
    return { pid, processGroupId: pid, port, command };
  }

  terminate(processGroupId: number, signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.logger.warn('Sending signal to IGV process group', { processGroupId, signal });
    try {
      this.kill(-processGroupId, signal);
      return true;
    } catch (err) {
      if (isMissingProcess(err)) {
        this.logger.warn('Process group no longer exists', { processGroupId });
        return false;
      }
      throw err;
    }
  }

  private async preflight(port: number, host: string): Promise<void> {
    const status = await this.probe(port, host);
    switch (status) {
      case 'in-use':
        throw new PortInUseError(port);
      case 'free':
        this.logger.debug('Port is available', { port });
        return;
      case 'unknown':
        this.logger.warn('Cannot tell whether port is in use; launching anyway', { port });
        return;
    }
  }

  private waitUntilReady(child: ChildHandle, options: LaunchOptions): Promise<void> {
    const marker = readyMarker(options.port);

    return new Promise((resolve, reject) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;
      const readers: readline.Interface[] = [];

      const finish = (err?: Error): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        child.removeListener('error', onError);
        child.removeListener('close', onClose);
        if (err) {
          for (const reader of readers) reader.close();
          reject(err);
        } else {
          resolve();
        }
      };

      const onLine = (line: string): void => {
        this.echo(line);
        if (line.includes(marker)) finish();
      };

      const onError = (err: Error): void => {
        finish(new ProcessLaunchError(`Failed to start ${options.command}: ${err.message}`, { cause: err }));
      };

      const onClose = (code: number | null, signal: NodeJS.Signals | null): void => {
        finish(new ProcessLaunchError(
          `${options.command} exited before it was ready (code: ${code}, signal: ${signal})`,
        ));
      };

      // ready 之後 reader 仍保留，持續轉印 IGV 的輸出
      for (const stream of [child.stdout, child.stderr]) {
        if (!stream) continue;
        const reader = readline.createInterface({ input: stream, crlfDelay: Infinity });
        reader.on('line', onLine);
        readers.push(reader);
      }

      child.once('error', onError);
      child.once('close', onClose);

      if (options.readyTimeoutMs !== undefined) {
        const timeoutMs = options.readyTimeoutMs;
        timer = setTimeout(() => {
          this.abandon(child);
          finish(new ProcessLaunchError(
            `${options.command} did not report "${marker}" within ${timeoutMs} ms`,
          ));
        }, timeoutMs);
      }
    });
  }

  /** 逾時放棄時結束已啟動的 group，避免留下孤兒 IGV */
  private abandon(child: ChildHandle): void {
    if (child.pid === undefined) return;
    try {
      this.terminate(child.pid);
    } catch (err) {
      this.logger.warn('Failed to terminate unready IGV', {
        pid: child.pid,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
